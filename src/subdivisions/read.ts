/**
 * ADM1 code list reader
 */

import { Effect, Schema } from 'effect'
import { type DelimitedFormat, readDelimitedFile } from '@/import/read/delimited'
import type { CountryReference } from '@/types/division.types'
import type { InputError } from '@/types/errors'
import type { Subdivision } from '@/types/subdivision.types'

const SubdivisionRow = Schema.Struct({
  Country_Code: Schema.Trim,
  First_Order_Administrative_Subdivision_Code: Schema.Trim.pipe(Schema.nonEmptyString()),
  Name: Schema.Trim,
  GENC_Short_URN_based_Identifier: Schema.Trim,
})

type SubdivisionRow = typeof SubdivisionRow.Type

const SUBDIVISION_FORMAT: DelimitedFormat<SubdivisionRow, typeof SubdivisionRow.Encoded> = {
  delimiter: ',',
  quoted: true,
  requiredColumns: Object.keys(SubdivisionRow.fields),
  schema: SubdivisionRow,
}

export function toSubdivision(row: SubdivisionRow, countries: CountryReference): Subdivision {
  const country = countries.get(row.Country_Code)
  return {
    countryCode: row.Country_Code,
    countryName: country?.shortName ?? '',
    countryFullName: country?.fullName ?? '',
    subdivisionCode: row.First_Order_Administrative_Subdivision_Code,
    subdivisionName: row.Name,
    gencUrn: row.GENC_Short_URN_based_Identifier,
  }
}

export const readSubdivisions = (
  path: string,
  countries: CountryReference,
): Effect.Effect<Subdivision[], InputError> =>
  readDelimitedFile(path, 'ADM1 codes', SUBDIVISION_FORMAT).pipe(
    Effect.map(({ rows }) => rows.map((row) => toSubdivision(row, countries))),
  )
