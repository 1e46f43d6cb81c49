/**
 * Country reference reader
 */

import type { Readable } from 'node:stream'
import { Effect, Schema } from 'effect'
import type { CountryInfo, CountryReference } from '@/types/division.types'
import type { InputError } from '@/types/errors'
import { type DelimitedFormat, parseDelimited, readDelimitedFile } from './delimited'

const CountryRow = Schema.Struct({
  Country_Code: Schema.Trim.pipe(Schema.nonEmptyString()),
  Short_Name: Schema.Trim,
  Full_Name: Schema.Trim,
})

type CountryRow = typeof CountryRow.Type

const COUNTRY_FORMAT: DelimitedFormat<CountryRow, typeof CountryRow.Encoded> = {
  delimiter: ',',
  quoted: true,
  requiredColumns: Object.keys(CountryRow.fields),
  schema: CountryRow,
}

/**
 * Build the immutable country reference. The first row for a code wins.
 */
export function buildCountryReference(rows: readonly CountryRow[]): CountryReference {
  const reference = new Map<string, CountryInfo>()
  for (const row of rows) {
    if (!reference.has(row.Country_Code)) {
      reference.set(row.Country_Code, { shortName: row.Short_Name, fullName: row.Full_Name })
    }
  }
  return reference
}

export async function parseCountryReference(
  input: Readable,
  source: string,
): Promise<CountryReference> {
  const { rows } = await parseDelimited(input, source, COUNTRY_FORMAT)
  return buildCountryReference(rows)
}

export const readCountryReference = (path: string): Effect.Effect<CountryReference, InputError> =>
  readDelimitedFile(path, 'country codes', COUNTRY_FORMAT).pipe(
    Effect.map(({ rows }) => buildCountryReference(rows)),
  )
