import { Effect, Either, Schema } from 'effect'
import { classifyNameType, emptyToNull } from '@/import/read/parse'
import { SHEET_NAMES } from '@/report/columns'
import { readWorkbookSheet } from '@/report/workbook'
import type { PublishedDivision } from '@/types/division.types'
import { type InputError, InvalidInputError } from '@/types/errors'

// Spreadsheet editors may turn text cells into numbers
const TextCell = Schema.transform(
  Schema.NullOr(Schema.Union(Schema.String, Schema.Number)),
  Schema.String,
  {
    strict: true,
    decode: (value) => (value === null ? '' : String(value)),
    encode: (value) => value,
  },
)

export const DivisionSheetRow = Schema.Struct({
  Country_Code: TextCell,
  Country_Name: TextCell,
  Country_Full_Name: TextCell,
  Administrative_Level: TextCell,
  Administrative_Name: TextCell,
  ADM1_Code: TextCell,
  latitude: Schema.Number,
  longitude: Schema.Number,
  Unique_Feature_ID: Schema.Number.pipe(Schema.int()),
  Unique_Name_ID: Schema.NullOr(Schema.Number.pipe(Schema.int())),
  Name_Type: TextCell,
  Name_Rank: Schema.NullOr(Schema.Number),
  Language_Code: TextCell,
  Transliteration_Code: TextCell,
  Script_Code: TextCell,
  Generic_Term: TextCell,
})

export type DivisionSheetRow = typeof DivisionSheetRow.Type

const decodeDivisionRow = Schema.decodeUnknownEither(DivisionSheetRow)

export function fromDivisionRow(row: DivisionSheetRow): PublishedDivision {
  return {
    featureId: row.Unique_Feature_ID,
    nameId: row.Unique_Name_ID,
    designationCode: row.Administrative_Level,
    nameText: row.Administrative_Name,
    nameType: classifyNameType(row.Name_Type),
    nameTypeCode: row.Name_Type,
    nameRank: row.Name_Rank,
    languageCode: emptyToNull(row.Language_Code),
    latitude: row.latitude,
    longitude: row.longitude,
    countryCode: row.Country_Code,
    countryName: row.Country_Name,
    countryFullName: row.Country_Full_Name,
    parentDivisionCode: row.ADM1_Code,
    transliterationCode: row.Transliteration_Code,
    scriptCode: row.Script_Code,
    genericTerm: row.Generic_Term,
  }
}

/**
 * Decode sheet rows into divisions. The workbook is this tool's own output,
 * so any row that does not decode is an error.
 */
export function decodeDivisionRows(
  rows: readonly unknown[],
  source: string,
): Either.Either<PublishedDivision[], InvalidInputError> {
  const divisions: PublishedDivision[] = []

  for (const [index, row] of rows.entries()) {
    const decoded = decodeDivisionRow(row)
    if (Either.isLeft(decoded)) {
      return Either.left(
        new InvalidInputError(
          `${source} row ${index + 2} is not a division row: ${decoded.left.message}`,
          source,
        ),
      )
    }
    divisions.push(fromDivisionRow(decoded.right))
  }

  return Either.right(divisions)
}

/**
 * Load the full division list from a report workbook
 */
export const loadPublishedDivisions = (
  path: string,
): Effect.Effect<PublishedDivision[], InputError> =>
  readWorkbookSheet(path, SHEET_NAMES.ALL_DIVISIONS).pipe(
    Effect.flatMap((rows) => {
      const decoded = decodeDivisionRows(rows, path)
      return Either.isLeft(decoded) ? Effect.fail(decoded.left) : Effect.succeed(decoded.right)
    }),
  )
