/**
 * GNS administrative regions reader
 */

import type { Readable } from 'node:stream'
import { Effect, Schema } from 'effect'
import type { RawAdministrativeRecord, RecordReadResult } from '@/types/division.types'
import type { InputError } from '@/types/errors'
import {
  type DelimitedFormat,
  type DelimitedReadResult,
  parseDelimited,
  readDelimitedFile,
} from './delimited'
import { classifyNameType, emptyToNull, parseDecimal, parseInteger } from './parse'

export const GnsRow = Schema.Struct({
  ufi: Schema.NumberFromString.pipe(Schema.int()),
  uni: Schema.String,
  full_name: Schema.String,
  nt: Schema.String,
  lat_dd: Schema.String,
  long_dd: Schema.String,
  desig_cd: Schema.String,
  cc_ft: Schema.String,
  adm1: Schema.String,
  name_rank: Schema.String,
  lang_cd: Schema.String,
  transl_cd: Schema.String,
  script_cd: Schema.String,
  display: Schema.String,
  generic: Schema.String,
})

export type GnsRow = typeof GnsRow.Type

export const GNS_FORMAT: DelimitedFormat<GnsRow, typeof GnsRow.Encoded> = {
  delimiter: '\t',
  quoted: false,
  requiredColumns: Object.keys(GnsRow.fields),
  schema: GnsRow,
}

export function toRawRecord(row: GnsRow): RawAdministrativeRecord {
  return {
    featureId: row.ufi,
    nameId: parseInteger(row.uni),
    designationCode: row.desig_cd.trim(),
    nameText: row.full_name,
    nameType: classifyNameType(row.nt),
    nameTypeCode: row.nt.trim(),
    nameRank: parseDecimal(row.name_rank),
    languageCode: emptyToNull(row.lang_cd),
    latitude: parseDecimal(row.lat_dd),
    longitude: parseDecimal(row.long_dd),
    countryCode: row.cc_ft.trim(),
    parentDivisionCode: row.adm1.trim(),
    displayFlag: row.display,
    transliterationCode: row.transl_cd,
    scriptCode: row.script_cd,
    genericTerm: row.generic,
  }
}

function toReadResult(result: DelimitedReadResult<GnsRow>): RecordReadResult {
  return {
    records: result.rows.map(toRawRecord),
    totalRows: result.totalRows,
    malformedRows: result.malformedRows,
  }
}

export async function parseRecords(input: Readable, source: string): Promise<RecordReadResult> {
  return toReadResult(await parseDelimited(input, source, GNS_FORMAT))
}

export const readAdministrativeRecords = (
  path: string,
): Effect.Effect<RecordReadResult, InputError> =>
  readDelimitedFile(path, 'administrative regions', GNS_FORMAT).pipe(Effect.map(toReadResult))
