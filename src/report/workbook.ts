/**
 * Spreadsheet serialization of report views
 */

import { readFile } from 'node:fs/promises'
import { Effect } from 'effect'
import * as XLSX from 'xlsx'
import { ensureReadable, writeFileAtomic } from '@/import/utils/files'
import { type InputError, InvalidInputError, ReportWriteError, toError } from '@/types/errors'
import type { SheetView } from '@/types/report.types'

export function buildWorkbook(views: readonly SheetView[]): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new()
  for (const view of views) {
    const sheet = XLSX.utils.aoa_to_sheet([view.header, ...view.rows])
    XLSX.utils.book_append_sheet(workbook, sheet, view.name)
  }
  return workbook
}

export function serializeWorkbook(workbook: XLSX.WorkBook): Uint8Array {
  const data: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' })
  if (!(data instanceof Uint8Array)) {
    throw new Error('Spreadsheet writer did not produce a buffer')
  }
  return data
}

export const writeWorkbook = (
  views: readonly SheetView[],
  path: string,
): Effect.Effect<void, ReportWriteError> =>
  Effect.gen(function* () {
    const data = yield* Effect.try({
      try: () => serializeWorkbook(buildWorkbook(views)),
      catch: (error) =>
        new ReportWriteError(`Failed to build workbook ${path}: ${toError(error).message}`, error),
    })
    yield* writeFileAtomic(path, data)
  })

/**
 * Read one sheet as header-keyed rows; empty cells come back as null
 */
export const readWorkbookSheet = (
  path: string,
  sheetName: string,
): Effect.Effect<unknown[], InputError> =>
  Effect.gen(function* () {
    yield* ensureReadable(path, 'report workbook')

    const workbook = yield* Effect.tryPromise({
      try: async () => XLSX.read(await readFile(path), { type: 'buffer' }),
      catch: (error) =>
        new InvalidInputError(`Failed to read workbook ${path}: ${toError(error).message}`, path),
    })

    const sheet = workbook.Sheets[sheetName]
    if (!sheet) {
      return yield* Effect.fail(
        new InvalidInputError(`Workbook ${path} has no sheet named ${sheetName}`, path),
      )
    }

    return XLSX.utils.sheet_to_json<unknown>(sheet, { defval: null })
  })
