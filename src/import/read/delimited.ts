/**
 * Header-validated, schema-decoded reading of delimited text files
 */

import { createReadStream } from 'node:fs'
import type { Readable } from 'node:stream'
import { parse } from 'csv-parse'
import { Effect, Either, Schema } from 'effect'
import { ensureReadable } from '@/import/utils/files'
import { type InputError, InvalidInputError, toError } from '@/types/errors'

export type DelimitedFormat<A, I> = {
  delimiter: string
  quoted: boolean
  requiredColumns: readonly string[]
  schema: Schema.Schema<A, I>
}

export type DelimitedReadResult<A> = {
  rows: A[]
  totalRows: number
  malformedRows: number
}

export function missingColumns(header: readonly string[], required: readonly string[]): string[] {
  const present = new Set(header)
  return required.filter((column) => !present.has(column))
}

function assertColumns(
  header: readonly string[] | null,
  required: readonly string[],
  source: string,
): void {
  if (header === null) {
    throw new InvalidInputError(`${source} has no header row`, source)
  }
  const missing = missingColumns(header, required)
  if (missing.length > 0) {
    throw new InvalidInputError(
      `${source} is missing required columns: ${missing.join(', ')}`,
      source,
    )
  }
}

/**
 * Rows that stop short of the header keep the missing trailing cells as
 * empty text
 */
function completeRow(raw: unknown, header: readonly string[]): unknown {
  if (typeof raw !== 'object' || raw === null) return raw
  return Object.fromEntries([
    ...header.map((column): [string, unknown] => [column, '']),
    ...Object.entries(raw),
  ])
}

/**
 * Parse a delimited stream. Columns are checked before the first row is
 * decoded; rows that fail the schema are counted and skipped.
 */
export async function parseDelimited<A, I>(
  input: Readable,
  source: string,
  format: DelimitedFormat<A, I>,
): Promise<DelimitedReadResult<A>> {
  const decodeRow = Schema.decodeUnknownEither(format.schema)
  const state: { header: string[] | null; checked: boolean } = { header: null, checked: false }

  const parser = parse({
    delimiter: format.delimiter,
    quote: format.quoted ? '"' : false,
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true,
    columns: (names: string[]) => {
      state.header = names.map((name) => name.trim())
      return state.header
    },
  })

  // Read errors on the source end the parser's iteration with that error
  input.on('error', (error) => parser.destroy(error))
  input.pipe(parser)

  const rows: A[] = []
  let totalRows = 0
  let malformedRows = 0

  try {
    for await (const raw of parser) {
      if (!state.checked) {
        assertColumns(state.header, format.requiredColumns, source)
        state.checked = true
      }

      totalRows++
      const decoded = decodeRow(completeRow(raw, state.header ?? []))
      if (Either.isRight(decoded)) {
        rows.push(decoded.right)
      } else {
        malformedRows++
      }
    }
  } finally {
    input.destroy()
  }

  if (!state.checked) {
    assertColumns(state.header, format.requiredColumns, source)
  }

  return { rows, totalRows, malformedRows }
}

/**
 * Read a delimited file from disk
 */
export const readDelimitedFile = <A, I>(
  path: string,
  label: string,
  format: DelimitedFormat<A, I>,
): Effect.Effect<DelimitedReadResult<A>, InputError> =>
  Effect.gen(function* () {
    yield* ensureReadable(path, label)

    return yield* Effect.tryPromise({
      try: async () => await parseDelimited(createReadStream(path), path, format),
      catch: (error) =>
        error instanceof InvalidInputError
          ? error
          : new InvalidInputError(`Failed to read ${path}: ${toError(error).message}`, path),
    })
  })
