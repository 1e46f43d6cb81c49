/**
 * File-system helpers shared by the readers and report writers
 */

import { access, mkdir, rename, rm, writeFile } from 'node:fs/promises'
import { constants } from 'node:fs'
import { dirname } from 'node:path'
import { Effect } from 'effect'
import { MissingInputFileError, ReportWriteError, toError } from '@/types/errors'

export const ensureReadable = (
  path: string,
  label: string,
): Effect.Effect<void, MissingInputFileError> =>
  Effect.tryPromise({
    try: async () => await access(path, constants.R_OK),
    catch: () => new MissingInputFileError(path, label),
  })

/**
 * Write to a sibling temporary file, then rename over the target.
 * Either the complete file lands at `path` or nothing does.
 */
export const writeFileAtomic = (
  path: string,
  data: string | Uint8Array,
): Effect.Effect<void, ReportWriteError> => {
  const tempPath = `${path}.${process.pid}.tmp`

  return Effect.tryPromise({
    try: async () => {
      await mkdir(dirname(path), { recursive: true })
      await writeFile(tempPath, data)
      await rename(tempPath, path)
    },
    catch: (error) =>
      new ReportWriteError(`Failed to write ${path}: ${toError(error).message}`, error),
  }).pipe(
    Effect.tapError(() =>
      Effect.tryPromise(async () => await rm(tempPath, { force: true })).pipe(Effect.ignore),
    ),
  )
}
