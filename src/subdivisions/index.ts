/**
 * ADM1 subdivision report
 */

import { Effect } from 'effect'
import { DEFAULTS, LOOKUP } from '@/import/constants'
import { readCountryReference } from '@/import/read/countries'
import {
  logHeader,
  logRanking,
  logSection,
  logSummary,
  type RankedEntry,
} from '@/import/utils/logging'
import { writeWorkbook } from '@/report/workbook'
import type { ImportConfig } from '@/types/config.types'
import type { InputError, ReportWriteError } from '@/types/errors'
import type { Subdivision } from '@/types/subdivision.types'
import { readSubdivisions } from './read'
import { buildSubdivisionViews, countSubdivisionsByCountry, specificSubdivisions } from './report'

export const loadSubdivisions = (
  config: Pick<ImportConfig, 'countryCodesFile' | 'subdivisionsFile'>,
): Effect.Effect<Subdivision[], InputError> =>
  Effect.gen(function* () {
    const countries = yield* readCountryReference(config.countryCodesFile)
    return yield* readSubdivisions(config.subdivisionsFile, countries)
  })

export const runSubdivisionReport = (
  config: ImportConfig,
): Effect.Effect<Subdivision[], InputError | ReportWriteError> =>
  Effect.gen(function* () {
    logHeader('ADM1 Subdivision Report')

    logSection('Step 1: Reading subdivision and country data')
    const subdivisions = yield* loadSubdivisions(config)
    const specific = specificSubdivisions(subdivisions)
    logSummary('Subdivision entries:', subdivisions.length)
    logSummary('Specific subdivisions:', specific.length)
    logSummary('General entries:', subdivisions.length - specific.length)

    logSection('Step 2: Writing workbook')
    const views = buildSubdivisionViews(subdivisions, DEFAULTS.TOP_SUBDIVISION_COUNTRIES)
    yield* writeWorkbook(views, config.subdivisionsOutputFile)
    console.log(`Created ${config.subdivisionsOutputFile}`)

    const counts = countSubdivisionsByCountry(specific)
    logSummary('Countries represented:', new Set(subdivisions.map((s) => s.countryCode)).size)
    logRanking(
      `Top ${LOOKUP.SUMMARY_TOP_COUNTRIES} countries by number of subdivisions:`,
      counts
        .slice(0, LOOKUP.SUMMARY_TOP_COUNTRIES)
        .map((count): RankedEntry => [count.countryName || count.countryCode, count.subdivisions]),
    )

    return subdivisions
  })
