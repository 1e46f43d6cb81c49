/**
 * Main report pipeline - coordinates load, classification and output
 */

import { Effect } from 'effect'
import { exportByCountry } from '@/export/split-by-country'
import { LOOKUP } from '@/import/constants'
import { readCountryReference } from '@/import/read/countries'
import { readAdministrativeRecords } from '@/import/read/records'
import { runClassification } from '@/import/transform'
import {
  logHeader,
  logRanking,
  logSection,
  logSummary,
  logWarning,
  type RankedEntry,
} from '@/import/utils/logging'
import { buildReportViews } from '@/report/columns'
import { writeGeoJSON } from '@/report/geojson'
import { summarizeByCountryAndLevel } from '@/report/views'
import { writeWorkbook } from '@/report/workbook'
import { summarizeDataset } from '@/services/lookup.service'
import type { ImportConfig } from '@/types/config.types'
import type { CanonicalDivision, ClassificationStats } from '@/types/division.types'
import type { InputError, ReportWriteError } from '@/types/errors'

export type ImportResult = {
  outputFile: string
  divisions: CanonicalDivision[]
  stats: ClassificationStats
  countryFiles: number
}

function displayConfig(config: ImportConfig): void {
  logHeader('GNS Administrative Divisions Report')
  console.log()
  console.log('Configuration:')
  console.log(`  Country codes: ${config.countryCodesFile}`)
  console.log(`  Administrative regions: ${config.adminRegionsFile}`)
  console.log(`  Output: ${config.outputFile}`)
  console.log(`  Display filter: ${config.policy.displayFilter}`)
  console.log(`  Primary language: ${config.policy.primaryLanguage}`)
  const common = [...config.policy.commonLanguages].join(', ')
  console.log(`  Common languages: ${common || '(none, primary only)'}`)
  console.log(`  Top countries: ${config.topCountries}`)
  console.log(`  Export by country: ${config.exportByCountry ? 'Yes' : 'No'}`)
  console.log()
}

function displayStats(stats: ClassificationStats): void {
  logSummary('Administrative records:', stats.afterLevelFilter)
  logSummary('After display filter:', stats.afterDisplayFilter)
  logSummary('After coordinate filter:', stats.afterCoordinateFilter)
  logSummary('After deduplication:', stats.uniqueDivisions)
  if (stats.unresolvedCountries > 0) {
    logWarning(`${stats.unresolvedCountries} divisions have no country reference entry`)
  }
}

function displaySummary(divisions: readonly CanonicalDivision[]): void {
  const dataset = summarizeDataset(divisions)

  console.log()
  logHeader('Summary')
  logSummary('Total administrative divisions:', dataset.totalDivisions)
  logSummary('Countries represented:', dataset.countries)
  logSummary('Administrative levels:', dataset.levels)

  console.log('\nBy administrative level:')
  for (const [level, count] of dataset.byLevel) {
    logSummary(`  ${level}`, count)
  }

  const top = summarizeByCountryAndLevel(divisions).rows.slice(0, LOOKUP.SUMMARY_TOP_COUNTRIES)
  logRanking(
    `Top ${top.length} countries by total divisions:`,
    top.map((row): RankedEntry => [
      `${row.countryName || '(unknown)'} (${row.countryCode})`,
      row.total,
    ]),
  )
  console.log()
}

/**
 * Run the complete report pipeline
 */
export const runImport = (
  config: ImportConfig,
): Effect.Effect<ImportResult, InputError | ReportWriteError> =>
  Effect.gen(function* () {
    displayConfig(config)

    logSection('Step 1: Reading country codes')
    const countries = yield* readCountryReference(config.countryCodesFile)
    console.log(`Found ${countries.size} countries`)

    logSection('Step 2: Reading administrative regions')
    console.log('This may take a while for the full extract...')
    const { records, totalRows, malformedRows } = yield* readAdministrativeRecords(
      config.adminRegionsFile,
    )
    console.log(`Loaded ${totalRows} rows`)
    if (malformedRows > 0) {
      logWarning(`Skipped ${malformedRows} rows that could not be decoded (non-integer ufi)`)
    }

    logSection('Step 3: Filtering and deduplicating administrative divisions')
    const { divisions, stats } = runClassification(records, countries, config.policy)
    displayStats(stats)

    if (divisions.length === 0) {
      logWarning('No administrative divisions survived filtering. Writing empty views.')
    }

    logSection('Step 4: Writing report workbook')
    const views = buildReportViews(divisions, config.topCountries)
    yield* writeWorkbook(views, config.outputFile)
    console.log(`Created ${config.outputFile}`)
    for (const view of views) {
      console.log(`  ${view.name}: ${view.rows.length} rows`)
    }

    if (config.geojsonFile) {
      logSection('Step 5: Writing GeoJSON')
      yield* writeGeoJSON(divisions, config.geojsonFile)
      console.log(`Saved ${divisions.length} features to ${config.geojsonFile}`)
    }

    let countryFiles = 0
    if (config.exportByCountry) {
      logSection('Step 6: Exporting per-country files')
      const exported = yield* exportByCountry(divisions, config.countryExportDir)
      countryFiles = exported.length
      console.log(`Exported ${countryFiles} country files to ${config.countryExportDir}`)
    }

    displaySummary(divisions)
    console.log('✅ Processing complete!')

    return { outputFile: config.outputFile, divisions, stats, countryFiles }
  })
