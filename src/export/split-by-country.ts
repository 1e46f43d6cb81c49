/**
 * Per-country extracts of the primary division view
 */

import { join } from 'node:path'
import { Effect } from 'effect'
import { logWarning } from '@/import/utils/logging'
import { divisionView } from '@/report/columns'
import { orderForPrimaryView } from '@/report/views'
import { writeWorkbook } from '@/report/workbook'
import type { PublishedDivision } from '@/types/division.types'
import type { ReportWriteError } from '@/types/errors'

export const COUNTRY_SHEET_NAME = 'Divisions'

export type CountryExport = {
  countryName: string
  path: string
  divisions: number
}

/**
 * Keep only letters, digits and whitespace, dropping trailing whitespace
 */
export function sanitizeFilename(name: string): string {
  return Array.from(name)
    .filter((char) => /[\p{L}\p{Nd}\s]/u.test(char))
    .join('')
    .trimEnd()
}

/**
 * Group divisions by country display name in primary-view order.
 * Divisions without a country name are left out.
 */
export function groupByCountry<T extends PublishedDivision>(
  divisions: readonly T[],
): Map<string, T[]> {
  const groups = new Map<string, T[]>()

  for (const division of orderForPrimaryView(divisions)) {
    if (division.countryName === '') continue
    const group = groups.get(division.countryName)
    if (group) {
      group.push(division)
    } else {
      groups.set(division.countryName, [division])
    }
  }

  return groups
}

/**
 * Plan one file per country. Names that sanitize to nothing are skipped;
 * names that sanitize to an existing file name get a numeric suffix.
 */
export function planCountryFiles(
  countryNames: Iterable<string>,
  outputDir: string,
): Map<string, string> {
  const plan = new Map<string, string>()
  const used = new Set<string>()

  for (const countryName of countryNames) {
    const base = sanitizeFilename(countryName)
    if (base === '') {
      logWarning(`Skipping country with no usable file name: ${countryName}`)
      continue
    }

    let filename = base
    for (let n = 2; used.has(filename); n++) {
      filename = `${base} ${n}`
    }
    used.add(filename)
    plan.set(countryName, join(outputDir, `${filename}.xlsx`))
  }

  return plan
}

export const exportByCountry = (
  divisions: readonly PublishedDivision[],
  outputDir: string,
): Effect.Effect<CountryExport[], ReportWriteError> =>
  Effect.gen(function* () {
    const groups = groupByCountry(divisions)
    const plan = planCountryFiles(groups.keys(), outputDir)

    console.log(`Found ${groups.size} countries. Exporting each to a separate file...`)

    const exports: CountryExport[] = []
    for (const [countryName, members] of groups) {
      const path = plan.get(countryName)
      if (!path) continue

      console.log(`  -> ${countryName}`)
      yield* writeWorkbook([divisionView(COUNTRY_SHEET_NAME, members)], path)
      exports.push({ countryName, path, divisions: members.length })
    }

    return exports
  })
