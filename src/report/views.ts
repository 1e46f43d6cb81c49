/**
 * Grouped, sorted and pivoted projections of the canonical divisions
 */

import type { PublishedDivision } from '@/types/division.types'
import type { CountrySummary, CountrySummaryRow } from '@/types/report.types'

export function compareText(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

// Divisions whose country is not in the reference go after every named country
function compareCountryNames(a: string, b: string): number {
  if (a === b) return 0
  if (a === '') return 1
  if (b === '') return -1
  return compareText(a, b)
}

export function compareForPrimaryView(a: PublishedDivision, b: PublishedDivision): number {
  return (
    compareCountryNames(a.countryName, b.countryName) ||
    compareText(a.designationCode, b.designationCode) ||
    compareText(a.nameText, b.nameText)
  )
}

/**
 * Sort by country name, administrative level, then division name
 */
export function orderForPrimaryView<T extends PublishedDivision>(divisions: readonly T[]): T[] {
  return [...divisions].sort(compareForPrimaryView)
}

/**
 * One partition per designation code present, keyed in ascending code order
 */
export function partitionByLevel<T extends PublishedDivision>(
  divisions: readonly T[],
): Map<string, T[]> {
  const partitions = new Map<string, T[]>()

  for (const division of orderForPrimaryView(divisions)) {
    const partition = partitions.get(division.designationCode)
    if (partition) {
      partition.push(division)
    } else {
      partitions.set(division.designationCode, [division])
    }
  }

  return new Map([...partitions.entries()].sort(([a], [b]) => compareText(a, b)))
}

type CountryCounts = {
  countryCode: string
  countryName: string
  levels: Map<string, number>
}

/**
 * Division counts per country and level, largest countries first
 */
export function summarizeByCountryAndLevel(
  divisions: readonly PublishedDivision[],
): CountrySummary {
  const levels = [...new Set(divisions.map((d) => d.designationCode))].sort(compareText)
  const counts = new Map<string, CountryCounts>()

  for (const division of divisions) {
    const key = `${division.countryCode}\u0000${division.countryName}`
    let entry = counts.get(key)
    if (!entry) {
      entry = {
        countryCode: division.countryCode,
        countryName: division.countryName,
        levels: new Map(),
      }
      counts.set(key, entry)
    }
    const level = division.designationCode
    entry.levels.set(level, (entry.levels.get(level) ?? 0) + 1)
  }

  const rows: CountrySummaryRow[] = [...counts.values()].map((entry) => {
    const byLevel: Record<string, number> = {}
    let total = 0
    for (const level of levels) {
      const count = entry.levels.get(level) ?? 0
      byLevel[level] = count
      total += count
    }
    return {
      countryCode: entry.countryCode,
      countryName: entry.countryName,
      levels: byLevel,
      total,
    }
  })

  rows.sort(
    (a, b) =>
      b.total - a.total ||
      compareText(a.countryCode, b.countryCode) ||
      compareText(a.countryName, b.countryName),
  )

  return { levels, rows }
}

export function topN(summary: CountrySummary, n: number): CountrySummary {
  return { levels: summary.levels, rows: summary.rows.slice(0, Math.max(0, Math.floor(n))) }
}
