import { compareText } from '@/report/views'
import type { CountryFields, PublishedDivision } from '@/types/division.types'
import type { DatasetStats, LookupFilters } from '@/types/report.types'

/**
 * Match a country query: exact code first, then a substring of the short
 * name, then a substring of the full name (all case-insensitive)
 */
export function matchCountry<T extends CountryFields>(items: readonly T[], query: string): T[] {
  const needle = query.trim().toUpperCase()
  if (needle === '') return []

  const byCode = items.filter((item) => item.countryCode.toUpperCase() === needle)
  if (byCode.length > 0) return byCode

  const byName = items.filter((item) => item.countryName.toUpperCase().includes(needle))
  if (byName.length > 0) return byName

  return items.filter((item) => item.countryFullName.toUpperCase().includes(needle))
}

/**
 * Distinct (code, name) pairs among the items, in first-seen order
 */
export function distinctCountries(
  items: readonly CountryFields[],
): Array<Pick<CountryFields, 'countryCode' | 'countryName'>> {
  const seen = new Map<string, Pick<CountryFields, 'countryCode' | 'countryName'>>()
  for (const { countryCode, countryName } of items) {
    const key = `${countryCode}\u0000${countryName}`
    if (!seen.has(key)) seen.set(key, { countryCode, countryName })
  }
  return [...seen.values()]
}

export function queryDivisions<T extends PublishedDivision>(
  divisions: readonly T[],
  filters: LookupFilters,
): T[] {
  let result: readonly T[] = divisions

  if (filters.country) {
    result = matchCountry(result, filters.country)
  }

  if (filters.level) {
    const level = filters.level.trim().toUpperCase()
    result = result.filter((division) => division.designationCode.toUpperCase() === level)
  }

  if (filters.name) {
    const needle = filters.name.trim().toLowerCase()
    result = result.filter((division) => division.nameText.toLowerCase().includes(needle))
  }

  return [...result]
}

export function summarizeDataset(divisions: readonly PublishedDivision[]): DatasetStats {
  const byLevel = new Map<string, number>()
  for (const division of divisions) {
    byLevel.set(division.designationCode, (byLevel.get(division.designationCode) ?? 0) + 1)
  }

  return {
    totalDivisions: divisions.length,
    countries: new Set(divisions.map((division) => division.countryCode)).size,
    levels: byLevel.size,
    byLevel: [...byLevel.entries()].sort(([a], [b]) => compareText(a, b)),
  }
}
