import { pipe } from 'effect'
import { hasCoordinates, isAdministrativeLevel, isDisplayable } from '@/import/filters'
import { compareKeys, priorityKey } from '@/import/priority'
import type {
  CanonicalDivision,
  ClassificationResult,
  CountryReference,
  LocatedRecord,
  PriorityKey,
  RawAdministrativeRecord,
  SelectionPolicy,
} from '@/types/division.types'

/**
 * Keep one name variant per feature: the one with the smallest priority key.
 * On equal keys the variant seen first stays, so the result depends on
 * input order only when two variants are true ties.
 */
export function selectPreferredNames(
  records: readonly LocatedRecord[],
  policy: SelectionPolicy,
): LocatedRecord[] {
  const best = new Map<number, { record: LocatedRecord; key: PriorityKey }>()

  for (const record of records) {
    const key = priorityKey(record, policy)
    const current = best.get(record.featureId)
    if (!current || compareKeys(key, current.key) < 0) {
      best.set(record.featureId, { record, key })
    }
  }

  return [...best.values()]
    .map(({ record }) => record)
    .sort((a, b) => a.featureId - b.featureId)
}

/**
 * Join country metadata. Unknown codes leave the country fields empty.
 */
export function enrichDivision(
  record: LocatedRecord,
  countries: CountryReference,
): CanonicalDivision {
  const country = countries.get(record.countryCode)
  return {
    ...record,
    countryName: country?.shortName ?? '',
    countryFullName: country?.fullName ?? '',
  }
}

/**
 * Complete classification pipeline with per-stage counts
 */
export function runClassification(
  records: readonly RawAdministrativeRecord[],
  countries: CountryReference,
  policy: SelectionPolicy,
): ClassificationResult {
  const atLevel = records.filter(isAdministrativeLevel)
  const displayable = atLevel.filter((record) => isDisplayable(record, policy))
  const located = displayable.filter(hasCoordinates)

  const divisions = pipe(
    located,
    (candidates) => selectPreferredNames(candidates, policy),
    (preferred) => preferred.map((record) => enrichDivision(record, countries)),
  )

  return {
    divisions,
    stats: {
      inputRecords: records.length,
      afterLevelFilter: atLevel.length,
      afterDisplayFilter: displayable.length,
      afterCoordinateFilter: located.length,
      uniqueDivisions: divisions.length,
      unresolvedCountries: divisions.filter((division) => !countries.has(division.countryCode))
        .length,
    },
  }
}

export function classifyAndDeduplicate(
  records: readonly RawAdministrativeRecord[],
  countries: CountryReference,
  policy: SelectionPolicy,
): CanonicalDivision[] {
  return runClassification(records, countries, policy).divisions
}
