/**
 * Per-record predicates applied before deduplication
 */

import { ADMIN_LEVEL_PREFIXES } from '@/import/constants'
import type {
  LocatedRecord,
  RawAdministrativeRecord,
  SelectionPolicy,
} from '@/types/division.types'

export function isAdministrativeLevel(record: RawAdministrativeRecord): boolean {
  return ADMIN_LEVEL_PREFIXES.some((prefix) => record.designationCode.startsWith(prefix))
}

/**
 * `non-empty` keeps any non-blank flag (the extract stores comma-separated
 * display contexts there); `affirmative` requires the configured marker.
 */
export function isDisplayable(
  record: RawAdministrativeRecord,
  policy: Pick<SelectionPolicy, 'displayFilter' | 'displayMarker'>,
): boolean {
  const flag = record.displayFlag.trim()
  if (policy.displayFilter === 'affirmative') {
    return flag.toUpperCase() === policy.displayMarker.trim().toUpperCase()
  }
  return flag.length > 0
}

export function hasCoordinates(record: RawAdministrativeRecord): record is LocatedRecord {
  return (
    record.latitude !== null &&
    record.longitude !== null &&
    Number.isFinite(record.latitude) &&
    Number.isFinite(record.longitude)
  )
}
