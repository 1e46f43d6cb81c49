/**
 * Name-variant priority scoring
 *
 * Each variant gets a (type, rank, language) key where lower is better.
 * Keys compare lexicographically, so name type always dominates rank and
 * rank always dominates language.
 */

import { LANGUAGE_PRIORITY, NAME_TYPE_PRIORITY, WORST_PRIORITY } from '@/import/constants'
import type {
  NameType,
  PriorityKey,
  RawAdministrativeRecord,
  SelectionPolicy,
} from '@/types/division.types'

export function typeScore(nameType: NameType): number {
  return NAME_TYPE_PRIORITY[nameType]
}

export function rankScore(nameRank: number | null): number {
  return nameRank === null || !Number.isFinite(nameRank) ? WORST_PRIORITY : nameRank
}

/**
 * With an empty common-language set every non-primary language scores the
 * same as a common one, which gives the two-tier English-first policy.
 */
export function languageScore(
  languageCode: string | null,
  policy: Pick<SelectionPolicy, 'primaryLanguage' | 'commonLanguages'>,
): number {
  if (languageCode === policy.primaryLanguage) return LANGUAGE_PRIORITY.PRIMARY
  if (languageCode !== null && policy.commonLanguages.has(languageCode)) {
    return LANGUAGE_PRIORITY.COMMON
  }
  return policy.commonLanguages.size > 0 ? LANGUAGE_PRIORITY.OTHER : LANGUAGE_PRIORITY.COMMON
}

export function priorityKey(
  record: RawAdministrativeRecord,
  policy: Pick<SelectionPolicy, 'primaryLanguage' | 'commonLanguages'>,
): PriorityKey {
  return [
    typeScore(record.nameType),
    rankScore(record.nameRank),
    languageScore(record.languageCode, policy),
  ]
}

export function compareKeys(a: PriorityKey, b: PriorityKey): number {
  return a[0] - b[0] || a[1] - b[1] || a[2] - b[2]
}
