import { NAME_TYPE_CODES } from '@/import/constants'
import type { NameType } from '@/types/division.types'

/**
 * Parse a decimal cell; blank or non-numeric text is absent
 */
export function parseDecimal(value: string): number | null {
  const trimmed = value.trim()
  if (trimmed === '') return null
  const parsed = Number(trimmed)
  return Number.isFinite(parsed) ? parsed : null
}

export function parseInteger(value: string): number | null {
  const parsed = parseDecimal(value)
  return parsed !== null && Number.isInteger(parsed) ? parsed : null
}

export function emptyToNull(value: string): string | null {
  const trimmed = value.trim()
  return trimmed === '' ? null : trimmed
}

export function classifyNameType(code: string): NameType {
  return NAME_TYPE_CODES[code.trim().toUpperCase()] ?? 'Unknown'
}
