import type { NameType } from '@/types/division.types'

export const ADMIN_LEVEL_PREFIXES = ['ADM1', 'ADM2', 'ADM3', 'ADM4', 'ADMD'] as const

export const NAME_TYPE_CODES: Readonly<Record<string, NameType>> = {
  N: 'Approved',
  C: 'Conventional',
  D: 'NonAuthoritative',
  V: 'Variant',
}

export const WORST_PRIORITY = 999

export const NAME_TYPE_PRIORITY: Readonly<Record<NameType, number>> = {
  Approved: 1,
  Conventional: 2,
  NonAuthoritative: 3,
  Variant: 4,
  Unknown: WORST_PRIORITY,
}

export const LANGUAGE_PRIORITY = {
  PRIMARY: 1,
  COMMON: 2,
  OTHER: 3,
} as const

export const DEFAULT_COMMON_LANGUAGES = [
  'spa',
  'fra',
  'deu',
  'ita',
  'por',
  'rus',
  'ara',
  'zho',
  'jpn',
  'hin',
] as const

export const DEFAULTS = {
  COUNTRY_CODES_FILE: 'Country_Codes.csv',
  ADMIN_REGIONS_FILE: 'Administrative_Regions/Administrative_Regions.txt',
  OUTPUT_FILE: 'Complete_Administrative_Divisions_with_Coordinates.xlsx',
  COUNTRY_EXPORT_DIR: 'Country_Exports',
  SUBDIVISIONS_FILE: 'ADM1_Codes.csv',
  SUBDIVISIONS_OUTPUT_FILE: 'Country_Subdivisions.xlsx',
  DISPLAY_MARKER: 'Y',
  PRIMARY_LANGUAGE: 'eng',
  TOP_COUNTRIES: 30,
  TOP_SUBDIVISION_COUNTRIES: 20,
} as const

export const LOOKUP = {
  PREVIEW_LIMIT: 20,
  SUMMARY_TOP_COUNTRIES: 10,
} as const
