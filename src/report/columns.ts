/**
 * Worksheet layouts for the division report
 */

import type { PublishedDivision } from '@/types/division.types'
import type { CellValue, CountrySummary, SheetView } from '@/types/report.types'
import { orderForPrimaryView, partitionByLevel, summarizeByCountryAndLevel, topN } from './views'

export const SHEET_NAMES = {
  ALL_DIVISIONS: 'All_Admin_Divisions',
  COUNTRY_SUMMARY: 'Country_Summary',
  levelDivisions: (level: string) => `${level}_Divisions`,
  topCountries: (n: number) => `Top_${n}_Countries`,
} as const

export const DIVISION_COLUMNS = [
  'Country_Code',
  'Country_Name',
  'Country_Full_Name',
  'Administrative_Level',
  'Administrative_Name',
  'ADM1_Code',
  'latitude',
  'longitude',
  'Unique_Feature_ID',
  'Unique_Name_ID',
  'Name_Type',
  'Name_Rank',
  'Language_Code',
  'Transliteration_Code',
  'Script_Code',
  'Generic_Term',
] as const

export function toDivisionCells(division: PublishedDivision): CellValue[] {
  return [
    division.countryCode,
    division.countryName,
    division.countryFullName,
    division.designationCode,
    division.nameText,
    division.parentDivisionCode,
    division.latitude,
    division.longitude,
    division.featureId,
    division.nameId,
    division.nameTypeCode,
    division.nameRank,
    division.languageCode,
    division.transliterationCode,
    division.scriptCode,
    division.genericTerm,
  ]
}

export function divisionView(name: string, divisions: readonly PublishedDivision[]): SheetView {
  return {
    name,
    header: [...DIVISION_COLUMNS],
    rows: divisions.map(toDivisionCells),
  }
}

export function summaryView(name: string, summary: CountrySummary): SheetView {
  return {
    name,
    header: ['Country_Code', 'Country_Name', ...summary.levels, 'Total'],
    rows: summary.rows.map((row) => [
      row.countryCode,
      row.countryName,
      ...summary.levels.map((level) => row.levels[level] ?? 0),
      row.total,
    ]),
  }
}

/**
 * All report views, in workbook order
 */
export function buildReportViews(
  divisions: readonly PublishedDivision[],
  topCountries: number,
): SheetView[] {
  const ordered = orderForPrimaryView(divisions)
  const summary = summarizeByCountryAndLevel(ordered)
  const levelViews = [...partitionByLevel(ordered)].map(([level, members]) =>
    divisionView(SHEET_NAMES.levelDivisions(level), members),
  )

  return [
    divisionView(SHEET_NAMES.ALL_DIVISIONS, ordered),
    ...levelViews,
    summaryView(SHEET_NAMES.COUNTRY_SUMMARY, summary),
    summaryView(SHEET_NAMES.topCountries(topCountries), topN(summary, topCountries)),
  ]
}
