/**
 * Report view definitions
 */

export type CellValue = string | number | null

/**
 * A named tabular view, written as one worksheet
 */
export type SheetView = {
  name: string
  header: string[]
  rows: CellValue[][]
}

export type CountrySummaryRow = {
  countryCode: string
  countryName: string
  levels: Readonly<Record<string, number>>
  total: number
}

export type CountrySummary = {
  levels: string[]
  rows: CountrySummaryRow[]
}

export type LookupFilters = {
  country?: string
  level?: string
  name?: string
}

export type DatasetStats = {
  totalDivisions: number
  countries: number
  levels: number
  byLevel: Array<[level: string, count: number]>
}
