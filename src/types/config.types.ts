import type { SelectionPolicy } from './division.types'

/**
 * Run configuration, resolved once at startup
 */
export type ImportConfig = {
  countryCodesFile: string
  adminRegionsFile: string
  outputFile: string
  countryExportDir: string
  exportByCountry: boolean
  geojsonFile: string | null
  topCountries: number
  policy: SelectionPolicy
  subdivisionsFile: string
  subdivisionsOutputFile: string
}
