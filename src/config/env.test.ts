import { Effect } from 'effect'
import { describe, expect, test } from 'vitest'
import { DEFAULT_COMMON_LANGUAGES } from '@/import/constants'
import { loadConfig, parseLanguageList } from './env'

describe('parseLanguageList', () => {
  test('should default to the common language set', () => {
    expect(parseLanguageList(undefined)).toEqual([...DEFAULT_COMMON_LANGUAGES])
  })

  test('should split and trim a comma-separated list', () => {
    expect(parseLanguageList(' fra, deu ,,ita ')).toEqual(['fra', 'deu', 'ita'])
  })

  test('should treat an empty string as no common languages', () => {
    expect(parseLanguageList('')).toEqual([])
  })
})

describe('loadConfig', () => {
  test('should apply defaults to an empty environment', async () => {
    const config = await Effect.runPromise(loadConfig({}))

    expect(config).toEqual({
      countryCodesFile: 'Country_Codes.csv',
      adminRegionsFile: 'Administrative_Regions/Administrative_Regions.txt',
      outputFile: 'Complete_Administrative_Divisions_with_Coordinates.xlsx',
      countryExportDir: 'Country_Exports',
      exportByCountry: false,
      geojsonFile: null,
      topCountries: 30,
      policy: {
        displayFilter: 'non-empty',
        displayMarker: 'Y',
        primaryLanguage: 'eng',
        commonLanguages: new Set(DEFAULT_COMMON_LANGUAGES),
      },
      subdivisionsFile: 'ADM1_Codes.csv',
      subdivisionsOutputFile: 'Country_Subdivisions.xlsx',
    })
  })

  test('should read overrides from the environment', async () => {
    const config = await Effect.runPromise(
      loadConfig({
        OUTPUT_FILE: 'out/report.xlsx',
        EXPORT_BY_COUNTRY: 'true',
        GEOJSON_FILE: 'out/divisions.geojson',
        DISPLAY_FILTER: 'affirmative',
        COMMON_LANGUAGES: '',
        TOP_COUNTRIES: '5',
      }),
    )

    expect(config.outputFile).toBe('out/report.xlsx')
    expect(config.exportByCountry).toBe(true)
    expect(config.geojsonFile).toBe('out/divisions.geojson')
    expect(config.policy.displayFilter).toBe('affirmative')
    expect(config.policy.commonLanguages.size).toBe(0)
    expect(config.topCountries).toBe(5)
  })

  test('should ignore unrelated variables', async () => {
    const config = await Effect.runPromise(loadConfig({ PATH: '/usr/bin', HOME: '/root' }))
    expect(config.outputFile).toBe('Complete_Administrative_Divisions_with_Coordinates.xlsx')
  })

  test('should treat a blank GeoJSON path as unset', async () => {
    const config = await Effect.runPromise(loadConfig({ GEOJSON_FILE: '  ' }))
    expect(config.geojsonFile).toBeNull()
  })

  test('should reject an unknown display filter', async () => {
    const error = await Effect.runPromise(Effect.flip(loadConfig({ DISPLAY_FILTER: 'all' })))

    expect(error._tag).toBe('ConfigurationError')
    expect(error.message).toContain('Invalid configuration')
    expect(error.message).toContain('DISPLAY_FILTER')
  })

  test('should reject a non-positive top country count', async () => {
    for (const value of ['0', '-3', '2.5', 'ten']) {
      const error = await Effect.runPromise(Effect.flip(loadConfig({ TOP_COUNTRIES: value })))
      expect(error._tag).toBe('ConfigurationError')
    }
  })
})
