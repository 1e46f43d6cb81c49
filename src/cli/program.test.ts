import { describe, expect, test } from 'vitest'
import { buildProgram, processOverrides } from './program'

describe('processOverrides', () => {
  test('should map flags to configuration variables', () => {
    expect(
      processOverrides({
        countries: 'in/countries.csv',
        records: 'in/regions.txt',
        output: 'out/report.xlsx',
        top: '10',
        displayFilter: 'affirmative',
        commonLanguages: '',
        geojson: 'out/divisions.geojson',
      }),
    ).toEqual({
      COUNTRY_CODES_FILE: 'in/countries.csv',
      ADMIN_REGIONS_FILE: 'in/regions.txt',
      OUTPUT_FILE: 'out/report.xlsx',
      TOP_COUNTRIES: '10',
      DISPLAY_FILTER: 'affirmative',
      COMMON_LANGUAGES: '',
      GEOJSON_FILE: 'out/divisions.geojson',
    })
  })

  test('should leave unset flags out', () => {
    expect(processOverrides({})).toEqual({})
  })

  test('should enable the country export with the default directory', () => {
    expect(processOverrides({ split: true })).toEqual({ EXPORT_BY_COUNTRY: 'true' })
  })

  test('should enable the country export into a given directory', () => {
    expect(processOverrides({ split: 'exports' })).toEqual({
      EXPORT_BY_COUNTRY: 'true',
      COUNTRY_EXPORT_DIR: 'exports',
    })
  })
})

describe('buildProgram', () => {
  test('should register every command', () => {
    const program = buildProgram()
    expect(program.commands.map((command) => command.name())).toEqual([
      'process',
      'split',
      'lookup',
      'subdivisions',
    ])

    const subdivisions = program.commands.find((command) => command.name() === 'subdivisions')
    expect(subdivisions?.commands.map((command) => command.name())).toEqual(['report', 'query'])
  })
})
