import { describe, expect, test } from 'vitest'
import type { CountryReference, LocatedRecord } from '@/types/division.types'
import {
  classifyAndDeduplicate,
  enrichDivision,
  runClassification,
  selectPreferredNames,
} from './transform'
import { makePolicy, makeRecord } from './utils/test-utils'

const countries: CountryReference = new Map([
  ['AA', { shortName: 'Alphaland', fullName: 'Republic of Alphaland' }],
  ['BB', { shortName: 'Betania', fullName: 'Kingdom of Betania' }],
])

const policy = makePolicy()

function located(overrides: Partial<LocatedRecord> = {}): LocatedRecord {
  return { ...makeRecord(), latitude: 10.5, longitude: 20.25, ...overrides }
}

describe('selectPreferredNames', () => {
  test('should keep an approved french name over a ranked english variant', () => {
    const records = [
      located({ nameId: 1, nameType: 'Variant', nameTypeCode: 'V', nameRank: 1, nameText: 'V' }),
      located({ nameId: 2, nameRank: 5, languageCode: 'fra', nameText: 'Province du Nord' }),
    ]

    const [winner] = selectPreferredNames(records, policy)
    expect(winner?.nameId).toBe(2)
    expect(winner?.nameText).toBe('Province du Nord')
  })

  test('should prefer the lower rank within a name type', () => {
    const records = [
      located({ nameId: 1, nameRank: 2 }),
      located({ nameId: 2, nameRank: 1, languageCode: 'swe' }),
    ]
    expect(selectPreferredNames(records, policy).map((r) => r.nameId)).toEqual([2])
  })

  test('should prefer the primary language on equal type and rank', () => {
    const records = [
      located({ nameId: 1, languageCode: 'spa' }),
      located({ nameId: 2, languageCode: 'eng' }),
      located({ nameId: 3, languageCode: 'swe' }),
    ]
    expect(selectPreferredNames(records, policy).map((r) => r.nameId)).toEqual([2])
  })

  test('should keep the first record on a full tie', () => {
    const records = [
      located({ nameId: 7, nameText: 'First' }),
      located({ nameId: 8, nameText: 'Second' }),
    ]
    expect(selectPreferredNames(records, policy).map((r) => r.nameText)).toEqual(['First'])
  })

  test('should order the result by feature id', () => {
    const records = [
      located({ featureId: 30 }),
      located({ featureId: 10 }),
      located({ featureId: 20 }),
      located({ featureId: 10, nameType: 'Variant' }),
    ]
    expect(selectPreferredNames(records, policy).map((r) => r.featureId)).toEqual([10, 20, 30])
  })
})

describe('enrichDivision', () => {
  test('should join country names', () => {
    const division = enrichDivision(located(), countries)
    expect(division.countryName).toBe('Alphaland')
    expect(division.countryFullName).toBe('Republic of Alphaland')
  })

  test('should leave the country fields empty for an unknown code', () => {
    const division = enrichDivision(located({ countryCode: 'ZZ' }), countries)
    expect(division.countryCode).toBe('ZZ')
    expect(division.countryName).toBe('')
    expect(division.countryFullName).toBe('')
  })

  test('should be idempotent', () => {
    const once = enrichDivision(located(), countries)
    expect(enrichDivision(once, countries)).toEqual(once)
  })
})

describe('runClassification', () => {
  const records = [
    makeRecord({ featureId: 1, nameId: 11, nameType: 'Variant', nameTypeCode: 'V' }),
    makeRecord({ featureId: 1, nameId: 12, nameRank: 5, languageCode: 'fra' }),
    makeRecord({ featureId: 2, nameId: 21, countryCode: 'BB', designationCode: 'ADM2' }),
    makeRecord({ featureId: 3, nameId: 31, displayFlag: '' }),
    makeRecord({ featureId: 4, nameId: 41, latitude: null }),
    makeRecord({ featureId: 4, nameId: 42, longitude: null }),
    makeRecord({ featureId: 5, nameId: 51, designationCode: 'PPL' }),
    makeRecord({ featureId: 6, nameId: 61, countryCode: 'ZZ' }),
  ]

  test('should report per-stage counts', () => {
    const { stats } = runClassification(records, countries, policy)
    expect(stats).toEqual({
      inputRecords: 8,
      afterLevelFilter: 7,
      afterDisplayFilter: 6,
      afterCoordinateFilter: 4,
      uniqueDivisions: 3,
      unresolvedCountries: 1,
    })
  })

  test('should emit one division per surviving feature', () => {
    const { divisions } = runClassification(records, countries, policy)
    expect(divisions.map((d) => [d.featureId, d.nameId, d.countryName])).toEqual([
      [1, 12, 'Alphaland'],
      [2, 21, 'Betania'],
      [6, 61, ''],
    ])
  })

  test('should drop records with an empty display flag', () => {
    const divisions = classifyAndDeduplicate(records, countries, policy)
    expect(divisions.some((d) => d.featureId === 3)).toBe(false)
  })

  test('should drop features without valid coordinates', () => {
    const divisions = classifyAndDeduplicate(records, countries, policy)
    expect(divisions.some((d) => d.featureId === 4)).toBe(false)
  })

  test('should only emit values taken from input records', () => {
    const divisions = classifyAndDeduplicate(records, countries, policy)
    for (const division of divisions) {
      const source = records.find((r) => r.nameId === division.nameId)
      expect(source).toBeDefined()
      expect(division.nameText).toBe(source?.nameText)
      expect(division.designationCode).toBe(source?.designationCode)
      expect(division.latitude).toBe(source?.latitude)
      expect(division.longitude).toBe(source?.longitude)
    }
  })

  test('should be deterministic and leave its input untouched', () => {
    const snapshot = structuredClone(records)
    const first = classifyAndDeduplicate(records, countries, policy)
    const second = classifyAndDeduplicate(records, countries, policy)
    expect(second).toEqual(first)
    expect(records).toEqual(snapshot)
  })

  test('should empty the country fields with an empty reference', () => {
    const divisions = classifyAndDeduplicate(records, new Map(), policy)
    expect(divisions.map((d) => d.countryName)).toEqual(['', '', ''])
  })

  test('should return nothing when every record is filtered out', () => {
    const result = runClassification([makeRecord({ displayFlag: '' })], countries, policy)
    expect(result.divisions).toEqual([])
    expect(result.stats.uniqueDivisions).toBe(0)
  })

  test('should apply the affirmative display policy', () => {
    const input = [
      makeRecord({ featureId: 1, displayFlag: 'Y' }),
      makeRecord({ featureId: 2, displayFlag: '1,2,3' }),
    ]
    const divisions = classifyAndDeduplicate(
      input,
      countries,
      makePolicy({ displayFilter: 'affirmative' }),
    )
    expect(divisions.map((d) => d.featureId)).toEqual([1])
  })
})
