import { describe, expect, test } from 'vitest'
import { makeDivision } from '@/import/utils/test-utils'
import {
  compareForPrimaryView,
  orderForPrimaryView,
  partitionByLevel,
  summarizeByCountryAndLevel,
  topN,
} from './views'

const alpha = { countryCode: 'AA', countryName: 'Alphaland' }
const beta = { countryCode: 'BB', countryName: 'Betania' }
const unknown = { countryCode: 'ZZ', countryName: '', countryFullName: '' }

const divisions = [
  makeDivision({ ...beta, featureId: 1, designationCode: 'ADM2', nameText: 'West' }),
  makeDivision({ ...alpha, featureId: 2, designationCode: 'ADM2', nameText: 'south' }),
  makeDivision({ ...unknown, featureId: 3, designationCode: 'ADM1', nameText: 'Nowhere' }),
  makeDivision({ ...alpha, featureId: 4, designationCode: 'ADM1', nameText: 'North' }),
  makeDivision({ ...alpha, featureId: 5, designationCode: 'ADM2', nameText: 'East' }),
  makeDivision({ ...beta, featureId: 6, designationCode: 'ADM1', nameText: 'Central' }),
]

describe('orderForPrimaryView', () => {
  test('should sort by country name, level and division name', () => {
    const ordered = orderForPrimaryView(divisions)
    expect(ordered.map((d) => d.featureId)).toEqual([4, 5, 2, 6, 1, 3])
  })

  test('should leave every adjacent pair in order', () => {
    const ordered = orderForPrimaryView(divisions)
    for (let i = 1; i < ordered.length; i++) {
      const previous = ordered[i - 1]
      const current = ordered[i]
      if (previous && current) {
        expect(compareForPrimaryView(previous, current)).toBeLessThanOrEqual(0)
      }
    }
  })

  test('should compare names by code unit', () => {
    const ordered = orderForPrimaryView([
      makeDivision({ featureId: 1, nameText: 'apple' }),
      makeDivision({ featureId: 2, nameText: 'Banana' }),
      makeDivision({ featureId: 3, nameText: 'Ñandú' }),
    ])
    expect(ordered.map((d) => d.nameText)).toEqual(['Banana', 'apple', 'Ñandú'])
  })

  test('should not reorder its input', () => {
    const input = [...divisions]
    orderForPrimaryView(input)
    expect(input).toEqual(divisions)
  })
})

describe('partitionByLevel', () => {
  test('should key partitions in ascending level order', () => {
    const partitions = partitionByLevel(divisions)
    expect([...partitions.keys()]).toEqual(['ADM1', 'ADM2'])
  })

  test('should keep the primary order inside a partition', () => {
    const partitions = partitionByLevel(divisions)
    expect(partitions.get('ADM1')?.map((d) => d.featureId)).toEqual([4, 6, 3])
    expect(partitions.get('ADM2')?.map((d) => d.featureId)).toEqual([5, 2, 1])
  })

  test('should return no partitions for no divisions', () => {
    expect(partitionByLevel([]).size).toBe(0)
  })
})

describe('summarizeByCountryAndLevel', () => {
  test('should count divisions per country and level', () => {
    const summary = summarizeByCountryAndLevel(divisions)

    expect(summary.levels).toEqual(['ADM1', 'ADM2'])
    expect(summary.rows).toEqual([
      { countryCode: 'AA', countryName: 'Alphaland', levels: { ADM1: 1, ADM2: 2 }, total: 3 },
      { countryCode: 'BB', countryName: 'Betania', levels: { ADM1: 1, ADM2: 1 }, total: 2 },
      { countryCode: 'ZZ', countryName: '', levels: { ADM1: 1, ADM2: 0 }, total: 1 },
    ])
  })

  test('should make totals add up to the number of divisions', () => {
    const summary = summarizeByCountryAndLevel(divisions)
    const total = summary.rows.reduce((sum, row) => sum + row.total, 0)
    expect(total).toBe(divisions.length)

    for (const row of summary.rows) {
      const levelSum = summary.levels.reduce((sum, level) => sum + (row.levels[level] ?? 0), 0)
      expect(levelSum).toBe(row.total)
    }
  })

  test('should break ties by country code', () => {
    const summary = summarizeByCountryAndLevel([
      makeDivision({ countryCode: 'CC', countryName: 'Cetia' }),
      makeDivision({ countryCode: 'AA', countryName: 'Zeta' }),
    ])
    expect(summary.rows.map((row) => row.countryCode)).toEqual(['AA', 'CC'])
  })
})

describe('topN', () => {
  test('should keep the first n rows', () => {
    const summary = summarizeByCountryAndLevel(divisions)
    expect(topN(summary, 2).rows.map((row) => row.countryCode)).toEqual(['AA', 'BB'])
    expect(topN(summary, 2).levels).toEqual(['ADM1', 'ADM2'])
  })

  test('should keep every row when n exceeds the row count', () => {
    const summary = summarizeByCountryAndLevel(divisions)
    expect(topN(summary, 30).rows).toHaveLength(3)
  })
})
