import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { Effect } from 'effect'
import { describe, expect, test } from 'vitest'
import { makeDivision, withTempDir } from '@/import/utils/test-utils'
import { toFeature, toFeatureCollection, writeGeoJSON } from './geojson'

describe('toFeature', () => {
  test('should place the point at longitude, latitude', () => {
    const feature = toFeature(makeDivision({ latitude: -12.5, longitude: 45.75 }))

    expect(feature).toEqual({
      type: 'Feature',
      id: 100,
      geometry: { type: 'Point', coordinates: [45.75, -12.5] },
      properties: {
        featureId: 100,
        name: 'Northern Province',
        level: 'ADM1',
        countryCode: 'AA',
        countryName: 'Alphaland',
        adm1: '01',
        nameType: 'N',
        languageCode: 'eng',
      },
    })
  })
})

describe('writeGeoJSON', () => {
  test('should write a feature collection', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'divisions.geojson')
      const divisions = [makeDivision({ featureId: 1 }), makeDivision({ featureId: 2 })]

      await Effect.runPromise(writeGeoJSON(divisions, path))

      const written: unknown = JSON.parse(await readFile(path, 'utf8'))
      expect(written).toEqual(toFeatureCollection(divisions))
    })
  })
})
