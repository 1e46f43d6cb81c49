/**
 * GeoJSON point export of the canonical divisions
 */

import type { Effect } from 'effect'
import type { Feature, FeatureCollection, Point } from 'geojson'
import { writeFileAtomic } from '@/import/utils/files'
import type { PublishedDivision } from '@/types/division.types'
import type { ReportWriteError } from '@/types/errors'

export type DivisionProperties = {
  featureId: number
  name: string
  level: string
  countryCode: string
  countryName: string
  adm1: string
  nameType: string
  languageCode: string | null
}

export function toFeature(division: PublishedDivision): Feature<Point, DivisionProperties> {
  return {
    type: 'Feature',
    id: division.featureId,
    geometry: {
      type: 'Point',
      coordinates: [division.longitude, division.latitude],
    },
    properties: {
      featureId: division.featureId,
      name: division.nameText,
      level: division.designationCode,
      countryCode: division.countryCode,
      countryName: division.countryName,
      adm1: division.parentDivisionCode,
      nameType: division.nameTypeCode,
      languageCode: division.languageCode,
    },
  }
}

export function toFeatureCollection(
  divisions: readonly PublishedDivision[],
): FeatureCollection<Point, DivisionProperties> {
  return {
    type: 'FeatureCollection',
    features: divisions.map(toFeature),
  }
}

export const writeGeoJSON = (
  divisions: readonly PublishedDivision[],
  path: string,
): Effect.Effect<void, ReportWriteError> =>
  writeFileAtomic(path, JSON.stringify(toFeatureCollection(divisions), null, 2))
