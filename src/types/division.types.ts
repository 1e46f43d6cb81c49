/**
 * Type definitions for the administrative division report
 */

export type NameType = 'Approved' | 'Conventional' | 'NonAuthoritative' | 'Variant' | 'Unknown'

/**
 * One name variant of a geographic feature, as read from the GNS extract
 */
export type RawAdministrativeRecord = {
  featureId: number
  nameId: number | null
  designationCode: string
  nameText: string
  nameType: NameType
  nameTypeCode: string
  nameRank: number | null
  languageCode: string | null
  latitude: number | null
  longitude: number | null
  countryCode: string
  parentDivisionCode: string
  displayFlag: string
  transliterationCode: string
  scriptCode: string
  genericTerm: string
}

export type LocatedRecord = RawAdministrativeRecord & {
  latitude: number
  longitude: number
}

export type CountryInfo = {
  shortName: string
  fullName: string
}

export type CountryReference = ReadonlyMap<string, CountryInfo>

export type CountryFields = {
  countryCode: string
  countryName: string
  countryFullName: string
}

/**
 * The preferred name variant of a feature, enriched with country metadata
 */
export type CanonicalDivision = Readonly<LocatedRecord & CountryFields>

/**
 * A division as it appears in the report workbook
 */
export type PublishedDivision = Omit<CanonicalDivision, 'displayFlag'>

export type DisplayFilter = 'non-empty' | 'affirmative'

export type SelectionPolicy = {
  displayFilter: DisplayFilter
  displayMarker: string
  primaryLanguage: string
  commonLanguages: ReadonlySet<string>
}

export type PriorityKey = readonly [type: number, rank: number, language: number]

export type ClassificationStats = {
  inputRecords: number
  afterLevelFilter: number
  afterDisplayFilter: number
  afterCoordinateFilter: number
  uniqueDivisions: number
  unresolvedCountries: number
}

export type ClassificationResult = {
  divisions: CanonicalDivision[]
  stats: ClassificationStats
}

export type RecordReadResult = {
  records: RawAdministrativeRecord[]
  totalRows: number
  malformedRows: number
}
