import { compareText } from '@/report/views'
import { distinctCountries, matchCountry } from '@/services/lookup.service'
import type { SheetView } from '@/types/report.types'
import type {
  Subdivision,
  SubdivisionCount,
  SubdivisionQueryResult,
} from '@/types/subdivision.types'

// Country-wide placeholder entries carry a "-000" code
export function isGeneralEntry(subdivision: Subdivision): boolean {
  return subdivision.subdivisionCode.endsWith('-000')
}

export function specificSubdivisions(subdivisions: readonly Subdivision[]): Subdivision[] {
  return subdivisions.filter((subdivision) => !isGeneralEntry(subdivision))
}

export function countSubdivisionsByCountry(
  subdivisions: readonly Subdivision[],
): SubdivisionCount[] {
  const counts = new Map<string, SubdivisionCount>()

  for (const { countryCode, countryName } of subdivisions) {
    const key = `${countryCode}\u0000${countryName}`
    const entry = counts.get(key)
    if (entry) {
      entry.subdivisions++
    } else {
      counts.set(key, { countryCode, countryName, subdivisions: 1 })
    }
  }

  return [...counts.values()].sort(
    (a, b) => b.subdivisions - a.subdivisions || compareText(a.countryCode, b.countryCode),
  )
}

const SUBDIVISION_COLUMNS = [
  'Country_Code',
  'Country_Short_Name',
  'Country_Full_Name',
  'Subdivision_Code',
  'Subdivision_Name',
  'GENC_Short_URN_based_Identifier',
]

function subdivisionView(name: string, subdivisions: readonly Subdivision[]): SheetView {
  return {
    name,
    header: [...SUBDIVISION_COLUMNS],
    rows: subdivisions.map((s) => [
      s.countryCode,
      s.countryName,
      s.countryFullName,
      s.subdivisionCode,
      s.subdivisionName,
      s.gencUrn,
    ]),
  }
}

function countView(name: string, counts: readonly SubdivisionCount[]): SheetView {
  return {
    name,
    header: ['Country_Code', 'Country_Short_Name', 'Number_of_Subdivisions'],
    rows: counts.map((c) => [c.countryCode, c.countryName, c.subdivisions]),
  }
}

export function buildSubdivisionViews(
  subdivisions: readonly Subdivision[],
  topCountries: number,
): SheetView[] {
  const specific = specificSubdivisions(subdivisions)
  const counts = countSubdivisionsByCountry(specific)

  return [
    subdivisionView('All_Subdivisions', subdivisions),
    subdivisionView('Specific_Subdivisions', specific),
    countView('Country_Summary', counts),
    countView(`Top_${topCountries}_Countries`, counts.slice(0, topCountries)),
  ]
}

export function querySubdivisions(
  subdivisions: readonly Subdivision[],
  query: string,
): SubdivisionQueryResult {
  const matches = matchCountry(subdivisions, query)
  if (matches.length === 0) {
    return { kind: 'no-country', query }
  }

  const countries = distinctCountries(matches)
  const [country] = countries
  if (!country || countries.length > 1) {
    return { kind: 'ambiguous', query, countries }
  }

  const specific = specificSubdivisions(matches)
  if (specific.length === 0) {
    return { kind: 'no-subdivisions', query, countryName: country.countryName }
  }

  return {
    kind: 'found',
    countryCode: country.countryCode,
    countryName: country.countryName,
    subdivisions: specific,
  }
}
