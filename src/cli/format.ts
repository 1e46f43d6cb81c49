import type { PublishedDivision } from '@/types/division.types'
import type { DatasetStats } from '@/types/report.types'
import type { SubdivisionQueryResult } from '@/types/subdivision.types'

function coordinates(division: PublishedDivision, digits: number): string {
  return `${division.latitude.toFixed(digits)}, ${division.longitude.toFixed(digits)}`
}

export function formatByCountry(division: PublishedDivision): string {
  return `  ${division.designationCode}: ${division.nameText} (${coordinates(division, 4)})`
}

export function formatByLevel(division: PublishedDivision): string {
  return `  ${division.countryName}: ${division.nameText} (${coordinates(division, 4)})`
}

export function formatMatch(division: PublishedDivision): string {
  return (
    `  ${division.countryName}: ${division.nameText} ` +
    `(${division.designationCode}) - (${coordinates(division, 4)})`
  )
}

export function formatDetailed(division: PublishedDivision): string {
  return (
    `${division.countryName}: ${division.nameText} (${division.designationCode}) - ` +
    `Lat: ${division.latitude.toFixed(6)}, Lon: ${division.longitude.toFixed(6)}`
  )
}

export function formatStats(stats: DatasetStats): string[] {
  return [
    'Dataset Statistics:',
    `  Total divisions: ${stats.totalDivisions.toLocaleString('en-US')}`,
    `  Countries: ${stats.countries}`,
    `  Administrative levels: ${stats.levels}`,
    'By level:',
    ...stats.byLevel.map(([level, count]) => `    ${level}: ${count.toLocaleString('en-US')}`),
  ]
}

export function formatSubdivisionResult(result: SubdivisionQueryResult): string[] {
  switch (result.kind) {
    case 'no-country':
      return [`No country found matching '${result.query}'`]
    case 'ambiguous':
      return [
        'Multiple countries found:',
        ...result.countries.map((c) => `  ${c.countryCode}: ${c.countryName}`),
        'Please be more specific.',
      ]
    case 'no-subdivisions':
      return [`No subdivisions found for '${result.query}'`]
    case 'found': {
      const title = `Subdivisions for ${result.countryName}:`
      return [
        title,
        '='.repeat(title.length),
        ...result.subdivisions.map((s) => `  ${s.subdivisionCode}: ${s.subdivisionName}`),
        '',
        `Total subdivisions: ${result.subdivisions.length}`,
      ]
    }
  }
}
