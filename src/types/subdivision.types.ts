import type { CountryFields } from './division.types'

/**
 * First-order subdivision from the GENC ADM1 code list
 */
export type Subdivision = Readonly<
  CountryFields & {
    subdivisionCode: string
    subdivisionName: string
    gencUrn: string
  }
>

export type CountryKey = Pick<CountryFields, 'countryCode' | 'countryName'>

export type SubdivisionCount = {
  countryCode: string
  countryName: string
  subdivisions: number
}

export type SubdivisionQueryResult =
  | { kind: 'no-country'; query: string }
  | { kind: 'ambiguous'; query: string; countries: CountryKey[] }
  | { kind: 'no-subdivisions'; query: string; countryName: string }
  | { kind: 'found'; countryCode: string; countryName: string; subdivisions: Subdivision[] }
