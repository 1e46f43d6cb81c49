/**
 * Shared test utilities
 */

import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Readable } from 'node:stream'
import { DEFAULT_COMMON_LANGUAGES } from '@/import/constants'
import type {
  CanonicalDivision,
  RawAdministrativeRecord,
  SelectionPolicy,
} from '@/types/division.types'

type MockedConsole = {
  log: typeof console.log
  warn: typeof console.warn
  error: typeof console.error
}

let originalConsole: MockedConsole | null = null

/**
 * Mock console methods to suppress test output
 * Call this in a beforeAll hook
 */
export function mockConsole(): void {
  originalConsole = { log: console.log, warn: console.warn, error: console.error }
  console.log = () => {}
  console.warn = () => {}
  console.error = () => {}
}

/**
 * Restore console methods
 * Call this in an afterAll hook if needed
 */
export function restoreConsole(): void {
  if (originalConsole) {
    console.log = originalConsole.log
    console.warn = originalConsole.warn
    console.error = originalConsole.error
    originalConsole = null
  }
}

export function makeRecord(
  overrides: Partial<RawAdministrativeRecord> = {},
): RawAdministrativeRecord {
  return {
    featureId: 100,
    nameId: 1000,
    designationCode: 'ADM1',
    nameText: 'Northern Province',
    nameType: 'Approved',
    nameTypeCode: 'N',
    nameRank: 1,
    languageCode: 'eng',
    latitude: 10.5,
    longitude: 20.25,
    countryCode: 'AA',
    parentDivisionCode: '01',
    displayFlag: '1,2,3',
    transliterationCode: '',
    scriptCode: 'latn',
    genericTerm: 'province',
    ...overrides,
  }
}

export function makeDivision(overrides: Partial<CanonicalDivision> = {}): CanonicalDivision {
  return {
    ...makeRecord(),
    latitude: 10.5,
    longitude: 20.25,
    countryName: 'Alphaland',
    countryFullName: 'Republic of Alphaland',
    ...overrides,
  }
}

export function makePolicy(overrides: Partial<SelectionPolicy> = {}): SelectionPolicy {
  return {
    displayFilter: 'non-empty',
    displayMarker: 'Y',
    primaryLanguage: 'eng',
    commonLanguages: new Set(DEFAULT_COMMON_LANGUAGES),
    ...overrides,
  }
}

export function textStream(content: string): Readable {
  return Readable.from([content])
}

export async function withTempDir<T>(run: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'gns-divisions-'))
  try {
    return await run(dir)
  } finally {
    await rm(dir, { recursive: true, force: true })
  }
}
