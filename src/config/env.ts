import { Effect, Schema } from 'effect'
import { DEFAULT_COMMON_LANGUAGES, DEFAULTS } from '@/import/constants'
import type { ImportConfig } from '@/types/config.types'
import { ConfigurationError } from '@/types/errors'

const PositiveIntFromString = Schema.NumberFromString.pipe(Schema.int(), Schema.positive())

const EnvSchema = Schema.Struct({
  COUNTRY_CODES_FILE: Schema.optionalWith(Schema.NonEmptyString, {
    default: () => DEFAULTS.COUNTRY_CODES_FILE,
  }),
  ADMIN_REGIONS_FILE: Schema.optionalWith(Schema.NonEmptyString, {
    default: () => DEFAULTS.ADMIN_REGIONS_FILE,
  }),
  OUTPUT_FILE: Schema.optionalWith(Schema.NonEmptyString, {
    default: () => DEFAULTS.OUTPUT_FILE,
  }),
  COUNTRY_EXPORT_DIR: Schema.optionalWith(Schema.NonEmptyString, {
    default: () => DEFAULTS.COUNTRY_EXPORT_DIR,
  }),
  EXPORT_BY_COUNTRY: Schema.optionalWith(Schema.Literal('true', 'false'), {
    default: () => 'false' as const,
  }),
  GEOJSON_FILE: Schema.optional(Schema.String),
  DISPLAY_FILTER: Schema.optionalWith(Schema.Literal('non-empty', 'affirmative'), {
    default: () => 'non-empty' as const,
  }),
  DISPLAY_MARKER: Schema.optionalWith(Schema.NonEmptyString, {
    default: () => DEFAULTS.DISPLAY_MARKER,
  }),
  PRIMARY_LANGUAGE: Schema.optionalWith(Schema.NonEmptyString, {
    default: () => DEFAULTS.PRIMARY_LANGUAGE,
  }),
  COMMON_LANGUAGES: Schema.optional(Schema.String),
  TOP_COUNTRIES: Schema.optionalWith(PositiveIntFromString, {
    default: () => DEFAULTS.TOP_COUNTRIES,
  }),
  SUBDIVISIONS_FILE: Schema.optionalWith(Schema.NonEmptyString, {
    default: () => DEFAULTS.SUBDIVISIONS_FILE,
  }),
  SUBDIVISIONS_OUTPUT_FILE: Schema.optionalWith(Schema.NonEmptyString, {
    default: () => DEFAULTS.SUBDIVISIONS_OUTPUT_FILE,
  }),
})

type Env = typeof EnvSchema.Type

/**
 * Comma-separated language codes. Unset means the default common set,
 * an empty string means no common languages at all.
 */
export function parseLanguageList(value: string | undefined): string[] {
  if (value === undefined) {
    return [...DEFAULT_COMMON_LANGUAGES]
  }
  return value
    .split(',')
    .map((code) => code.trim())
    .filter((code) => code.length > 0)
}

function toImportConfig(env: Env): ImportConfig {
  const geojsonFile = env.GEOJSON_FILE?.trim()

  return {
    countryCodesFile: env.COUNTRY_CODES_FILE,
    adminRegionsFile: env.ADMIN_REGIONS_FILE,
    outputFile: env.OUTPUT_FILE,
    countryExportDir: env.COUNTRY_EXPORT_DIR,
    exportByCountry: env.EXPORT_BY_COUNTRY === 'true',
    geojsonFile: geojsonFile ? geojsonFile : null,
    topCountries: env.TOP_COUNTRIES,
    policy: {
      displayFilter: env.DISPLAY_FILTER,
      displayMarker: env.DISPLAY_MARKER,
      primaryLanguage: env.PRIMARY_LANGUAGE,
      commonLanguages: new Set(parseLanguageList(env.COMMON_LANGUAGES)),
    },
    subdivisionsFile: env.SUBDIVISIONS_FILE,
    subdivisionsOutputFile: env.SUBDIVISIONS_OUTPUT_FILE,
  }
}

/**
 * Decode the run configuration from environment variables
 */
export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): Effect.Effect<ImportConfig, ConfigurationError> =>
  Schema.decodeUnknown(EnvSchema)(env).pipe(
    Effect.mapError((error) => new ConfigurationError(`Invalid configuration: ${error.message}`)),
    Effect.map(toImportConfig),
  )
