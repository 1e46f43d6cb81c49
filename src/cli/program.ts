/**
 * Command-line entry points
 */

import { Command } from 'commander'
import { Effect } from 'effect'
import { loadConfig } from '@/config/env'
import { exportByCountry } from '@/export/split-by-country'
import { runImport } from '@/import/index'
import { logSection } from '@/import/utils/logging'
import { queryDivisions } from '@/services/lookup.service'
import { loadPublishedDivisions } from '@/services/workbook.service'
import { loadSubdivisions, runSubdivisionReport } from '@/subdivisions/index'
import { querySubdivisions } from '@/subdivisions/report'
import type { ConfigurationError, InputError, ReportWriteError } from '@/types/errors'
import { formatDetailed, formatSubdivisionResult } from './format'
import { handleLookupCommand, handleSubdivisionCommand, LOOKUP_HELP, runPrompt } from './repl'

type CliError = InputError | ReportWriteError | ConfigurationError

type EnvOverrides = Record<string, string | undefined>

type ProcessOptions = {
  countries?: string
  records?: string
  output?: string
  top?: string
  displayFilter?: string
  displayMarker?: string
  primaryLanguage?: string
  commonLanguages?: string
  split?: string | boolean
  geojson?: string
}

type LookupOptions = {
  workbook?: string
  name?: string
  interactive?: boolean
}

type SubdivisionOptions = {
  countries?: string
  input?: string
  output?: string
}

function reportError(error: CliError): void {
  console.error(`❌ Error: ${error.message}`)
  if (error._tag === 'MissingInputFileError') {
    console.error(`Expected file: ${error.path}`)
    console.error('Run from the directory holding the GNS extract or set the file paths in .env')
  }
}

/**
 * Run an effect at the CLI edge: typed failures are reported and exit non-zero
 */
export async function runCli<A>(program: Effect.Effect<A, CliError>): Promise<void> {
  await Effect.runPromise(
    program.pipe(
      Effect.asVoid,
      Effect.catchAll((error) =>
        Effect.sync(() => {
          reportError(error)
          process.exit(1)
        }),
      ),
    ),
  )
}

/**
 * CLI flags take precedence over environment variables; both go through
 * the same decoding
 */
export function processOverrides(options: ProcessOptions): EnvOverrides {
  const overrides: EnvOverrides = {
    COUNTRY_CODES_FILE: options.countries,
    ADMIN_REGIONS_FILE: options.records,
    OUTPUT_FILE: options.output,
    TOP_COUNTRIES: options.top,
    DISPLAY_FILTER: options.displayFilter,
    DISPLAY_MARKER: options.displayMarker,
    PRIMARY_LANGUAGE: options.primaryLanguage,
    COMMON_LANGUAGES: options.commonLanguages,
    GEOJSON_FILE: options.geojson,
  }

  if (options.split !== undefined && options.split !== false) {
    overrides.EXPORT_BY_COUNTRY = 'true'
    if (typeof options.split === 'string') {
      overrides.COUNTRY_EXPORT_DIR = options.split
    }
  }

  return definedOnly(overrides)
}

function definedOnly(overrides: EnvOverrides): EnvOverrides {
  return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined))
}

// Unset flags fall through to the environment
const withOverrides = (overrides: EnvOverrides) =>
  loadConfig({ ...process.env, ...definedOnly(overrides) })

function registerProcessCommand(program: Command): void {
  program
    .command('process', { isDefault: true })
    .description('Build the administrative divisions workbook from the GNS extract')
    .option('--countries <file>', 'country codes CSV')
    .option('--records <file>', 'GNS administrative regions TSV')
    .option('--output <file>', 'report workbook to write')
    .option('--top <n>', 'number of countries in the top countries sheet')
    .option('--display-filter <mode>', 'display flag policy: non-empty or affirmative')
    .option('--display-marker <marker>', 'marker required by the affirmative policy')
    .option('--primary-language <code>', 'most preferred language code')
    .option('--common-languages <codes>', 'comma-separated second-tier language codes')
    .option('--split [dir]', 'also write one workbook per country')
    .option('--geojson <file>', 'also write the divisions as GeoJSON points')
    .action(async (options: ProcessOptions) => {
      await runCli(
        Effect.gen(function* () {
          const config = yield* withOverrides(processOverrides(options))
          return yield* runImport(config)
        }),
      )
    })
}

function registerSplitCommand(program: Command): void {
  program
    .command('split')
    .description('Split an existing report workbook into one workbook per country')
    .argument('[workbook]', 'report workbook to read')
    .option('--out <dir>', 'directory for the country workbooks')
    .action(async (workbook: string | undefined, options: { out?: string }) => {
      await runCli(
        Effect.gen(function* () {
          const config = yield* withOverrides({
            OUTPUT_FILE: workbook,
            COUNTRY_EXPORT_DIR: options.out,
          })
          logSection(`Reading ${config.outputFile}`)
          const divisions = yield* loadPublishedDivisions(config.outputFile)
          const exported = yield* exportByCountry(divisions, config.countryExportDir)
          console.log(
            `\nSuccess! Exported ${exported.length} country files to '${config.countryExportDir}'.`,
          )
        }),
      )
    })
}

function registerLookupCommand(program: Command): void {
  program
    .command('lookup')
    .description('Look up divisions in a report workbook (interactive without a query)')
    .argument('[country]', 'country code or name')
    .argument('[level]', 'administrative level, e.g. ADM1')
    .option('--name <text>', 'division name substring')
    .option('--workbook <file>', 'report workbook to read')
    .option('-i, --interactive', 'start the interactive prompt')
    .action(
      async (country: string | undefined, level: string | undefined, options: LookupOptions) => {
        await runCli(
          Effect.gen(function* () {
            const config = yield* withOverrides({ OUTPUT_FILE: options.workbook })
            const divisions = yield* loadPublishedDivisions(config.outputFile)

            if (options.interactive || (!country && !level && !options.name)) {
              for (const line of LOOKUP_HELP) console.log(line)
              yield* Effect.promise(() =>
                runPrompt('Enter command: ', (line) => handleLookupCommand(divisions, line)),
              )
              return
            }

            const results = queryDivisions(divisions, { country, level, name: options.name })
            if (results.length === 0) {
              console.log('No matching divisions found')
              return
            }
            console.log(`Found ${results.length} divisions:`)
            for (const division of results) console.log(formatDetailed(division))
          }),
        )
      },
    )
}

function registerSubdivisionCommands(program: Command): void {
  const subdivisions = program
    .command('subdivisions')
    .description('First-order subdivision report from the ADM1 code list')

  subdivisions
    .command('report', { isDefault: true })
    .description('Write the subdivision workbook')
    .option('--countries <file>', 'country codes CSV')
    .option('--input <file>', 'ADM1 codes CSV')
    .option('--output <file>', 'subdivision workbook to write')
    .action(async (options: SubdivisionOptions) => {
      await runCli(
        Effect.gen(function* () {
          const config = yield* withOverrides({
            COUNTRY_CODES_FILE: options.countries,
            SUBDIVISIONS_FILE: options.input,
            SUBDIVISIONS_OUTPUT_FILE: options.output,
          })
          yield* runSubdivisionReport(config)
        }),
      )
    })

  subdivisions
    .command('query')
    .description('List the subdivisions of a country (interactive without a query)')
    .argument('[country...]', 'country code or name')
    .option('--countries <file>', 'country codes CSV')
    .option('--input <file>', 'ADM1 codes CSV')
    .action(async (words: string[], options: SubdivisionOptions) => {
      await runCli(
        Effect.gen(function* () {
          const config = yield* withOverrides({
            COUNTRY_CODES_FILE: options.countries,
            SUBDIVISIONS_FILE: options.input,
          })
          const loaded = yield* loadSubdivisions(config)

          if (words.length === 0) {
            console.log('Country Subdivision Query Tool')
            console.log('='.repeat(30))
            console.log("Enter a country code (e.g., 'US') or name (e.g., 'United States')")
            console.log("Type 'quit' to exit\n")
            yield* Effect.promise(() =>
              runPrompt('Enter country: ', (line) => handleSubdivisionCommand(loaded, line)),
            )
            return
          }

          const result = querySubdivisions(loaded, words.join(' '))
          for (const line of formatSubdivisionResult(result)) console.log(line)
        }),
      )
    })
}

export function buildProgram(): Command {
  const program = new Command()
    .name('gns-divisions')
    .description('Canonical administrative divisions from the GEOnet Names Server extract')

  registerProcessCommand(program)
  registerSplitCommand(program)
  registerLookupCommand(program)
  registerSubdivisionCommands(program)

  return program
}
