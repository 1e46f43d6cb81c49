/**
 * Interactive lookup adapters. Command handling is a plain function of the
 * loaded data; the prompt loop only moves lines in and out.
 */

import { createInterface } from 'node:readline'
import { LOOKUP } from '@/import/constants'
import { queryDivisions, summarizeDataset } from '@/services/lookup.service'
import { querySubdivisions } from '@/subdivisions/report'
import type { PublishedDivision } from '@/types/division.types'
import type { Subdivision } from '@/types/subdivision.types'
import {
  formatByCountry,
  formatByLevel,
  formatMatch,
  formatStats,
  formatSubdivisionResult,
} from './format'

export type CommandOutput = {
  lines: string[]
  quit: boolean
}

const QUIT_COMMANDS = new Set(['quit', 'exit', 'q'])

export const LOOKUP_HELP = [
  'Administrative Division Coordinate Lookup',
  '='.repeat(40),
  'Available commands:',
  '  country <CODE>     - Show all divisions for a country',
  '  level <LEVEL>      - Show divisions by level (ADM1, ADM2, etc.)',
  '  search <NAME>      - Search divisions by name',
  '  stats              - Show statistics',
  '  quit               - Exit',
  '',
]

export function handleLookupCommand(
  divisions: readonly PublishedDivision[],
  line: string,
): CommandOutput {
  const [command = '', ...args] = line.trim().split(/\s+/)
  const name = command.toLowerCase()
  const argument = args.join(' ')

  if (name === '') return { lines: [], quit: false }
  if (QUIT_COMMANDS.has(name)) return { lines: [], quit: true }

  if (name === 'country' && argument) {
    const results = queryDivisions(divisions, { country: argument })
    const [first] = results
    if (!first) {
      return { lines: [`No divisions found for country code: ${argument}`], quit: false }
    }
    return {
      lines: [
        `\nDivisions for ${first.countryName} (${first.countryCode}):`,
        ...results.map(formatByCountry),
      ],
      quit: false,
    }
  }

  if (name === 'level' && argument) {
    const results = queryDivisions(divisions, { level: argument })
    if (results.length === 0) {
      return { lines: [`No divisions found for level: ${argument}`], quit: false }
    }
    return {
      lines: [
        `\n${argument.toUpperCase()} divisions (showing first ${LOOKUP.PREVIEW_LIMIT}):`,
        ...results.slice(0, LOOKUP.PREVIEW_LIMIT).map(formatByLevel),
      ],
      quit: false,
    }
  }

  if (name === 'search' && argument) {
    const results = queryDivisions(divisions, { name: argument })
    if (results.length === 0) {
      return { lines: [`No divisions found matching: ${argument}`], quit: false }
    }
    return {
      lines: [
        `\nDivisions matching '${argument}' (showing first ${LOOKUP.PREVIEW_LIMIT}):`,
        ...results.slice(0, LOOKUP.PREVIEW_LIMIT).map(formatMatch),
      ],
      quit: false,
    }
  }

  if (name === 'stats') {
    return { lines: ['', ...formatStats(summarizeDataset(divisions))], quit: false }
  }

  return { lines: ["Unknown command. Type 'quit' to exit."], quit: false }
}

export function handleSubdivisionCommand(
  subdivisions: readonly Subdivision[],
  line: string,
): CommandOutput {
  const query = line.trim()
  if (query === '') return { lines: [], quit: false }
  if (QUIT_COMMANDS.has(query.toLowerCase())) return { lines: ['Goodbye!'], quit: true }

  const result = querySubdivisions(subdivisions, query)
  return { lines: ['', ...formatSubdivisionResult(result), ''], quit: false }
}

/**
 * Read commands from stdin until a handler asks to quit or input ends
 */
export async function runPrompt(
  prompt: string,
  handler: (line: string) => CommandOutput,
  streams: { input: NodeJS.ReadableStream; output: NodeJS.WritableStream } = {
    input: process.stdin,
    output: process.stdout,
  },
): Promise<void> {
  const rl = createInterface({ input: streams.input, output: streams.output })
  rl.setPrompt(prompt)

  try {
    rl.prompt()
    for await (const line of rl) {
      const { lines, quit } = handler(line)
      for (const output of lines) {
        console.log(output)
      }
      if (quit) break
      rl.prompt()
    }
  } finally {
    rl.close()
  }
}
