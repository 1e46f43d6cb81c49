/**
 * Console output helpers shared by the report commands
 */

const RULE_WIDTH = 60
const LABEL_WIDTH = 32

export type RankedEntry = readonly [label: string, value: number]

function formatValue(value: string | number): string {
  return typeof value === 'number' ? value.toLocaleString('en-US') : value
}

export function logSection(title: string): void {
  console.log(`\n▶ ${title}`)
  console.log('━'.repeat(RULE_WIDTH))
}

export function logHeader(title: string): void {
  console.log(`╔${'═'.repeat(RULE_WIDTH)}╗`)
  console.log(`║ ${title.padEnd(RULE_WIDTH - 2)} ║`)
  console.log(`╚${'═'.repeat(RULE_WIDTH)}╝`)
}

export function logSummary(label: string, value: string | number): void {
  console.log(`${label.padEnd(LABEL_WIDTH)} ${formatValue(value)}`)
}

export function logWarning(message: string): void {
  console.warn(`⚠️  ${message}`)
}

/**
 * Numbered list under a title; nothing is printed for no entries
 */
export function logRanking(title: string, entries: readonly RankedEntry[]): void {
  if (entries.length === 0) return
  console.log(`\n${title}`)
  entries.forEach(([label, value], index) => {
    console.log(`  ${String(index + 1).padStart(2)}. ${label}: ${formatValue(value)}`)
  })
}
