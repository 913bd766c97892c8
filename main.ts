#!/usr/bin/env node
/**
 * passforge command line
 *
 * Prints a batch of passwords, either from a given pattern or from the
 * bundled pattern file, and can validate or trace a pattern.
 */

import { existsSync, readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { Command, InvalidArgumentError } from 'commander'
import {
  PasswordGenerator,
  validatePattern,
  formatTrace,
  type GeneratorOptions,
  type ValidationIssue,
} from './engine/core'

// ============================================================================
// Types
// ============================================================================

export interface CliOptions {
  count: number
  pattern?: string
  showPattern: boolean
  quiet: boolean
  wordlists?: string
  check: boolean
  trace: boolean
}

/** Line sinks for normal output and diagnostics */
export interface CliIO {
  out: (line: string) => void
  err: (line: string) => void
}

const consoleIO: CliIO = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
}

const RULE_WIDTH = 60
const PATTERN_COLUMN = 40

const EXAMPLES = `
Examples:
  passforge                        Generate 12 random passwords
  passforge -n 5                   Generate 5 passwords
  passforge -p "{word}.{word}"     Use a specific pattern
  passforge --show-pattern         Show the pattern used for each password
  passforge --check -p "{word"     Report problems in a pattern

Pattern syntax:
  {word}           Random word from the default list
  {word(animal)}   Random word from a specific list
  {number(99)}     Random number (0-99)
  {symbol}         Random symbol
  {pronounceable}  Made-up pronounceable word
  {a|b|c}          One of the options
  {word}[50]       Kept half of the time
  {$W1}            Repeat the first value

Modifiers:
  {word+uppercase}   Convert to uppercase
  {word+obscure}     Leet-speak substitutions
  {word}+reverse     Reverse the text
  {word+piglatin}    Convert to pig latin`

// ============================================================================
// Helpers
// ============================================================================

function readVersion(): string {
  const candidates = [resolve(__dirname, 'package.json'), resolve(__dirname, '../package.json')]
  const path = candidates.find((candidate) => existsSync(candidate))
  if (!path) return '0.0.0'

  const pkg: unknown = JSON.parse(readFileSync(path, 'utf8'))
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version
  }
  return '0.0.0'
}

function parseCount(value: string): number {
  const count = Number(value)
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return count
}

/** Shorten a pattern to fit the pattern column */
export function truncatePattern(pattern: string): string {
  return pattern.length > PATTERN_COLUMN ? `${pattern.slice(0, PATTERN_COLUMN - 3)}...` : pattern
}

/**
 * One numbered output line
 *
 * @example
 * formatPasswordLine(3, 'bark.otter')
 * // '   3. bark.otter'
 */
export function formatPasswordLine(index: number, password: string, pattern?: string): string {
  const number = String(index).padStart(2)
  if (pattern === undefined) return `  ${number}. ${password}`
  return `  ${number}. ${password.padEnd(PATTERN_COLUMN)}  [${truncatePattern(pattern)}]`
}

function formatIssue(issue: ValidationIssue): string[] {
  const position = issue.position !== undefined ? ` (at ${issue.position})` : ''
  const lines = [`${issue.severity}: ${issue.message}${position}`]
  if (issue.suggestion) lines.push(`  ${issue.suggestion}`)
  return lines
}

// ============================================================================
// Commands
// ============================================================================

function checkPattern(pattern: string | undefined, io: CliIO): number {
  if (pattern === undefined) {
    io.err('--check needs a pattern, pass one with -p')
    return 2
  }

  const result = validatePattern(pattern)
  for (const issue of result.issues) {
    for (const line of formatIssue(issue)) io.out(line)
  }
  if (result.valid) io.out('Pattern is valid')
  return result.valid ? 0 : 1
}

/**
 * Run the CLI with parsed options and return the exit code
 */
export function runPasswords(options: CliOptions, io: CliIO, generatorOptions: GeneratorOptions = {}): number {
  if (options.check) return checkPattern(options.pattern, io)

  const generator = new PasswordGenerator({
    ...generatorOptions,
    config: { ...generatorOptions.config, wordlistDir: options.wordlists },
  })

  if (!options.quiet) {
    io.out('')
    io.out('='.repeat(RULE_WIDTH))
    io.out('  passforge - Pattern-based Password Generator')
    io.out('='.repeat(RULE_WIDTH))
    io.out('')
  }

  for (let i = 1; i <= options.count; i++) {
    const result = generator.generateDetailed(options.pattern, { enableTrace: options.trace })

    if (options.quiet) {
      io.out(result.text)
    } else {
      io.out(formatPasswordLine(i, result.text, options.showPattern ? result.pattern : undefined))
    }

    if (result.trace) {
      for (const line of formatTrace(result.trace).split('\n')) {
        io.out(`      ${line}`)
      }
    }
  }

  if (!options.quiet) {
    io.out('')
    io.out('-'.repeat(RULE_WIDTH))
    if (options.pattern !== undefined) {
      io.out(`  Pattern: ${options.pattern}`)
    } else {
      io.out('  Tip: Use -p to specify a custom pattern')
      io.out('       Use --show-pattern to see patterns used')
    }
    io.out('')
  }

  return 0
}

export function createProgram(action: (options: CliOptions) => void): Command {
  const program = new Command()

  program
    .name('passforge')
    .description('Generate strong, memorable passwords using patterns.')
    .version(readVersion())
    .option('-n, --count <n>', 'number of passwords to generate', parseCount, 12)
    .option('-p, --pattern <pattern>', 'use a specific pattern instead of a random one')
    .option('--show-pattern', 'show the pattern used for each password', false)
    .option('-q, --quiet', 'just output passwords, one per line', false)
    .option('--wordlists <dir>', 'directory of word lists and patterns.cfg', process.env.PASSFORGE_WORDLISTS)
    .option('--check', 'validate the pattern and print any issues', false)
    .option('--trace', 'print how each password was resolved', false)
    .addHelpText('after', EXAMPLES)
    .action(() => action(program.opts<CliOptions>()))

  return program
}

/**
 * Parse user arguments (without the node and script entries) and run
 */
export function runCli(args: string[], io: CliIO = consoleIO, generatorOptions: GeneratorOptions = {}): number {
  let exitCode = 0
  const program = createProgram((options) => {
    exitCode = runPasswords(options, io, generatorOptions)
  })
  program.parse(args, { from: 'user' })
  return exitCode
}

if (require.main === module) {
  process.exitCode = runCli(process.argv.slice(2))
}
