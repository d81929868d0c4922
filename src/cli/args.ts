/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command, CommanderError } from 'commander'
import { VERSION } from '../index'

export type CommandName = 'summarize' | 'ask' | 'extract' | 'clear-cache' | 'help'

export interface CLIArgs {
  command: CommandName
  /** Input file; stdin when unset */
  file: string | undefined
  /** Question for the ask command */
  question: string | undefined
  /** Write the result to this file as well */
  save: string | undefined
  /** extract: fail instead of returning empty entities on unparseable output */
  strict: boolean
  clearCache: boolean
  noCache: boolean
  cacheDir: string | undefined
  configFile: string | undefined
  quiet: boolean
  verbose: boolean
}

const DESCRIPTION = `Smart Q&A - Summarize, ask and extract from text.

Responses are cached in ./.cache so repeated requests never call the API twice.

Examples:
  # Summarize a document
  $ smart-qa summarize --file report.txt

  # Ask a question
  $ smart-qa ask --file context.txt --question "What is the main point?"

  # Extract entities and save to file
  $ smart-qa extract --file article.txt --save entities.json

  # Clear the cache
  $ smart-qa --clear-cache`

function createProgram(): Command {
  const program = new Command()
    .name('smart-qa')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('--clear-cache', 'Clear the cache before running')
    .option('--no-cache', 'Skip cache lookups and regenerate results')
    .option('--cache-dir <dir>', 'Custom cache directory (or set SMART_QA_CACHE_DIR)')
    .option('--config-file <path>', 'Config file path (or set SMART_QA_CONFIG)')
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')

  // ============ SUMMARIZE ============
  program
    .command('summarize')
    .description('Summarize text')
    .option('-f, --file <path>', 'Path to text file to summarize (default: stdin)')
    .option('-s, --save <path>', 'Save summary to file')

  // ============ ASK ============
  program
    .command('ask')
    .description('Ask a question about text')
    .option('-f, --file <path>', 'Path to context file (default: stdin)')
    .requiredOption('--question <text>', 'Question to ask')
    .option('-s, --save <path>', 'Save answer to file')

  // ============ EXTRACT ============
  program
    .command('extract')
    .description('Extract people, dates and locations as JSON')
    .option('-f, --file <path>', 'Path to text file (default: stdin)')
    .option('-s, --save <path>', 'Save extracted entities to JSON file')
    .option('--strict', 'Fail when the model output cannot be parsed')

  return program
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function buildCLIArgs(command: CommandName, opts: Record<string, unknown>): CLIArgs {
  return {
    command,
    file: optionalString(opts.file),
    question: optionalString(opts.question),
    save: optionalString(opts.save),
    strict: opts.strict === true,
    clearCache: opts.clearCache === true,
    noCache: opts.cache === false,
    cacheDir: optionalString(opts.cacheDir),
    configFile: optionalString(opts.configFile),
    quiet: opts.quiet === true,
    verbose: opts.verbose === true
  }
}

function isCommandName(name: string): name is 'summarize' | 'ask' | 'extract' {
  return name === 'summarize' || name === 'ask' || name === 'extract'
}

/**
 * Attach action handlers that capture the parsed args.
 * optsWithGlobals() includes the global options from the parent program.
 */
function captureArgs(program: Command): () => CLIArgs | null {
  let result: CLIArgs | null = null

  for (const cmd of program.commands) {
    const name = cmd.name()
    if (!isCommandName(name)) continue
    cmd.action(() => {
      result = buildCLIArgs(name, cmd.optsWithGlobals())
    })
  }

  // No subcommand: only meaningful with --clear-cache
  program.action(() => {
    const opts = program.opts()
    result = buildCLIArgs(opts.clearCache === true ? 'clear-cache' : 'help', opts)
  })

  return () => result
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version, and shows help when nothing was asked for.
 */
export function parseCliArgs(argv: string[] = process.argv): CLIArgs {
  const program: Command = createProgram()
  const parsed = captureArgs(program)

  program.parse(argv)

  const result = parsed()
  if (!result || result.command === 'help') {
    program.help()
  }

  return result
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    // Subcommands copied their settings at creation, so each needs its own override
    for (const cmd of [program, ...program.commands]) {
      cmd.exitOverride().configureOutput({ writeErr: () => {}, writeOut: () => {} })
    }
  }

  const parsed = captureArgs(program)

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    // exitOverride throws on help/version and on usage errors
    if (!(error instanceof CommanderError)) throw error
  }

  return parsed() ?? buildCLIArgs('help', {})
}
