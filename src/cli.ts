#!/usr/bin/env node
/**
 * smart-qa CLI
 *
 * Reads input from a file or stdin, runs one operation through the client
 * and prints the framed result. Settings come from the config file, the
 * environment (.env is loaded first) and flags.
 */

import { config as loadDotenv } from 'dotenv'
import { parseCliArgs } from './cli/args'
import { describeError, EXIT_OK, exitCodeFor, runCommand } from './cli/commands'
import { resolveCliConfig } from './cli/config'
import { SmartQAClient } from './client'
import { createLogger } from './logger'

async function main(): Promise<number> {
  loadDotenv()
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  try {
    const config = await resolveCliConfig({ configFile: args.configFile, cacheDir: args.cacheDir })
    const client = new SmartQAClient(config, { logger })

    await runCommand(args, {
      client,
      logger,
      write: (text) => process.stdout.write(text),
      stdin: process.stdin
    })

    const stats = client.getStats()
    logger.verbose(
      `Cache hits: ${stats.hits}, misses: ${stats.misses}, remote calls: ${stats.remoteCalls}`
    )
    return EXIT_OK
  } catch (error) {
    logger.error(describeError(error))
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    return exitCodeFor(error)
  }
}

main().then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error(error)
    process.exitCode = 1
  }
)
