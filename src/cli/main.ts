#!/usr/bin/env node
import { defineCommand, runMain } from 'citty'
import { config as loadEnv } from 'dotenv'
import { createLogger, type Logger } from '../core/logger.js'
import { toError } from '../core/ociauth/errors.js'
import { EXIT_ERROR, runLocations, runResolve, runValidate, type CommandContext } from './commands.js'

preloadEnv()

const commonArgs = {
  config: { type: 'string', description: 'Extra configuration files, comma-separated (merged after the default file)' },
  verbose: { type: 'boolean', description: 'Verbose output' },
  'env-file': { type: 'string', description: 'Path to .env file (default: ./.env)' }
} as const

const main = defineCommand({
  meta: {
    name: 'ocicreds',
    description: 'Inspect which credentials an OCI registry client would use for a repository.'
  },
  subCommands: {
    resolve: defineCommand({
      meta: { name: 'resolve', description: 'Show the credentials source selected for a repository address' },
      args: {
        address: { type: 'positional', required: true, description: 'Repository address (e.g., example.com/org/repo)' },
        lookup: { type: 'boolean', description: 'Run the selected source and print the username (secrets are never printed)' },
        ...commonArgs
      },
      async run({ args }) {
        await runCommand(Boolean(args.verbose), ctx => runResolve({
          address: args.address,
          lookup: Boolean(args.lookup),
          config: args.config,
          verbose: Boolean(args.verbose)
        }, ctx))
      }
    }),
    locations: defineCommand({
      meta: { name: 'locations', description: 'List the credentials configuration layers in precedence order' },
      args: commonArgs,
      async run({ args }) {
        await runCommand(Boolean(args.verbose), ctx => runLocations({ config: args.config, verbose: Boolean(args.verbose) }, ctx))
      }
    }),
    validate: defineCommand({
      meta: { name: 'validate', description: 'Check the CLI configuration files for problems' },
      args: commonArgs,
      async run({ args }) {
        await runCommand(Boolean(args.verbose), ctx => runValidate({ config: args.config, verbose: Boolean(args.verbose) }, ctx))
      }
    })
  }
})

void runMain(main)

async function runCommand(verbose: boolean, command: (ctx: CommandContext) => Promise<number>): Promise<void> {
  const logger: Logger = createLogger(verbose)
  try {
    process.exitCode = await command({ env: process.env, logger })
  } catch (error) {
    logger.error(toError(error).message)
    process.exitCode = EXIT_ERROR
  }
}

function preloadEnv() {
  const envArg = findArgValue('--env-file')
  if (envArg) {
    loadEnv({ path: envArg })
  } else {
    loadEnv()
  }
}

function findArgValue(flag: string): string | undefined {
  const argv = process.argv.slice(2)
  const direct = argv.find(arg => arg.startsWith(`${flag}=`))
  if (direct) {
    const value = direct.slice(flag.length + 1)
    return value ? value.trim() : undefined
  }
  const idx = argv.indexOf(flag)
  if (idx >= 0 && argv[idx + 1]) return argv[idx + 1]
  return undefined
}
