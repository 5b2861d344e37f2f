import { getConfigPath, loadConfigFiles, validateConfig, type LoadedConfig } from '../core/cliconfig/config.js'
import { ConfigValidationError, formatDiagnostic } from '../core/cliconfig/diagnostics.js'
import { ociCredentialsPolicy } from '../core/cliconfig/ociCredentialsPolicy.js'
import type { Logger } from '../core/logger.js'
import { parseRepositoryAddressPrefix } from '../core/ociauth/address.js'
import type { CredentialsConfigs } from '../core/ociauth/configs.js'
import { dockerCredentialHelperLookupEnvironment } from '../core/ociauth/credentialHelper.js'
import { nodeConfigDiscoveryEnvironment, type CredentialsLookupEnvironment } from '../core/ociauth/environment.js'
import { isCredentialsNotFoundError, JoinedError } from '../core/ociauth/errors.js'
import { describeSpecificity } from '../core/ociauth/specificity.js'

export const EXIT_OK = 0
export const EXIT_ERROR = 1
export const EXIT_NOT_FOUND = 2

export interface CommonOptions {
  /** Comma-separated extra configuration files, merged after the default one. */
  config?: string
  verbose?: boolean
}

export interface ResolveOptions extends CommonOptions {
  address: string
  /** Also run the selected source (invoking credential helpers) and report the username. */
  lookup?: boolean
}

export interface CommandContext {
  env: NodeJS.ProcessEnv
  logger: Logger
  platform?: NodeJS.Platform
  lookupEnv?: CredentialsLookupEnvironment
}

export async function runResolve(options: ResolveOptions, ctx: CommandContext): Promise<number> {
  const { logger } = ctx
  const { registryDomain, repositoryPath } = parseRepositoryAddressPrefix(options.address)
  const policy = await buildPolicy(options, ctx)
  for (const config of policy.allConfigs()) {
    logger.debug(`Considering credentials from ${config.credentialsConfigLocationForUI()}`)
  }

  const { source, location, error } = policy.credentialsSourceForRepository(registryDomain, repositoryPath)
  if (!source) {
    for (const problem of nonNotFoundErrors(error)) {
      logger.warn(problem.message)
    }
    logger.info(`No credentials configured for ${options.address}.`)
    return EXIT_NOT_FOUND
  }
  if (error) {
    logger.warn(`Problems with some OCI credentials configuration:\n${error.message}`)
  }

  logger.success(`Selected ${source.describe()}`)
  logger.info(`Declared in: ${location ?? 'unknown location'}`)
  logger.info(`Matched: ${describeSpecificity(source.credentialsSpecificity())}`)

  if (!options.lookup) return EXIT_OK

  const lookupEnv = ctx.lookupEnv ?? dockerCredentialHelperLookupEnvironment({ env: ctx.env, logger })
  try {
    const creds = await source.credentials(lookupEnv)
    if (creds.kind === 'oauth') {
      logger.info('Credentials are OAuth-style tokens.')
    } else {
      logger.info(`Username: ${creds.username}`)
    }
    return EXIT_OK
  } catch (lookupErr) {
    if (!isCredentialsNotFoundError(lookupErr)) throw lookupErr
    logger.info(`The selected source has no credentials for ${options.address}.`)
    return EXIT_NOT_FOUND
  }
}

export async function runLocations(options: CommonOptions, ctx: CommandContext): Promise<number> {
  const policy = await buildPolicy(options, ctx)
  const configs = policy.allConfigs()
  if (configs.length === 0) {
    ctx.logger.info('No OCI credentials configuration in effect.')
    return EXIT_OK
  }
  for (const [i, config] of configs.entries()) {
    ctx.logger.info(`${i + 1}. ${config.credentialsConfigLocationForUI()}`)
  }
  return EXIT_OK
}

export async function runValidate(options: CommonOptions, ctx: CommandContext): Promise<number> {
  const { config, diagnostics } = await loadCliConfig(options, ctx.env)
  const all = [...diagnostics, ...validateConfig(config)]
  if (all.length > 0) {
    for (const diag of all) {
      ctx.logger.error(formatDiagnostic(diag))
    }
    return EXIT_ERROR
  }
  ctx.logger.success(`Configuration is valid (${config.ociRepositoryCredentials.length} oci_credentials, ${config.ociDefaultCredentials.length} oci_default_credentials).`)
  return EXIT_OK
}

/**
 * The default location is optional unless OCICREDS_CONFIG names it; files
 * given on the command line must all exist.
 */
export async function loadCliConfig(options: CommonOptions, env: NodeJS.ProcessEnv): Promise<LoadedConfig> {
  const extra = splitList(options.config)
  return loadConfigFiles([getConfigPath(env), ...extra], { optionalFirst: !env.OCICREDS_CONFIG })
}

async function buildPolicy(options: CommonOptions, ctx: CommandContext): Promise<CredentialsConfigs> {
  const { config, diagnostics } = await loadCliConfig(options, ctx.env)
  if (diagnostics.length > 0) {
    throw new ConfigValidationError(diagnostics)
  }
  const discoEnv = nodeConfigDiscoveryEnvironment(ctx.env, ctx.logger, ctx.platform)
  return ociCredentialsPolicy(config, discoEnv, ctx.logger)
}

function nonNotFoundErrors(error: Error | undefined): Error[] {
  if (!error) return []
  const parts = error instanceof JoinedError ? [...error.errors] : [error]
  return parts.filter(part => !isCredentialsNotFoundError(part))
}

function splitList(value: string | undefined): string[] {
  if (!value) return []
  return value.split(',').map(item => item.trim()).filter(Boolean)
}
