import type { Logger } from '../logger.js'
import { silentLogger } from '../logger.js'
import type { CredentialsConfig } from '../ociauth/config.js'
import { newCredentialsConfigs, newGlobalDockerCredentialHelperCredentialsConfig, type CredentialsConfigs } from '../ociauth/configs.js'
import { findDockerCLIStyleCredentialsConfigs, fixedDockerCLIStyleCredentialsConfigs } from '../ociauth/discovery.js'
import type { ConfigDiscoveryEnvironment } from '../ociauth/environment.js'
import { toError, wrapError } from '../ociauth/errors.js'
import type { CLIConfig } from './config.js'
import { validateConfig } from './config.js'
import { ConfigValidationError } from './diagnostics.js'
import { newDefaultOCIDefaultCredentials, OCIRepositoryCredentialsConfig } from './ociCredentials.js'

/**
 * Builds the credentials policy for a merged configuration. Explicit
 * oci_credentials blocks come first so they win ties against anything
 * else, then the default credential helper, then whatever ambient
 * configuration discovery turns up.
 */
export async function ociCredentialsPolicy(
  cfg: CLIConfig,
  discoEnv: ConfigDiscoveryEnvironment,
  logger: Logger = silentLogger
): Promise<CredentialsConfigs> {
  const diagnostics = validateConfig(cfg)
  if (diagnostics.length > 0) {
    throw new ConfigValidationError(diagnostics)
  }

  const configs: CredentialsConfig[] = cfg.ociRepositoryCredentials.map(block => new OCIRepositoryCredentialsConfig(block))

  const defaults = cfg.ociDefaultCredentials[0] ?? newDefaultOCIDefaultCredentials()
  if (defaults.defaultDockerCredentialHelper) {
    configs.push(newGlobalDockerCredentialHelperCredentialsConfig('oci_default_credentials block', defaults.defaultDockerCredentialHelper))
  }

  if (defaults.discoverAmbientCredentials) {
    try {
      configs.push(...await discoverAmbientOCICredentials(defaults.dockerStyleConfigFiles, discoEnv, logger))
    } catch (error) {
      throw wrapError('discovering ambient OCI registry credentials', toError(error))
    }
  }

  return newCredentialsConfigs(configs)
}

async function discoverAmbientOCICredentials(
  dockerStyleConfigFiles: readonly string[] | undefined,
  discoEnv: ConfigDiscoveryEnvironment,
  logger: Logger
): Promise<CredentialsConfig[]> {
  if (dockerStyleConfigFiles !== undefined) {
    // An empty list disables Docker-style files entirely.
    const { configs, error } = await fixedDockerCLIStyleCredentialsConfigs(dockerStyleConfigFiles, discoEnv)
    if (error) {
      throw wrapError('failed to read Docker-style config files', error)
    }
    return configs
  }

  const { configs, error } = await findDockerCLIStyleCredentialsConfigs(discoEnv)
  if (error) {
    // Searched locations are best-effort: drop all ambient layers and go on.
    logger.warn(`Problems during OCI registry ambient credentials discovery:\n${error.message}`)
    return []
  }
  return configs
}
