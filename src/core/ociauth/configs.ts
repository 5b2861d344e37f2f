import type { Logger } from '../logger.js'
import { silentLogger } from '../logger.js'
import { parseRepositoryAddressPrefix } from './address.js'
import type { CredentialsCandidate, CredentialsConfig } from './config.js'
import { EmptyRegistryCredential, type RegistryCredential } from './credentials.js'
import type { CredentialsLookupEnvironment } from './environment.js'
import { CredentialsNotFoundError, isCredentialsNotFoundError, joinErrors, wrapError } from './errors.js'
import { newDockerCredentialHelperCredentialsSource, type CredentialsSource } from './sources.js'
import { GlobalCredentialsSpecificity, NoCredentialsSpecificity } from './specificity.js'

export interface CredentialsSourceLookup {
  /** The most specific matching source, if any matched at all. */
  source?: CredentialsSource
  /** The locationForUI of the layer that produced source. */
  location?: string
  /**
   * Set when nothing matched (satisfying isCredentialsNotFoundError), and
   * also when a source was found but some layers reported problems.
   */
  error?: Error
}

/**
 * The full credentials policy: an ordered list of configuration layers where
 * earlier layers win ties between equally-specific matches.
 */
export class CredentialsConfigs {
  readonly #configs: readonly CredentialsConfig[]

  constructor(configs: readonly CredentialsConfig[]) {
    this.#configs = Object.freeze([...configs])
  }

  allConfigs(): CredentialsConfig[] {
    return [...this.#configs]
  }

  credentialsSourceForRepository(registryDomain: string, repositoryPath: string): CredentialsSourceLookup {
    let best: CredentialsSource | undefined
    let bestSpec = NoCredentialsSpecificity
    let bestLocation = ''
    let errs: Error | undefined

    for (const config of this.#configs) {
      for (const { source, error } of config.credentialsSourcesForRepository(registryDomain, repositoryPath)) {
        if (!source) {
          if (error && !isCredentialsNotFoundError(error)) {
            errs = joinErrors(errs, wrapError(config.credentialsConfigLocationForUI(), error))
          }
          continue
        }
        const spec = source.credentialsSpecificity()
        if (spec > bestSpec) {
          best = source
          bestSpec = spec
          bestLocation = config.credentialsConfigLocationForUI()
        }
      }
    }

    if (!best) {
      const target = repositoryPath ? `${registryDomain}/${repositoryPath}` : registryDomain
      return { error: joinErrors(new CredentialsNotFoundError(`no credentials configured for ${target}`), errs) }
    }
    return errs ? { source: best, location: bestLocation, error: errs } : { source: best, location: bestLocation }
  }

  credentialsSourceForRepositoryAddress(address: string): CredentialsSourceLookup {
    const { registryDomain, repositoryPath } = parseRepositoryAddressPrefix(address)
    return this.credentialsSourceForRepository(registryDomain, repositoryPath)
  }
}

export function newCredentialsConfigs(configs: readonly CredentialsConfig[]): CredentialsConfigs {
  return new CredentialsConfigs(configs)
}

/**
 * A layer with a single rule: use the given credential helper for every
 * registry domain, at the lowest specificity that still counts as a match.
 */
export function newGlobalDockerCredentialHelperCredentialsConfig(locationForUI: string, helperName: string): CredentialsConfig {
  return Object.freeze({
    * credentialsSourcesForRepository(registryDomain: string): Iterable<CredentialsCandidate> {
      yield { source: newDockerCredentialHelperCredentialsSource(helperName, `https://${registryDomain}`, GlobalCredentialsSpecificity) }
    },
    credentialsConfigLocationForUI: () => locationForUI
  })
}

export type RegistryCredentialCallback = (hostport: string) => Promise<RegistryCredential>

/**
 * Selects credentials for one repository and returns the callback shape
 * registry clients use to ask for credentials per host. The selected
 * credentials are only ever handed out for the registry they were
 * configured for.
 */
export function registryCredentialCallback(
  policy: CredentialsConfigs,
  registryDomain: string,
  repositoryPath: string,
  lookupEnv: CredentialsLookupEnvironment,
  logger: Logger = silentLogger
): RegistryCredentialCallback {
  for (const config of policy.allConfigs()) {
    logger.debug(`OCI registry client will consider credentials from ${config.credentialsConfigLocationForUI()}`)
  }
  const { source, error } = policy.credentialsSourceForRepository(registryDomain, repositoryPath)
  if (source && error) {
    logger.warn(`Problems with some OCI credentials configuration:\n${error.message}`)
  }
  return async (hostport) => {
    if (hostport !== registryDomain || !source) {
      return { ...EmptyRegistryCredential }
    }
    try {
      const creds = await source.credentials(lookupEnv)
      return creds.toRegistryCredential()
    } catch (err) {
      if (isCredentialsNotFoundError(err)) return { ...EmptyRegistryCredential }
      throw err
    }
  }
}
