import type { CredentialsSource } from './sources.js'

export type CredentialsCandidate =
  | { source: CredentialsSource; error?: undefined }
  | { source?: undefined; error: Error }

/**
 * One layer of credentials configuration, such as a single Docker-style
 * config file or a single explicit oci_credentials rule. Layers are
 * immutable once constructed.
 */
export interface CredentialsConfig {
  /**
   * Yields every source in this layer that matches the given repository,
   * along with errors for individual entries that could not be used. The
   * caller compares all candidates, so the order only matters for ties.
   */
  credentialsSourcesForRepository: (registryDomain: string, repositoryPath: string) => Iterable<CredentialsCandidate>
  /** A file path or short description, used only in messages. */
  credentialsConfigLocationForUI: () => string
}
