import { parseRepositoryAddressPrefix } from './address.js'
import {
  DomainCredentialsSpecificity,
  NoCredentialsSpecificity,
  repositoryCredentialsSpecificity,
  type CredentialsSpecificity
} from './specificity.js'

/**
 * Decides how well a property name from the "auths" object of a
 * Docker/Podman-style auth file matches the given registry domain and
 * repository path.
 *
 * Plain Docker CLI files only ever use whole domains, and so only produce
 * {@link NoCredentialsSpecificity} or {@link DomainCredentialsSpecificity}.
 * The containers-auth.json extension adds "domain/path" names, matched by
 * path-segment prefix, with one more unit of specificity per segment in the
 * configured name. Explicit oci_credentials rules use the same syntax and so
 * are matched by this function too.
 */
export function containersAuthPropertyNameMatch(
  authsPropertyName: string,
  wantRegistryDomain: string,
  wantRepositoryPath: string
): CredentialsSpecificity {
  if (!authsPropertyName) return NoCredentialsSpecificity

  let gotDomain = authsPropertyName
  let gotRepositoryPath = ''
  if (authsPropertyName.includes('/')) {
    try {
      const parsed = parseRepositoryAddressPrefix(authsPropertyName)
      gotDomain = parsed.registryDomain
      gotRepositoryPath = parsed.repositoryPath
    } catch {
      // Names written by other tools that we can't parse never match.
      return NoCredentialsSpecificity
    }
  }

  if (gotDomain !== wantRegistryDomain) return NoCredentialsSpecificity
  if (!gotRepositoryPath) return DomainCredentialsSpecificity

  const gotSegments = gotRepositoryPath.split('/')
  const wantSegments = wantRepositoryPath.split('/')
  if (gotSegments.length > wantSegments.length) return NoCredentialsSpecificity
  for (let i = 0; i < gotSegments.length; i += 1) {
    if (gotSegments[i] !== wantSegments[i]) return NoCredentialsSpecificity
  }
  return repositoryCredentialsSpecificity(gotSegments.length)
}
