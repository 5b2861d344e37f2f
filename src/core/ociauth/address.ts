export interface RepositoryAddressPrefix {
  registryDomain: string
  repositoryPath: string
}

const DOMAIN_LABEL = '[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?'
const DOMAIN_PATTERN = new RegExp(`^(?:${DOMAIN_LABEL}(?:\\.${DOMAIN_LABEL})*|\\[[a-fA-F0-9:]+\\])(?::[0-9]{1,5})?$`)
const PATH_COMPONENT_PATTERN = /^[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*$/

/**
 * Parses a string like "example.com", "example.com:5000/org/repo" or
 * "[::1]:5000/org/repo" into its registry domain and (possibly empty)
 * repository path. Tags and digests are not allowed: these prefixes select
 * whole repositories, never individual artifacts.
 */
export function parseRepositoryAddressPrefix(addr: string): RepositoryAddressPrefix {
  if (!addr) {
    throw new Error('repository address must not be empty')
  }
  const slash = addr.indexOf('/')
  const registryDomain = slash === -1 ? addr : addr.slice(0, slash)
  const repositoryPath = slash === -1 ? '' : addr.slice(slash + 1)

  if (!registryDomain) {
    throw new Error(`repository address ${JSON.stringify(addr)} has no registry domain`)
  }
  if (!DOMAIN_PATTERN.test(registryDomain)) {
    throw new Error(`invalid registry domain ${JSON.stringify(registryDomain)}`)
  }
  if (slash === -1) {
    return { registryDomain, repositoryPath }
  }

  if (repositoryPath.includes(':') || repositoryPath.includes('@')) {
    throw new Error(`repository address ${JSON.stringify(addr)} must not include a tag or digest`)
  }
  for (const segment of repositoryPath.split('/')) {
    if (!PATH_COMPONENT_PATTERN.test(segment)) {
      throw new Error(`invalid repository path segment ${JSON.stringify(segment)} in ${JSON.stringify(addr)}`)
    }
  }
  return { registryDomain, repositoryPath }
}
