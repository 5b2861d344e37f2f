/**
 * How precisely a credentials entry matches a requested repository. Larger
 * values are more specific, so two values can be ranked with `>`. Callers
 * should rely only on that ordering and on the predicates below, never on
 * the particular numbers.
 */
export type CredentialsSpecificity = number

export const NoCredentialsSpecificity: CredentialsSpecificity = 0
export const GlobalCredentialsSpecificity: CredentialsSpecificity = 1
export const DomainCredentialsSpecificity: CredentialsSpecificity = 2
export const MaxCredentialsSpecificity: CredentialsSpecificity = 0xffffffff

export function repositoryCredentialsSpecificity(pathSegments: number): CredentialsSpecificity {
  if (!Number.isInteger(pathSegments) || pathSegments < 0) {
    throw new RangeError(`invalid repository path segment count ${pathSegments}`)
  }
  return Math.min(DomainCredentialsSpecificity + pathSegments, MaxCredentialsSpecificity)
}

export function matchedRegistryDomain(spec: CredentialsSpecificity): boolean {
  return spec >= DomainCredentialsSpecificity
}

export function matchedRepositoryPath(spec: CredentialsSpecificity): boolean {
  return spec > DomainCredentialsSpecificity
}

export function matchedRepositoryPathSegments(spec: CredentialsSpecificity): number {
  return matchedRepositoryPath(spec) ? spec - DomainCredentialsSpecificity : 0
}

export function describeSpecificity(spec: CredentialsSpecificity): string {
  if (matchedRepositoryPath(spec)) {
    const segments = matchedRepositoryPathSegments(spec)
    return `repository (${segments} path ${segments === 1 ? 'segment' : 'segments'})`
  }
  if (matchedRegistryDomain(spec)) return 'domain'
  if (spec === GlobalCredentialsSpecificity) return 'global'
  return 'none'
}
