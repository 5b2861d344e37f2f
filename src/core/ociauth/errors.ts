/**
 * Signals that a configuration layer or credential helper has no credentials
 * for the requested repository. This is a normal outcome for public
 * repositories, so callers should test for it with
 * {@link isCredentialsNotFoundError} and carry on without credentials.
 */
export class CredentialsNotFoundError extends Error {
  constructor(message = 'credentials not found', options?: ErrorOptions) {
    super(message, options)
    this.name = 'CredentialsNotFoundError'
  }
}

/**
 * Several independent errors reported together, such as one per unreadable
 * configuration file.
 */
export class JoinedError extends Error {
  readonly errors: readonly Error[]

  constructor(errors: Error[]) {
    super(errors.map(err => err.message).join('\n'))
    this.name = 'JoinedError'
    this.errors = Object.freeze([...errors])
  }
}

export class CredentialHelperError extends Error {
  readonly helperName: string
  readonly serverURL: string

  constructor(helperName: string, serverURL: string, cause: Error) {
    super(`"${helperName}" credential helper failed for ${serverURL}: ${cause.message}`, { cause })
    this.name = 'CredentialHelperError'
    this.helperName = helperName
    this.serverURL = serverURL
  }
}

export function joinErrors(...errs: Array<Error | undefined>): Error | undefined {
  const flat: Error[] = []
  for (const err of errs) {
    if (!err) continue
    if (err instanceof JoinedError) {
      flat.push(...err.errors)
    } else {
      flat.push(err)
    }
  }
  if (flat.length === 0) return undefined
  if (flat.length === 1) return flat[0]
  return new JoinedError(flat)
}

export function wrapError(message: string, cause: Error): Error {
  return new Error(`${message}: ${cause.message}`, { cause })
}

export function hasErrorMatching(err: unknown, predicate: (err: Error) => boolean): boolean {
  if (!(err instanceof Error)) return false
  if (predicate(err)) return true
  if (err instanceof JoinedError) {
    return err.errors.some(inner => hasErrorMatching(inner, predicate))
  }
  return hasErrorMatching(err.cause, predicate)
}

export function isCredentialsNotFoundError(err: unknown): boolean {
  return hasErrorMatching(err, candidate => candidate instanceof CredentialsNotFoundError)
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
