import { Credentials } from './credentials.js'
import type { CredentialsLookupEnvironment } from './environment.js'
import { CredentialHelperError, isCredentialsNotFoundError, toError } from './errors.js'
import type { CredentialsSpecificity } from './specificity.js'

interface CredentialsSourceBase {
  credentialsSpecificity: () => CredentialsSpecificity
  credentials: (lookupEnv: CredentialsLookupEnvironment) => Promise<Credentials>
  describe: () => string
}

export interface StaticCredentialsSource extends CredentialsSourceBase {
  readonly kind: 'static'
}

export interface DockerCredentialHelperCredentialsSource extends CredentialsSourceBase {
  readonly kind: 'dockerCredentialHelper'
  readonly helperName: string
  readonly serverURL: string
}

/**
 * A matched source of credentials whose specificity was decided when it was
 * matched. The set of kinds is closed: use the constructor functions below
 * rather than implementing this type elsewhere.
 */
export type CredentialsSource = StaticCredentialsSource | DockerCredentialHelperCredentialsSource

export function newStaticCredentialsSource(creds: Credentials, spec: CredentialsSpecificity): StaticCredentialsSource {
  return Object.freeze({
    kind: 'static' as const,
    credentialsSpecificity: () => spec,
    credentials: async () => creds,
    describe: () => creds.kind === 'oauth' ? 'static OAuth-style credentials' : 'static username/password credentials'
  })
}

export function newDockerCredentialHelperCredentialsSource(
  helperName: string,
  serverURL: string,
  spec: CredentialsSpecificity
): DockerCredentialHelperCredentialsSource {
  return Object.freeze({
    kind: 'dockerCredentialHelper' as const,
    helperName,
    serverURL,
    credentialsSpecificity: () => spec,
    async credentials(lookupEnv: CredentialsLookupEnvironment) {
      const result = await lookupEnv.queryDockerCredentialHelper(helperName, serverURL).catch((error: unknown) => {
        if (isCredentialsNotFoundError(error)) throw error
        throw new CredentialHelperError(helperName, serverURL, toError(error))
      })
      return Credentials.basicAuth(result.username, result.secret)
    },
    describe: () => `"${helperName}" credential helper for ${serverURL}`
  })
}
