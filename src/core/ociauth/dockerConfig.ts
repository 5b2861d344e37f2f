import type { CredentialsCandidate, CredentialsConfig } from './config.js'
import { Credentials } from './credentials.js'
import { containersAuthPropertyNameMatch } from './match.js'
import { newDockerCredentialHelperCredentialsSource, newStaticCredentialsSource } from './sources.js'
import {
  DomainCredentialsSpecificity,
  GlobalCredentialsSpecificity,
  NoCredentialsSpecificity
} from './specificity.js'

export interface DockerCLIStyleConfigFile {
  /** Domain-specific or repository-specific static credentials. */
  auths: ReadonlyMap<string, string | undefined>
  /** Domain-specific credential helpers. */
  credHelpers: ReadonlyMap<string, string>
  /** Global credential helper. */
  credsStore: string
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/

export class DockerCLIStyleCredentialsConfig implements CredentialsConfig {
  readonly filename: string
  readonly content: Readonly<DockerCLIStyleConfigFile>

  constructor(filename: string, content: DockerCLIStyleConfigFile) {
    this.filename = filename
    this.content = Object.freeze(content)
  }

  * credentialsSourcesForRepository(registryDomain: string, repositoryPath: string): Iterable<CredentialsCandidate> {
    for (const [propName, encoded] of this.content.auths) {
      // Some tools write empty entries here when their login command stored
      // the real secret in a credential helper.
      if (!encoded) continue
      const spec = containersAuthPropertyNameMatch(propName, registryDomain, repositoryPath)
      if (spec === NoCredentialsSpecificity) continue

      const decoded = decodeBase64(encoded)
      const colon = decoded === undefined ? -1 : decoded.indexOf(':')
      if (decoded === undefined || colon === -1) {
        yield {
          error: new Error(`auth object for ${JSON.stringify(propName)} in ${this.filename} does not have base64-encoded username:password pair`)
        }
        continue
      }
      const creds = Credentials.basicAuth(decoded.slice(0, colon), decoded.slice(colon + 1))
      yield { source: newStaticCredentialsSource(creds, spec) }
    }

    const domainHelper = this.content.credHelpers.get(registryDomain)
    if (domainHelper) {
      yield { source: newDockerCredentialHelperCredentialsSource(domainHelper, `https://${registryDomain}`, DomainCredentialsSpecificity) }
    }

    if (this.content.credsStore) {
      yield { source: newDockerCredentialHelperCredentialsSource(this.content.credsStore, `https://${registryDomain}`, GlobalCredentialsSpecificity) }
    }
  }

  credentialsConfigLocationForUI(): string {
    return this.filename
  }
}

/**
 * Parses the content of a Docker CLI-style config file. Only the top-level
 * structure is checked here: individual entries of unexpected types are
 * ignored, since these files are shared with other tools that may add
 * things we don't understand.
 */
export function newDockerCLIStyleCredentialsConfig(src: string, filename: string): DockerCLIStyleCredentialsConfig {
  let parsed: unknown
  try {
    parsed = JSON.parse(src)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new Error(`invalid JSON syntax: ${reason}`)
  }
  if (!isRecord(parsed)) {
    throw new Error('invalid JSON syntax: top-level value must be an object')
  }

  const auths = new Map<string, string | undefined>()
  if (isRecord(parsed.auths)) {
    for (const [name, entry] of Object.entries(parsed.auths)) {
      auths.set(name, isRecord(entry) && typeof entry.auth === 'string' ? entry.auth : undefined)
    }
  }

  const credHelpers = new Map<string, string>()
  if (isRecord(parsed.credHelpers)) {
    for (const [domain, helper] of Object.entries(parsed.credHelpers)) {
      if (typeof helper === 'string' && helper) credHelpers.set(domain, helper)
    }
  }

  const credsStore = typeof parsed.credsStore === 'string' ? parsed.credsStore : ''

  return new DockerCLIStyleCredentialsConfig(filename, { auths, credHelpers, credsStore })
}

function decodeBase64(encoded: string): string | undefined {
  const compact = encoded.replace(/\s+/g, '')
  if (compact.length % 4 === 1 || !BASE64_PATTERN.test(compact)) return undefined
  return Buffer.from(compact, 'base64').toString('utf8')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
