import path from 'node:path'
import { parseRepositoryAddressPrefix } from '../ociauth/address.js'
import type { CredentialsCandidate, CredentialsConfig } from '../ociauth/config.js'
import { Credentials } from '../ociauth/credentials.js'
import { validDockerCredentialHelperName } from '../ociauth/credentialHelper.js'
import { containersAuthPropertyNameMatch } from '../ociauth/match.js'
import { newDockerCredentialHelperCredentialsSource, newStaticCredentialsSource } from '../ociauth/sources.js'
import { NoCredentialsSpecificity } from '../ociauth/specificity.js'
import type { ConfigDiagnostic } from './diagnostics.js'

/**
 * Settings from an oci_default_credentials block. Only one such block may
 * appear across all of the CLI configuration files.
 */
export interface OCIDefaultCredentials {
  /**
   * Whether to look for credentials in Docker/Podman-style config files and
   * other places outside of our own configuration. Defaults to true.
   */
  discoverAmbientCredentials: boolean
  /**
   * Overrides the default search locations for Docker-style config files.
   * Undefined means "use the usual locations"; an empty list disables
   * Docker-style files while leaving discovery itself enabled. Always
   * undefined when discovery is disabled.
   */
  dockerStyleConfigFiles: string[] | undefined
  /** Credential helper for any domain without a more specific setting. */
  defaultDockerCredentialHelper: string
  /** Where the block was declared, for messages. Empty for the built-in default. */
  declaredAt: string
}

/**
 * One oci_credentials block: credentials for the repositories under a
 * registry domain and optional repository path prefix. Exactly one of the
 * three credential styles is set.
 */
export interface OCIRepositoryCredentials {
  /** Matched the same way as the "auths" property names in Docker-style config files. */
  repositoryPrefix: string
  username: string
  password: string
  accessToken: string
  refreshToken: string
  /** Only allowed when repositoryPrefix has no path, since helpers work per domain. */
  dockerCredentialHelper: string
  declaredAt: string
}

export interface DecodeResult<T> {
  result?: T
  diagnostics: ConfigDiagnostic[]
}

const DEFAULT_BLOCK_SUMMARY = 'Invalid oci_default_credentials block'
const CREDENTIALS_BLOCK_SUMMARY = 'Invalid oci_credentials block'

export function newDefaultOCIDefaultCredentials(): OCIDefaultCredentials {
  return {
    discoverAmbientCredentials: true,
    dockerStyleConfigFiles: undefined,
    defaultDockerCredentialHelper: '',
    declaredAt: ''
  }
}

/**
 * Decodes the body of one oci_default_credentials block. Relative entries in
 * docker_style_config_files are taken as relative to the directory of the
 * file the block came from.
 */
export function decodeOCIDefaultCredentials(body: unknown, filename: string, where: string): DecodeResult<OCIDefaultCredentials> {
  const diagnostics: ConfigDiagnostic[] = []
  const fail = (detail: string) => {
    diagnostics.push({ summary: DEFAULT_BLOCK_SUMMARY, detail })
  }

  if (!isRecord(body)) {
    fail(`The oci_default_credentials block at ${where} must be represented by an object.`)
    return { diagnostics }
  }
  const unknown = Object.keys(body).filter(key => !['discover_ambient_credentials', 'docker_style_config_files', 'docker_credentials_helper'].includes(key))
  if (unknown.length > 0) {
    fail(`Invalid oci_default_credentials block at ${where}: unsupported argument ${JSON.stringify(unknown[0])}.`)
    return { diagnostics }
  }

  const ret = newDefaultOCIDefaultCredentials()
  ret.declaredAt = where

  const discover = body.discover_ambient_credentials
  if (discover !== undefined) {
    if (typeof discover !== 'boolean') {
      fail(`Invalid oci_default_credentials block at ${where}: discover_ambient_credentials must be a boolean.`)
      return { diagnostics }
    }
    ret.discoverAmbientCredentials = discover
  }

  const files = body.docker_style_config_files
  if (files !== undefined) {
    if (!Array.isArray(files) || !files.every((item): item is string => typeof item === 'string')) {
      fail(`Invalid oci_default_credentials block at ${where}: docker_style_config_files must be a list of strings.`)
      return { diagnostics }
    }
    const baseDir = path.dirname(path.resolve(filename))
    ret.dockerStyleConfigFiles = files.map(configPath => path.resolve(baseDir, configPath))
  }

  const helper = body.docker_credentials_helper
  if (helper !== undefined) {
    if (typeof helper !== 'string') {
      fail(`Invalid oci_default_credentials block at ${where}: docker_credentials_helper must be a string.`)
      return { diagnostics }
    }
    ret.defaultDockerCredentialHelper = helper
    if (!validDockerCredentialHelperName(helper)) {
      fail(`The oci_default_credentials block at ${where} specifies the invalid Docker credential helper name ${JSON.stringify(helper)}. Must be a non-empty string that could be used as part of an executable filename.`)
    }
  }

  if (!ret.discoverAmbientCredentials && ret.dockerStyleConfigFiles !== undefined) {
    fail(`The oci_default_credentials block at ${where} disables discovery of ambient credentials, but also sets docker_style_config_files which is relevant only when ambient credentials discovery is enabled.`)
  }

  return diagnostics.length > 0 ? { diagnostics } : { result: ret, diagnostics }
}

/**
 * Decodes the body of one oci_credentials block whose label (the repository
 * address prefix) is given separately.
 */
export function decodeOCIRepositoryCredentials(label: string, body: unknown, where: string): DecodeResult<OCIRepositoryCredentials> {
  const diagnostics: ConfigDiagnostic[] = []
  const fail = (detail: string): DecodeResult<OCIRepositoryCredentials> => {
    diagnostics.push({ summary: CREDENTIALS_BLOCK_SUMMARY, detail })
    return { diagnostics }
  }

  let repositoryPath: string
  try {
    repositoryPath = parseRepositoryAddressPrefix(label).repositoryPath
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    return fail(`The oci_credentials block at ${where} has an invalid block label: ${reason}.`)
  }

  if (!isRecord(body)) {
    return fail(`The oci_credentials block at ${where} must be represented by an object.`)
  }
  const fields: Record<string, string | undefined> = {}
  for (const [key, value] of Object.entries(body)) {
    if (!['username', 'password', 'access_token', 'refresh_token', 'docker_credentials_helper'].includes(key)) {
      return fail(`Invalid oci_credentials block at ${where}: unsupported argument ${JSON.stringify(key)}.`)
    }
    if (typeof value !== 'string') {
      return fail(`Invalid oci_credentials block at ${where}: ${key} must be a string.`)
    }
    fields[key] = value
  }

  const staticBasicAuth = fields.username !== undefined || fields.password !== undefined
  const oauth = fields.access_token !== undefined || fields.refresh_token !== undefined
  const dockerCredHelper = fields.docker_credentials_helper !== undefined
  const stylesConfigured = [staticBasicAuth, oauth, dockerCredHelper].filter(Boolean).length
  if (stylesConfigured === 0) {
    return fail(`The oci_credentials block at ${where} must set either username+password, access_token+refresh_token, or docker_credentials_helper.`)
  }
  if (stylesConfigured > 1) {
    return fail(`The oci_credentials block at ${where} must set only one group out of username+password, access_token+refresh_token, or docker_credentials_helper.`)
  }

  const ret: OCIRepositoryCredentials = {
    repositoryPrefix: label,
    username: '',
    password: '',
    accessToken: '',
    refreshToken: '',
    dockerCredentialHelper: '',
    declaredAt: where
  }
  if (staticBasicAuth) {
    if (fields.username === undefined || fields.password === undefined) {
      return fail(`The oci_credentials block at ${where} must set both username and password together when using static credentials.`)
    }
    ret.username = fields.username
    ret.password = fields.password
  } else if (oauth) {
    if (fields.access_token === undefined || fields.refresh_token === undefined) {
      return fail(`The oci_credentials block at ${where} must set both access_token and refresh_token together when using OAuth-style credentials.`)
    }
    ret.accessToken = fields.access_token
    ret.refreshToken = fields.refresh_token
  } else {
    ret.dockerCredentialHelper = fields.docker_credentials_helper ?? ''
    if (repositoryPath) {
      fail(`The oci_credentials block at ${where} cannot set docker_credentials_helper with a repository path: credential helpers only support credentials for whole domains.`)
    }
    if (!validDockerCredentialHelperName(ret.dockerCredentialHelper)) {
      fail(`The oci_credentials block at ${where} specifies the invalid Docker credential helper name ${JSON.stringify(ret.dockerCredentialHelper)}. Must be a non-empty string that could be used as part of an executable filename.`)
    }
    if (diagnostics.length > 0) return { diagnostics }
  }

  return { result: ret, diagnostics }
}

/**
 * Adapts one explicit oci_credentials block into a credentials layer of its
 * own.
 */
export class OCIRepositoryCredentialsConfig implements CredentialsConfig {
  readonly block: Readonly<OCIRepositoryCredentials>

  constructor(block: OCIRepositoryCredentials) {
    this.block = Object.freeze({ ...block })
  }

  credentialsConfigLocationForUI(): string {
    return `explicit oci_credentials ${JSON.stringify(this.block.repositoryPrefix)} block`
  }

  * credentialsSourcesForRepository(registryDomain: string, repositoryPath: string): Iterable<CredentialsCandidate> {
    const spec = containersAuthPropertyNameMatch(this.block.repositoryPrefix, registryDomain, repositoryPath)
    if (spec === NoCredentialsSpecificity) return

    if (this.block.username) {
      yield { source: newStaticCredentialsSource(Credentials.basicAuth(this.block.username, this.block.password), spec) }
    } else if (this.block.accessToken) {
      yield { source: newStaticCredentialsSource(Credentials.oauth(this.block.accessToken, this.block.refreshToken), spec) }
    } else if (this.block.dockerCredentialHelper) {
      yield { source: newDockerCredentialHelperCredentialsSource(this.block.dockerCredentialHelper, `https://${registryDomain}`, spec) }
    } else {
      yield { error: new Error(`${this.credentialsConfigLocationForUI()} has no supported credentials arguments`) }
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
