import { spawn } from 'node:child_process'
import type { Logger } from '../logger.js'
import { silentLogger } from '../logger.js'
import type { CredentialsLookupEnvironment, DockerCredentialHelperGetResult } from './environment.js'
import { CredentialsNotFoundError, isCredentialsNotFoundError, toError } from './errors.js'

const NOT_FOUND_MESSAGE = 'credentials not found in native keychain'
const IDENTITY_TOKEN_USERNAME = '<token>'

export interface DockerCredentialHelperOptions {
  env?: NodeJS.ProcessEnv
  logger?: Logger
}

interface HelperOutput {
  code: number | null
  stdout: string
  stderr: string
}

/**
 * Resolves credential helper sources by running docker-credential-<name>
 * programs, using the "get" action of the Docker credential helper protocol.
 */
export function dockerCredentialHelperLookupEnvironment(options: DockerCredentialHelperOptions = {}): CredentialsLookupEnvironment {
  const env = options.env ?? process.env
  const logger = options.logger ?? silentLogger
  return {
    async queryDockerCredentialHelper(helperName, serverURL) {
      if (!validDockerCredentialHelperName(helperName)) {
        throw new Error(`invalid Docker credential helper name ${JSON.stringify(helperName)}`)
      }
      const executable = `docker-credential-${helperName}`
      logger.debug(`Executing docker-style credentials helper "${helperName}" for ${serverURL}`)
      try {
        const output = await runWithStdin(executable, ['get'], serverURL, env)
        return parseHelperOutput(helperName, serverURL, output)
      } catch (error) {
        if (!isCredentialsNotFoundError(error)) {
          logger.error(`Docker-style credential helper "${helperName}" failed for ${serverURL}: ${toError(error).message}`)
        }
        throw error
      }
    }
  }
}

/** Backslash only counts as a path separator on Windows. */
export function validDockerCredentialHelperName(name: string, platform: NodeJS.Platform = process.platform): boolean {
  if (name === '' || name.includes('/')) return false
  return platform !== 'win32' || !name.includes('\\')
}

function parseHelperOutput(helperName: string, serverURL: string, output: HelperOutput): DockerCredentialHelperGetResult {
  const stdout = output.stdout.trim()
  if (output.code !== 0) {
    if (stdout === NOT_FOUND_MESSAGE) {
      throw new CredentialsNotFoundError(`"${helperName}" credential helper has no credentials for ${serverURL}`)
    }
    const detail = stdout || output.stderr.trim() || `exit code ${output.code}`
    throw new Error(`"${helperName}" credential helper failed: ${detail}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(stdout)
  } catch {
    throw new Error(`"${helperName}" credential helper returned invalid JSON`)
  }
  if (!isRecord(parsed)) {
    throw new Error(`"${helperName}" credential helper returned invalid JSON`)
  }
  const username = parsed.Username
  const secret = parsed.Secret
  if (typeof username !== 'string' || typeof secret !== 'string') {
    throw new Error(`"${helperName}" credential helper response is missing Username or Secret`)
  }
  if (username === IDENTITY_TOKEN_USERNAME) {
    throw new Error(`"${helperName}" credential helper returned OAuth-style credentials, but only username/password-style is allowed from a credential helper`)
  }
  return {
    serverURL: typeof parsed.ServerURL === 'string' && parsed.ServerURL ? parsed.ServerURL : serverURL,
    username,
    secret
  }
}

function runWithStdin(cmd: string, args: string[], input: string, env: NodeJS.ProcessEnv): Promise<HelperOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, { env, windowsHide: true })
    let stdout = ''
    let stderr = ''
    child.stdout.on('data', (data) => { stdout += data.toString() })
    child.stderr.on('data', (data) => { stderr += data.toString() })
    child.on('error', reject)
    child.stdin.on('error', reject)
    child.on('close', (code) => {
      resolve({ code, stdout, stderr })
    })
    child.stdin.write(input)
    child.stdin.end()
  })
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
