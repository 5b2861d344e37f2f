import { readFile } from 'node:fs/promises'
import os from 'node:os'
import type { Logger } from '../logger.js'
import { silentLogger } from '../logger.js'

/**
 * The parts of the host environment that ambient credentials discovery
 * depends on, kept behind an interface so that discovery can be exercised
 * without touching the real filesystem.
 */
export interface ConfigDiscoveryEnvironment {
  environmentVariableVal: (name: string) => string
  userHomeDirPath: () => string
  /** A GOOS-style name: "linux", "windows", "darwin", or something else. */
  operatingSystemName: () => string
  /** Must reject with an error satisfying {@link isNotExistError} for missing files. */
  readFile: (path: string) => Promise<string>
}

export interface DockerCredentialHelperGetResult {
  serverURL: string
  username: string
  secret: string
}

export interface CredentialsLookupEnvironment {
  /**
   * Rejects with a CredentialsNotFoundError when the helper reports that it
   * has no credentials for the given server URL.
   */
  queryDockerCredentialHelper: (helperName: string, serverURL: string) => Promise<DockerCredentialHelperGetResult>
}

export function isNotExistError(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false
  return err.code === 'ENOENT' || err.code === 'ENOTDIR'
}

export function operatingSystemNameForPlatform(platform: NodeJS.Platform): string {
  return platform === 'win32' ? 'windows' : platform
}

export function nodeConfigDiscoveryEnvironment(
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = silentLogger,
  platform: NodeJS.Platform = process.platform
): ConfigDiscoveryEnvironment {
  const osName = operatingSystemNameForPlatform(platform)
  return {
    environmentVariableVal: (name) => env[name] ?? '',
    operatingSystemName: () => osName,
    userHomeDirPath: () => homeDirForDiscovery(env, osName),
    async readFile(path) {
      logger.debug(`OCI credentials discovery reading ${path}`)
      return readFile(path, 'utf8')
    }
  }
}

// Same fallback order Podman uses for its own auth file searches.
function homeDirForDiscovery(env: NodeJS.ProcessEnv, osName: string): string {
  if (osName === 'windows') {
    if (env.USERPROFILE) return env.USERPROFILE
    return os.homedir() || 'nul:'
  }
  if (env.HOME) return env.HOME
  try {
    return os.userInfo().homedir || '/'
  } catch {
    return '/'
  }
}
