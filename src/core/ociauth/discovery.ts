import path from 'node:path'
import type { CredentialsConfig } from './config.js'
import { newDockerCLIStyleCredentialsConfig } from './dockerConfig.js'
import { isNotExistError, type ConfigDiscoveryEnvironment } from './environment.js'
import { joinErrors, toError, wrapError } from './errors.js'

export interface DiscoveredCredentialsConfigs {
  configs: CredentialsConfig[]
  /** Problems with individual files, joined; the good files are still in configs. */
  error?: Error
}

/**
 * Enumerates the locations where Podman, Buildah, Skopeo and the Docker CLI
 * look for auth files, in the order those tools prefer them, as described in
 * containers-auth.json(5). On Windows and macOS with XDG_CONFIG_HOME unset the
 * first two entries are equal, which callers should skip.
 */
export function dockerCLIStyleAuthFileSearchLocations(env: ConfigDiscoveryEnvironment): string[] {
  const osName = env.operatingSystemName()
  const homeDir = env.userHomeDirPath()
  const { join } = osName === 'windows' && homeDir.includes('\\') ? path.win32 : path.posix
  const ret: string[] = []

  if (osName === 'linux') {
    const xdgRuntimeDir = env.environmentVariableVal('XDG_RUNTIME_DIR')
    if (xdgRuntimeDir) {
      ret.push(join(xdgRuntimeDir, 'containers', 'auth.json'))
    }
  } else if (osName === 'windows' || osName === 'darwin') {
    ret.push(join(homeDir, '.config', 'containers', 'auth.json'))
  }

  const xdgConfigHome = env.environmentVariableVal('XDG_CONFIG_HOME') || join(homeDir, '.config')
  ret.push(join(xdgConfigHome, 'containers', 'auth.json'))
  ret.push(join(homeDir, '.docker', 'config.json'))
  ret.push(join(homeDir, '.dockercfg'))
  return ret
}

export function dockerCLIStyleAuthFileCandidates(env: ConfigDiscoveryEnvironment): string[] {
  return dockerCLIStyleAuthFileSearchLocations(env).filter((filePath, i, all) => i === 0 || all[i - 1] !== filePath)
}

/**
 * Reads whichever of the conventional auth files exist. Missing files are
 * skipped; any other problem is reported in the result's error while the
 * remaining files are still returned.
 */
export async function findDockerCLIStyleCredentialsConfigs(env: ConfigDiscoveryEnvironment): Promise<DiscoveredCredentialsConfigs> {
  return loadDockerCLIStyleCredentialsConfigs(dockerCLIStyleAuthFileCandidates(env), env, false)
}

/**
 * Reads exactly the given files, which the operator named explicitly, so a
 * missing file is reported as a problem too.
 */
export async function fixedDockerCLIStyleCredentialsConfigs(
  filePaths: readonly string[],
  env: ConfigDiscoveryEnvironment
): Promise<DiscoveredCredentialsConfigs> {
  return loadDockerCLIStyleCredentialsConfigs(filePaths, env, true)
}

async function loadDockerCLIStyleCredentialsConfigs(
  filePaths: readonly string[],
  env: ConfigDiscoveryEnvironment,
  requireAll: boolean
): Promise<DiscoveredCredentialsConfigs> {
  const configs: CredentialsConfig[] = []
  let error: Error | undefined
  for (const filePath of filePaths) {
    let src: string
    try {
      src = await env.readFile(filePath)
    } catch (readErr) {
      if (requireAll || !isNotExistError(readErr)) {
        error = joinErrors(error, wrapError(`reading ${filePath}`, toError(readErr)))
      }
      continue
    }
    try {
      configs.push(newDockerCLIStyleCredentialsConfig(src, filePath))
    } catch (parseErr) {
      error = joinErrors(error, wrapError(`parsing ${filePath}`, toError(parseErr)))
    }
  }
  return error ? { configs, error } : { configs }
}
