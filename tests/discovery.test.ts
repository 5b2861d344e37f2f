import { describe, it, expect } from 'vitest'
import {
  dockerCLIStyleAuthFileCandidates,
  dockerCLIStyleAuthFileSearchLocations,
  findDockerCLIStyleCredentialsConfigs,
  fixedDockerCLIStyleCredentialsConfigs
} from '../src/core/ociauth/discovery.js'
import { fakeDiscoveryEnvironment } from './fakes.js'

const dockerConfig = JSON.stringify({ credsStore: 'desktop' })

describe('dockerCLIStyleAuthFileSearchLocations', () => {
  it('starts with XDG_RUNTIME_DIR on linux', () => {
    const env = fakeDiscoveryEnvironment({ os: 'linux', home: '/home/u', env: { XDG_RUNTIME_DIR: '/run/user/1000' } })
    expect(dockerCLIStyleAuthFileSearchLocations(env)).toEqual([
      '/run/user/1000/containers/auth.json',
      '/home/u/.config/containers/auth.json',
      '/home/u/.docker/config.json',
      '/home/u/.dockercfg'
    ])
  })

  it('combines XDG_RUNTIME_DIR and XDG_CONFIG_HOME on linux', () => {
    const env = fakeDiscoveryEnvironment({
      os: 'linux',
      home: '/home/u',
      env: { XDG_RUNTIME_DIR: '/run/x', XDG_CONFIG_HOME: '/home/u/xdg' }
    })
    expect(dockerCLIStyleAuthFileSearchLocations(env)).toEqual([
      '/run/x/containers/auth.json',
      '/home/u/xdg/containers/auth.json',
      '/home/u/.docker/config.json',
      '/home/u/.dockercfg'
    ])
  })

  it('honours XDG_CONFIG_HOME', () => {
    const env = fakeDiscoveryEnvironment({ os: 'linux', home: '/home/u', env: { XDG_CONFIG_HOME: '/xdg' } })
    expect(dockerCLIStyleAuthFileSearchLocations(env)).toEqual([
      '/xdg/containers/auth.json',
      '/home/u/.docker/config.json',
      '/home/u/.dockercfg'
    ])
  })

  it('lists the home config location twice on macOS', () => {
    const env = fakeDiscoveryEnvironment({ os: 'darwin', home: '/Users/u', env: { XDG_RUNTIME_DIR: '/ignored' } })
    expect(dockerCLIStyleAuthFileSearchLocations(env)).toEqual([
      '/Users/u/.config/containers/auth.json',
      '/Users/u/.config/containers/auth.json',
      '/Users/u/.docker/config.json',
      '/Users/u/.dockercfg'
    ])
    expect(dockerCLIStyleAuthFileCandidates(env)).toEqual([
      '/Users/u/.config/containers/auth.json',
      '/Users/u/.docker/config.json',
      '/Users/u/.dockercfg'
    ])
  })

  it('uses Windows separators for a Windows home directory', () => {
    const env = fakeDiscoveryEnvironment({ os: 'windows', home: 'C:\\Users\\u' })
    expect(dockerCLIStyleAuthFileSearchLocations(env)).toEqual([
      'C:\\Users\\u\\.config\\containers\\auth.json',
      'C:\\Users\\u\\.config\\containers\\auth.json',
      'C:\\Users\\u\\.docker\\config.json',
      'C:\\Users\\u\\.dockercfg'
    ])
  })

  it('only uses the portable locations on other systems', () => {
    const env = fakeDiscoveryEnvironment({ os: 'freebsd', home: '/home/u', env: { XDG_RUNTIME_DIR: '/run/user/1000' } })
    expect(dockerCLIStyleAuthFileSearchLocations(env)).toEqual([
      '/home/u/.config/containers/auth.json',
      '/home/u/.docker/config.json',
      '/home/u/.dockercfg'
    ])
  })
})

describe('findDockerCLIStyleCredentialsConfigs', () => {
  it('loads the files that exist and skips the rest', async () => {
    const env = fakeDiscoveryEnvironment({
      os: 'linux',
      home: '/home/u',
      files: { '/home/u/.docker/config.json': dockerConfig }
    })
    const { configs, error } = await findDockerCLIStyleCredentialsConfigs(env)
    expect(error).toBeUndefined()
    expect(configs.map(c => c.credentialsConfigLocationForUI())).toEqual(['/home/u/.docker/config.json'])
    expect(env.reads).toEqual([
      '/home/u/.config/containers/auth.json',
      '/home/u/.docker/config.json',
      '/home/u/.dockercfg'
    ])
  })

  it('reads a duplicated location only once', async () => {
    const env = fakeDiscoveryEnvironment({ os: 'darwin', home: '/Users/u' })
    await findDockerCLIStyleCredentialsConfigs(env)
    expect(env.reads).toEqual([
      '/Users/u/.config/containers/auth.json',
      '/Users/u/.docker/config.json',
      '/Users/u/.dockercfg'
    ])
  })

  it('reports broken files and keeps the good ones', async () => {
    const denied = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' })
    const env = fakeDiscoveryEnvironment({
      os: 'linux',
      home: '/home/u',
      files: {
        '/home/u/.config/containers/auth.json': '[]',
        '/home/u/.docker/config.json': dockerConfig,
        '/home/u/.dockercfg': denied
      }
    })
    const { configs, error } = await findDockerCLIStyleCredentialsConfigs(env)
    expect(configs.map(c => c.credentialsConfigLocationForUI())).toEqual(['/home/u/.docker/config.json'])
    expect(error?.message).toBe([
      'parsing /home/u/.config/containers/auth.json: invalid JSON syntax: top-level value must be an object',
      'reading /home/u/.dockercfg: EACCES: permission denied'
    ].join('\n'))
  })
})

describe('fixedDockerCLIStyleCredentialsConfigs', () => {
  it('treats missing files as problems', async () => {
    const env = fakeDiscoveryEnvironment({
      os: 'linux',
      home: '/home/u',
      files: { '/etc/auth.json': dockerConfig }
    })
    const { configs, error } = await fixedDockerCLIStyleCredentialsConfigs(['/etc/auth.json', '/etc/missing.json'], env)
    expect(configs.map(c => c.credentialsConfigLocationForUI())).toEqual(['/etc/auth.json'])
    expect(error?.message).toBe("reading /etc/missing.json: ENOENT: no such file or directory, open '/etc/missing.json'")
  })

  it('reads nothing for an empty list', async () => {
    const env = fakeDiscoveryEnvironment({ os: 'linux', home: '/home/u' })
    const { configs, error } = await fixedDockerCLIStyleCredentialsConfigs([], env)
    expect(configs).toEqual([])
    expect(error).toBeUndefined()
    expect(env.reads).toEqual([])
  })
})
