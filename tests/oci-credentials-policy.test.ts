import { describe, it, expect } from 'vitest'
import { parseConfigSource, type CLIConfig } from '../src/core/cliconfig/config.js'
import { ConfigValidationError } from '../src/core/cliconfig/diagnostics.js'
import { ociCredentialsPolicy } from '../src/core/cliconfig/ociCredentialsPolicy.js'
import {
  DomainCredentialsSpecificity,
  GlobalCredentialsSpecificity,
  repositoryCredentialsSpecificity
} from '../src/core/ociauth/specificity.js'
import { basicAuth, captureLogger, fakeDiscoveryEnvironment, fakeLookupEnvironment } from './fakes.js'

const dockerConfigPath = '/home/u/.docker/config.json'
const dockerConfig = JSON.stringify({
  credsStore: 'desktop',
  credHelpers: { 'example.com': 'ecr-login' },
  auths: {
    'example.net': { auth: basicAuth('net-user', 'test-secret') },
    'example.com/team': { auth: basicAuth('team-user', 'test-secret') }
  }
})

function discoEnv(files: Record<string, string | Error> = { [dockerConfigPath]: dockerConfig }) {
  return fakeDiscoveryEnvironment({ os: 'linux', home: '/home/u', files })
}

function config(lines: string[]): CLIConfig {
  return parseConfigSource(lines.join('\n'), '/etc/ocicreds/config.yaml').config
}

const explicitExampleCom = [
  'oci_credentials:',
  '  example.com:',
  '    username: explicit-user',
  '    password: test-secret'
]

function helperName(source: unknown): string {
  return typeof source === 'object' && source !== null && 'helperName' in source && typeof source.helperName === 'string' ? source.helperName : ''
}

describe('ociCredentialsPolicy', () => {
  it('orders explicit blocks, then the default helper, then ambient files', async () => {
    const policy = await ociCredentialsPolicy(config([
      ...explicitExampleCom,
      'oci_default_credentials:',
      '  docker_credentials_helper: pass'
    ]), discoEnv())
    expect(policy.allConfigs().map(c => c.credentialsConfigLocationForUI())).toEqual([
      'explicit oci_credentials "example.com" block',
      'oci_default_credentials block',
      dockerConfigPath
    ])
  })

  it('lets explicit blocks win ties with ambient configuration', async () => {
    const policy = await ociCredentialsPolicy(config(explicitExampleCom), discoEnv())
    const { source, location } = policy.credentialsSourceForRepository('example.com', 'app')
    expect(location).toBe('explicit oci_credentials "example.com" block')
    expect(source?.credentialsSpecificity()).toBe(DomainCredentialsSpecificity)
    expect((await source?.credentials(fakeLookupEnvironment()))?.username).toBe('explicit-user')
  })

  it('still prefers more specific ambient entries', async () => {
    const policy = await ociCredentialsPolicy(config(explicitExampleCom), discoEnv())
    const { source, location } = policy.credentialsSourceForRepository('example.com', 'team/app')
    expect(location).toBe(dockerConfigPath)
    expect(source?.credentialsSpecificity()).toBe(repositoryCredentialsSpecificity(1))
  })

  it('falls back to ambient configuration for other domains', async () => {
    const policy = await ociCredentialsPolicy(config(explicitExampleCom), discoEnv())
    expect((await policy.credentialsSourceForRepository('example.net', 'app').source?.credentials(fakeLookupEnvironment()))?.username).toBe('net-user')

    const { source } = policy.credentialsSourceForRepository('unrelated.example', 'app')
    expect(source?.credentialsSpecificity()).toBe(GlobalCredentialsSpecificity)
    expect(helperName(source)).toBe('desktop')
  })

  it('puts the default helper ahead of ambient global helpers', async () => {
    const policy = await ociCredentialsPolicy(config([
      'oci_default_credentials:',
      '  docker_credentials_helper: pass'
    ]), discoEnv())
    const { source, location } = policy.credentialsSourceForRepository('unrelated.example', 'app')
    expect(location).toBe('oci_default_credentials block')
    expect(helperName(source)).toBe('pass')
  })

  it('skips ambient discovery when disabled', async () => {
    const env = discoEnv()
    const policy = await ociCredentialsPolicy(config([
      ...explicitExampleCom,
      'oci_default_credentials:',
      '  discover_ambient_credentials: false'
    ]), env)
    expect(policy.allConfigs().map(c => c.credentialsConfigLocationForUI())).toEqual(['explicit oci_credentials "example.com" block'])
    expect(env.reads).toEqual([])
  })

  it('uses only the listed files when a list is given', async () => {
    const env = discoEnv({ [dockerConfigPath]: dockerConfig, '/etc/ocicreds/auth.json': JSON.stringify({ credsStore: 'pass' }) })
    const policy = await ociCredentialsPolicy(config([
      'oci_default_credentials:',
      '  docker_style_config_files: [auth.json]'
    ]), env)
    expect(policy.allConfigs().map(c => c.credentialsConfigLocationForUI())).toEqual(['/etc/ocicreds/auth.json'])
  })

  it('disables Docker-style files with an empty list', async () => {
    const policy = await ociCredentialsPolicy(config([
      'oci_default_credentials:',
      '  docker_style_config_files: []'
    ]), discoEnv())
    expect(policy.allConfigs()).toEqual([])
  })

  it('fails when a listed file cannot be read', async () => {
    const policy = ociCredentialsPolicy(config([
      'oci_default_credentials:',
      '  docker_style_config_files: [missing.json]'
    ]), discoEnv())
    await expect(policy).rejects.toThrow(
      "discovering ambient OCI registry credentials: failed to read Docker-style config files: reading /etc/ocicreds/missing.json: ENOENT: no such file or directory, open '/etc/ocicreds/missing.json'"
    )
  })

  it('warns and drops ambient configuration when discovered files are broken', async () => {
    const { logger, lines } = captureLogger()
    const policy = await ociCredentialsPolicy(config(explicitExampleCom), discoEnv({ [dockerConfigPath]: '[]' }), logger)
    expect(policy.allConfigs().map(c => c.credentialsConfigLocationForUI())).toEqual(['explicit oci_credentials "example.com" block'])
    expect(lines).toEqual([
      '[!] Problems during OCI registry ambient credentials discovery:',
      `[!] parsing ${dockerConfigPath}: invalid JSON syntax: top-level value must be an object`
    ])
  })

  it('refuses an invalid configuration', async () => {
    const cfg = config([
      'oci_default_credentials:',
      '  - {}',
      '  - {}'
    ])
    await expect(ociCredentialsPolicy(cfg, discoEnv())).rejects.toBeInstanceOf(ConfigValidationError)
    await expect(ociCredentialsPolicy(cfg, discoEnv())).rejects.toThrow('No more than one oci_default_credentials block may be specified')
  })
})
