import { readFile } from 'node:fs/promises'
import os from 'node:os'
import { resolve } from 'node:path'
import { isMap, isNode, isScalar, isSeq, parseDocument, type Document, type YAMLMap } from 'yaml'
import { isNotExistError } from '../ociauth/environment.js'
import { toError, wrapError } from '../ociauth/errors.js'
import type { ConfigDiagnostic } from './diagnostics.js'
import {
  decodeOCIDefaultCredentials,
  decodeOCIRepositoryCredentials,
  type OCIDefaultCredentials,
  type OCIRepositoryCredentials
} from './ociCredentials.js'

/**
 * The merged content of one or more CLI configuration files. Duplicate
 * blocks are allowed here and only rejected by validateConfig, so that
 * separate files can be merged first.
 */
export interface CLIConfig {
  ociDefaultCredentials: OCIDefaultCredentials[]
  ociRepositoryCredentials: OCIRepositoryCredentials[]
}

export interface LoadedConfig {
  config: CLIConfig
  diagnostics: ConfigDiagnostic[]
}

export interface LoadConfigOptions {
  /** Treat a missing file as empty configuration instead of failing. */
  optional?: boolean
}

const DEFAULT_CONFIG_NAME = 'config.yaml'
const TOP_LEVEL_KEYS = ['oci_default_credentials', 'oci_credentials']

export function defaultOcicredsDir(): string {
  return resolve(os.homedir(), '.ocicreds')
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env.OCICREDS_CONFIG
  if (configured) return resolve(configured)
  return resolve(defaultOcicredsDir(), DEFAULT_CONFIG_NAME)
}

export function emptyConfig(): CLIConfig {
  return { ociDefaultCredentials: [], ociRepositoryCredentials: [] }
}

/**
 * Reads a single YAML or JSON configuration file. Problems with the file as a
 * whole (unreadable, unparseable) are thrown; problems with individual blocks
 * are returned as diagnostics alongside whatever did decode.
 */
export async function loadConfigFile(filePath: string, options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  let raw: string
  try {
    raw = await readFile(filePath, 'utf8')
  } catch (error) {
    if (options.optional && isNotExistError(error)) {
      return { config: emptyConfig(), diagnostics: [] }
    }
    throw wrapError(`reading configuration file ${filePath}`, toError(error))
  }
  return parseConfigSource(raw, filePath)
}

export function parseConfigSource(raw: string, filePath: string): LoadedConfig {
  const trimmed = raw.trim()
  if (!trimmed) return { config: emptyConfig(), diagnostics: [] }

  // Repeated keys are kept so that duplicate blocks reach validateConfig.
  const doc = parseDocument(trimmed, { uniqueKeys: false })
  if (doc.errors.length > 0) {
    throw wrapError(`parsing configuration file ${filePath}`, doc.errors[0])
  }
  const root = doc.contents
  if (isNullNode(root)) return { config: emptyConfig(), diagnostics: [] }
  if (!isMap(root)) {
    throw new Error(`parsing configuration file ${filePath}: top-level value must be an object`)
  }

  const config = emptyConfig()
  const diagnostics: ConfigDiagnostic[] = []

  for (const { key, occurrence, node } of mapEntries(root, doc)) {
    if (!TOP_LEVEL_KEYS.includes(key)) {
      diagnostics.push({
        summary: 'Unsupported configuration setting',
        detail: `The configuration file ${filePath} contains unsupported setting ${JSON.stringify(key)}.`
      })
      continue
    }
    if (isNullNode(node)) continue
    const setting = withOccurrence(key, occurrence)

    if (key === 'oci_default_credentials') {
      const blocks = isSeq(node)
        ? node.items.map((item, i) => ({ body: toPlain(item, doc), where: `${filePath} (${setting}[${i}])` }))
        : [{ body: toPlain(node, doc), where: `${filePath} (${setting})` }]
      for (const { body, where } of blocks) {
        const { result, diagnostics: blockDiags } = decodeOCIDefaultCredentials(body, filePath, where)
        diagnostics.push(...blockDiags)
        if (result) config.ociDefaultCredentials.push(result)
      }
      continue
    }

    for (const entry of credentialsBlockEntries(node, doc, filePath, setting, diagnostics)) {
      const { result, diagnostics: blockDiags } = decodeOCIRepositoryCredentials(entry.label, entry.body, entry.where)
      diagnostics.push(...blockDiags)
      if (result) config.ociRepositoryCredentials.push(result)
    }
  }

  return { config, diagnostics }
}

/**
 * Loads each file in turn and merges the results in the given order. Only
 * the first (default) location may be absent when optionalFirst is set.
 */
export async function loadConfigFiles(filePaths: readonly string[], options: { optionalFirst?: boolean } = {}): Promise<LoadedConfig> {
  const loaded: LoadedConfig[] = []
  for (const [i, filePath] of filePaths.entries()) {
    loaded.push(await loadConfigFile(filePath, { optional: i === 0 && options.optionalFirst }))
  }
  return {
    config: mergeConfigs(...loaded.map(item => item.config)),
    diagnostics: loaded.flatMap(item => item.diagnostics)
  }
}

export function mergeConfigs(...configs: CLIConfig[]): CLIConfig {
  return {
    ociDefaultCredentials: configs.flatMap(cfg => cfg.ociDefaultCredentials),
    ociRepositoryCredentials: configs.flatMap(cfg => cfg.ociRepositoryCredentials)
  }
}

/**
 * Checks the rules that can only be enforced once all of the files have been
 * merged together.
 */
export function validateConfig(cfg: CLIConfig): ConfigDiagnostic[] {
  const diagnostics: ConfigDiagnostic[] = []

  if (cfg.ociDefaultCredentials.length > 1) {
    const [first, ...rest] = cfg.ociDefaultCredentials
    for (const block of rest) {
      diagnostics.push({
        summary: 'Duplicate oci_default_credentials block',
        detail: `No more than one oci_default_credentials block may be specified. Found one at ${first.declaredAt} and another at ${block.declaredAt}.`
      })
    }
  }

  const seen = new Map<string, OCIRepositoryCredentials>()
  for (const block of cfg.ociRepositoryCredentials) {
    const previous = seen.get(block.repositoryPrefix)
    if (previous) {
      diagnostics.push({
        summary: `Duplicate oci_credentials block for ${JSON.stringify(block.repositoryPrefix)}`,
        detail: `The block at ${block.declaredAt} repeats the repository address prefix already declared at ${previous.declaredAt}.`
      })
      continue
    }
    seen.set(block.repositoryPrefix, block)
  }

  return diagnostics
}

interface CredentialsBlockEntry {
  label: string
  body: unknown
  where: string
}

function credentialsBlockEntries(node: unknown, doc: Document.Parsed, filePath: string, setting: string, diagnostics: ConfigDiagnostic[]): CredentialsBlockEntry[] {
  if (isSeq(node)) {
    const entries: CredentialsBlockEntry[] = []
    for (const [i, itemNode] of node.items.entries()) {
      const where = `${filePath} (${setting}[${i}])`
      const item = toPlain(itemNode, doc)
      const address = isRecord(item) ? item.address : undefined
      if (!isRecord(item) || typeof address !== 'string') {
        diagnostics.push({
          summary: 'Invalid oci_credentials block',
          detail: `The oci_credentials block at ${where} must be an object with a string "address" property.`
        })
        continue
      }
      const body = Object.fromEntries(Object.entries(item).filter(([key]) => key !== 'address'))
      entries.push({ label: address, body, where })
    }
    return entries
  }
  if (isMap(node)) {
    return mapEntries(node, doc).map(({ key, occurrence, node: body }) => ({
      label: key,
      body: toPlain(body, doc),
      where: `${filePath} (${setting} ${withOccurrence(JSON.stringify(key), occurrence)})`
    }))
  }
  diagnostics.push({
    summary: 'Invalid oci_credentials setting',
    detail: `The oci_credentials setting in ${filePath} must be an object keyed by repository address or a list of objects.`
  })
  return []
}

interface MapEntry {
  key: string
  /** 1 for the first pair with this key, 2 for the next, and so on. */
  occurrence: number
  node: unknown
}

function mapEntries(map: YAMLMap, doc: Document.Parsed): MapEntry[] {
  const counts = new Map<string, number>()
  return map.items.map(pair => {
    const key = String(toPlain(pair.key, doc))
    const occurrence = (counts.get(key) ?? 0) + 1
    counts.set(key, occurrence)
    return { key, occurrence, node: pair.value }
  })
}

function withOccurrence(label: string, occurrence: number): string {
  return occurrence > 1 ? `${label} #${occurrence}` : label
}

function toPlain(node: unknown, doc: Document.Parsed): unknown {
  return isNode(node) ? node.toJS(doc) : node
}

function isNullNode(node: unknown): boolean {
  return node === null || node === undefined || (isScalar(node) && node.value === null)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
