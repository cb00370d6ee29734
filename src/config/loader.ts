/**
 * Config file loader for `<dataDir>/config.yaml`
 *
 * Recognized keys:
 *
 * ```yaml
 * backup:
 *   git-repo: ~/notes-repo   # write backups to <repo>/backup when it is a git repo
 * store:
 *   path: issues.db          # SQLite file, relative to the data dir
 * ```
 *
 * A missing file yields the defaults.
 */

import { promises as fs } from 'node:fs'
import { dirname, isAbsolute, join, resolve } from 'node:path'
import * as yaml from 'yaml'
import { ConfigurationError, hasErrorCode, toError } from '../errors'
import { isRecord, isString } from '../utils/json-validation'

/** Name of the directory that holds the store, config and default backup dir */
export const DATA_DIR_NAME = '.issues'
export const CONFIG_FILENAME = 'config.yaml'
export const DEFAULT_STORE_FILENAME = 'issues.db'

export interface BackupConfig {
  /** Data directory the config was loaded from */
  dataDir: string
  /** Git repository to place backups in, as written in the config */
  gitRepo?: string | undefined
  /** Absolute path of the SQLite store */
  storePath: string
}

/**
 * Find the data directory by walking up from `cwd`.
 * Falls back to `<cwd>/.issues` when none exists.
 */
export async function findDataDir(cwd: string = process.cwd()): Promise<string> {
  let current = resolve(cwd)
  for (;;) {
    const candidate = join(current, DATA_DIR_NAME)
    try {
      const stat = await fs.stat(candidate)
      if (stat.isDirectory()) return candidate
    } catch (error: unknown) {
      if (!hasErrorCode(error, 'ENOENT') && !hasErrorCode(error, 'ENOTDIR')) throw error
    }
    const parent = dirname(current)
    if (parent === current) break
    current = parent
  }
  return join(resolve(cwd), DATA_DIR_NAME)
}

/**
 * Parse config YAML text. Empty text yields the defaults.
 *
 * @throws ConfigurationError on invalid YAML or wrongly typed keys
 */
export function parseConfig(text: string, dataDir: string): BackupConfig {
  let parsed: unknown = {}
  if (text.trim()) {
    try {
      parsed = yaml.parse(text) ?? {}
    } catch (error: unknown) {
      const cause = toError(error)
      throw new ConfigurationError(`YAML parse error: ${cause.message}`, { path: join(dataDir, CONFIG_FILENAME) }, cause)
    }
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError('Config must be a YAML mapping', { path: join(dataDir, CONFIG_FILENAME) })
  }

  const backup = section(parsed, 'backup')
  const store = section(parsed, 'store')

  const gitRepo = optionalString(backup, 'backup.git-repo', 'git-repo')
  const storePath = optionalString(store, 'store.path', 'path') ?? DEFAULT_STORE_FILENAME

  return {
    dataDir,
    gitRepo: gitRepo === '' ? undefined : gitRepo,
    storePath: isAbsolute(storePath) ? storePath : join(dataDir, storePath),
  }
}

/**
 * Load `config.yaml` from the data directory
 */
export async function loadConfig(dataDir: string): Promise<BackupConfig> {
  const path = join(dataDir, CONFIG_FILENAME)
  let text = ''
  try {
    text = await fs.readFile(path, 'utf-8')
  } catch (error: unknown) {
    if (!hasErrorCode(error, 'ENOENT')) {
      const cause = toError(error)
      throw new ConfigurationError(`Failed to read config: ${cause.message}`, { path }, cause)
    }
  }
  return parseConfig(text, dataDir)
}

function section(parsed: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = parsed[key]
  if (value === undefined || value === null) return {}
  if (!isRecord(value)) {
    throw new ConfigurationError(`Config key "${key}" must be a mapping`, { configKey: key })
  }
  return value
}

function optionalString(parent: Record<string, unknown>, configKey: string, key: string): string | undefined {
  const value = parent[key]
  if (value === undefined || value === null) return undefined
  if (!isString(value)) {
    throw new ConfigurationError(`Config key "${configKey}" must be a string`, { configKey })
  }
  return value
}
