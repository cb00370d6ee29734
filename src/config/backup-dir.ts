/**
 * Backup directory resolution
 *
 * With `backup.git-repo` pointing at a git repository, backups go to its
 * `backup/` subdirectory so they can be committed alongside other files.
 * Otherwise (or when the path is not a git repository) they go to
 * `<dataDir>/backup`. The directory is created with mode 0700.
 */

import { promises as fs } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { ConfigurationError, hasErrorCode, toError } from '../errors'
import { DIR_MODE } from '../storage/atomic-write'
import { logger } from '../utils/logger'
import type { BackupConfig } from './loader'

export const BACKUP_DIR_NAME = 'backup'

/**
 * Expand a leading `~/` to the home directory
 */
export function expandHome(path: string, home: string = homedir()): string {
  return path.startsWith('~/') ? join(home, path.slice(2)) : path
}

async function isGitRepo(path: string): Promise<boolean> {
  try {
    await fs.stat(join(path, '.git'))
    return true
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) return false
    throw error
  }
}

/**
 * Resolve the backup directory for a config and make sure it exists
 */
export async function resolveBackupDir(config: BackupConfig, home?: string): Promise<string> {
  let dir = join(config.dataDir, BACKUP_DIR_NAME)

  if (config.gitRepo !== undefined) {
    const repo = expandHome(config.gitRepo, home)
    if (await isGitRepo(repo)) {
      dir = join(repo, BACKUP_DIR_NAME)
    } else {
      logger.debug(`git-repo ${repo} is not a git repo, falling back to ${dir}`)
    }
  }

  try {
    await fs.mkdir(dir, { recursive: true, mode: DIR_MODE })
  } catch (error: unknown) {
    const cause = toError(error)
    throw new ConfigurationError(`Failed to create backup directory ${dir}: ${cause.message}`, { path: dir }, cause)
  }
  return dir
}
