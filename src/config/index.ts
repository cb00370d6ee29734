/**
 * Configuration
 *
 * Data directory discovery, config file loading and backup directory
 * resolution.
 */

export {
  findDataDir,
  loadConfig,
  parseConfig,
  CONFIG_FILENAME,
  DATA_DIR_NAME,
  DEFAULT_STORE_FILENAME,
  type BackupConfig,
} from './loader'

export { resolveBackupDir, expandHome, BACKUP_DIR_NAME } from './backup-dir'
