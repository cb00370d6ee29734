/**
 * issue-backup CLI
 *
 * Commands:
 *   export          Export the store to JSONL files in the backup directory
 *   status          Show the state of the last export
 */

import { createConsoleLogger, isDebugEnabled, setLogger } from '../utils/logger'
import { exportCommand, statusCommand, type BackupCommandDeps } from './commands/backup'
import { parseArgs, print, printError } from './types'

// =============================================================================
// Constants
// =============================================================================

export const VERSION = '0.1.0'

const HELP_TEXT = `
issue-backup v${VERSION}

Incremental JSONL backups of the issue store.

USAGE:
  issue-backup <command> [options]

COMMANDS:
  export                        Export changed data to the backup directory
  status                        Show the last backup's revision, watermark and counts

OPTIONS:
  -h, --help                    Show this help message
  -v, --version                 Show version number
  -d, --directory <path>        Start the .issues search here (default: current directory)
  -f, --force                   Export even if nothing changed
  -q, --quiet                   Only print errors
      --verbose                 Log each step to stderr (also ISSUE_BACKUP_DEBUG=1)

EXAMPLES:
  # Back up if anything changed since the last run
  issue-backup export

  # Re-export everything regardless of the revision
  issue-backup export --force

  # Show what the last backup recorded
  issue-backup status
`

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Main CLI entry point
 */
export async function main(argv: string[] = process.argv.slice(2), deps: BackupCommandDeps = {}): Promise<number> {
  try {
    const parsed = parseArgs(argv)

    if (parsed.options.verbose || isDebugEnabled()) {
      setLogger(createConsoleLogger('debug'))
    }

    if (parsed.options.help) {
      print(HELP_TEXT)
      return 0
    }

    if (parsed.options.version) {
      print(`issue-backup v${VERSION}`)
      return 0
    }

    if (!parsed.command) {
      print(HELP_TEXT)
      return 0
    }

    switch (parsed.command) {
      case 'export':
        return await exportCommand(parsed, deps)
      case 'status':
        return await statusCommand(parsed)
      case 'help':
        print(HELP_TEXT)
        return 0
      default:
        printError(`Unknown command: ${parsed.command}`)
        print('\nRun "issue-backup --help" for usage.')
        return 1
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    printError(message)
    return 1
  }
}
