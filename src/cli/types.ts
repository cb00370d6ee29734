/**
 * CLI Types and Utilities
 *
 * Shared argument parsing and output helpers for the issue-backup CLI.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  command: string
  args: string[]
  options: {
    help: boolean
    version: boolean
    /** Directory to start the data directory search from */
    directory: string
    force: boolean
    quiet: boolean
    verbose: boolean
  }
}

// =============================================================================
// Argument Parser
// =============================================================================

/**
 * Parse command line arguments
 *
 * @throws Error on an unknown option
 */
export function parseArgs(argv: string[], cwd: string = process.cwd()): ParsedArgs {
  const result: ParsedArgs = {
    command: '',
    args: [],
    options: {
      help: false,
      version: false,
      directory: cwd,
      force: false,
      quiet: false,
      verbose: false,
    },
  }

  let i = 0
  while (i < argv.length) {
    const arg = argv[i]

    if (!arg) {
      i++
      continue
    }

    if (arg.startsWith('-')) {
      switch (arg) {
        case '-h':
        case '--help':
          result.options.help = true
          break
        case '-v':
        case '--version':
          result.options.version = true
          break
        case '-d':
        case '--directory':
          result.options.directory = argv[++i] ?? cwd
          break
        case '-f':
        case '--force':
          result.options.force = true
          break
        case '-q':
        case '--quiet':
          result.options.quiet = true
          break
        case '--verbose':
          result.options.verbose = true
          break
        default:
          throw new Error(`Unknown option: ${arg}`)
      }
    } else if (!result.command) {
      result.command = arg
    } else {
      result.args.push(arg)
    }
    i++
  }

  return result
}

// =============================================================================
// Output Utilities
// =============================================================================

/**
 * Print to stdout
 */
export function print(message: string): void {
  process.stdout.write(message + '\n')
}

/**
 * Print to stderr
 */
export function printError(message: string): void {
  process.stderr.write('Error: ' + message + '\n')
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  process.stdout.write('OK ' + message + '\n')
}
