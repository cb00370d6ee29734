#!/usr/bin/env node
/**
 * issue-backup executable. Ctrl-C aborts a running export; the previous
 * backup state is kept.
 */

import { main } from './main'

const controller = new AbortController()
process.once('SIGINT', () => controller.abort())

main(process.argv.slice(2), { signal: controller.signal })
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`)
    process.exit(1)
  })
