#!/usr/bin/env node
import { Command } from 'commander'
import { registerDiscoverCommand } from './commands/discover.js'
import { registerSyncCommand } from './commands/sync.js'
import { output } from './output.js'

const program = new Command()

program
  .name('forms-tap')
  .description('Extract form responses with per-form schema inference')
  .version('0.1.0')

registerDiscoverCommand(program)
registerSyncCommand(program)

export { program }

program.parseAsync().catch((err: unknown) => {
  output.error(err instanceof Error ? err.message : String(err))
  process.exitCode = 1
})
