/**
 * `forms-tap discover` -- print the stream catalog as JSON.
 *
 * Runs in discover mode: list streams, which only feed detail streams, are
 * left out.
 */

import type { Command } from 'commander'
import { createFormsClient } from '../../client/index.js'
import { FieldCatalog } from '../../discovery/index.js'
import { buildCatalog } from '../../streams/index.js'
import { output } from '../output.js'
import { loadConfigOrExit } from './load.js'

export function registerDiscoverCommand(program: Command): void {
  program
    .command('discover')
    .description('Discover forms and print the stream catalog')
    .option('-c, --config <path>', 'configuration file path', 'forms-tap.config.json')
    .action(async (options: { config: string }) => {
      const config = loadConfigOrExit(options.config)
      if (!config) return

      const client = createFormsClient(config)
      const fieldCatalog = new FieldCatalog(client, { switchAsBoolean: config.switch_as_boolean })

      try {
        const streams = await buildCatalog(client, fieldCatalog, 'discover')
        output.data(JSON.stringify({ streams }, null, 2))
        output.success(`Discovered ${streams.length} stream(s)`)
      } catch (err) {
        output.error(err instanceof Error ? err.message : String(err))
        process.exit(1)
      }
    })
}
