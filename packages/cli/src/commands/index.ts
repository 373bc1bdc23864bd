/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/switchboard.ts
 *   src/index.ts
 */

import { program } from 'commander'
import { locateCommand } from './locate.js'
import { inspectCommand } from './inspect.js'
import { callCommand } from './call.js'
import { emitCommand } from './emit.js'
import { logCommand } from './log.js'

program
  .name('switchboard')
  .description(
    'Switchboard: locate a controller configuration and host the API it declares.\n' +
    'The config file is <identity>*.json, where identity is the binder name after its first "-".',
  )
  .version('0.1.0')

program.addCommand(locateCommand)
program.addCommand(inspectCommand)
program.addCommand(callCommand)
program.addCommand(emitCommand)
program.addCommand(logCommand)

export { program }
