/**
 * switchboard emit — Push an event to the loaded controller
 *
 * The event goes to every API with an event hook; handler activity shows up
 * in the log on stderr.
 */

import { Command } from 'commander';
import { buildRuntime, bootController } from '../runtime.js';
import { t } from '../output/theme.js';
import { parseJsonArgument, withRuntimeOptions } from './options.js';
import type { RuntimeFlags } from './options.js';

export const emitCommand = withRuntimeOptions(new Command('emit'))
  .description('Push an event to the controller API')
  .argument('<event>', 'Event name')
  .argument('[payload]', 'JSON payload')
  .action(async (event: string, rawPayload: string | undefined, options: RuntimeFlags) => {
    const payload = parseJsonArgument(rawPayload, 'payload');
    if (!payload.ok) {
      // eslint-disable-next-line no-console
      console.error(t.red(payload.message));
      process.exit(1);
    }

    const runtime = buildRuntime(options);
    const boot = await bootController(runtime);
    if (!boot.ok) {
      // eslint-disable-next-line no-console
      console.error(t.red(boot.error.message));
      process.exit(1);
    }

    const delivered = await runtime.binder.pushEvent(event, payload.value);
    // eslint-disable-next-line no-console
    console.log(`Event '${event}' delivered to ${delivered} API(s)`);
  });
