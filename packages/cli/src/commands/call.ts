/**
 * switchboard call — Call a verb of the loaded controller API
 *
 * Usage:
 *   switchboard call ping-global
 *   switchboard call <verb> '{"key":"value"}' --auth
 *
 * `--auth` calls the built-in `auth` verb first on the same session, raising
 * its level of assurance. The reply is printed as JSON; a failed reply
 * exits 1.
 */

import { Command } from 'commander';
import { LocalSession } from '@switchboard/runtime-host';
import { buildRuntime, bootController } from '../runtime.js';
import { t } from '../output/theme.js';
import { parseJsonArgument, withRuntimeOptions } from './options.js';
import type { RuntimeFlags } from './options.js';

export const callCommand = withRuntimeOptions(new Command('call'))
  .description('Call a verb of the controller API and print the reply')
  .argument('<verb>', 'Verb name')
  .argument('[args]', 'JSON arguments')
  .option('--auth', 'Call the auth verb first on the same session')
  .action(async (verb: string, rawArgs: string | undefined, options: RuntimeFlags & { auth?: boolean }) => {
    const args = parseJsonArgument(rawArgs, 'args');
    if (!args.ok) {
      // eslint-disable-next-line no-console
      console.error(t.red(args.message));
      process.exit(1);
    }

    const runtime = buildRuntime(options);
    const boot = await bootController(runtime);
    if (!boot.ok) {
      // eslint-disable-next-line no-console
      console.error(t.red(boot.error.message));
      process.exit(1);
    }

    const session = new LocalSession('cli');
    if (options.auth === true) {
      const auth = await runtime.binder.call(boot.api.name, 'auth', null, session);
      if (!auth.ok) {
        // eslint-disable-next-line no-console
        console.error(t.red(`auth failed: ${auth.status}`));
        process.exit(1);
      }
    }

    const reply = await runtime.binder.call(boot.api.name, verb, args.value, session);
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(reply, null, 2));
    if (!reply.ok) process.exit(1);
  });
