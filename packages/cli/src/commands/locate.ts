/**
 * switchboard locate — Show where the controller configuration is found
 *
 * Prints the composed search path and the first matching file. Exits 1
 * when the path cannot be composed or no file matches.
 */

import { Command } from 'commander';
import { controllerSearchPath, locateConfig, serviceIdentity } from '@switchboard/runtime-host';
import { buildRuntime } from '../runtime.js';
import { t } from '../output/theme.js';
import { withRuntimeOptions } from './options.js';
import type { RuntimeFlags } from './options.js';

export const locateCommand = withRuntimeOptions(new Command('locate'))
  .description('Print the configuration search path and the located file')
  .action((options: RuntimeFlags) => {
    const { binder, entryOptions } = buildRuntime(options, { console: null });
    const composed = controllerSearchPath(binder, entryOptions);
    if (!composed.ok) {
      // eslint-disable-next-line no-console
      console.error(t.red(composed.error.message));
      process.exit(1);
    }

    const identity = serviceIdentity(binder.binderName());
    // eslint-disable-next-line no-console
    console.log(`${t.muted('identity:   ')} ${identity}`);
    // eslint-disable-next-line no-console
    console.log(`${t.muted('search path:')} ${composed.searchPath}`);

    const located = locateConfig(composed.searchPath, identity, { extensions: entryOptions.extensions });
    if (!located.ok) {
      // eslint-disable-next-line no-console
      console.error(t.red(located.error.message));
      process.exit(1);
    }
    // eslint-disable-next-line no-console
    console.log(`${t.muted('config:     ')} ${located.path}`);
  });
