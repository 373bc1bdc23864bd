/**
 * switchboard inspect — Load the controller and describe the API it built
 *
 * Displays:
 * - API name, info and source file
 * - Verbs with their required level of assurance
 * - Routed events and loaded plugins
 * - Init status
 */

import { Command } from 'commander';
import { buildRuntime, bootController } from '../runtime.js';
import { statusColor, t } from '../output/theme.js';
import { withRuntimeOptions } from './options.js';
import type { RuntimeFlags } from './options.js';

export const inspectCommand = withRuntimeOptions(new Command('inspect'))
  .description('Load the controller and print its API, verbs, events and plugins')
  .option('--json', 'Output as JSON')
  .action(async (options: RuntimeFlags & { json?: boolean }) => {
    const runtime = buildRuntime(options, { console: options.json === true ? null : undefined });
    const boot = await bootController(runtime);
    if (!boot.ok) {
      // eslint-disable-next-line no-console
      console.error(t.red(boot.error.message));
      process.exit(1);
    }

    const { api, context, init } = boot;
    const verbs = api.verbNames().flatMap((name) => {
      const verb = api.verb(name);
      return verb === undefined ? [] : [{ verb: verb.verb, info: verb.info, loa: verb.loa }];
    });
    const events = context.routedEvents();
    const plugins = context.plugins.list().map((plugin) => plugin.spec.uid);
    const source = boot.config.source;

    if (options.json === true) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({
        api: api.name,
        info: api.info,
        source,
        sealed: api.sealed,
        state: context.state,
        verbs,
        events,
        plugins,
        init,
      }, null, 2));
      return;
    }

    // eslint-disable-next-line no-console
    console.log(`\n${t.dim('───')} ${t.white(api.name)} ${t.dim('─────────────────────────────────────')}`);
    // eslint-disable-next-line no-console
    console.log(`info:    ${api.info}`);
    // eslint-disable-next-line no-console
    console.log(`source:  ${source}`);
    // eslint-disable-next-line no-console
    console.log(`state:   ${context.state}`);

    // eslint-disable-next-line no-console
    console.log('\nVerbs:');
    for (const verb of verbs) {
      // eslint-disable-next-line no-console
      console.log(`  ${t.blue(verb.verb)}  loa=${verb.loa}${verb.info !== '' ? `  ${t.muted(verb.info)}` : ''}`);
    }

    // eslint-disable-next-line no-console
    console.log('\nEvents:');
    // eslint-disable-next-line no-console
    console.log(events.length === 0 ? '  (none)' : events.map((event) => `  ${event}`).join('\n'));

    // eslint-disable-next-line no-console
    console.log('\nPlugins:');
    // eslint-disable-next-line no-console
    console.log(plugins.length === 0 ? '  (none)' : plugins.map((uid) => `  ${uid}`).join('\n'));

    // eslint-disable-next-line no-console
    console.log('\nInit:');
    for (const status of init) {
      // eslint-disable-next-line no-console
      console.log(`  ${status.api}  ${statusColor(status.status === 0)(String(status.status))}`);
    }
    // eslint-disable-next-line no-console
    console.log(t.dim('─────────────────────────────────────────────────────\n'));
  });
