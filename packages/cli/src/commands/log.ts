/**
 * switchboard log — Print entries from a JSONL log file
 *
 * Reads a file written through --log-file. Malformed lines and a partial
 * trailing line are skipped and reported in a summary on stderr. `--plain`
 * prints uncoloured lines for piping into other tools.
 */

import { Command } from 'commander';
import type { LogEntry } from '@switchboard/kernel';
import { isLogLevel, severity } from '@switchboard/kernel';
import { readLogFile } from '@switchboard/runtime-host';
import { formatLogLine, renderLogLine } from '../output/console-log-sink.js';
import { t } from '../output/theme.js';

export const logCommand = new Command('log')
  .description('Print entries from a JSONL log file')
  .argument('<file>', 'Log file written with --log-file')
  .option('--level <level>', 'Only entries at this level or more severe')
  .option('--source <source>', 'Only entries from this source')
  .option('--json', 'Output entries as JSON')
  .option('--plain', 'Print lines without colour')
  .action((file: string, options: { level?: string; source?: string; json?: boolean; plain?: boolean }) => {
    const level = options.level;
    if (level !== undefined && !isLogLevel(level)) {
      // eslint-disable-next-line no-console
      console.error(t.red(`Unknown log level: ${level}`));
      process.exit(1);
    }

    const { entries, stats } = readLogFile(file);
    const selected = entries.filter((entry: LogEntry) =>
      (level === undefined || severity(entry.level) <= severity(level)) &&
      (options.source === undefined || entry.source === options.source),
    );

    if (options.json === true) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(selected, null, 2));
    } else {
      for (const entry of selected) {
        // eslint-disable-next-line no-console
        console.log(options.plain === true ? formatLogLine(entry) : renderLogLine(entry));
      }
    }

    if (stats.parseErrors > 0 || stats.partialTrailingLine) {
      // eslint-disable-next-line no-console
      console.error(t.amber(
        `${stats.parseErrors} malformed line(s) skipped${stats.partialTrailingLine ? ', partial trailing line dropped' : ''}`,
      ));
    }
  });
