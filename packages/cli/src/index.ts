/**
 * @switchboard/cli
 *
 * Operator CLI. The Commander program is exported unparsed so it can be
 * embedded; bin/switchboard.ts parses process.argv.
 *
 * Usage:
 *   switchboard locate
 *   switchboard inspect [--json]
 *   switchboard call <verb> [json-args] [--auth]
 *   switchboard emit <event> [json-payload]
 *   switchboard log <file>
 */

export { program } from './commands/index.js';
export type { BootResult, BuildRuntimeDeps, Runtime } from './runtime.js';
export { bootController, buildRuntime } from './runtime.js';
export { ConsoleLogSink, formatLogLine, renderLogLine } from './output/console-log-sink.js';
export { BUILTIN_PLUGINS } from './plugins/builtin.js';
