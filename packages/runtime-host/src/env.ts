/**
 * Switchboard Runtime Host: Environment Directory Lists
 *
 * Directory-list overrides are read from `<PREFIX>_<SUFFIX>` variables, e.g.
 * CONTROL_CONFIG_PATH or CONTROL_PLUGIN_PATH. The prefix is upper-cased.
 */

export function envVarName(prefix: string, suffix: string): string {
  return `${prefix.toUpperCase()}_${suffix}`;
}

/**
 * Read a colon-delimited directory list from the environment.
 *
 * @returns undefined when the variable is unset or empty
 */
export function readEnvDirList(
  prefix: string,
  suffix: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const value = env[envVarName(prefix, suffix)];
  return typeof value === 'string' && value !== '' ? value : undefined;
}
