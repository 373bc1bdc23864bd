/**
 * Switchboard Kernel: Error Taxonomy
 *
 * Discovery, parse and schema errors abort the module load. Registration
 * errors are collected per step and only their count reaches the host.
 * Each class carries a stable `code` so diagnostics can be matched without
 * string comparison on messages.
 */

export type SwitchboardErrorCode =
  | 'E_PATH'
  | 'E_NOT_FOUND'
  | 'E_PARSE'
  | 'E_SCHEMA'
  | 'E_REGISTRATION'
  | 'E_LIFECYCLE'
  | 'E_HOST';

export abstract class SwitchboardError extends Error {
  abstract readonly code: SwitchboardErrorCode;
}

/** Malformed binding path: cannot derive the application root. */
export class PathError extends SwitchboardError {
  override readonly code = 'E_PATH';

  constructor(readonly bindingPath: string, reason: string) {
    super(`Invalid binding path "${bindingPath}": ${reason}`);
    this.name = 'PathError';
  }
}

/** No configuration file matched in any searched directory. */
export class NotFoundError extends SwitchboardError {
  override readonly code = 'E_NOT_FOUND';

  constructor(readonly identity: string, readonly searchPath: string) {
    super(`No ${identity}* config found in ${searchPath}`);
    this.name = 'NotFoundError';
  }
}

/** The configuration file could not be read or is not well-formed. */
export class ParseError extends SwitchboardError {
  override readonly code = 'E_PARSE';

  constructor(readonly file: string, detail: string) {
    super(`No valid control config file in: ${file} (${detail})`);
    this.name = 'ParseError';
  }
}

/** Required metadata is missing or has the wrong type. */
export class SchemaError extends SwitchboardError {
  override readonly code = 'E_SCHEMA';

  constructor(readonly file: string, detail: string) {
    super(`${detail} in: ${file}`);
    this.name = 'SchemaError';
  }
}

/**
 * A single registration step failed: one static verb, one section loader,
 * or one entry within a section.
 */
export class RegistrationError extends SwitchboardError {
  override readonly code = 'E_REGISTRATION';

  /**
   * @param step - What was being registered, e.g. `verb:auth` or `control:ping`
   */
  constructor(readonly step: string, detail: string) {
    super(`${step}: ${detail}`);
    this.name = 'RegistrationError';
  }
}

/** An illegal lifecycle transition was attempted. */
export class LifecycleError extends SwitchboardError {
  override readonly code = 'E_LIFECYCLE';

  constructor(message: string) {
    super(message);
    this.name = 'LifecycleError';
  }
}

/** The host refused an operation (API creation, registration after seal, a failed call). */
export class HostError extends SwitchboardError {
  override readonly code = 'E_HOST';

  constructor(message: string, readonly status: string = 'host-error') {
    super(message);
    this.name = 'HostError';
  }
}

/** Render any thrown value as a one-line message. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
