/**
 * Switchboard Kernel: Section Dispatcher
 *
 * Owns the ordered section table and drives it against a ConfigDocument.
 * Table order, not document order, decides the sequence: plugins must be
 * registered before the controls and events that call them, and everything
 * before the onload actions that run at init.
 *
 * Failure policy: best effort. A failed loader does not stop later loaders
 * and nothing already applied is rolled back. Errors are collected and
 * returned; the count is what the host sees.
 *
 * Document sections with no loader are skipped and never counted as errors,
 * so older binaries accept newer configuration files. With
 * `unknownSections: 'warn'` each skipped key is also logged.
 */

import type { ControllerContext } from '../assembly/context.js';
import { RegistrationError, describeError } from '../errors.js';
import type { ApiHandle } from '../types/host.js';
import type { SectionLoader } from './section-loader.js';

export type UnknownSectionPolicy = 'ignore' | 'warn';

export interface SectionDispatcherOptions {
  readonly unknownSections?: UnknownSectionPolicy | undefined;
}

export interface DispatchReport {
  readonly errors: ReadonlyArray<RegistrationError>;
  /** Keys whose loader ran, in the order it ran. */
  readonly loaded: ReadonlyArray<string>;
  /** Document keys with no loader in the table, in document order. */
  readonly skipped: ReadonlyArray<string>;
}

export class SectionDispatcher {
  private readonly table: ReadonlyArray<SectionLoader>;
  private readonly unknownSections: UnknownSectionPolicy;

  /**
   * @param loaders - The section table, in dispatch order
   * @throws {Error} If two loaders share a key
   */
  constructor(loaders: ReadonlyArray<SectionLoader>, options: SectionDispatcherOptions = {}) {
    const seen = new Set<string>();
    for (const loader of loaders) {
      if (seen.has(loader.key)) {
        throw new Error(`Duplicate section key in table: ${loader.key}`);
      }
      seen.add(loader.key);
    }
    this.table = [...loaders];
    this.unknownSections = options.unknownSections ?? 'ignore';
  }

  /** Section keys in dispatch order. */
  keys(): ReadonlyArray<string> {
    return this.table.map((loader) => loader.key);
  }

  /** Pre-init pass: run every loader whose section is present. */
  async dispatch(api: ApiHandle, context: ControllerContext): Promise<DispatchReport> {
    const report = await this.run(api, context, 'load');
    for (const key of report.skipped) {
      if (this.unknownSections === 'warn') {
        api.log('warning', `Ignoring unrecognized section '${key}'`);
      }
    }
    return report;
  }

  /** Init pass: run the init phase of every loader that has one and whose section is present. */
  dispatchInit(api: ApiHandle, context: ControllerContext): Promise<DispatchReport> {
    return this.run(api, context, 'init');
  }

  private async run(
    api: ApiHandle,
    context: ControllerContext,
    phase: 'load' | 'init',
  ): Promise<DispatchReport> {
    const sections = context.config.sections;
    const errors: RegistrationError[] = [];
    const loaded: string[] = [];

    for (const loader of this.table) {
      const payload = sections.get(loader.key);
      if (payload === undefined) continue;

      const step = phase === 'load' ? loader.load.bind(loader) : loader.init?.bind(loader);
      if (step === undefined) continue;

      loaded.push(loader.key);
      try {
        errors.push(...(await step(api, payload, context)));
      } catch (err: unknown) {
        errors.push(new RegistrationError(`section:${loader.key}`, describeError(err)));
      }
    }

    const known = new Set(this.keys());
    const skipped = Array.from(sections.keys()).filter((key) => !known.has(key));
    return { errors, loaded, skipped };
  }
}
