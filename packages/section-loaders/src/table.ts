/**
 * The default section table.
 *
 * Order is load order: plugins before anything that calls them, controls and
 * events before onload actions that may trigger them.
 */

import type { SectionLoader } from '@switchboard/kernel';
import { ControlSection } from './controls.js';
import { EventSection } from './events.js';
import { OnloadSection } from './onload.js';
import { PluginSection } from './plugins.js';

export const SECTION_ORDER: ReadonlyArray<string> = ['plugins', 'controls', 'events', 'onload'];

export function defaultSectionTable(): ReadonlyArray<SectionLoader> {
  return [new PluginSection(), new ControlSection(), new EventSection(), new OnloadSection()];
}
