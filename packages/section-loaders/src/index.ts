/**
 * @switchboard/section-loaders
 *
 * The configuration section loaders (plugins, controls, events, onload),
 * the action model they share, and an in-process plugin catalog.
 */

export type { SectionEntries, SectionEntry } from './actions/entries.js';
export { sectionEntries } from './actions/entries.js';

export type { ActionDefinition, ActionList, ActionParseResult, ActionTarget } from './actions/action.js';
export { formatActionTarget, parseAction, parseActionUri, parseActions } from './actions/action.js';

export type { ActionInvocation } from './actions/executor.js';
export { checkAction, executeAction, mergeArgs } from './actions/executor.js';

export type { PluginSpecResult } from './plugins.js';
export { PluginSection, parsePluginSpec } from './plugins.js';
export { ControlSection } from './controls.js';
export { EventSection } from './events.js';
export { OnloadSection } from './onload.js';

export { SECTION_ORDER, defaultSectionTable } from './table.js';
export { CatalogPluginResolver } from './catalog-resolver.js';
