/**
 * Section loader test helpers: a context with plugins already registered,
 * attached to a FakeApi the way the assembler would attach it.
 */

import type { PluginModule } from '@switchboard/kernel';
import { ControllerContext } from '@switchboard/kernel';
import { FakeApi, makeDocument } from '../../kernel/test/fixtures.js';

export { FakeApi, FakeRequest, makeDocument } from '../../kernel/test/fixtures.js';

export interface Harness {
  readonly api: FakeApi;
  readonly context: ControllerContext;
}

export function harness(plugins: Readonly<Record<string, PluginModule>> = {}): Harness {
  const context = new ControllerContext(makeDocument({ api: 'demo' }));
  for (const [uid, module] of Object.entries(plugins)) {
    context.plugins.register({ spec: { uid, info: '', module: uid }, module });
  }
  const api = new FakeApi('demo');
  api.setUserData(context);
  return { api, context };
}
