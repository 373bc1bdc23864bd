/**
 * Switchboard Kernel — Lifecycle Tests
 *
 *   LC-U1: Created → Assembling → Sealed → Initialized is the only path
 *   LC-U2: ControllerContext rejects skipped or backward transitions
 *   LC-U3: event routes can only be added before sealing
 *   LC-U4: ping counter is per context
 *   LC-U5: contextOf() only recognizes a ControllerContext
 */

import { describe, it, expect } from 'vitest';
import { ApiState, ControllerContext, LifecycleError, canTransition, contextOf } from '../src/index.js';
import { FakeApi, makeDocument } from './fixtures.js';

describe('canTransition', () => {
  it('LC-U1: allows exactly the forward chain', () => {
    expect(canTransition(ApiState.Created, ApiState.Assembling)).toBe(true);
    expect(canTransition(ApiState.Assembling, ApiState.Sealed)).toBe(true);
    expect(canTransition(ApiState.Sealed, ApiState.Initialized)).toBe(true);

    expect(canTransition(ApiState.Created, ApiState.Sealed)).toBe(false);
    expect(canTransition(ApiState.Sealed, ApiState.Assembling)).toBe(false);
    expect(canTransition(ApiState.Initialized, ApiState.Initialized)).toBe(false);
  });
});

describe('ControllerContext', () => {
  it('LC-U2: throws LifecycleError on a skipped transition', () => {
    const context = new ControllerContext(makeDocument({ api: 'demo' }));
    expect(context.state).toBe(ApiState.Created);
    expect(() => context.transition(ApiState.Sealed)).toThrow(LifecycleError);
    expect(() => context.transition(ApiState.Sealed)).toThrow(
      "Illegal lifecycle transition for API 'demo': Created → Sealed",
    );
    expect(context.state).toBe(ApiState.Created);
  });

  it('LC-U3: accepts event routes while assembling and rejects them once sealed', () => {
    const context = new ControllerContext(makeDocument({ api: 'demo' }));
    context.transition(ApiState.Assembling);
    context.addEventHandler('alarm', () => undefined);
    context.addEventHandler('alarm', () => undefined);
    context.transition(ApiState.Sealed);

    expect(context.eventHandlersFor('alarm')).toHaveLength(2);
    expect(context.routedEvents()).toEqual(['alarm']);
    expect(() => context.addEventHandler('late', () => undefined)).toThrow(
      "Cannot route event 'late' on API 'demo' in state Sealed",
    );
  });

  it('LC-U4: counts pings per context', () => {
    const a = new ControllerContext(makeDocument({ api: 'a' }));
    const b = new ControllerContext(makeDocument({ api: 'b' }));
    expect(a.nextPing()).toBe(1);
    expect(a.nextPing()).toBe(2);
    expect(b.nextPing()).toBe(1);
  });

  it('LC-U5: contextOf() ignores foreign user data', () => {
    const api = new FakeApi();
    expect(contextOf(api)).toBeUndefined();
    api.setUserData({ config: 'not a context' });
    expect(contextOf(api)).toBeUndefined();

    const context = new ControllerContext(makeDocument({ api: 'demo' }));
    api.setUserData(context);
    expect(contextOf(api)).toBe(context);
  });
});
