import { describe, it, expect, vi } from 'vitest';
import { advanceLastUpdateTime, evaluateUpdate } from '../updatePolicy';
import type { UpdatePolicyInput } from '../updatePolicy';

const input = (overrides: Partial<UpdatePolicyInput> = {}): UpdatePolicyInput => ({
  force: false,
  now: 10_000,
  lastUpdateTime: 0,
  minTime: 1,
  autoUpdate: undefined,
  readGlobalAutoUpdate: () => true,
  ...overrides,
});

describe('evaluateUpdate', () => {
  it('triggers once more than minTime has passed', () => {
    expect(evaluateUpdate(input({ now: 1001, lastUpdateTime: 0 }))).toEqual({ trigger: true, elapsed: 1001 });
  });

  it('throttles when exactly minTime has passed', () => {
    expect(evaluateUpdate(input({ now: 1000, lastUpdateTime: 0 }))).toEqual({
      trigger: false,
      elapsed: 1000,
      reason: 'throttled',
    });
  });

  it('converts minTime from seconds', () => {
    const decision = evaluateUpdate(input({ now: 2400, lastUpdateTime: 0, minTime: 2.5 }));
    expect(decision.trigger).toBe(false);
  });

  it('skips when the global flag is off', () => {
    const decision = evaluateUpdate(input({ readGlobalAutoUpdate: () => false }));
    expect(decision).toEqual({ trigger: false, elapsed: 10_000, reason: 'global-autoupdate-off' });
  });

  it('blocks non-forced updates when the override is false, without reading the global flag', () => {
    const readGlobalAutoUpdate = vi.fn(() => true);
    const decision = evaluateUpdate(input({ autoUpdate: false, readGlobalAutoUpdate }));

    expect(decision).toEqual({ trigger: false, elapsed: 10_000, reason: 'autoupdate-disabled' });
    expect(readGlobalAutoUpdate).not.toHaveBeenCalled();
  });

  it('treats an override of true like no override', () => {
    expect(evaluateUpdate(input({ autoUpdate: true, readGlobalAutoUpdate: () => false })).trigger).toBe(false);
    expect(evaluateUpdate(input({ autoUpdate: true, now: 500 })).trigger).toBe(false);
  });

  it('always triggers when forced', () => {
    expect(evaluateUpdate(input({ force: true, now: 1, lastUpdateTime: 1 })).trigger).toBe(true);
    expect(evaluateUpdate(input({ force: true, autoUpdate: false })).trigger).toBe(true);
    expect(evaluateUpdate(input({ force: true, readGlobalAutoUpdate: () => false })).trigger).toBe(true);
  });
});

describe('advanceLastUpdateTime', () => {
  it('moves forward with the clock', () => {
    expect(advanceLastUpdateTime(100, 250)).toBe(250);
  });

  it('never moves backwards', () => {
    expect(advanceLastUpdateTime(250, 100)).toBe(250);
  });
});
