/**
 * Update policy - decides whether a plot redraw is due.
 *
 * Kept free of plot/renderer state so the decision can be tested on its own.
 * `Plot.update()` feeds it the current clock, the plot's throttle settings
 * and the global auto-update flag, and acts on the result.
 */

import type { Milliseconds, Seconds } from '../config/types';

export type UpdateSkipReason = 'autoupdate-disabled' | 'global-autoupdate-off' | 'throttled';

export type UpdateDecision =
  | Readonly<{ readonly trigger: true; readonly elapsed: Milliseconds }>
  | Readonly<{ readonly trigger: false; readonly elapsed: Milliseconds; readonly reason: UpdateSkipReason }>;

export interface UpdatePolicyInput {
  readonly force: boolean;
  readonly now: Milliseconds;
  readonly lastUpdateTime: Milliseconds;
  readonly minTime: Seconds;
  /** Per-plot override. Only an explicit `false` has an effect. */
  readonly autoUpdate: boolean | undefined;
  /**
   * Reads the global auto-update flag. Called lazily so a plot with its
   * override set to `false` never consults the configuration.
   */
  readonly readGlobalAutoUpdate: () => boolean;
}

/**
 * Evaluates the throttle, in this order:
 * 1. elapsed time since the last redraw
 * 2. explicit `autoUpdate === false` blocks any non-forced update
 * 3. the global flag is read
 * 4. trigger when forced, or when the global flag is on and more than
 *    `minTime` seconds have passed
 */
export function evaluateUpdate(input: UpdatePolicyInput): UpdateDecision {
  const elapsed = input.now - input.lastUpdateTime;

  if (!input.force && input.autoUpdate === false) {
    return { trigger: false, elapsed, reason: 'autoupdate-disabled' };
  }

  const globalAutoUpdate = input.readGlobalAutoUpdate();
  if (input.force || (globalAutoUpdate && elapsed > input.minTime * 1000)) {
    return { trigger: true, elapsed };
  }

  return { trigger: false, elapsed, reason: globalAutoUpdate ? 'throttled' : 'global-autoupdate-off' };
}

/**
 * Next value for `lastUpdateTime`. Never moves backwards, even if the
 * injected clock does.
 */
export function advanceLastUpdateTime(lastUpdateTime: Milliseconds, now: Milliseconds): Milliseconds {
  return now > lastUpdateTime ? now : lastUpdateTime;
}
