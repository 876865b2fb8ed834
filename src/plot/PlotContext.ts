import { createNamedRegistry } from '../core/createNamedRegistry';
import type { NamedRegistry } from '../core/createNamedRegistry';
import { createConfigStore } from '../config/createConfigStore';
import type { ConfigStore } from '../config/createConfigStore';
import type { Milliseconds } from '../config/types';
import type { Plot } from './Plot';

/**
 * Shared state for a set of plots, owned by the application root and passed
 * to every plot constructor.
 */
export interface PlotContext {
  readonly plots: NamedRegistry<Plot>;
  readonly config: ConfigStore;
  /** Wall clock used by the update throttle. */
  readonly now: () => Milliseconds;
}

export interface PlotContextInit {
  readonly config?: ConfigStore;
  readonly now?: () => Milliseconds;
}

export function createPlotContext(init: PlotContextInit = {}): PlotContext {
  return {
    plots: createNamedRegistry<Plot>('Plot'),
    config: init.config ?? createConfigStore(),
    now: init.now ?? Date.now,
  };
}
