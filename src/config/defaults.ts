import type { ConfigValues, ResolvedPlotOptions } from './types';

export const PLOT_NAME_PREFIX = 'plot';

export const AUTO_UPDATE_KEY = 'auto-update' as const satisfies keyof ConfigValues;

export const defaultPlotOptions = {
  name: '',
  maxPoints: 10000,
  maxTraces: 5,
  minTime: 1,
  autoUpdate: undefined,
} as const satisfies ResolvedPlotOptions;

export const defaultConfigValues = {
  'auto-update': true,
} as const satisfies ConfigValues;
