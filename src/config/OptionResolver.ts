import type { ConfigValues, PlotOptions, ResolvedPlotOptions } from './types';
import { defaultPlotOptions } from './defaults';

const resolveName = (name: unknown): string => {
  if (typeof name !== 'string') return defaultPlotOptions.name;
  return name.trim();
};

// Limits must be finite and >= 1 after flooring; anything else falls back.
const resolveLimit = (value: unknown, fallback: number): number => {
  if (typeof value !== 'number' || !Number.isFinite(value)) return fallback;
  const floored = Math.floor(value);
  return floored >= 1 ? floored : fallback;
};

const resolveMinTime = (value: unknown): number => {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    return defaultPlotOptions.minTime;
  }
  return value;
};

const resolveAutoUpdate = (value: unknown): boolean | undefined =>
  typeof value === 'boolean' ? value : undefined;

export function resolvePlotOptions(options: PlotOptions = {}): ResolvedPlotOptions {
  return {
    name: resolveName(options.name),
    maxPoints: resolveLimit(options.maxPoints, defaultPlotOptions.maxPoints),
    maxTraces: resolveLimit(options.maxTraces, defaultPlotOptions.maxTraces),
    minTime: resolveMinTime(options.minTime),
    autoUpdate: resolveAutoUpdate(options.autoUpdate),
  };
}

/**
 * Sanitizes settings from an untrusted source (a parsed settings file, for
 * instance). Unknown keys are dropped; keys with the wrong type are dropped
 * so the store's defaults apply to them.
 */
export function resolveConfigValues(input: unknown): Partial<ConfigValues> {
  if (input === null || typeof input !== 'object' || Array.isArray(input)) {
    return {};
  }

  if (!('auto-update' in input)) return {};
  const autoUpdate = input['auto-update'];
  return typeof autoUpdate === 'boolean' ? { 'auto-update': autoUpdate } : {};
}
