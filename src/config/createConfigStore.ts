import type { ConfigKey, ConfigValues } from './types';
import { resolveConfigValues } from './OptionResolver';

export type ConfigChangePayload = Readonly<{
  readonly key: ConfigKey;
  readonly value: ConfigValues[ConfigKey] | undefined;
}>;

type StoredValues = { -readonly [K in ConfigKey]?: ConfigValues[K] };

export type ConfigChangeListener = (payload: ConfigChangePayload) => void;

export interface ConfigStore {
  /** Returns the stored value, or `defaultValue` when the key was never set. */
  get<K extends ConfigKey>(key: K, defaultValue: ConfigValues[K]): ConfigValues[K];
  set<K extends ConfigKey>(key: K, value: ConfigValues[K]): void;
  /** Forgets a stored value so `get` falls back to its default again. */
  unset(key: ConfigKey): void;
  has(key: ConfigKey): boolean;
  on(eventName: 'change', listener: ConfigChangeListener): void;
  off(eventName: 'change', listener: ConfigChangeListener): void;
}

/**
 * Creates the settings store a `PlotContext` reads from.
 *
 * `initial` is sanitized with `resolveConfigValues`, so it may come straight
 * from `JSON.parse`.
 */
export function createConfigStore(initial?: unknown): ConfigStore {
  const values: StoredValues = { ...resolveConfigValues(initial) };
  const listeners = new Set<ConfigChangeListener>();

  const emit = (payload: ConfigChangePayload): void => {
    for (const listener of listeners) listener(payload);
  };

  return {
    get<K extends ConfigKey>(key: K, defaultValue: ConfigValues[K]): ConfigValues[K] {
      const value: ConfigValues[K] | undefined = values[key];
      return value ?? defaultValue;
    },
    set<K extends ConfigKey>(key: K, value: ConfigValues[K]): void {
      if (values[key] === value) return;
      values[key] = value;
      emit({ key, value });
    },
    unset(key) {
      if (values[key] === undefined) return;
      delete values[key];
      emit({ key, value: undefined });
    },
    has: (key) => values[key] !== undefined,
    on(_eventName, listener) {
      listeners.add(listener);
    },
    off(_eventName, listener) {
      listeners.delete(listener);
    },
  };
}
