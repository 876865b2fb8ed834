import { DuplicateNameError, NotFoundError } from './errors';

export type NamedRegistryEventName = 'item-added' | 'item-removed';

export type NamedRegistryEventPayload<T> = Readonly<{
  readonly name: string;
  readonly item: T;
}>;

export type NamedRegistryListener<T> = (payload: NamedRegistryEventPayload<T>) => void;

export interface NamedRegistry<T> {
  /** Human-readable kind used in error messages (e.g. `Plot`). */
  readonly kind: string;
  readonly size: number;
  /**
   * Returns `<prefix><n>` for the lowest counter value not yet handed out for
   * that prefix, skipping names that are already registered.
   */
  newUniqueName(prefix: string): string;
  /** The name `newUniqueName(prefix)` would return now, without handing it out. */
  peekUniqueName(prefix: string): string;
  /** Throws `DuplicateNameError` when the name is taken. */
  register(name: string, item: T): void;
  /** Throws `NotFoundError` when nothing is registered under `name`. */
  lookup(name: string): T;
  has(name: string): boolean;
  remove(name: string): boolean;
  names(): string[];
  values(): T[];
  on(eventName: NamedRegistryEventName, listener: NamedRegistryListener<T>): void;
  off(eventName: NamedRegistryEventName, listener: NamedRegistryListener<T>): void;
}

type ListenerRegistry<T> = Readonly<Record<NamedRegistryEventName, Set<NamedRegistryListener<T>>>>;

export function createNamedRegistry<T>(kind = 'Item'): NamedRegistry<T> {
  const items = new Map<string, T>();
  const counters = new Map<string, number>();

  const listeners: ListenerRegistry<T> = {
    'item-added': new Set<NamedRegistryListener<T>>(),
    'item-removed': new Set<NamedRegistryListener<T>>(),
  };

  const emit = (eventName: NamedRegistryEventName, payload: NamedRegistryEventPayload<T>): void => {
    for (const listener of listeners[eventName]) listener(payload);
  };

  const nextCounter = (prefix: string): number => {
    let counter = counters.get(prefix) ?? 0;
    while (items.has(`${prefix}${counter}`)) counter++;
    return counter;
  };

  const newUniqueName: NamedRegistry<T>['newUniqueName'] = (prefix) => {
    const counter = nextCounter(prefix);
    counters.set(prefix, counter + 1);
    return `${prefix}${counter}`;
  };

  const register: NamedRegistry<T>['register'] = (name, item) => {
    if (items.has(name)) {
      throw new DuplicateNameError(name, kind);
    }
    items.set(name, item);
    emit('item-added', { name, item });
  };

  const lookup: NamedRegistry<T>['lookup'] = (name) => {
    const item = items.get(name);
    if (item === undefined) {
      throw new NotFoundError(name, kind);
    }
    return item;
  };

  const remove: NamedRegistry<T>['remove'] = (name) => {
    const item = items.get(name);
    if (item === undefined) return false;
    items.delete(name);
    emit('item-removed', { name, item });
    return true;
  };

  return {
    kind,
    get size() {
      return items.size;
    },
    newUniqueName,
    peekUniqueName: (prefix) => `${prefix}${nextCounter(prefix)}`,
    register,
    lookup,
    has: (name) => items.has(name),
    remove,
    names: () => Array.from(items.keys()),
    values: () => Array.from(items.values()),
    on(eventName, listener) {
      listeners[eventName].add(listener);
    },
    off(eventName, listener) {
      listeners[eventName].delete(listener);
    },
  };
}
