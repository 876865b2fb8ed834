import { describe, it, expect, vi } from 'vitest';
import { createNamedRegistry } from '../createNamedRegistry';
import { DuplicateNameError, NotFoundError } from '../errors';

describe('createNamedRegistry - names', () => {
  it('hands out prefix0, prefix1, ... in order', () => {
    const registry = createNamedRegistry<string>();
    expect(registry.newUniqueName('plot')).toBe('plot0');
    expect(registry.newUniqueName('plot')).toBe('plot1');
    expect(registry.newUniqueName('plot')).toBe('plot2');
  });

  it('keeps a separate counter per prefix', () => {
    const registry = createNamedRegistry<string>();
    expect(registry.newUniqueName('plot')).toBe('plot0');
    expect(registry.newUniqueName('data')).toBe('data0');
    expect(registry.newUniqueName('plot')).toBe('plot1');
  });

  it('skips names that were registered explicitly', () => {
    const registry = createNamedRegistry<string>();
    registry.register('plot0', 'a');
    registry.register('plot1', 'b');
    expect(registry.newUniqueName('plot')).toBe('plot2');
  });

  it('peeks at the next name without handing it out', () => {
    const registry = createNamedRegistry<string>();
    expect(registry.peekUniqueName('plot')).toBe('plot0');
    expect(registry.peekUniqueName('plot')).toBe('plot0');
    expect(registry.newUniqueName('plot')).toBe('plot0');
    registry.register('plot1', 'a');
    expect(registry.peekUniqueName('plot')).toBe('plot2');
  });
});

describe('createNamedRegistry - register/lookup', () => {
  it('looks up a registered item', () => {
    const registry = createNamedRegistry<{ id: number }>('Plot');
    const item = { id: 7 };
    registry.register('iv', item);

    expect(registry.lookup('iv')).toBe(item);
    expect(registry.has('iv')).toBe(true);
    expect(registry.size).toBe(1);
    expect(registry.names()).toEqual(['iv']);
    expect(registry.values()).toEqual([item]);
  });

  it('throws NotFoundError for unknown names', () => {
    const registry = createNamedRegistry<number>('Plot');
    expect(() => registry.lookup('missing')).toThrow(NotFoundError);
    expect(() => registry.lookup('missing')).toThrow("Plot 'missing' not found.");
  });

  it('throws DuplicateNameError when a name is taken', () => {
    const registry = createNamedRegistry<number>('Plot');
    registry.register('iv', 1);
    expect(() => registry.register('iv', 2)).toThrow(DuplicateNameError);
    expect(registry.lookup('iv')).toBe(1);
  });

  it('removes items and reports whether anything was removed', () => {
    const registry = createNamedRegistry<number>();
    registry.register('a', 1);

    expect(registry.remove('a')).toBe(true);
    expect(registry.remove('a')).toBe(false);
    expect(registry.has('a')).toBe(false);
    expect(registry.size).toBe(0);
  });
});

describe('createNamedRegistry - events', () => {
  it('emits item-added and item-removed', () => {
    const registry = createNamedRegistry<number>();
    const added = vi.fn();
    const removed = vi.fn();
    registry.on('item-added', added);
    registry.on('item-removed', removed);

    registry.register('a', 1);
    registry.remove('a');

    expect(added).toHaveBeenCalledWith({ name: 'a', item: 1 });
    expect(removed).toHaveBeenCalledWith({ name: 'a', item: 1 });
  });

  it('stops notifying after off()', () => {
    const registry = createNamedRegistry<number>();
    const added = vi.fn();
    registry.on('item-added', added);
    registry.off('item-added', added);

    registry.register('a', 1);

    expect(added).not.toHaveBeenCalled();
  });
});
