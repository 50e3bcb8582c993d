/**
 * Tests for the provider registry.
 */

import { describe, it, expect } from 'vitest';
import { ProviderRegistry } from '../../src/utils/provider-registry.js';
import { ConfigError } from '../../src/utils/errors.js';

describe('ProviderRegistry', () => {
  const registry = new ProviderRegistry<{ size: number }, string>('widget')
    .register('small', (opts) => `small:${opts.size}`)
    .register('large', (opts) => `large:${opts.size * 10}`);

  it('creates the provider registered under an id', () => {
    expect(registry.create('small', { size: 2 })).toBe('small:2');
    expect(registry.create('large', { size: 2 })).toBe('large:20');
  });

  it('lists ids in sorted order', () => {
    expect(registry.ids()).toEqual(['large', 'small']);
    expect(registry.has('small')).toBe(true);
    expect(registry.has('medium')).toBe(false);
  });

  it('throws ConfigError naming the known ids for an unknown id', () => {
    expect(() => registry.create('medium', { size: 1 })).toThrow(ConfigError);
    expect(() => registry.create('medium', { size: 1 })).toThrow(
      'Unknown widget provider: medium. Available: large, small',
    );
  });

  it('replaces a factory registered twice', () => {
    const r = new ProviderRegistry<void, number>('counter').register('a', () => 1).register('a', () => 2);

    expect(r.create('a', undefined)).toBe(2);
  });
});
