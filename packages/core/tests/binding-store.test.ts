import { describe, expect, it } from 'vitest';

import { BindingStore } from '../src/core/binding-store.js';
import { bindingKey, token } from '../src/core/token.js';

const ApiT = token('Api');
const CacheT = token('Cache');

describe('BindingStore', () => {
  it('keeps untagged and tagged slots apart', () => {
    const store = new BindingStore();

    expect(store.setInstance(ApiT.id, 'untagged')).toBeUndefined();
    expect(store.setInstance(ApiT.id, 'tagged', 'x')).toBeUndefined();

    expect(store.getInstance(ApiT.id)).toBe('untagged');
    expect(store.getInstance(ApiT.id, 'x')).toBe('tagged');
    expect(store.hasInstance(CacheT.id, 'x')).toBe(false);
    expect(store.getInstance(CacheT.id, 'x')).toBeUndefined();
    expect([...(store.tagsOf(ApiT.id) ?? [])]).toEqual(['x']);
    expect(store.bindingCount).toBe(2);
  });

  it('returns the binding it replaces', () => {
    const store = new BindingStore();
    store.setInstance(ApiT.id, 'first');

    expect(store.setInstance(ApiT.id, 'second')).toEqual({ type: ApiT.id, value: 'first' });
  });

  it('moves a tag to its new type and forgets the old one', () => {
    const store = new BindingStore();
    store.setInstance(ApiT.id, 'api', 'main');
    store.setUseCount(bindingKey(ApiT.id, 'main'), 3);

    const previous = store.setInstance(CacheT.id, 'cache', 'main');

    expect(previous).toEqual({ type: ApiT.id, tag: 'main', value: 'api' });
    expect(store.tagsOf(ApiT.id)).toBeUndefined();
    expect(store.getUseCount(bindingKey(ApiT.id, 'main'))).toBeUndefined();
    expect(store.getTagged('main')).toEqual({ type: CacheT.id, value: 'cache' });
  });

  it('removes instances by slot', () => {
    const store = new BindingStore();
    store.setInstance(ApiT.id, undefined);
    store.setInstance(ApiT.id, 'tagged', 'x');

    expect(store.hasInstance(ApiT.id)).toBe(true);
    expect(store.removeInstance(ApiT.id)).toEqual({ type: ApiT.id, value: undefined });
    expect(store.removeInstance(ApiT.id)).toBeUndefined();
    expect(store.removeInstance(CacheT.id, 'x')).toBeUndefined();
    expect(store.removeInstance(ApiT.id, 'x')).toEqual({ type: ApiT.id, tag: 'x', value: 'tagged' });
    expect(store.tagsOf(ApiT.id)).toBeUndefined();
  });

  it('enumerates untagged records before tagged ones', () => {
    const store = new BindingStore();
    store.setInstance(ApiT.id, 'tagged', 'x');
    store.setInstance(ApiT.id, 'untagged');

    expect([...store.records()]).toEqual([
      { type: ApiT.id, value: 'untagged' },
      { type: ApiT.id, tag: 'x', value: 'tagged' },
    ]);
  });

  it('tracks factories and use counts and clears everything', () => {
    const store = new BindingStore();
    const key = bindingKey(ApiT.id);
    const entry = { type: ApiT.id, factory: () => 'made', dependencies: [] };

    store.setFactory(key, entry);
    store.setUseCount(key, 0);
    store.setInstance(CacheT.id, 'cache');

    expect(store.getFactory(key)).toBe(entry);
    expect(store.factoryCount).toBe(1);
    expect([...store.factoryEntries()]).toEqual([[key, entry]]);
    expect(store.getUseCount(key)).toBe(0);

    store.clear();

    expect(store.factoryCount).toBe(0);
    expect(store.bindingCount).toBe(0);
    expect(store.getUseCount(key)).toBeUndefined();
    expect(store.removeFactory(key)).toBe(false);
  });
});
