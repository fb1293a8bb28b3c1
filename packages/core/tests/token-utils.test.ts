import { describe, expect, it, vi } from 'vitest';

import { createTokenGroup, keyFor } from '../src/api/token-utils.js';
import { Scope } from '../src/core/scope.js';
import { token, type Token } from '../src/core/token.js';
import { ReactiveHub } from '../src/reactive/reactive-hub.js';
import { createTestRuntime } from './support/runtime.js';

class CartRepository {}
class CartService {
  constructor(readonly repository: CartRepository) {}
}

describe('createTokenGroup', () => {
  it('creates one labelled token per name', () => {
    const Cart = createTokenGroup<{ Repository: CartRepository; Service: CartService }>('Cart', [
      'Repository',
      'Service',
    ]);

    expect(Cart.Repository.label).toBe('CartRepository');
    expect(Cart.Service.label).toBe('CartService');
    expect(Cart.Repository.id).not.toBe(Cart.Service.id);
    expect(Object.isFrozen(Cart)).toBe(true);

    const typed: Token<CartService> = Cart.Service;
    expect(typed.kind).toBe('token');
  });

  it('works as scope keys', () => {
    const { runtime } = createTestRuntime();
    const scope = new Scope({ name: 'root', runtime });
    const Cart = createTokenGroup<{ Repository: CartRepository; Service: CartService }>('Cart', [
      'Repository',
      'Service',
    ]);
    const repository = new CartRepository();

    scope.register(Cart.Repository, repository);
    scope.lazily(Cart.Service, () => new CartService(scope.findRequired(Cart.Repository)));

    expect(scope.findRequired(Cart.Service).repository).toBe(repository);
  });

  it('returns an empty group for no names', () => {
    expect(Object.keys(createTokenGroup('Empty', []))).toEqual([]);
  });
});

describe('keyFor', () => {
  it('builds the untagged and tagged binding keys', () => {
    const CountT = token<number>('Count');

    expect(keyFor(CountT)).toBe(CountT.id);
    expect(keyFor(CountT, { tag: 'x' })).toBe(`${CountT.id}:x`);
  });

  it('maps a class to the key of its token', () => {
    expect(keyFor(CartRepository)).toBe(keyFor(CartRepository));
    expect(keyFor(CartRepository)).not.toBe(keyFor(CartService));
  });

  it('addresses typed listeners through the raw-key api', () => {
    const CountT = token<number>('Count');
    const hub = new ReactiveHub(() => undefined);
    const listener = vi.fn();

    hub.listen(CountT, listener, { tag: 'x' });
    hub.notifyKey(keyFor(CountT, { tag: 'x' }));

    expect(listener).toHaveBeenCalledTimes(2);
  });
});
