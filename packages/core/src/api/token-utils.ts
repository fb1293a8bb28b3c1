import { bindingKey, toToken, token, type BindingKey, type Token, type TypeKey } from '../core/token.js';

export type TokenGroup<Shape> = { readonly [K in keyof Shape & string]: Token<Shape[K]> };

/**
 * Tokens for one feature, labelled `<prefix><Name>`.
 *
 * The value types come from the `Shape` type argument; only the names exist
 * at runtime.
 *
 * @example
 * ```typescript
 * const Cart = createTokenGroup<{ Repository: CartRepository; Service: CartService }>('Cart', [
 *   'Repository',
 *   'Service',
 * ]);
 * scope.lazily(Cart.Service, () => new CartService(scope.findRequired(Cart.Repository)));
 * ```
 */
export function createTokenGroup<Shape extends Record<string, unknown>>(
  prefix: string,
  names: ReadonlyArray<keyof Shape & string>
): TokenGroup<Shape> {
  const group: Record<string, Token> = {};
  for (const name of names) {
    group[name] = token(`${prefix}${name}`);
  }
  return Object.freeze(group) as TokenGroup<Shape>;
}

/**
 * Hub/binding key of `(type, tag)`, for use with `listenKey` and `notifyKey`.
 */
export function keyFor<T>(type: TypeKey<T>, options: { tag?: string } = {}): BindingKey {
  return bindingKey(toToken(type).id, options.tag);
}
