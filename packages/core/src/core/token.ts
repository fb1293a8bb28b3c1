import { InvalidTokenError } from '../errors/errors.js';
import type { Constructor } from '../types/types.js';

/**
 * Branded type for canonical token identifiers.
 * Prevents accidental use of raw strings as token IDs.
 */
export type CanonicalId = string & { __brand: 'CanonicalId' };

/**
 * Phantom type brand for compile-time type safety.
 * Associates tokens with their bound value type without runtime overhead.
 */
declare const TOKEN_BRAND: unique symbol;

/**
 * Type-safe binding key.
 *
 * Tokens stand in for runtime type identity: every binding, factory, use count
 * and reactive channel is keyed by a token's canonical id.
 *
 * @template T - The type of value bound under this token
 */
export interface Token<T = unknown> {
  /** Discriminant for runtime type checking */
  readonly kind: 'token';

  /** Unique canonical identifier (tok_1, tok_2, etc.) */
  readonly id: CanonicalId;

  /** Human-readable label for logs and error messages */
  readonly label: string;

  /** Phantom type brand - associates token with its value type */
  readonly [TOKEN_BRAND]: T;
}

/**
 * Anything a scope accepts as a type: an explicit token or a class.
 */
export type TypeKey<T = unknown> = Token<T> | Constructor<T>;

/**
 * Global counter for generating unique token IDs.
 */
let _tokCounter = 0;

/**
 * Tokens minted for classes used directly as type keys. Computed once per
 * class, so the same constructor always maps to the same canonical id.
 */
const classTokens = new WeakMap<Constructor, Token>();

/**
 * Labels by canonical id, so stored bindings can be described without their token.
 */
const tokenLabels = new Map<CanonicalId, string>();

/**
 * Create a new type-safe binding token.
 *
 * @param label - Optional human-readable label (defaults to "Token")
 *
 * @example
 * ```typescript
 * const ApiClientT = token<ApiClient>('ApiClient');
 * scope.register(ApiClientT, new ApiClient());
 * ```
 */
export function token<T = unknown>(label?: string): Token<T> {
  const resolvedLabel = label ?? `Token`;
  const id = `tok_${++_tokCounter}` as CanonicalId;
  const t: Token<T> = Object.freeze({
    kind: 'token',
    id,
    label: resolvedLabel,
  }) as Token<T>;
  tokenLabels.set(id, resolvedLabel);
  return t;
}

/**
 * Runtime type guard to check if a value is a valid Token.
 */
export function isToken(x: unknown): x is Token<unknown> {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as Token).kind === 'token' &&
    typeof (x as Token).id === 'string' &&
    typeof (x as Token).label === 'string'
  );
}

/**
 * Return the token for a class, minting it on first use.
 */
export function tokenFor<T>(ctor: Constructor<T>): Token<T> {
  let t = classTokens.get(ctor);
  if (!t) {
    t = token<T>(ctor.name || 'AnonymousClass');
    classTokens.set(ctor, t);
  }
  return t as Token<T>;
}

/**
 * Normalize a type key to its token.
 *
 * @throws {InvalidTokenError} when the key is neither a token nor a class
 */
export function toToken<T>(key: TypeKey<T>): Token<T> {
  if (isToken(key)) return key as Token<T>;
  if (typeof key === 'function') return tokenFor(key);
  throw new InvalidTokenError(key);
}

/**
 * Composite key of a binding: `typeId` for the untagged slot, `typeId:tag` for
 * a tagged one. Factories, use counts and reactive channels share this shape.
 */
export type BindingKey = string & { __brand: 'BindingKey' };

export function bindingKey(typeId: CanonicalId, tag?: string): BindingKey {
  return (tag !== undefined ? `${typeId}:${tag}` : typeId) as BindingKey;
}

/**
 * Human-readable form of a type key and optional tag, for logs and errors.
 */
export function describeKey(t: Token, tag?: string): string {
  return tag !== undefined ? `${t.label}(${tag})` : t.label;
}

/**
 * Same as {@link describeKey}, from a canonical id.
 */
export function describeBinding(typeId: CanonicalId, tag?: string): string {
  const label = tokenLabels.get(typeId) ?? typeId;
  return tag !== undefined ? `${label}(${tag})` : label;
}
