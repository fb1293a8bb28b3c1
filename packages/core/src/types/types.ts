/**
 * Generic constructor signature. Classes may be used directly as type keys.
 *
 * @template T - Type produced by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * Zero-argument producer registered with `lazily()` or `putFactory()`.
 */
export type Factory<T> = () => T;

/**
 * Shape of a value that exposes a disposal hook.
 *
 * Scopes dispose such values when they are replaced, deleted, cleared or when
 * the scope itself is disposed. `close()` is honored when `dispose()` is absent.
 */
export interface Disposable {
  dispose?: () => void;
  close?: () => void;
  /** When `true`, the value is treated as already disposed and skipped. */
  readonly isDisposed?: boolean;
}

export interface TagOptions {
  tag?: string;
}

export interface RegisterOptions extends TagOptions {
  /** Permanent bindings survive force-less deletion and `clearAll()`. */
  permanent?: boolean;
  /** Instances this one declares as dependencies; used for cycle detection only. */
  dependencies?: readonly unknown[];
}

export interface LazyOptions extends RegisterOptions {
  /** Re-invoke the factory on every lookup instead of caching the first result. */
  alwaysNew?: boolean;
}

export interface DeleteOptions extends TagOptions {
  force?: boolean;
}

/**
 * Use-count sentinels stored alongside ordinary reference counts.
 *
 *   - `USE_COUNT_PERMANENT` (-1): never removed without `force`
 *   - `USE_COUNT_ALWAYS_NEW` (-2): binding is an always-new factory
 *   - any value >= 0: reference count maintained by callers
 */
export const USE_COUNT_PERMANENT = -1;
export const USE_COUNT_ALWAYS_NEW = -2;

/**
 * Check whether a value exposes a disposal hook and has not been disposed yet.
 */
export function isDisposable(value: unknown): value is Disposable {
  if (value === null || (typeof value !== 'object' && typeof value !== 'function')) return false;
  const candidate = value as Disposable;
  if (candidate.isDisposed === true) return false;
  return typeof candidate.dispose === 'function' || typeof candidate.close === 'function';
}

/**
 * Run a value's disposal hook (`dispose()` first, `close()` otherwise).
 */
export function disposeValue(value: Disposable): void {
  const disposeFn = value.dispose ?? value.close;
  disposeFn?.call(value);
}
