/**
 * Stable integer handle assigned to a registered instance.
 */
export type Handle = number & { __brand: 'Handle' };

/**
 * Typed arena that gives each instance a stable integer handle.
 *
 * Dependency graphs store edges between handles rather than between the
 * instances themselves, so cycle detection only ever compares integers.
 * Objects are held weakly; primitive values (strings, numbers) are interned
 * by value, matching how they compare as map keys.
 *
 * One arena is shared by every scope of a runtime so that edges crossing
 * scope boundaries resolve to the same handles.
 */
export class HandleArena {
  private nextHandle = 0;
  private readonly objects = new WeakMap<object, Handle>();
  private readonly primitives = new Map<unknown, Handle>();

  /**
   * Handle for `value`, assigned on first request.
   */
  handleOf(value: unknown): Handle {
    const existing = this.peek(value);
    if (existing !== undefined) return existing;

    const handle = ++this.nextHandle as Handle;
    if (isObjectLike(value)) {
      this.objects.set(value, handle);
    } else {
      this.primitives.set(value, handle);
    }
    return handle;
  }

  /**
   * Handle for `value` if one was assigned, without assigning a new one.
   */
  peek(value: unknown): Handle | undefined {
    return isObjectLike(value) ? this.objects.get(value) : this.primitives.get(value);
  }

  /** Number of handles issued so far. */
  get issued(): number {
    return this.nextHandle;
  }
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}
