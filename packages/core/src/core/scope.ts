/* Scope
 *
 * A node in the hierarchical instance-lifetime tree. A scope stores typed and
 * tagged bindings, pending factories, use counts, declared dependencies,
 * custom disposers and the child scopes it owns.
 *
 * Resolution:
 *  - find() looks in this scope first and then walks up the parent chain.
 *    A child's own binding always shadows the parent's; a child lookup never
 *    mutates the parent's bindings.
 *  - Tagged slots are keyed by tag. A tag is unique within a scope and only
 *    matches lookups for the type it was registered under.
 *
 * Lazy materialization is a side effect of lookup:
 *  - find() and findInThisScope() are NOT pure reads. Resolving a key whose
 *    only local entry is a lazy factory runs the factory, caches the result
 *    as an ordinary binding and discards the factory. Always-new factories
 *    (putFactory) run on every lookup and are never cached.
 *  - A factory that throws leaves the scope unchanged, so the lookup can be
 *    retried.
 *
 * Use counts (per binding key):
 *  - -1 marks a permanent binding: delete() refuses it unless `force` is set
 *  - -2 marks an always-new factory
 *  - values >= 0 are reference counts owned by callers; increment/decrement
 *    delegate to the ancestor that holds the binding and never go below 0
 *
 * Disposal:
 *  - dispose() is idempotent. It runs disposers in registration order (errors
 *    are logged, the rest still run), disposes every disposable binding once,
 *    disposes a snapshot of the children depth-first, clears every map and
 *    detaches from the parent.
 *  - Mutating calls on a disposed scope throw ScopeDisposedError; lookups
 *    return undefined and delete() returns false.
 *
 * Usage example:
 * ```typescript
 * const ApiT = token<ApiClient>('ApiClient');
 * const CartT = token<CartService>('CartService');
 *
 * const root = new Scope({ name: 'Root' });
 * root.register(ApiT, new ApiClient(), { permanent: true });
 *
 * const checkout = root.createChild('Checkout');
 * checkout.lazily(CartT, () => new CartService(checkout.findRequired(ApiT)));
 *
 * checkout.find(CartT); // factory runs here, once
 * checkout.dispose();   // CartService.dispose() runs, ApiClient stays
 * ```
 */

import { CircularDependencyError, DependencyNotFoundError, InvalidFactoryOptionsError, ScopeDisposedError } from '../errors/errors.js';
import type { Logger } from '../logging/logger.js';
import {
  disposeValue,
  isDisposable,
  USE_COUNT_ALWAYS_NEW,
  USE_COUNT_PERMANENT,
  type DeleteOptions,
  type Factory,
  type LazyOptions,
  type RegisterOptions,
  type TagOptions,
} from '../types/types.js';
import { BindingStore, type BindingRecord, type FactoryEntry } from './binding-store.js';
import { DependencyGraph, detectCycles } from './dependency-graph.js';
import { createRuntime, type ScopeRuntime } from './runtime.js';
import { bindingKey, describeBinding, describeKey, toToken, type BindingKey, type CanonicalId, type Token, type TypeKey } from './token.js';

export interface ScopeOptions {
  name?: string;
  /** Defaults to `<name>-<n>` (or `scope-<n>`). */
  id?: string;
  parent?: Scope;
  /** Ignored when `parent` is given: children always share the parent's runtime. */
  runtime?: ScopeRuntime;
}

export interface BindingInfo {
  type: CanonicalId;
  /** Label of the type, without the tag. */
  label: string;
  tag?: string;
  value: unknown;
}

export interface ScopeStats {
  bindings: number;
  factories: number;
  children: number;
  disposers: number;
  declaredDependencyNodes: number;
}

type LocalLookup<T> = { found: true; value: T } | { found: false };

const NOT_FOUND: LocalLookup<never> = { found: false };

let _scopeCounter = 0;

export class Scope {
  readonly id: string;
  readonly name: string | undefined;
  readonly parent: Scope | undefined;
  readonly runtime: ScopeRuntime;

  private disposed = false;

  /** Set while dispose() runs so re-entrant calls are no-ops. */
  private disposing = false;

  private readonly store = new BindingStore();
  private readonly graph: DependencyGraph;
  private readonly children: Scope[] = [];
  private readonly disposers: Array<() => void> = [];

  /** Binding keys whose factory is currently running, for re-entrancy detection. */
  private readonly materializing = new Set<BindingKey>();

  private readonly logger: Logger;

  constructor(options: ScopeOptions = {}) {
    const { parent } = options;
    if (parent?.isDisposed) {
      throw new ScopeDisposedError(parent.displayName, 'createChild');
    }

    this.parent = parent;
    this.name = options.name;
    this.id = options.id ?? `${options.name ?? 'scope'}-${++_scopeCounter}`;
    this.runtime = parent?.runtime ?? options.runtime ?? createRuntime();
    this.logger = this.runtime.logger;
    this.graph = new DependencyGraph(this.runtime.arena);

    parent?.children.push(this);

    this.runtime.metrics.record('scopesCreated');
    this.logger.debug(`Created scope: ${this.displayName} (id: ${this.id})`);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Name when given, id otherwise. Used in logs and errors. */
  get displayName(): string {
    return this.name ?? this.id;
  }

  /** Snapshot of the owned child scopes. */
  get childScopes(): readonly Scope[] {
    return [...this.children];
  }

  // ---------- registration ----------

  /**
   * Bind `instance` under `type`, or under `options.tag` when given.
   *
   * An existing binding in the same slot is replaced, and disposed when it
   * exposes a disposal hook. With declared `dependencies` and cycle checking
   * enabled, a registration that would close a cycle is rejected before
   * anything changes.
   *
   * @throws {ScopeDisposedError} if the scope has been disposed
   * @throws {CircularDependencyError} if the declared dependencies form a cycle
   */
  register<T>(type: TypeKey<T>, instance: T, options: RegisterOptions = {}): T {
    this.assertActive('register');
    const t = toToken(type);
    const { tag, permanent = false, dependencies = [] } = options;
    const key = bindingKey(t.id, tag);

    if (dependencies.length > 0) {
      const previous = this.graph.declare(instance, dependencies);
      if (this.runtime.config.checkForCircularDependencies && this.detectCycles(instance)) {
        this.graph.restore(instance, previous);
        throw new CircularDependencyError(describeKey(t, tag), this.displayName);
      }
    }

    this.releaseTag(t.id, tag, instance);
    const replaced = this.store.setInstance(t.id, instance, tag);
    this.store.removeFactory(key);
    this.store.setUseCount(key, permanent ? USE_COUNT_PERMANENT : 0);

    if (replaced && replaced.value !== instance) this.evict(replaced);

    this.runtime.metrics.record('registrations');
    this.logger.debug(
      `Registered ${describeKey(t, tag)} in '${this.displayName}' (${permanent ? 'permanent' : 'temporary'})`
    );
    return instance;
  }

  /** Alias of {@link register}. */
  put<T>(type: TypeKey<T>, instance: T, options: RegisterOptions = {}): T {
    return this.register(type, instance, options);
  }

  /**
   * Register a factory for later materialization. Nothing runs now.
   *
   * - default: lazy singleton, cached on first lookup, factory then removed
   * - `alwaysNew`: invoked on every lookup, never cached
   * - `permanent`: the materialized binding is permanent
   *
   * @throws {InvalidFactoryOptionsError} when both `permanent` and `alwaysNew` are set
   * @throws {ScopeDisposedError} if the scope has been disposed
   */
  putLazy<T>(type: TypeKey<T>, factory: Factory<T>, options: LazyOptions = {}): void {
    this.assertActive('putLazy');
    const t = toToken(type);
    const { tag, permanent = false, alwaysNew = false, dependencies = [] } = options;

    if (permanent && alwaysNew) {
      throw new InvalidFactoryOptionsError(describeKey(t, tag));
    }

    const key = bindingKey(t.id, tag);
    this.releaseTag(t.id, tag);
    this.store.setFactory(key, { type: t.id, tag, factory, dependencies });
    this.store.setUseCount(key, alwaysNew ? USE_COUNT_ALWAYS_NEW : permanent ? USE_COUNT_PERMANENT : 0);

    const behavior = alwaysNew ? 'factory (always new)' : permanent ? 'permanent singleton' : 'temporary singleton';
    this.logger.debug(`Registered lazy ${behavior} for ${describeKey(t, tag)} in '${this.displayName}'`);
  }

  /**
   * Register a lazy singleton: the factory runs on the first lookup only.
   */
  lazily<T>(type: TypeKey<T>, factory: Factory<T>, options: RegisterOptions = {}): void {
    this.putLazy(type, factory, { ...options, alwaysNew: false });
  }

  /**
   * Register an always-new factory: every lookup returns a fresh instance.
   */
  putFactory<T>(type: TypeKey<T>, factory: Factory<T>, options: TagOptions = {}): void {
    this.putLazy(type, factory, { tag: options.tag, alwaysNew: true });
  }

  /**
   * Register a cleanup callback run (in registration order) when this scope
   * is disposed.
   *
   * @throws {ScopeDisposedError} if the scope has been disposed
   */
  registerDisposer(disposer: () => void): void {
    this.assertActive('registerDisposer');
    this.disposers.push(disposer);
    this.logger.debug(`Registered disposer in scope: ${this.displayName}`);
  }

  // ---------- lookup ----------

  /**
   * Resolve `type` (and tag) in this scope, then in each ancestor.
   *
   * May run a lazy factory; see the module notes.
   */
  find<T>(type: TypeKey<T>, options: TagOptions = {}): T | undefined {
    if (this.disposed) return undefined;
    const t = toToken(type);
    const local = this.lookupLocal(t, options.tag);
    if (local.found) return local.value;
    return this.parent?.find(t, options);
  }

  /**
   * Resolve only against this scope's own bindings and factories.
   *
   * May run a lazy factory; never consults the parent.
   */
  findInThisScope<T>(type: TypeKey<T>, options: TagOptions = {}): T | undefined {
    if (this.disposed) return undefined;
    const local = this.lookupLocal(toToken(type), options.tag);
    return local.found ? local.value : undefined;
  }

  /**
   * Like {@link find}, but throws when nothing is bound.
   *
   * @throws {DependencyNotFoundError}
   */
  findRequired<T>(type: TypeKey<T>, options: TagOptions = {}): T {
    const t = toToken(type);
    const local = this.disposed ? NOT_FOUND : this.lookupLocal(t, options.tag);
    if (local.found) return local.value;
    if (this.parent && !this.disposed && this.parent.exists(t, options)) {
      return this.parent.findRequired(t, options);
    }
    throw new DependencyNotFoundError(t.label, options.tag, this.displayName);
  }

  /**
   * Whether `type` (and tag) resolves anywhere in the chain, as an instance
   * or a pending factory. Does not run factories.
   */
  exists<T>(type: TypeKey<T>, options: TagOptions = {}): boolean {
    if (this.disposed) return false;
    const t = toToken(type);
    if (this.contains(t, options)) return true;
    return this.parent?.exists(t, options) ?? false;
  }

  /** Alias of {@link exists}. */
  has<T>(type: TypeKey<T>, options: TagOptions = {}): boolean {
    return this.exists(type, options);
  }

  /**
   * Whether this scope itself holds an instance or a pending factory for
   * `type` (and tag).
   */
  contains<T>(type: TypeKey<T>, options: TagOptions = {}): boolean {
    if (this.disposed) return false;
    const t = toToken(type);
    return (
      this.store.hasInstance(t.id, options.tag) ||
      this.store.getFactory(bindingKey(t.id, options.tag)) !== undefined
    );
  }

  /**
   * Every instance bound under `type` (untagged and tagged) in this scope and
   * its descendants, without duplicates. Pending factories are not run.
   */
  findAllOfType<T>(type: TypeKey<T>): T[] {
    if (this.disposed) return [];
    const t = toToken(type);
    const result: T[] = [];
    const seen = new Set<unknown>();
    const add = (value: T): void => {
      if (seen.has(value)) return;
      seen.add(value);
      result.push(value);
    };

    const untagged = this.lookupInstance(t);
    if (untagged.found) add(untagged.value);
    for (const tag of this.store.tagsOf(t.id) ?? []) {
      const tagged = this.lookupInstance(t, tag);
      if (tagged.found) add(tagged.value);
    }
    for (const child of this.children) {
      for (const value of child.findAllOfType(t)) add(value);
    }
    return result;
  }

  // ---------- deletion ----------

  /**
   * Remove a binding and any pending factory for `type` (and tag).
   *
   * Permanent bindings are kept unless `force` is set: the call then logs a
   * warning and returns false without side effects. A removed value that
   * exposes a disposal hook is disposed.
   *
   * @returns true when something was removed
   */
  delete<T>(type: TypeKey<T>, options: DeleteOptions = {}): boolean {
    if (this.disposed) return false;
    const t = toToken(type);
    return this.deleteBinding(t.id, describeKey(t, options.tag), options.tag, options.force ?? false);
  }

  /** Alias of {@link delete}. */
  remove<T>(type: TypeKey<T>, options: DeleteOptions = {}): boolean {
    return this.delete(type, options);
  }

  /**
   * Remove whatever is bound (or pending) under `tag`, whatever its type.
   */
  deleteByTag(tag: string, options: { force?: boolean } = {}): boolean {
    if (this.disposed) return false;
    const force = options.force ?? false;

    const tagged = this.store.getTagged(tag);
    if (tagged) return this.deleteBinding(tagged.type, describeBinding(tagged.type, tag), tag, force);

    for (const [, entry] of this.store.factoryEntries()) {
      if (entry.tag === tag) return this.deleteBinding(entry.type, describeBinding(entry.type, tag), tag, force);
    }
    return false;
  }

  /**
   * Remove the untagged binding of a type known only at runtime.
   */
  deleteByType(type: TypeKey, options: { force?: boolean } = {}): boolean {
    if (this.disposed) return false;
    const t = toToken(type);
    return this.deleteBinding(t.id, describeKey(t), undefined, options.force ?? false);
  }

  /**
   * Remove (and dispose) every binding and pending factory, keeping permanent
   * ones unless `force` is set. Disposal errors are logged.
   */
  clearAll(options: { force?: boolean } = {}): void {
    if (this.disposed) return;
    const force = options.force ?? false;

    for (const record of Array.from(this.store.records())) {
      const key = bindingKey(record.type, record.tag);
      if (!force && this.store.getUseCount(key) === USE_COUNT_PERMANENT) continue;
      this.store.removeInstance(record.type, record.tag);
      this.store.removeUseCount(key);
      this.graph.remove(record.value);
      this.disposeBinding(record.value, describeBinding(record.type, record.tag));
    }

    for (const [key] of Array.from(this.store.factoryEntries())) {
      if (!force && this.store.getUseCount(key) === USE_COUNT_PERMANENT) continue;
      this.store.removeFactory(key);
      this.store.removeUseCount(key);
    }

    this.logger.debug(`Cleared all dependencies from scope: ${this.displayName}`);
  }

  // ---------- use counts ----------

  /**
   * Increment the reference count of a binding held here or in an ancestor.
   *
   * @returns the new count; the sentinel for permanent or always-new
   * bindings (unchanged); 0 when nothing is bound in the chain
   * @throws {ScopeDisposedError} if the scope has been disposed
   */
  incrementUseCount<T>(type: TypeKey<T>, options: TagOptions = {}): number {
    this.assertActive('incrementUseCount');
    return this.adjustUseCount(toToken(type), options.tag, 1);
  }

  /**
   * Decrement the reference count of a binding held here or in an ancestor.
   * Never goes below 0.
   *
   * @throws {ScopeDisposedError} if the scope has been disposed
   */
  decrementUseCount<T>(type: TypeKey<T>, options: TagOptions = {}): number {
    this.assertActive('decrementUseCount');
    return this.adjustUseCount(toToken(type), options.tag, -1);
  }

  /**
   * Current use count of the nearest binding in the chain, or undefined when
   * nothing is bound.
   */
  getUseCount<T>(type: TypeKey<T>, options: TagOptions = {}): number | undefined {
    if (this.disposed) return undefined;
    const t = toToken(type);
    if (this.contains(t, options)) return this.store.getUseCount(bindingKey(t.id, options.tag));
    return this.parent?.getUseCount(t, options);
  }

  /** Whether this scope holds a permanent binding for `type` (and tag). */
  isPermanent<T>(type: TypeKey<T>, options: TagOptions = {}): boolean {
    if (this.disposed) return false;
    const t = toToken(type);
    return this.store.getUseCount(bindingKey(t.id, options.tag)) === USE_COUNT_PERMANENT;
  }

  /**
   * Set every ordinary use count of this scope back to 0. The permanent and
   * always-new sentinels are kept.
   */
  resetUseCounts(): void {
    if (this.disposed) return;
    for (const [key, count] of Array.from(this.store.useCountEntries())) {
      if (count > 0) this.store.setUseCount(key, 0);
    }
  }

  // ---------- dependency graph ----------

  /**
   * Whether `start` reaches itself through declared dependencies recorded in
   * this scope or its ancestors. Conservative: failures count as cycles.
   */
  detectCycles(start: unknown): boolean {
    return detectCycles(start, this.graphChain(), this.runtime.arena, this.logger);
  }

  /** Declared dependencies of `instance` recorded in this scope. */
  getDependenciesOf(instance: unknown): unknown[] {
    if (this.disposed) return [];
    return this.graph.dependenciesOf(instance);
  }

  /** @internal Graph used by the scope manager's tree-wide cycle check. */
  get dependencyGraph(): DependencyGraph {
    return this.graph;
  }

  // ---------- introspection ----------

  /** Instances bound in this scope with their type label and tag. */
  getBindings(): BindingInfo[] {
    if (this.disposed) return [];
    return Array.from(this.store.records(), (record) => ({
      type: record.type,
      label: describeBinding(record.type),
      tag: record.tag,
      value: record.value,
    }));
  }

  /** All bound instances of this scope (untagged first, then tagged). */
  getAllDependencies(): unknown[] {
    if (this.disposed) return [];
    return Array.from(this.store.records(), (record) => record.value);
  }

  getTagForInstance(instance: unknown): string | undefined {
    if (this.disposed) return undefined;
    for (const record of this.store.records()) {
      if (record.tag !== undefined && record.value === instance) return record.tag;
    }
    return undefined;
  }

  /** Whether `instance` is bound in this scope or any descendant. */
  containsInstance(instance: unknown): boolean {
    if (this.disposed) return false;
    for (const record of this.store.records()) {
      if (record.value === instance) return true;
    }
    return this.children.some((child) => child.containsInstance(instance));
  }

  getStats(): ScopeStats {
    return {
      bindings: this.store.bindingCount,
      factories: this.store.factoryCount,
      children: this.children.length,
      disposers: this.disposers.length,
      declaredDependencyNodes: this.graph.size,
    };
  }

  // ---------- tree ----------

  createChild(name?: string): Scope {
    return new Scope({ name, parent: this });
  }

  /**
   * Dispose this scope and everything it owns. Idempotent.
   */
  dispose(): void {
    if (this.disposed || this.disposing) return;
    this.disposing = true;
    this.logger.debug(`Disposing scope: ${this.displayName}`);

    for (const disposer of this.disposers) {
      try {
        disposer();
      } catch (error) {
        this.logger.warn(`Error executing disposer in scope '${this.displayName}'`, error);
      }
    }

    const seen = new Set<unknown>();
    for (const record of Array.from(this.store.records())) {
      if (seen.has(record.value)) continue;
      seen.add(record.value);
      this.disposeBinding(record.value, describeBinding(record.type, record.tag));
    }

    for (const child of [...this.children]) {
      child.dispose();
    }

    this.store.clear();
    this.graph.clear();
    this.children.length = 0;
    this.disposers.length = 0;
    this.materializing.clear();

    if (this.parent) {
      const index = this.parent.children.indexOf(this);
      if (index >= 0) this.parent.children.splice(index, 1);
    }

    this.disposed = true;
    this.runtime.metrics.record('scopesDisposed');
  }

  toString(): string {
    return (
      `Scope{name: ${this.name ?? 'none'}, id: ${this.id}, disposed: ${this.disposed}, ` +
      `dependencies: ${this.store.bindingCount}, lazy dependencies: ${this.store.factoryCount}, ` +
      `children: ${this.children.length}}`
    );
  }

  // ---------- internals ----------

  private assertActive(operation: string): void {
    if (this.disposed || this.disposing) throw new ScopeDisposedError(this.displayName, operation);
  }

  /**
   * A tag holds one binding per scope. Drop the instance or pending factory
   * another type keeps under `tag` before `type` takes it. The incoming
   * value itself is unlinked but never disposed.
   */
  private releaseTag(type: CanonicalId, tag: string | undefined, incoming?: unknown): void {
    if (tag === undefined) return;

    for (const [key, entry] of Array.from(this.store.factoryEntries())) {
      if (entry.tag !== tag || entry.type === type) continue;
      this.store.removeFactory(key);
      this.store.removeUseCount(key);
      this.logger.warn(
        `Replacing existing dependency ${describeBinding(entry.type, tag)} in scope '${this.displayName}'`
      );
    }

    const held = this.store.getTagged(tag);
    if (held && held.type !== type) {
      const removed = this.store.removeInstance(held.type, tag);
      this.store.removeUseCount(bindingKey(held.type, tag));
      if (removed && (incoming === undefined || removed.value !== incoming)) this.evict(removed);
    }
  }

  /** Warn about, unlink and dispose a binding that lost its slot. */
  private evict(record: BindingRecord): void {
    const label = describeBinding(record.type, record.tag);
    this.logger.warn(`Replacing existing dependency ${label} in scope '${this.displayName}'`);
    this.graph.remove(record.value);
    this.disposeBinding(record.value, label);
  }

  private lookupInstance<T>(t: Token<T>, tag?: string): LocalLookup<T> {
    if (!this.store.hasInstance(t.id, tag)) return NOT_FOUND;
    return { found: true, value: this.store.getInstance(t.id, tag) as T };
  }

  private lookupLocal<T>(t: Token<T>, tag?: string): LocalLookup<T> {
    const existing = this.lookupInstance(t, tag);
    if (existing.found) {
      this.runtime.metrics.record('resolutions');
      return existing;
    }

    const key = bindingKey(t.id, tag);
    const entry = this.store.getFactory(key);
    if (!entry) return NOT_FOUND;

    this.runtime.metrics.record('resolutions');
    return { found: true, value: this.materialize(t, key, entry) as T };
  }

  private materialize(t: Token, key: BindingKey, entry: FactoryEntry): unknown {
    if (this.materializing.has(key)) {
      throw new CircularDependencyError(describeKey(t, entry.tag), this.displayName);
    }

    this.materializing.add(key);
    let value: unknown;
    try {
      value = entry.factory();
    } finally {
      this.materializing.delete(key);
    }
    this.runtime.metrics.record('factoryInvocations');

    const alwaysNew = this.store.getUseCount(key) === USE_COUNT_ALWAYS_NEW;
    if (!alwaysNew && this.store.getFactory(key) === entry) {
      const replaced = this.store.setInstance(entry.type, value, entry.tag);
      this.store.removeFactory(key);
      if (replaced && replaced.value !== value) this.evict(replaced);
      if (entry.dependencies.length > 0) this.graph.declare(value, entry.dependencies);
      this.runtime.metrics.record('lazyMaterializations');
    }

    this.logger.debug(
      `Created ${alwaysNew ? 'factory' : 'lazy'} instance for ${describeKey(t, entry.tag)} in '${this.displayName}'`
    );
    return value;
  }

  private deleteBinding(type: CanonicalId, label: string, tag: string | undefined, force: boolean): boolean {
    const key = bindingKey(type, tag);

    if (this.store.getUseCount(key) === USE_COUNT_PERMANENT && !force) {
      this.logger.warn(`Attempted to delete permanent dependency ${label}. Use force=true to override.`);
      return false;
    }

    const hadFactory = this.store.removeFactory(key);
    const removed = this.store.removeInstance(type, tag);
    if (!hadFactory && !removed) return false;

    this.store.removeUseCount(key);
    if (removed) {
      this.graph.remove(removed.value);
      this.disposeBinding(removed.value, label);
    }

    this.runtime.metrics.record('deletions');
    this.logger.debug(`Deleted dependency ${label} from '${this.displayName}'`);
    return true;
  }

  private adjustUseCount(t: Token, tag: string | undefined, delta: 1 | -1): number {
    if (!this.contains(t, { tag })) {
      return this.parent?.adjustUseCount(t, tag, delta) ?? 0;
    }

    const key = bindingKey(t.id, tag);
    const current = this.store.getUseCount(key) ?? 0;
    if (current < 0) return current;

    const next = Math.max(0, current + delta);
    this.store.setUseCount(key, next);
    return next;
  }

  private disposeBinding(value: unknown, label: string): void {
    if (!isDisposable(value)) return;
    try {
      disposeValue(value);
    } catch (error) {
      this.logger.error(`Error disposing ${label} in scope '${this.displayName}'`, error);
    }
  }

  private graphChain(): DependencyGraph[] {
    const graphs: DependencyGraph[] = [];
    for (let scope: Scope | undefined = this; scope; scope = scope.parent) {
      graphs.push(scope.graph);
    }
    return graphs;
  }
}
