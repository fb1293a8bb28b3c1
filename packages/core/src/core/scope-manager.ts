import { ScopeDisposedError } from '../errors/errors.js';
import { detectCycles } from './dependency-graph.js';
import type { MetricsSnapshot } from './metrics.js';
import { createRuntime, type ScopeRuntime } from './runtime.js';
import { Scope, type BindingInfo } from './scope.js';
import type { CanonicalId } from './token.js';

export const ROOT_SCOPE_NAME = 'RootScope';

export interface CreateScopeOptions {
  name?: string;
  /** Defaults to the current scope. */
  parent?: Scope;
  id?: string;
}

export interface SystemStats {
  scopes: number;
  bindings: number;
  factories: number;
  disposers: number;
  metrics: MetricsSnapshot;
}

/**
 * A temporary switch of the manager's current-scope cursor.
 *
 * `end()` puts the previous cursor back. It is idempotent, so it can sit in a
 * `finally` block and still be called explicitly earlier.
 */
export class ScopeSession {
  private ended = false;

  constructor(
    readonly scope: Scope,
    private readonly restore: () => void
  ) {}

  get isEnded(): boolean {
    return this.ended;
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.restore();
  }
}

/**
 * Owns the root scope of a tree, the current-scope cursor and the name/id
 * indexes of the scopes it created.
 *
 * Indexed scopes unregister themselves through a disposer, so a disposed
 * scope is never returned by `getScope()` or `getScopeById()`. The root is
 * recreated on the next access after it has been disposed.
 *
 * @example
 * ```typescript
 * const manager = new ScopeManager();
 * const feature = manager.createScope({ name: 'Checkout' });
 *
 * manager.runInSession(feature, () => {
 *   manager.currentScope.register(CartT, new Cart());
 * });
 * ```
 */
export class ScopeManager {
  private root: Scope | undefined;
  private current: Scope | undefined;
  private readonly byName = new Map<string, Scope>();
  private readonly byId = new Map<string, Scope>();

  constructor(readonly runtime: ScopeRuntime = createRuntime()) {}

  get rootScope(): Scope {
    if (!this.root || this.root.isDisposed) {
      this.root = new Scope({ name: ROOT_SCOPE_NAME, runtime: this.runtime });
      this.track(this.root);
      this.runtime.logger.debug(`Created root scope (id: ${this.root.id})`);
    }
    return this.root;
  }

  /** The session cursor, falling back to the root when unset or disposed. */
  get currentScope(): Scope {
    if (!this.current || this.current.isDisposed) {
      this.current = this.rootScope;
    }
    return this.current;
  }

  /**
   * @throws {ScopeDisposedError} if `scope` has been disposed
   */
  setCurrentScope(scope: Scope): void {
    if (scope.isDisposed) throw new ScopeDisposedError(scope.displayName, 'setCurrentScope');
    this.current = scope;
  }

  /**
   * Create a scope wired into the tree and indexed by name and id.
   *
   * @throws {ScopeDisposedError} if the parent has been disposed
   */
  createScope(options: CreateScopeOptions = {}): Scope {
    const parent = options.parent ?? this.currentScope;
    const scope = new Scope({ name: options.name, id: options.id, parent });
    this.track(scope);
    return scope;
  }

  getScope(name: string): Scope | undefined {
    const scope = this.byName.get(name);
    return scope && !scope.isDisposed ? scope : undefined;
  }

  getScopeById(id: string): Scope | undefined {
    const scope = this.byId.get(id);
    return scope && !scope.isDisposed ? scope : undefined;
  }

  /**
   * Make `scope` current until the returned session ends.
   *
   * When the previous scope has been disposed by the time the session ends,
   * the cursor falls back to the root.
   *
   * @throws {ScopeDisposedError} if `scope` has been disposed
   */
  beginSession(scope: Scope): ScopeSession {
    if (scope.isDisposed) throw new ScopeDisposedError(scope.displayName, 'beginSession');
    const previous = this.currentScope;
    this.current = scope;
    return new ScopeSession(scope, () => {
      this.current = previous.isDisposed ? undefined : previous;
    });
  }

  runInSession<R>(scope: Scope, fn: (scope: Scope) => R): R {
    const session = this.beginSession(scope);
    try {
      return fn(scope);
    } finally {
      session.end();
    }
  }

  /**
   * Async counterpart of {@link runInSession}: the session ends once the
   * returned promise settles.
   */
  async runInSessionAsync<R>(scope: Scope, fn: (scope: Scope) => Promise<R>): Promise<R> {
    const session = this.beginSession(scope);
    try {
      return await fn(scope);
    } finally {
      session.end();
    }
  }

  /** Every live scope of the tree, depth-first from the root. */
  getAllScopes(): Scope[] {
    const scopes: Scope[] = [];
    const visit = (scope: Scope): void => {
      scopes.push(scope);
      for (const child of scope.childScopes) visit(child);
    };
    visit(this.rootScope);
    return scopes;
  }

  /**
   * Cycle check across the declared dependencies of every scope in the tree.
   */
  detectCycles(start: unknown): boolean {
    const graphs = this.getAllScopes().map((scope) => scope.dependencyGraph);
    return detectCycles(start, graphs, this.runtime.arena, this.runtime.logger);
  }

  /**
   * Indented text rendering of the tree, one scope per line.
   */
  describeHierarchy(): string {
    const lines: string[] = [];
    const visit = (scope: Scope, depth: number): void => {
      const stats = scope.getStats();
      const marker = scope === this.current ? ' *' : '';
      lines.push(
        `${'  '.repeat(depth)}${scope.displayName} [${scope.id}] ` +
          `(bindings: ${stats.bindings}, factories: ${stats.factories})${marker}`
      );
      for (const child of scope.childScopes) visit(child, depth + 1);
    };
    visit(this.rootScope, 0);
    return lines.join('\n');
  }

  /**
   * Text report of bindings that sit on a declared-dependency cycle and of
   * types bound in more than one scope.
   */
  detectProblematicDependencies(): string {
    const lines = ['=== DEPENDENCY ANALYSIS ===', ''];
    const scopesByType = new Map<CanonicalId, { label: string; scopes: Scope[] }>();

    for (const scope of this.getAllScopes()) {
      for (const binding of scope.getBindings()) {
        if (this.detectCycles(binding.value)) {
          lines.push(`CIRCULAR DEPENDENCY: ${describeBindingInfo(binding)} is part of a dependency cycle`);
        }
        const entry = scopesByType.get(binding.type) ?? { label: binding.label, scopes: [] };
        if (!entry.scopes.includes(scope)) entry.scopes.push(scope);
        scopesByType.set(binding.type, entry);
      }
    }

    for (const { label, scopes } of scopesByType.values()) {
      if (scopes.length < 2) continue;
      lines.push(`MULTIPLE REGISTRATIONS: ${label} is registered in multiple scopes:`);
      for (const scope of scopes) lines.push(`  - ${scope.displayName}`);
    }

    if (lines.length === 2) lines.push('No problematic dependencies detected');
    return lines.join('\n');
  }

  /**
   * Text rendering of every scope's bindings and their declared dependencies.
   * A dependency is labelled by the first binding that holds it anywhere in
   * the tree.
   */
  visualizeDependencyGraph(): string {
    const scopes = this.getAllScopes();
    const owners = new Map<unknown, BindingInfo>();
    for (const scope of scopes) {
      for (const binding of scope.getBindings()) {
        if (!owners.has(binding.value)) owners.set(binding.value, binding);
      }
    }

    const lines = ['=== DEPENDENCY GRAPH ==='];
    for (const scope of scopes) {
      lines.push('', `SCOPE: ${scope.displayName}`);
      const bindings = scope.getBindings();
      if (bindings.length === 0) {
        lines.push('  No dependencies registered in this scope');
        continue;
      }

      for (const binding of bindings) {
        const head = `  ${describeBindingInfo(binding)}`;
        const dependencies = scope.getDependenciesOf(binding.value);
        if (dependencies.length === 0) {
          lines.push(`${head} - no dependencies`);
          continue;
        }
        lines.push(`${head} depends on:`);
        for (const dependency of dependencies) {
          const owner = owners.get(dependency);
          lines.push(`    - ${owner ? describeBindingInfo(owner) : 'unregistered value'}`);
        }
      }
    }
    return lines.join('\n');
  }

  /** Reset the ordinary use counts of every scope to 0. */
  resetAllUseCounts(): void {
    for (const scope of this.getAllScopes()) scope.resetUseCounts();
    this.runtime.logger.debug('Reset all use counts');
  }

  getSystemStats(): SystemStats {
    const stats: SystemStats = {
      scopes: 0,
      bindings: 0,
      factories: 0,
      disposers: 0,
      metrics: this.runtime.metrics.snapshot(),
    };
    for (const scope of this.getAllScopes()) {
      const scopeStats = scope.getStats();
      stats.scopes++;
      stats.bindings += scopeStats.bindings;
      stats.factories += scopeStats.factories;
      stats.disposers += scopeStats.disposers;
    }
    return stats;
  }

  /**
   * Dispose the tree and reset metrics. The next access creates a fresh root.
   */
  reset(): void {
    this.dispose();
    this.runtime.metrics.reset();
  }

  /**
   * Dispose the whole tree. The manager stays usable: the next access to
   * `rootScope` creates a fresh root.
   */
  dispose(): void {
    this.root?.dispose();
    this.root = undefined;
    this.current = undefined;
    this.byName.clear();
    this.byId.clear();
    this.runtime.logger.debug('Scope manager disposed');
  }

  private track(scope: Scope): void {
    if (scope.name !== undefined) this.byName.set(scope.name, scope);
    this.byId.set(scope.id, scope);
    scope.registerDisposer(() => {
      if (scope.name !== undefined && this.byName.get(scope.name) === scope) this.byName.delete(scope.name);
      if (this.byId.get(scope.id) === scope) this.byId.delete(scope.id);
    });
  }
}

function describeBindingInfo(binding: BindingInfo): string {
  return binding.tag !== undefined ? `${binding.label} (tag: ${binding.tag})` : binding.label;
}
