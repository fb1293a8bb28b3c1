import type { Scope } from '../core/scope.js';
import { ScopeManager, type CreateScopeOptions, type SystemStats } from '../core/scope-manager.js';
import { createRuntime, type RuntimeOptions, type ScopeRuntime } from '../core/runtime.js';
import type { TypeKey } from '../core/token.js';
import { ModuleRegistry, type Module } from '../modules/module-registry.js';
import { ReactiveHub, type HubMemoryStats, type Listener, type Subscription } from '../reactive/reactive-hub.js';
import type { DeleteOptions, Factory, RegisterOptions, TagOptions } from '../types/types.js';

export type ContainerOptions = RuntimeOptions;

export interface ScopeTarget {
  /** Scope to act on. Defaults to the root scope. */
  scope?: Scope;
}

export interface ContainerStats extends SystemStats {
  hub: HubMemoryStats;
}

/**
 * One scope tree, its reactive hub and its module registry, sharing a
 * configuration, a logger and metrics.
 *
 * Every container is independent: tests create their own and dispose it
 * afterwards instead of relying on process-wide state.
 *
 * Writes through the container notify the hub: `put` always, `delete` when
 * something was removed. Hub listeners read values from the root scope.
 *
 * @example
 * ```typescript
 * const app = createContainer({ environment: 'development' });
 *
 * const sub = app.listen(SessionT, (session) => console.log(session?.user));
 * app.put(SessionT, new Session('test-user')); // listener runs
 *
 * await app.registerModules([CartModule]);
 * await app.dispose();
 * ```
 */
export class Container {
  readonly runtime: ScopeRuntime;
  readonly scopes: ScopeManager;
  readonly hub: ReactiveHub;
  readonly modules: ModuleRegistry;

  constructor(options: ContainerOptions = {}) {
    this.runtime = createRuntime(options);
    this.scopes = new ScopeManager(this.runtime);
    this.hub = new ReactiveHub((type, tag) => this.scopes.rootScope.find(type, { tag }), {
      limits: this.runtime.config.hub,
      logger: this.runtime.logger,
    });
    this.modules = new ModuleRegistry(this.runtime.logger);
  }

  get rootScope(): Scope {
    return this.scopes.rootScope;
  }

  get currentScope(): Scope {
    return this.scopes.currentScope;
  }

  /**
   * Register `instance` and notify listeners of `(type, tag)`.
   */
  put<T>(type: TypeKey<T>, instance: T, options: RegisterOptions & ScopeTarget = {}): T {
    const { scope = this.rootScope, ...registerOptions } = options;
    scope.register(type, instance, registerOptions);
    this.hub.notifyListeners(type, { tag: options.tag });
    return instance;
  }

  lazily<T>(type: TypeKey<T>, factory: Factory<T>, options: RegisterOptions & ScopeTarget = {}): void {
    const { scope = this.rootScope, ...lazyOptions } = options;
    scope.lazily(type, factory, lazyOptions);
  }

  putFactory<T>(type: TypeKey<T>, factory: Factory<T>, options: TagOptions & ScopeTarget = {}): void {
    const { scope = this.rootScope, tag } = options;
    scope.putFactory(type, factory, { tag });
  }

  /**
   * Look up `(type, tag)` from the target scope upwards. May run a lazy
   * factory.
   */
  find<T>(type: TypeKey<T>, options: TagOptions & ScopeTarget = {}): T | undefined {
    const { scope = this.rootScope, tag } = options;
    return scope.find(type, { tag });
  }

  findRequired<T>(type: TypeKey<T>, options: TagOptions & ScopeTarget = {}): T {
    const { scope = this.rootScope, tag } = options;
    return scope.findRequired(type, { tag });
  }

  /**
   * Delete a binding and, when something was removed, notify its listeners
   * (they then observe whatever the root scope resolves, usually undefined).
   */
  delete<T>(type: TypeKey<T>, options: DeleteOptions & ScopeTarget = {}): boolean {
    const { scope = this.rootScope, tag, force } = options;
    const deleted = scope.delete(type, { tag, force });
    if (deleted) this.hub.notifyListeners(type, { tag });
    return deleted;
  }

  listen<T>(type: TypeKey<T>, callback: Listener<T>, options: TagOptions = {}): Subscription {
    return this.hub.listen(type, callback, options);
  }

  notify<T>(type: TypeKey<T>, options: TagOptions = {}): void {
    this.hub.notifyListeners(type, options);
  }

  createScope(options: CreateScopeOptions = {}): Scope {
    return this.scopes.createScope(options);
  }

  registerModules(modules: readonly Module[], scope: Scope = this.rootScope): Promise<void> {
    return this.modules.registerModules(modules, scope);
  }

  getStats(): ContainerStats {
    return { ...this.scopes.getSystemStats(), hub: this.hub.getMemoryStats() };
  }

  /**
   * Run module dispose hooks (reverse load order), drop every listener and
   * dispose the scope tree.
   */
  async dispose(): Promise<void> {
    await this.modules.disposeModules();
    this.hub.clearListeners();
    this.scopes.dispose();
    this.runtime.logger.debug('Container disposed');
  }
}

export function createContainer(options: ContainerOptions = {}): Container {
  return new Container(options);
}
