import type { Scope } from '../core/scope.js';
import { ModuleCircularDependencyError } from '../errors/errors.js';
import { Logger } from '../logging/logger.js';

/**
 * A named group of registrations with declared inter-module dependencies.
 *
 * Modules are identified by name: two module objects with the same name are
 * the same module as far as the registry is concerned.
 */
export interface Module {
  readonly name: string;
  readonly dependencies?: readonly Module[];
  /** Synchronous registrations into `scope`. */
  register(scope: Scope): void;
  /** Awaited after `register`, before the next module loads. */
  onInit?(scope: Scope): Promise<void> | void;
  /** Awaited by `disposeModules()`, in reverse load order. */
  onDispose?(scope: Scope): Promise<void> | void;
}

/**
 * Build a module from a plain definition.
 *
 * @example
 * ```typescript
 * const CartModule = defineModule({
 *   name: 'Cart',
 *   dependencies: [ApiModule],
 *   register(scope) {
 *     scope.lazily(CartT, () => new CartService(scope.findRequired(ApiT)));
 *   },
 * });
 * ```
 */
export function defineModule(definition: Module): Module {
  return Object.freeze({ ...definition, dependencies: definition.dependencies ?? [] });
}

interface LoadedModule {
  module: Module;
  scope: Scope;
}

/**
 * Loads modules in dependency order into a scope.
 *
 * Loading is fail-fast: the whole batch is validated before anything
 * registers, then modules load one at a time; the first `register` or
 * `onInit` error stops the sequence and reaches the caller unchanged.
 * Modules loaded before the failure stay loaded; nothing is rolled back.
 */
export class ModuleRegistry {
  private readonly loaded = new Map<string, LoadedModule>();

  constructor(private readonly logger: Logger = new Logger()) {}

  /**
   * Register `modules` and everything they depend on into `scope`.
   *
   * Modules already loaded (by name) are skipped.
   *
   * @throws {ModuleCircularDependencyError} before any module registers, when
   * the dependency graph has a cycle
   */
  async registerModules(modules: readonly Module[], scope: Scope): Promise<void> {
    if (modules.length === 0) return;

    const all = collectModules(modules);
    assertAcyclic(all);
    const order = loadOrder(all);

    this.logger.info(`Loading ${order.length} module(s): ${order.map((m) => m.name).join(' → ')}`);

    for (const module of order) {
      if (this.loaded.has(module.name)) {
        this.logger.debug(`Skipped (already loaded): ${module.name}`);
        continue;
      }

      module.register(scope);
      await module.onInit?.(scope);

      this.loaded.set(module.name, { module, scope });
      this.logger.info(`Loaded: ${module.name}`);
    }
  }

  hasModule(name: string): boolean {
    return this.loaded.has(name);
  }

  getModule(name: string): Module | undefined {
    return this.loaded.get(name)?.module;
  }

  getAllModules(): ReadonlyMap<string, Module> {
    return new Map(Array.from(this.loaded, ([name, entry]) => [name, entry.module]));
  }

  /** Names of the loaded modules, in the order they loaded. */
  getLoadOrder(): string[] {
    return Array.from(this.loaded.keys());
  }

  /**
   * Run `onDispose` of every loaded module in reverse load order, each with
   * the scope it was loaded into, then forget them all. Failures are logged
   * and do not stop the remaining hooks.
   */
  async disposeModules(): Promise<void> {
    const entries = Array.from(this.loaded.values()).reverse();
    for (const { module, scope } of entries) {
      try {
        await module.onDispose?.(scope);
      } catch (error) {
        this.logger.error(`Error disposing module '${module.name}'`, error);
      }
    }
    this.loaded.clear();
  }

  /** Forget every loaded module without running hooks. */
  clear(): void {
    this.loaded.clear();
    this.logger.debug('Cleared module registry');
  }
}

/**
 * Breadth-first transitive closure, de-duplicated by name. The first module
 * seen with a given name wins.
 */
function collectModules(roots: readonly Module[]): Module[] {
  const byName = new Map<string, Module>();
  const queue = [...roots];

  while (queue.length > 0) {
    const module = queue.shift();
    if (!module || byName.has(module.name)) continue;
    byName.set(module.name, module);
    for (const dep of module.dependencies ?? []) {
      if (!byName.has(dep.name)) queue.push(dep);
    }
  }

  return Array.from(byName.values());
}

function assertAcyclic(modules: readonly Module[]): void {
  const byName = new Map(modules.map((m) => [m.name, m] as const));
  const visited = new Set<string>();
  const path: string[] = [];

  const visit = (name: string): void => {
    if (visited.has(name)) return;
    const onPath = path.indexOf(name);
    if (onPath >= 0) {
      throw new ModuleCircularDependencyError(name, [...path.slice(onPath), name]);
    }

    path.push(name);
    for (const dep of byName.get(name)?.dependencies ?? []) {
      visit(dep.name);
    }
    path.pop();
    visited.add(name);
  };

  for (const module of modules) visit(module.name);
}

/** Dependencies before dependents; ties keep collection order. */
function loadOrder(modules: readonly Module[]): Module[] {
  const byName = new Map(modules.map((m) => [m.name, m] as const));
  const visited = new Set<string>();
  const result: Module[] = [];

  const visit = (module: Module): void => {
    if (visited.has(module.name)) return;
    visited.add(module.name);
    for (const dep of module.dependencies ?? []) {
      const resolved = byName.get(dep.name);
      if (resolved) visit(resolved);
    }
    result.push(module);
  };

  for (const module of modules) visit(module);
  return result;
}
