/*
 * DependencyGraph
 * ---------------
 * Declared-dependency edges of one scope, keyed by arena handles.
 *
 * The graph is never used to order resolution; it exists so callers can ask
 * whether an instance participates in a dependency cycle. Each node keeps the
 * values of its dependencies alongside their handles so `dependenciesOf()`
 * can hand instances back without a reverse index on the arena.
 *
 * Cycle detection is a depth-first walk with a `visited` set (nodes fully
 * explored, no cycle through them) and a recursion stack (nodes on the
 * current path). It is conservative: exceeding MAX_CYCLE_DEPTH or any error
 * thrown during the walk is reported as a cycle.
 */
import type { Logger } from '../logging/logger.js';
import type { Handle, HandleArena } from './handle-arena.js';

/** Recursion-stack depth at which the walk gives up and reports a cycle. */
export const MAX_CYCLE_DEPTH = 100;

export class DependencyGraph {
  /** node handle -> (dependency handle -> dependency value) */
  private readonly edges = new Map<Handle, Map<Handle, unknown>>();

  constructor(private readonly arena: HandleArena) {}

  /** Number of nodes with declared dependencies. */
  get size(): number {
    return this.edges.size;
  }

  /**
   * Record `dependencies` as the full dependency list of `instance`,
   * replacing any previous declaration. An empty list removes the node.
   *
   * @returns the previous declaration, so callers can roll back
   */
  declare(instance: unknown, dependencies: readonly unknown[]): Map<Handle, unknown> | undefined {
    const node = this.arena.handleOf(instance);
    const previous = this.edges.get(node);

    if (dependencies.length === 0) {
      this.edges.delete(node);
      return previous;
    }

    const deps = new Map<Handle, unknown>();
    for (const dep of dependencies) {
      deps.set(this.arena.handleOf(dep), dep);
    }
    this.edges.set(node, deps);
    return previous;
  }

  /**
   * Put back a declaration returned by `declare()`.
   */
  restore(instance: unknown, previous: Map<Handle, unknown> | undefined): void {
    const node = this.arena.handleOf(instance);
    if (previous) this.edges.set(node, previous);
    else this.edges.delete(node);
  }

  remove(instance: unknown): void {
    const node = this.arena.peek(instance);
    if (node !== undefined) this.edges.delete(node);
  }

  has(instance: unknown): boolean {
    const node = this.arena.peek(instance);
    return node !== undefined && this.edges.has(node);
  }

  dependenciesOf(instance: unknown): unknown[] {
    const node = this.arena.peek(instance);
    if (node === undefined) return [];
    const deps = this.edges.get(node);
    return deps ? Array.from(deps.values()) : [];
  }

  /** @internal Edge lookup used by `detectCycles()`. */
  edgesOf(node: Handle): Iterable<Handle> | undefined {
    return this.edges.get(node)?.keys();
  }

  clear(): void {
    this.edges.clear();
  }
}

/**
 * Check whether `start` can reach itself through the declared dependencies
 * recorded in any of `graphs`.
 *
 * @returns true when a cycle exists, or when the walk could not complete
 */
export function detectCycles(
  start: unknown,
  graphs: readonly DependencyGraph[],
  arena: HandleArena,
  logger: Logger
): boolean {
  try {
    if (start === null || start === undefined) return false;
    const root = arena.peek(start);
    if (root === undefined) return false;

    const visited = new Set<Handle>();
    const recursionStack = new Set<Handle>();

    const visit = (current: Handle): boolean => {
      if (recursionStack.size > MAX_CYCLE_DEPTH) {
        logger.warn('Cycle detection reached depth limit - possible deep circular reference');
        return true;
      }
      if (recursionStack.has(current)) return true;
      if (visited.has(current)) return false;

      visited.add(current);
      recursionStack.add(current);

      for (const graph of graphs) {
        const deps = graph.edgesOf(current);
        if (!deps) continue;
        for (const dep of deps) {
          if (visit(dep)) return true;
        }
      }

      recursionStack.delete(current);
      return false;
    };

    return visit(root);
  } catch (error) {
    logger.error('Error in cycle detection', error);
    return true;
  }
}
