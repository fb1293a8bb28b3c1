/*
 * ReactiveHub
 * -----------
 * Listener registry keyed by (type, optional tag).
 *
 * Keys share the binding-key shape (`typeId` or `typeId:tag`), so a
 * notification for a binding reaches exactly the listeners of that slot.
 * Raw string keys (`listenKey` / `notifyKey`) live in the same key space and
 * carry plain signals without a value.
 *
 * Dispatch:
 *  - 0 listeners: return after a single map lookup
 *  - 1 listener: called directly
 *  - n listeners: the live set is iterated, no copy
 * Every call is isolated: a throwing listener is logged and counted, and the
 * remaining listeners still run. Nothing thrown by a listener reaches the
 * notifier.
 *
 * A key is dropped as soon as its last subscription is disposed, so the map
 * only ever holds keys with at least one live listener. A maintenance pass
 * (every `maintenanceInterval` notifications, or on demand) re-checks that and
 * reports health against the configured thresholds.
 */
import { DEFAULT_HUB_CONFIG, type HubConfig } from '../config/config.js';
import { bindingKey, describeKey, toToken, type Token, type TypeKey } from '../core/token.js';
import { Logger } from '../logging/logger.js';
import type { TagOptions } from '../types/types.js';

/**
 * Reads the current value of a binding. Called on subscription and for every
 * notification, once per listener.
 */
export type ValueResolver = <T>(type: Token<T>, tag: string | undefined) => T | undefined;

export type Listener<T> = (value: T | undefined) => void;

export type HealthStatus = 'healthy' | 'warning' | 'critical';
export type MemoryPressure = 'low' | 'medium' | 'high';

export interface HubMemoryStats {
  totalKeys: number;
  totalListeners: number;
  /** Largest listener set among the current keys. */
  maxListenersPerKey: number;
  averageListenersPerKey: number;
  /** Largest listener set ever observed, including keys since removed. */
  peakListenersPerKey: number;
  notificationCount: number;
  errorCount: number;
}

export interface HubHealthReport {
  status: HealthStatus;
  memoryPressure: MemoryPressure;
  issues: string[];
  stats: HubMemoryStats;
}

export interface ReactiveHubOptions {
  limits?: Partial<HubConfig>;
  logger?: Logger;
}

interface ListenerEntry {
  readonly run: () => void;
  readonly subscription: Subscription;
}

/** Error-to-notification ratio above which health degrades. */
const ERROR_RATE_WARNING = 0.1;

/** Share of `maxTotalListeners` above which health degrades. */
const TOTAL_LISTENERS_WARNING = 0.8;

/**
 * Handle for one registered listener. Disposing it is idempotent.
 */
export class Subscription {
  private disposed = false;

  constructor(
    readonly key: string,
    private readonly release: () => void
  ) {}

  get isDisposed(): boolean {
    return this.disposed;
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.release();
  }

  /** Alias of {@link dispose}. */
  close(): void {
    this.dispose();
  }
}

export class ReactiveHub {
  private readonly listeners = new Map<string, Set<ListenerEntry>>();
  private readonly labels = new Map<string, string>();
  private readonly limits: Readonly<HubConfig>;
  private readonly logger: Logger;

  private notifications = 0;
  private errors = 0;
  private peakPerKey = 0;

  constructor(
    private readonly resolve: ValueResolver,
    options: ReactiveHubOptions = {}
  ) {
    this.limits = { ...DEFAULT_HUB_CONFIG, ...options.limits };
    this.logger = options.logger ?? new Logger();
  }

  get notificationCount(): number {
    return this.notifications;
  }

  get errorCount(): number {
    return this.errors;
  }

  get peakListenersPerKey(): number {
    return this.peakPerKey;
  }

  /**
   * Subscribe to changes of the binding `(type, tag)`.
   *
   * `callback` runs once right away with the current value (`undefined` when
   * nothing is bound), then again on each matching notification.
   *
   * @example
   * ```typescript
   * const sub = hub.listen(CartT, (cart) => render(cart?.items ?? []));
   * scope.register(CartT, nextCart);
   * hub.notifyListeners(CartT);
   * sub.dispose();
   * ```
   */
  listen<T>(type: TypeKey<T>, callback: Listener<T>, options: TagOptions = {}): Subscription {
    const t = toToken(type);
    const { tag } = options;
    return this.subscribe(bindingKey(t.id, tag), describeKey(t, tag), () => callback(this.resolve(t, tag)));
  }

  /**
   * Subscribe a plain signal to a raw key. The callback also runs once
   * right away.
   */
  listenKey(key: string, callback: () => void): Subscription {
    return this.subscribe(key, key, callback);
  }

  notifyListeners<T>(type: TypeKey<T>, options: TagOptions = {}): void {
    this.dispatch(bindingKey(toToken(type).id, options.tag));
  }

  notifyKey(key: string): void {
    this.dispatch(key);
  }

  hasListeners<T>(type: TypeKey<T>, options: TagOptions = {}): boolean {
    return this.listeners.has(bindingKey(toToken(type).id, options.tag));
  }

  getListenerCount<T>(type: TypeKey<T>, options: TagOptions = {}): number {
    return this.listeners.get(bindingKey(toToken(type).id, options.tag))?.size ?? 0;
  }

  /**
   * Dispose every subscription, drop every key and reset the counters.
   */
  clearListeners(): void {
    const entries: ListenerEntry[] = [];
    for (const set of this.listeners.values()) entries.push(...set);

    this.listeners.clear();
    this.labels.clear();
    for (const entry of entries) entry.subscription.dispose();

    this.notifications = 0;
    this.errors = 0;
    this.peakPerKey = 0;
    this.logger.debug(`Cleared ${entries.length} listener(s)`);
  }

  /**
   * Drop empty listener sets and log a warning when health is degraded.
   *
   * @returns the number of keys removed
   */
  runMaintenance(): number {
    let removed = 0;
    for (const [key, set] of this.listeners) {
      if (set.size === 0) {
        this.listeners.delete(key);
        this.labels.delete(key);
        removed++;
      }
    }

    const health = this.getHealthStatus();
    if (health.status !== 'healthy') {
      this.logger.warn(`Reactive hub health is ${health.status}: ${health.issues.join('; ')}`);
    }
    this.logger.debug(`Reactive hub maintenance removed ${removed} empty key(s)`);
    return removed;
  }

  getMemoryStats(): HubMemoryStats {
    let totalListeners = 0;
    let maxListenersPerKey = 0;
    for (const set of this.listeners.values()) {
      totalListeners += set.size;
      if (set.size > maxListenersPerKey) maxListenersPerKey = set.size;
    }
    const totalKeys = this.listeners.size;

    return {
      totalKeys,
      totalListeners,
      maxListenersPerKey,
      averageListenersPerKey: totalKeys === 0 ? 0 : totalListeners / totalKeys,
      peakListenersPerKey: this.peakPerKey,
      notificationCount: this.notifications,
      errorCount: this.errors,
    };
  }

  getHealthStatus(): HubHealthReport {
    const stats = this.getMemoryStats();
    const { maxListenersPerKey, maxTotalListeners } = this.limits;
    const issues: string[] = [];
    let status: HealthStatus = 'healthy';
    const degrade = (to: HealthStatus): void => {
      if (status !== 'critical') status = to;
    };

    if (stats.totalListeners > maxTotalListeners) {
      issues.push(`Total listeners (${stats.totalListeners}) exceed limit (${maxTotalListeners})`);
      degrade('critical');
    } else if (stats.totalListeners > maxTotalListeners * TOTAL_LISTENERS_WARNING) {
      issues.push(`Total listeners (${stats.totalListeners}) approaching limit (${maxTotalListeners})`);
      degrade('warning');
    }

    if (stats.maxListenersPerKey > maxListenersPerKey) {
      issues.push(`A key has ${stats.maxListenersPerKey} listeners (limit ${maxListenersPerKey})`);
      degrade('warning');
    }

    if (stats.notificationCount > 0 && stats.errorCount / stats.notificationCount > ERROR_RATE_WARNING) {
      issues.push(`High listener error rate: ${stats.errorCount} errors in ${stats.notificationCount} notifications`);
      degrade('warning');
    }

    let memoryPressure: MemoryPressure = 'low';
    if (stats.totalListeners > maxTotalListeners) {
      memoryPressure = 'high';
    } else if (stats.totalListeners > maxTotalListeners / 2 || stats.maxListenersPerKey > maxListenersPerKey) {
      memoryPressure = 'medium';
    }

    return { status, memoryPressure, issues, stats };
  }

  /**
   * Text dump of every key and its listener count, largest first.
   */
  dumpListeners(): string {
    const stats = this.getMemoryStats();
    const lines = [`Reactive hub: ${stats.totalKeys} key(s), ${stats.totalListeners} listener(s)`];
    const rows = Array.from(this.listeners, ([key, set]) => ({ key, size: set.size }));
    rows.sort((a, b) => b.size - a.size);
    for (const { key, size } of rows) {
      const label = this.labels.get(key) ?? key;
      lines.push(`  ${label} [${key}]: ${size}`);
    }
    return lines.join('\n');
  }

  // ---------- internals ----------

  private subscribe(key: string, label: string, run: () => void): Subscription {
    let set = this.listeners.get(key);
    if (!set) {
      set = new Set();
      this.listeners.set(key, set);
      this.labels.set(key, label);
    }

    const subscription = new Subscription(key, () => this.release(key, entry));
    const entry: ListenerEntry = { run, subscription };
    set.add(entry);
    if (set.size > this.peakPerKey) this.peakPerKey = set.size;

    this.invoke(entry, key, 'initial');
    return subscription;
  }

  private release(key: string, entry: ListenerEntry): void {
    const set = this.listeners.get(key);
    if (!set) return;
    set.delete(entry);
    if (set.size === 0) {
      this.listeners.delete(key);
      this.labels.delete(key);
    }
  }

  private dispatch(key: string): void {
    this.notifications++;

    const listeners = this.listeners.get(key);
    if (listeners !== undefined) {
      if (listeners.size === 1) {
        const [only] = listeners;
        this.invoke(only, key, 'notification');
      } else {
        for (const entry of listeners) this.invoke(entry, key, 'notification');
      }
    }

    if (this.notifications % this.limits.maintenanceInterval === 0) {
      this.runMaintenance();
    }
  }

  private invoke(entry: ListenerEntry, key: string, phase: 'initial' | 'notification'): void {
    try {
      entry.run();
    } catch (error) {
      this.errors++;
      this.logger.error(`Error in ${phase} listener call for ${this.labels.get(key) ?? key}`, error);
    }
  }
}
