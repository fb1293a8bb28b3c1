/*
 * BindingStore
 * ------------
 * Local storage of one scope:
 *  - type id -> instance (untagged slot)
 *  - tag -> { type id, instance } (tagged slot; a tag is unique per scope)
 *  - type id -> tags currently bound under that type (reverse index)
 *  - binding key -> pending factory
 *  - binding key -> use count (with the -1 / -2 sentinels)
 *
 * The store only keeps these maps consistent with each other. Disposal,
 * permanence rules and logging belong to Scope.
 */
import type { Factory } from '../types/types.js';
import { bindingKey, type BindingKey, type CanonicalId } from './token.js';

export interface TaggedBinding {
  type: CanonicalId;
  value: unknown;
}

/** Pending factory plus the dependencies to declare once it has produced a value. */
export interface FactoryEntry {
  type: CanonicalId;
  tag?: string;
  factory: Factory<unknown>;
  dependencies: readonly unknown[];
}

/** One binding as seen by enumeration helpers. */
export interface BindingRecord {
  type: CanonicalId;
  tag?: string;
  value: unknown;
}

export class BindingStore {
  private readonly typeBindings = new Map<CanonicalId, unknown>();
  private readonly taggedBindings = new Map<string, TaggedBinding>();
  private readonly typeToTags = new Map<CanonicalId, Set<string>>();
  private readonly factories = new Map<BindingKey, FactoryEntry>();
  private readonly useCounts = new Map<BindingKey, number>();

  get bindingCount(): number {
    return this.typeBindings.size + this.taggedBindings.size;
  }

  get factoryCount(): number {
    return this.factories.size;
  }

  // ---------- instances ----------

  hasInstance(type: CanonicalId, tag?: string): boolean {
    if (tag === undefined) return this.typeBindings.has(type);
    return this.taggedBindings.get(tag)?.type === type;
  }

  getInstance(type: CanonicalId, tag?: string): unknown {
    if (tag === undefined) return this.typeBindings.get(type);
    const entry = this.taggedBindings.get(tag);
    return entry?.type === type ? entry.value : undefined;
  }

  getTagged(tag: string): TaggedBinding | undefined {
    return this.taggedBindings.get(tag);
  }

  /**
   * Store an instance. Returns the binding that occupied the slot before,
   * which for a tag may have been registered under a different type.
   */
  setInstance(type: CanonicalId, value: unknown, tag?: string): BindingRecord | undefined {
    if (tag === undefined) {
      const had = this.typeBindings.has(type);
      const previous = this.typeBindings.get(type);
      this.typeBindings.set(type, value);
      return had ? { type, value: previous } : undefined;
    }

    const previous = this.taggedBindings.get(tag);
    if (previous && previous.type !== type) {
      this.untrackTag(previous.type, tag);
      this.useCounts.delete(bindingKey(previous.type, tag));
    }
    this.taggedBindings.set(tag, { type, value });
    let tags = this.typeToTags.get(type);
    if (!tags) {
      tags = new Set();
      this.typeToTags.set(type, tags);
    }
    tags.add(tag);
    return previous ? { type: previous.type, tag, value: previous.value } : undefined;
  }

  /**
   * Remove an instance slot. Returns the removed record, or undefined when
   * the slot was empty.
   */
  removeInstance(type: CanonicalId, tag?: string): BindingRecord | undefined {
    if (tag === undefined) {
      if (!this.typeBindings.has(type)) return undefined;
      const value = this.typeBindings.get(type);
      this.typeBindings.delete(type);
      return { type, value };
    }

    const entry = this.taggedBindings.get(tag);
    if (!entry || entry.type !== type) return undefined;
    this.taggedBindings.delete(tag);
    this.untrackTag(type, tag);
    return { type, tag, value: entry.value };
  }

  tagsOf(type: CanonicalId): ReadonlySet<string> | undefined {
    return this.typeToTags.get(type);
  }

  *records(): IterableIterator<BindingRecord> {
    for (const [type, value] of this.typeBindings) yield { type, value };
    for (const [tag, entry] of this.taggedBindings) yield { type: entry.type, tag, value: entry.value };
  }

  // ---------- factories ----------

  getFactory(key: BindingKey): FactoryEntry | undefined {
    return this.factories.get(key);
  }

  setFactory(key: BindingKey, entry: FactoryEntry): void {
    this.factories.set(key, entry);
  }

  removeFactory(key: BindingKey): boolean {
    return this.factories.delete(key);
  }

  *factoryEntries(): IterableIterator<[BindingKey, FactoryEntry]> {
    yield* this.factories.entries();
  }

  // ---------- use counts ----------

  getUseCount(key: BindingKey): number | undefined {
    return this.useCounts.get(key);
  }

  setUseCount(key: BindingKey, count: number): void {
    this.useCounts.set(key, count);
  }

  removeUseCount(key: BindingKey): void {
    this.useCounts.delete(key);
  }

  *useCountEntries(): IterableIterator<[BindingKey, number]> {
    yield* this.useCounts.entries();
  }

  clear(): void {
    this.typeBindings.clear();
    this.taggedBindings.clear();
    this.typeToTags.clear();
    this.factories.clear();
    this.useCounts.clear();
  }

  private untrackTag(type: CanonicalId, tag: string): void {
    const tags = this.typeToTags.get(type);
    if (!tags) return;
    tags.delete(tag);
    if (tags.size === 0) this.typeToTags.delete(type);
  }
}
