/**
 * Specialized contexts: one per family per session. Each holds sets of
 * detected markers by category; adding a marker twice is the same as once.
 */

import type { ContextFamily } from '../types/index.js';

export interface SpecializedSnapshot {
  family: ContextFamily;
  session_id: string;
  created_at: string;
  last_updated: string;
  markers: Record<string, string[]>;
}

export class SpecializedContext {
  readonly created_at: number;
  last_updated: number;
  private readonly markers = new Map<string, Set<string>>();

  constructor(
    readonly family: ContextFamily,
    readonly session_id: string,
    now = Date.now(),
  ) {
    this.created_at = now;
    this.last_updated = now;
  }

  /** True when the marker was not present before. */
  add(category: string, value: string, now = Date.now()): boolean {
    let set = this.markers.get(category);
    if (!set) {
      set = new Set();
      this.markers.set(category, set);
    }
    this.last_updated = now;
    if (set.has(value)) return false;
    set.add(value);
    return true;
  }

  get(category: string): string[] {
    return [...(this.markers.get(category) ?? [])];
  }

  has(category: string, value: string): boolean {
    return this.markers.get(category)?.has(value) ?? false;
  }

  categories(): string[] {
    return [...this.markers.keys()].filter((c) => (this.markers.get(c)?.size ?? 0) > 0);
  }

  isPopulated(): boolean {
    return this.categories().length > 0;
  }

  isStale(timeoutMs: number, now = Date.now()): boolean {
    return now - this.last_updated > timeoutMs;
  }

  toJSON(): SpecializedSnapshot {
    const markers: Record<string, string[]> = {};
    for (const c of this.categories()) markers[c] = this.get(c);
    return {
      family: this.family,
      session_id: this.session_id,
      created_at: new Date(this.created_at).toISOString(),
      last_updated: new Date(this.last_updated).toISOString(),
      markers,
    };
  }
}
