/**
 * @fileoverview In-memory key-value engine
 *
 * Backs tests and the `memory` backend. Nothing survives the process.
 */

import type { KeyValueStore } from './types.js';

export class MemoryKeyValueStore implements KeyValueStore {
  private entries: Map<string, string>;

  constructor(initial?: Record<string, string>) {
    this.entries = new Map(Object.entries(initial ?? {}));
  }

  async get(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  /**
   * Remove a key (for tests that need to simulate a fresh install)
   */
  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
