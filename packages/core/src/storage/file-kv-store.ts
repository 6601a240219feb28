/**
 * @fileoverview JSON file key-value engine
 *
 * Keeps every key in one JSON object file. Writes land in a temporary file
 * that is renamed over the target, so a crash never leaves a half-written file.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { createLogger } from '../logging/index.js';
import type { KeyValueStore } from './types.js';

const logger = createLogger('storage:file');

const fileContentSchema = z.record(z.string());

export class FileKeyValueStore implements KeyValueStore {
  private readonly filePath: string;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  getPath(): string {
    return this.filePath;
  }

  async get(key: string): Promise<string | null> {
    const entries = await this.readEntries();
    return entries[key] ?? null;
  }

  /**
   * Writes are chained so two overlapping `set` calls cannot drop each other's key.
   */
  async set(key: string, value: string): Promise<void> {
    const previous = this.writeQueue;
    let release: (() => void) | undefined;
    this.writeQueue = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const entries = await this.readEntries();
      entries[key] = value;
      await this.writeEntries(entries);
      logger.debug('Key written', { key, filePath: this.filePath, bytes: value.length });
    } finally {
      release?.();
    }
  }

  async close(): Promise<void> {
    await this.writeQueue;
  }

  private async readEntries(): Promise<Record<string, string>> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    const parsed = fileContentSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Store file ${this.filePath} is not a JSON object of strings`);
    }
    return parsed.data;
  }

  private async writeEntries(entries: Record<string, string>): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(entries, null, 2), 'utf-8');
    await fs.rename(tempPath, this.filePath);
  }
}
