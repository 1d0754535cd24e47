import { promises as fs } from 'node:fs';
import path from 'node:path';

import { isMissingFileError } from './fs-utils.js';
import type { StateStore } from './types.js';

export class MemoryStateStore implements StateStore {
  private readonly values = new Map<string, unknown>();

  async get(key: string): Promise<unknown> {
    return this.values.get(key);
  }

  async set(key: string, value: unknown): Promise<void> {
    this.values.set(key, structuredClone(value));
  }
}

/** Keeps every key in one JSON document. Writes are whole-file and last-writer-wins. */
export class JsonFileStateStore implements StateStore {
  constructor(private readonly filePath: string) {}

  async get(key: string): Promise<unknown> {
    const values = await this.load();
    return values[key];
  }

  async set(key: string, value: unknown): Promise<void> {
    const values = await this.load();
    values[key] = value;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(values, null, 2), 'utf8');
  }

  private async load(): Promise<Record<string, unknown>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return {};
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`State file ${this.filePath} does not contain a JSON object`);
    }
    return { ...parsed };
  }
}
