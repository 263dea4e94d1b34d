/**
 * JSON file store
 *
 * Reads never throw: a missing file is a warning (or silent for optional
 * files), malformed JSON or a schema mismatch is an error line, and both
 * load as null. Failed writes are logged and reported as false.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { z } from 'zod';

export interface JsonFileStoreOptions {
  /** Log prefix, e.g. [teams] */
  label: string;
  /** Missing file is expected; don't warn */
  optional?: boolean;
  /** Write top-level keys in sorted order */
  sortKeys?: boolean;
}

/**
 * Copy of a record with its keys in sorted order
 */
export function sortByKey<V>(record: Readonly<Record<string, V>>): Record<string, V> {
  const sorted: Record<string, V> = {};
  for (const key of Object.keys(record).sort()) {
    sorted[key] = record[key];
  }
  return sorted;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class JsonFileStore<T> {
  constructor(
    readonly filePath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly options: JsonFileStoreOptions
  ) {}

  async load(): Promise<T | null> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        if (!this.options.optional) {
          console.warn(`${this.options.label} ${this.filePath} not found, starting empty`);
        }
      } else {
        console.error(`${this.options.label} Failed to read ${this.filePath}: ${errorMessage(err)}`);
      }
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      console.error(`${this.options.label} Malformed JSON in ${this.filePath}: ${errorMessage(err)}`);
      return null;
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      console.error(`${this.options.label} Invalid ${this.filePath}: ${issues}`);
      return null;
    }
    return parsed.data;
  }

  async save(data: T): Promise<boolean> {
    const value = this.options.sortKeys && isRecord(data) ? sortByKey(data) : data;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(value, null, 2) + '\n', 'utf-8');
      return true;
    } catch (err) {
      console.error(`${this.options.label} Failed to write ${this.filePath}: ${errorMessage(err)}`);
      return false;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
