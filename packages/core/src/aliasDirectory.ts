/**
 * Alias Directory
 *
 * Maps every normalized alias (and canonical name) to its canonical entity.
 * Rebuilt from a directory snapshot; never patched in place.
 *
 * Conflicts (one normalized alias claimed by two entities) are collected on
 * `conflicts` and resolved by the configured policy. A canonical name's own
 * key always stays with that entity, so every canonical name resolves to itself.
 */

import type { AliasConflictPolicy } from './config.js';
import { normalize } from './normalize.js';

export interface AliasRecord {
  aliases?: readonly string[];
}

export interface AliasConflict {
  alias: string;
  /** Entity the alias resolves to after the build */
  kept: string;
  /** Entity whose claim lost */
  dropped: string;
}

export class AliasConflictError extends Error {
  constructor(public readonly conflict: AliasConflict) {
    super(`Alias "${conflict.alias}" is claimed by both "${conflict.kept}" and "${conflict.dropped}"`);
    this.name = 'AliasConflictError';
  }
}

export class AliasDirectory {
  private readonly map = new Map<string, string>();
  private readonly canonicalKeys = new Set<string>();
  private readonly conflictList: AliasConflict[] = [];

  private constructor(private readonly policy: AliasConflictPolicy) {}

  /**
   * Build from `{canonicalName: {aliases}}` records
   * Throws AliasConflictError under the 'reject' policy.
   */
  static build(
    records: Readonly<Record<string, AliasRecord>>,
    policy: AliasConflictPolicy = 'last-wins'
  ): AliasDirectory {
    const directory = new AliasDirectory(policy);
    const entries = Object.entries(records);

    // Canonical names first so aliases can't steal them
    for (const [name] of entries) {
      directory.insert(normalize(name), name, true);
    }

    for (const [name, record] of entries) {
      for (const alias of record.aliases ?? []) {
        directory.insert(normalize(alias), name, false);
      }
    }

    return directory;
  }

  private insert(key: string, canonical: string, isCanonicalKey: boolean): void {
    const existing = this.map.get(key);

    if (existing === undefined || existing === canonical) {
      this.map.set(key, canonical);
      if (isCanonicalKey) this.canonicalKeys.add(key);
      return;
    }

    let conflict: AliasConflict;
    if (this.canonicalKeys.has(key) && !isCanonicalKey) {
      conflict = { alias: key, kept: existing, dropped: canonical };
    } else if (this.policy === 'first-wins') {
      conflict = { alias: key, kept: existing, dropped: canonical };
    } else {
      conflict = { alias: key, kept: canonical, dropped: existing };
      this.map.set(key, canonical);
    }

    if (this.policy === 'reject') {
      throw new AliasConflictError(conflict);
    }
    this.conflictList.push(conflict);
  }

  /**
   * Canonical name for an already-normalized alias
   */
  canonicalOf(normalizedAlias: string): string | null {
    return this.map.get(normalizedAlias) ?? null;
  }

  get conflicts(): readonly AliasConflict[] {
    return this.conflictList;
  }
}
