import { caseFoldEquals, caseFoldHash } from './casefold.js';

interface AliasEntry {
  /** Key as first inserted. Compared by fold, never re-cased. */
  readonly key: string;
  value: string;
}

/**
 * Case-insensitive username → display name table.
 *
 * Buckets are keyed by `caseFoldHash` of the username and probed with `caseFoldEquals`,
 * so a lookup hashes the caller's string in place instead of lowercasing a copy first.
 * Built once at startup; `get` is the per-message hot path.
 */
export class UsernameAliasTable {
  private buckets = new Map<number, AliasEntry[]>();
  private count = 0;

  /** Build a table from a parsed alias blob. Later keys that fold equal to earlier ones win. */
  static fromRecord(record: Readonly<Record<string, string>>): UsernameAliasTable {
    const table = new UsernameAliasTable();
    for (const [key, value] of Object.entries(record)) {
      table.insert(key, value);
    }
    return table;
  }

  /** Display name for `key`, or `key` itself when no alias matches. */
  get(key: string): string {
    return this.find(key)?.value ?? key;
  }

  /**
   * Display name for `key.slice(start, end)`, or `undefined` when no alias matches.
   * The range is matched in place, so callers can skip padding without slicing.
   */
  lookup(key: string, start = 0, end = key.length): string | undefined {
    return this.find(key, start, end)?.value;
  }

  has(key: string): boolean {
    return this.find(key) !== undefined;
  }

  /** Store `value` under `key`, replacing the value of any entry whose key folds equal. */
  insert(key: string, value: string): void {
    const hash = caseFoldHash(key);
    const bucket = this.buckets.get(hash);
    if (bucket === undefined) {
      this.buckets.set(hash, [{ key, value }]);
      this.count++;
      return;
    }
    for (const entry of bucket) {
      if (caseFoldEquals(entry.key, key)) {
        entry.value = value;
        return;
      }
    }
    bucket.push({ key, value });
    this.count++;
  }

  /** Number of distinct folded keys. */
  get size(): number {
    return this.count;
  }

  private find(key: string, start = 0, end = key.length): AliasEntry | undefined {
    const bucket = this.buckets.get(caseFoldHash(key, start, end));
    if (bucket === undefined) return undefined;
    for (const entry of bucket) {
      if (caseFoldEquals(entry.key, key, start, end)) return entry;
    }
    return undefined;
  }
}

/** Read-only view handed to message handlers. */
export type UsernameAliasLookup = Pick<UsernameAliasTable, 'get' | 'lookup' | 'has' | 'size'>;
