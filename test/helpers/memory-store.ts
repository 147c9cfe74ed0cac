import type { LedgerStore } from "../../src/usage/store.js";
import { StorageError } from "../../src/usage/errors.js";
import type { UsageRecord } from "../../src/usage/types.js";

/** LedgerStore kept in a Map, serialized the way the file store does. */
export class MemoryLedgerStore implements LedgerStore {
  readonly records = new Map<string, string>();
  failWrites = false;
  writes = 0;

  async read(identity: string): Promise<UsageRecord | null> {
    const raw = this.records.get(identity);
    return raw === undefined ? null : (JSON.parse(raw) as UsageRecord);
  }

  async write(identity: string, record: UsageRecord): Promise<void> {
    // Yield so concurrent callers get a chance to interleave.
    await new Promise((resolve) => setImmediate(resolve));
    if (this.failWrites) {
      throw new StorageError(`Failed to write usage record for ${identity}`, `memory:${identity}`);
    }
    this.writes++;
    this.records.set(identity, JSON.stringify(record));
  }

  async withLock<T>(_identity: string, fn: () => Promise<T>): Promise<T> {
    return fn();
  }

  stored(identity: string): UsageRecord | undefined {
    const raw = this.records.get(identity);
    return raw === undefined ? undefined : (JSON.parse(raw) as UsageRecord);
  }
}
