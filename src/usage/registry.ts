import type { PricingConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { KeyedMutex } from "../utils/keyed-mutex.js";
import { toIsoDate, type IsoDate } from "./dates.js";
import { UsageLedger } from "./ledger.js";
import type { LedgerStore } from "./store.js";
import type { UsageEvent } from "./types.js";

export interface LedgerRegistryOptions {
  readonly store: LedgerStore;
  readonly pricing: PricingConfig;
  readonly logger: Logger;
  readonly now?: () => Date;
}

export interface RecordResult {
  readonly identity: string;
  readonly cost: number;
  readonly date: IsoDate;
}

/**
 * Process-wide table of ledgers. A ledger is loaded on first access and
 * written back after every mutation; mutations of one identity are
 * serialized, different identities proceed in parallel.
 */
export class LedgerRegistry {
  private readonly ledgers = new Map<string, UsageLedger>();
  private readonly loading = new Map<string, Promise<UsageLedger>>();
  private readonly dirty = new Set<string>();
  private readonly mutex = new KeyedMutex();
  private readonly store: LedgerStore;
  private readonly pricing: PricingConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: LedgerRegistryOptions) {
    this.store = options.store;
    this.pricing = options.pricing;
    this.logger = options.logger.child({ component: "ledger-registry" });
    this.now = options.now ?? (() => new Date());
  }

  today(): IsoDate {
    return toIsoDate(this.now());
  }

  has(identity: string): boolean {
    return this.ledgers.has(identity);
  }

  /** Ledgers whose latest mutation has not reached the store. */
  get dirtyIdentities(): string[] {
    return [...this.dirty];
  }

  async get(identity: string, displayName: string): Promise<UsageLedger> {
    const cached = this.ledgers.get(identity);
    if (cached) return cached;

    const pending = this.loading.get(identity);
    if (pending) return pending;

    const load = this.load(identity, displayName).finally(() => {
      this.loading.delete(identity);
    });
    this.loading.set(identity, load);
    return load;
  }

  /**
   * Applies one usage event to the identity's ledger and persists it. When
   * the write fails the in-memory ledger keeps the event, is marked dirty
   * and the {@link StorageError} reaches the caller; the next successful
   * write or {@link flush} brings the store back in line.
   */
  async record(identity: string, displayName: string, event: UsageEvent): Promise<RecordResult> {
    return this.mutex.run(identity, () =>
      this.store.withLock(identity, async () => {
        const ledger = await this.refresh(identity, displayName);
        const today = this.today();
        if (today < ledger.lastUpdate) {
          this.logger.warn(
            { identity, today, lastUpdate: ledger.lastUpdate },
            "Usage event dated before last update, treating as a new day",
          );
        }
        const cost = ledger.apply(event, today);
        this.dirty.add(identity);
        await this.persist(ledger);
        this.logger.debug({ identity, kind: event.kind, cost }, "Usage recorded");
        return { identity, cost, date: today };
      }),
    );
  }

  /** Retries the write of a ledger left dirty by a failed write. */
  async flush(identity: string): Promise<boolean> {
    return this.mutex.run(identity, () =>
      this.store.withLock(identity, async () => {
        const ledger = this.ledgers.get(identity);
        if (!ledger || !this.dirty.has(identity)) return false;
        await this.persist(ledger);
        return true;
      }),
    );
  }

  private async persist(ledger: UsageLedger): Promise<void> {
    try {
      await this.store.write(ledger.identity, ledger.toRecord());
    } catch (err) {
      this.logger.error({ err, identity: ledger.identity }, "Failed to persist usage record");
      throw err;
    }
    this.dirty.delete(ledger.identity);
  }

  // Another process may have written the record since it was cached. A dirty
  // ledger holds events the store has not seen, so memory wins there.
  private async refresh(identity: string, displayName: string): Promise<UsageLedger> {
    const cached = this.ledgers.get(identity);
    if (!cached) return this.get(identity, displayName);
    if (this.dirty.has(identity)) return cached;

    const record = await this.store.read(identity);
    if (!record) return cached;
    const ledger = UsageLedger.fromRecord(identity, record, this.pricing);
    this.ledgers.set(identity, ledger);
    return ledger;
  }

  private async load(identity: string, displayName: string): Promise<UsageLedger> {
    const record = await this.store.read(identity);
    const ledger = record
      ? UsageLedger.fromRecord(identity, record, this.pricing)
      : UsageLedger.create(identity, displayName, this.today(), this.pricing);
    this.ledgers.set(identity, ledger);
    return ledger;
  }
}
