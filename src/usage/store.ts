import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import { DEFAULT_LOCK_OPTIONS, withFileLock, type FileLockOptions } from "../utils/file-lock.js";
import { StorageError } from "./errors.js";
import { isIsoDate } from "./dates.js";
import type { UsageRecord } from "./types.js";

const isoDate = z.string().refine(isIsoDate, "expected YYYY-MM-DD");
const count = z.number().nonnegative();

const usageRecordSchema = z.object({
  user_name: z.string(),
  current_cost: z.object({
    day: z.number(),
    month: z.number(),
    all_time: z.number().optional(),
    last_update: isoDate,
  }),
  usage_history: z.object({
    chat_tokens: z.record(isoDate, count).default({}),
    transcription_seconds: z.record(isoDate, count).default({}),
    number_images: z.record(isoDate, z.tuple([count, count, count])).default({}),
  }),
});

/** Durable home of ledgers, one record per identity. */
export interface LedgerStore {
  read(identity: string): Promise<UsageRecord | null>;
  /** Replaces the whole record. Throws {@link StorageError} on failure. */
  write(identity: string, record: UsageRecord): Promise<void>;
  /**
   * Runs `fn` while holding the identity's record exclusively. Failing to
   * take the lock throws {@link StorageError}; errors from `fn` pass through.
   */
  withLock<T>(identity: string, fn: () => Promise<T>): Promise<T>;
}

export function parseUsageRecord(raw: unknown): UsageRecord | null {
  const result = usageRecordSchema.safeParse(raw);
  return result.success ? result.data : null;
}

export class LedgerFileStore implements LedgerStore {
  constructor(
    private readonly logsDir: string,
    private readonly logger: Logger,
    private readonly lockOptions: FileLockOptions = DEFAULT_LOCK_OPTIONS,
  ) {}

  pathFor(identity: string): string {
    return join(this.logsDir, `${encodeURIComponent(identity)}.json`);
  }

  async read(identity: string): Promise<UsageRecord | null> {
    const filePath = this.pathFor(identity);
    let content: string;
    try {
      content = await readFile(filePath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
        this.logger.warn({ err, identity }, "Unreadable usage record, starting fresh");
      }
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      this.logger.warn({ err, identity }, "Malformed usage record, starting fresh");
      return null;
    }

    const record = parseUsageRecord(raw);
    if (!record) {
      this.logger.warn({ identity }, "Usage record failed validation, starting fresh");
    }
    return record;
  }

  async write(identity: string, record: UsageRecord): Promise<void> {
    const filePath = this.pathFor(identity);
    const tmpPath = `${filePath}.${randomUUID()}.tmp`;
    try {
      await mkdir(this.logsDir, { recursive: true });
      await writeFile(tmpPath, JSON.stringify(record));
      await rename(tmpPath, filePath);
    } catch (err) {
      await rm(tmpPath, { force: true }).catch((rmErr: unknown) => {
        this.logger.debug({ err: rmErr, path: tmpPath }, "Could not remove temp file");
      });
      throw new StorageError(`Failed to write usage record for ${identity}`, filePath, {
        cause: err,
      });
    }
  }

  async withLock<T>(identity: string, fn: () => Promise<T>): Promise<T> {
    const filePath = this.pathFor(identity);
    let locked = false;
    try {
      await mkdir(this.logsDir, { recursive: true });
      return await withFileLock(
        filePath,
        () => {
          locked = true;
          return fn();
        },
        this.lockOptions,
      );
    } catch (err) {
      if (locked) throw err;
      throw new StorageError(`Failed to lock usage record for ${identity}`, filePath, {
        cause: err,
      });
    }
  }
}
