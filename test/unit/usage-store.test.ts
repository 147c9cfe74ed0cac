import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import * as lockfile from "proper-lockfile";
import { LedgerFileStore, parseUsageRecord } from "../../src/usage/store.js";
import { StorageError } from "../../src/usage/errors.js";
import { LedgerRegistry } from "../../src/usage/registry.js";
import type { UsageRecord } from "../../src/usage/types.js";
import { PRICING } from "../helpers/fixtures.js";
import { captureLogger, warnings } from "../helpers/logger.js";

function makeRecord(): UsageRecord {
  return {
    user_name: "@alice",
    current_cost: { day: 0.45, month: 3.23, all_time: 3.23, last_update: "2024-03-14" },
    usage_history: {
      chat_tokens: { "2024-03-13": 520, "2024-03-14": 1532 },
      transcription_seconds: { "2024-03-13": 125, "2024-03-14": 64.5 },
      number_images: { "2024-03-12": [0, 2, 3], "2024-03-14": [0, 1, 2] },
    },
  };
}

describe("LedgerFileStore", () => {
  let tempDir: string;
  let logsDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "tokentab-store-"));
    logsDir = join(tempDir, "usage_logs");
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("returns null for an identity without a record", async () => {
    const store = new LedgerFileStore(logsDir, captureLogger().logger);
    expect(await store.read("42")).toBeNull();
  });

  it("writes one file per identity and reads it back", async () => {
    const store = new LedgerFileStore(logsDir, captureLogger().logger);
    await store.write("42", makeRecord());

    expect(readdirSync(logsDir)).toEqual(["42.json"]);
    expect(await store.read("42")).toEqual(makeRecord());
    expect(await store.read("43")).toBeNull();
  });

  it("rewrites a reloaded record byte for byte", async () => {
    const store = new LedgerFileStore(logsDir, captureLogger().logger);
    await store.write("42", makeRecord());
    const first = readFileSync(join(logsDir, "42.json"), "utf-8");

    const reloaded = await store.read("42");
    expect(reloaded).not.toBeNull();
    if (reloaded) await store.write("42", reloaded);
    expect(readFileSync(join(logsDir, "42.json"), "utf-8")).toBe(first);
  });

  it("leaves no temp files behind", async () => {
    const store = new LedgerFileStore(logsDir, captureLogger().logger);
    await store.write("42", makeRecord());
    await store.write("42", makeRecord());
    expect(readdirSync(logsDir)).toEqual(["42.json"]);
  });

  it("encodes identities into safe file names", () => {
    const store = new LedgerFileStore(logsDir, captureLogger().logger);
    expect(store.pathFor("guests")).toBe(join(logsDir, "guests.json"));
    expect(store.pathFor("../evil")).toBe(join(logsDir, "..%2Fevil.json"));
  });

  it("treats malformed JSON as absent and warns", async () => {
    const { logger, lines } = captureLogger();
    const store = new LedgerFileStore(logsDir, logger);
    await store.write("42", makeRecord());
    writeFileSync(join(logsDir, "42.json"), "{not json");

    expect(await store.read("42")).toBeNull();
    expect(warnings(lines())).toEqual(["Malformed usage record, starting fresh"]);
  });

  it("treats a record of the wrong shape as absent", async () => {
    const { logger, lines } = captureLogger();
    const store = new LedgerFileStore(logsDir, logger);
    await store.write("42", makeRecord());
    writeFileSync(join(logsDir, "42.json"), JSON.stringify({ user_name: "@alice" }));

    expect(await store.read("42")).toBeNull();
    expect(warnings(lines())).toEqual(["Usage record failed validation, starting fresh"]);
  });

  it("raises a StorageError when the write fails", async () => {
    // A file where the directory should be makes every write fail.
    writeFileSync(logsDir, "");
    const store = new LedgerFileStore(logsDir, captureLogger().logger);

    const err = await store.write("42", makeRecord()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StorageError);
    expect(err).toMatchObject({
      code: "STORAGE_ERROR",
      path: join(logsDir, "42.json"),
      message: "Failed to write usage record for 42",
    });
  });

  it("holds a lock while running work", async () => {
    const store = new LedgerFileStore(logsDir, captureLogger().logger);
    const result = await store.withLock("42", async () => {
      expect(readdirSync(logsDir)).toContain("42.json.lock");
      return "done";
    });
    expect(result).toBe("done");
    expect(readdirSync(logsDir)).toEqual([]);
  });

  describe("when another process holds the lock", () => {
    const noRetry = { retries: 0, minTimeout: 10 };
    let release: () => Promise<void>;

    beforeEach(async () => {
      mkdirSync(logsDir, { recursive: true });
      release = await lockfile.lock(join(logsDir, "42.json"), { realpath: false });
    });

    afterEach(async () => {
      await release();
    });

    it("fails with a storage error", async () => {
      const store = new LedgerFileStore(logsDir, captureLogger().logger, noRetry);
      const err = await store.withLock("42", async () => "unreached").catch((e: unknown) => e);

      expect(err).toBeInstanceOf(StorageError);
      expect(err).toMatchObject({
        code: "STORAGE_ERROR",
        path: join(logsDir, "42.json"),
        message: "Failed to lock usage record for 42",
        cause: { code: "ELOCKED" },
      });
    });

    it("rejects a record attempt without touching the ledger", async () => {
      const { logger } = captureLogger();
      const store = new LedgerFileStore(logsDir, logger, noRetry);
      const registry = new LedgerRegistry({ store, pricing: PRICING, logger });

      await expect(
        registry.record("42", "@alice", { kind: "chat", tokens: 1000 }),
      ).rejects.toThrow(StorageError);
      expect(registry.has("42")).toBe(false);
      expect(registry.dirtyIdentities).toEqual([]);
    });
  });

  it("passes errors from the locked work through unchanged", async () => {
    const store = new LedgerFileStore(logsDir, captureLogger().logger);
    const err = await store
      .withLock("42", async () => {
        throw new RangeError("boom");
      })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RangeError);
    expect(readdirSync(logsDir)).toEqual([]);
  });
});

describe("parseUsageRecord", () => {
  it("accepts records written before all-time tracking", () => {
    const record = makeRecord();
    delete record.current_cost.all_time;
    expect(parseUsageRecord(record)).toEqual(record);
  });

  it("fills in missing history series", () => {
    const parsed = parseUsageRecord({
      user_name: "@carol",
      current_cost: { day: 0, month: 0, all_time: 0, last_update: "2024-03-14" },
      usage_history: { chat_tokens: { "2024-03-14": 10 } },
    });
    expect(parsed?.usage_history).toEqual({
      chat_tokens: { "2024-03-14": 10 },
      transcription_seconds: {},
      number_images: {},
    });
  });

  it("rejects bad dates and image vectors", () => {
    const badDate = makeRecord();
    badDate.current_cost.last_update = "14/03/2024";
    expect(parseUsageRecord(badDate)).toBeNull();

    expect(
      parseUsageRecord({
        ...makeRecord(),
        usage_history: { ...makeRecord().usage_history, number_images: { "2024-03-14": [1, 2] } },
      }),
    ).toBeNull();
  });
});
