import * as lockfile from "proper-lockfile";

export interface FileLockOptions {
  /** Attempts after the first before giving up with ELOCKED. */
  readonly retries: number;
  /** Delay before the first retry, doubled on each attempt. */
  readonly minTimeout: number;
}

export const DEFAULT_LOCK_OPTIONS: FileLockOptions = { retries: 5, minTimeout: 50 };

/**
 * Runs `fn` while holding an advisory lock on `filePath`. The file itself
 * need not exist; only its directory does.
 */
export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
  options: FileLockOptions = DEFAULT_LOCK_OPTIONS,
): Promise<T> {
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: { retries: options.retries, minTimeout: options.minTimeout },
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}
