export type UsageErrorCode = "INVALID_INPUT" | "STORAGE_ERROR";

export class InvalidInputError extends Error {
  readonly code: UsageErrorCode = "INVALID_INPUT";

  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export class StorageError extends Error {
  readonly code: UsageErrorCode = "STORAGE_ERROR";

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StorageError";
  }
}
