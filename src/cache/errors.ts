// src/cache/errors.ts
import type { CacheKey } from "./source.js";

export type WarnFn = (msg: string) => void;

export class CacheError extends Error {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A cursor read ran past the end of its buffer. */
export class OutOfBoundsError extends CacheError {
  public constructor(
    public readonly offset: number,
    public readonly need: number,
    public readonly have: number,
  ) {
    super(`Unexpected end of data at offset ${offset}: need ${need} bytes, have ${have}`);
  }
}

/** Bytes were present but do not form a valid record. */
export class MalformedRecordError extends CacheError {
  public constructor(
    public readonly record: string,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(`Malformed ${record}: ${detail}`, options);
  }
}

/**
 * The square has no location record in the cache. This is the normal state
 * for most of the grid, not a failure of the cache.
 */
export class AbsentError extends CacheError {
  public constructor(
    public readonly i: number,
    public readonly j: number,
    public readonly key: CacheKey | undefined = undefined,
  ) {
    super(
      key
        ? `Map square ${i},${j} has no location data (index ${key.index}, file ${key.fileId})`
        : `Map square ${i},${j} has no location data`,
    );
  }
}

export class GridBoundsError extends CacheError {
  public constructor(
    public readonly i: number,
    public readonly j: number,
    public readonly width: number,
    public readonly height: number,
  ) {
    super(`Map square ${i},${j} is outside the grid (${width}x${height})`);
  }
}

/**
 * Runs a decode step and reports a truncated stream as a malformed record.
 */
export function decodeOrMalformed<T>(record: string, decode: () => T): T {
  try {
    return decode();
  } catch (err: unknown) {
    if (err instanceof OutOfBoundsError) {
      throw new MalformedRecordError(record, err.message, { cause: err });
    }
    throw err;
  }
}
