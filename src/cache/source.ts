// src/cache/source.ts
import path from "node:path";
import { readFile } from "node:fs/promises";

import { CacheError } from "./errors.js";

export type CacheKey = Readonly<{
  index: number;
  fileId: number;
}>;

/**
 * Key/value view of a cache whose containers are already decompressed and
 * decrypted. `undefined` means the key does not exist.
 *
 * Bytes returned for a key must not change afterwards; callers never write to them.
 */
export interface CacheSource {
  fetch(index: number, fileId: number): Promise<Uint8Array | undefined>;
}

export const IndexType = {
  CONFIGS: 2,
  MAPS: 5,
  REFERENCE: 255,
} as const;

export const ConfigArchive = {
  LOCATIONS: 6,
} as const;

/** Tiles along each side of a map square. */
export const SQUARE_SIZE = 64;

function keyOf(index: number, fileId: number): string {
  return `${index}/${fileId}`;
}

export class MemoryCacheSource implements CacheSource {
  private readonly files = new Map<string, Uint8Array>();

  public set(index: number, fileId: number, bytes: Uint8Array): this {
    this.files.set(keyOf(index, fileId), Uint8Array.from(bytes));
    return this;
  }

  public delete(index: number, fileId: number): boolean {
    return this.files.delete(keyOf(index, fileId));
  }

  public fetch(index: number, fileId: number): Promise<Uint8Array | undefined> {
    return Promise.resolve(this.files.get(keyOf(index, fileId)));
  }
}

export type DirectoryCacheSourceOptions = Readonly<{
  /** Upper bound for a single file read, at least 1. */
  timeoutMs?: number;
}>;

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Reads an extracted cache laid out as `<root>/<index>/<fileId>.dat`.
 */
export class DirectoryCacheSource implements CacheSource {
  public constructor(
    public readonly root: string,
    private readonly opts: DirectoryCacheSourceOptions = {},
  ) {
    const { timeoutMs } = opts;
    if (timeoutMs !== undefined && (!Number.isInteger(timeoutMs) || timeoutMs < 1)) {
      throw new RangeError(`timeoutMs must be a positive integer, got ${timeoutMs}`);
    }
  }

  public filePath(index: number, fileId: number): string {
    return path.join(this.root, String(index), `${fileId}.dat`);
  }

  public async fetch(index: number, fileId: number): Promise<Uint8Array | undefined> {
    const file = this.filePath(index, fileId);
    const signal =
      this.opts.timeoutMs !== undefined ? AbortSignal.timeout(this.opts.timeoutMs) : undefined;

    try {
      const bytes = signal ? await readFile(file, { signal }) : await readFile(file);
      return new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    } catch (err: unknown) {
      if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
        return undefined;
      }
      if (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError")) {
        throw new CacheError(`Timed out after ${this.opts.timeoutMs}ms reading ${file}`, {
          cause: err,
        });
      }
      throw err;
    }
  }
}
