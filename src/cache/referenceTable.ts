// src/cache/referenceTable.ts
import { ByteCursor } from "./binary.js";
import { MalformedRecordError, decodeOrMalformed } from "./errors.js";
import { IndexType, type CacheSource } from "./source.js";

export type ArchiveEntry = Readonly<{
  id: number;
  nameHash?: number;
  crc: number;
  uncompressedCrc?: number;
  digest?: Uint8Array; // 64-byte whirlpool
  compressedSize?: number;
  size?: number;
  version: number;
  fileIds: ReadonlyArray<number>;
  fileNameHashes?: ReadonlyArray<number>;
}>;

type ArchiveEntryDraft = {
  -readonly [K in keyof ArchiveEntry]: ArchiveEntry[K];
};

const FLAG_NAMED = 0x1;
const FLAG_DIGESTS = 0x2;
const FLAG_SIZES = 0x4;
const FLAG_UNCOMPRESSED_CRCS = 0x8;
const KNOWN_FLAGS = FLAG_NAMED | FLAG_DIGESTS | FLAG_SIZES | FLAG_UNCOMPRESSED_CRCS;

const DIGEST_LENGTH = 64;

/** Java-style string hash (31·h + c, int32) over the lowercased name. */
export function hashName(name: string): number {
  let h = 0;
  for (const ch of name.toLowerCase()) {
    h = (Math.imul(h, 31) + ch.charCodeAt(0)) | 0;
  }
  return h;
}

function readMany<T>(count: number, read: (i: number) => T): T[] {
  const out: T[] = [];
  for (let i = 0; i < count; i++) out.push(read(i));
  return out;
}

function accumulate(count: number, readDelta: () => number): number[] {
  let acc = 0;
  return readMany(count, () => (acc += readDelta()));
}

/**
 * Archive listing of one cache index, as stored in index 255 under the
 * index's own id.
 */
export class ReferenceTable {
  private readonly byName = new Map<number, ArchiveEntry>();

  public constructor(
    public readonly format: number,
    public readonly version: number | undefined,
    private readonly entries: ReadonlyMap<number, ArchiveEntry>,
  ) {
    for (const entry of entries.values()) {
      if (entry.nameHash !== undefined) this.byName.set(entry.nameHash, entry);
    }
  }

  public static decode(bytes: Uint8Array): ReferenceTable {
    return decodeOrMalformed("reference table", () => decodeReferenceTable(new ByteCursor(bytes)));
  }

  /** `undefined` when the source has no reference table for `index`. */
  public static async load(source: CacheSource, index: number): Promise<ReferenceTable | undefined> {
    const bytes = await source.fetch(IndexType.REFERENCE, index);
    return bytes === undefined ? undefined : ReferenceTable.decode(bytes);
  }

  public get size(): number {
    return this.entries.size;
  }

  public archive(id: number): ArchiveEntry | undefined {
    return this.entries.get(id);
  }

  public archiveIds(): number[] {
    return [...this.entries.keys()];
  }

  public findArchiveByName(name: string): ArchiveEntry | undefined {
    return this.byName.get(hashName(name));
  }

  public hasNameHash(hash: number): boolean {
    return this.byName.has(hash);
  }
}

function decodeReferenceTable(r: ByteCursor): ReferenceTable {
  const format = r.readU8();
  if (format < 5 || format > 7) {
    throw new MalformedRecordError("reference table", `unsupported format ${format}`);
  }

  const version = format >= 6 ? r.readI32() : undefined;
  const flags = r.readU8();
  if ((flags & ~KNOWN_FLAGS) !== 0) {
    throw new MalformedRecordError("reference table", `unknown flags 0x${flags.toString(16)}`);
  }
  const named = (flags & FLAG_NAMED) !== 0;

  const readId = (): number => (format >= 7 ? r.readBigSmart() : r.readU16());

  const count = readId();
  // Every archive carries at least a crc and a version.
  if (count * 8 > r.remaining()) {
    throw new MalformedRecordError(
      "reference table",
      `${count} archives cannot fit in ${r.remaining()} bytes`,
    );
  }

  const ids = accumulate(count, readId);
  const nameHashes = named ? readMany(count, () => r.readI32()) : undefined;
  const crcs = readMany(count, () => r.readI32());
  const uncompressedCrcs =
    (flags & FLAG_UNCOMPRESSED_CRCS) !== 0 ? readMany(count, () => r.readI32()) : undefined;
  const digests =
    (flags & FLAG_DIGESTS) !== 0
      ? readMany(count, () => Uint8Array.from(r.readBytes(DIGEST_LENGTH)))
      : undefined;
  const sizes =
    (flags & FLAG_SIZES) !== 0
      ? readMany(count, () => ({ compressed: r.readU32(), size: r.readU32() }))
      : undefined;
  const versions = readMany(count, () => r.readI32());
  const childCounts = readMany(count, readId);
  const childIds = childCounts.map((n) => accumulate(n, readId));
  const childNames = named ? childCounts.map((n) => readMany(n, () => r.readI32())) : undefined;

  const entries = new Map<number, ArchiveEntry>();
  for (let k = 0; k < count; k++) {
    const id = ids[k]!;
    if (entries.has(id)) {
      throw new MalformedRecordError("reference table", `duplicate archive id ${id}`);
    }

    const fileIds = childIds[k]!;
    if (new Set(fileIds).size !== fileIds.length) {
      throw new MalformedRecordError("reference table", `duplicate file id in archive ${id}`);
    }

    const entry: ArchiveEntryDraft = {
      id,
      crc: crcs[k]!,
      version: versions[k]!,
      fileIds,
    };
    if (nameHashes) entry.nameHash = nameHashes[k]!;
    if (uncompressedCrcs) entry.uncompressedCrc = uncompressedCrcs[k]!;
    if (digests) entry.digest = digests[k]!;
    if (sizes) {
      entry.compressedSize = sizes[k]!.compressed;
      entry.size = sizes[k]!.size;
    }
    if (childNames) entry.fileNameHashes = childNames[k]!;

    entries.set(id, entry);
  }

  return new ReferenceTable(format, version, entries);
}
