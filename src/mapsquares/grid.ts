// src/mapsquares/grid.ts
import { splitArchive } from "../cache/archive.js";
import { AbsentError, CacheError, GridBoundsError } from "../cache/errors.js";
import { ReferenceTable, hashName, type ArchiveEntry } from "../cache/referenceTable.js";
import { IndexType, type CacheKey, type CacheSource } from "../cache/source.js";
import { decodeLocations, type PlacedLocation } from "./locations.js";

export type GridExtent = Readonly<{
  width: number; // i in [0, width)
  height: number; // j in [0, height)
}>;

export const DEFAULT_EXTENT: GridExtent = { width: 100, height: 200 };

export type AddressingKind = "named" | "packed";

/** File of a square's archive that holds the location list. */
export const LOCATIONS_FILE = 0;

/** Map archive of one square and the file ids its reference table lists. */
export type SquareArchive = Readonly<{
  key: CacheKey;
  fileIds: ReadonlyArray<number>;
}>;

/** Maps a square coordinate to the archive holding its location file. */
export interface SquareAddressing {
  readonly kind: AddressingKind;
  /** Largest extent the scheme can address. */
  readonly limit: GridExtent;
  /** `undefined` when the reference table lists no archive for the square. */
  resolve(i: number, j: number): Promise<SquareArchive | undefined>;
  /** Smallest extent covering every square the cache has a record for. */
  queryExtent(): Promise<GridExtent>;
}

async function requireReferenceTable(source: CacheSource, index: number): Promise<ReferenceTable> {
  const refs = await ReferenceTable.load(source, index);
  if (!refs) throw new CacheError(`No reference table for map index ${index}`);
  return refs;
}

function squareArchive(index: number, entry: ArchiveEntry | undefined): SquareArchive | undefined {
  return entry ? { key: { index, fileId: entry.id }, fileIds: entry.fileIds } : undefined;
}

export function packedSquareId(i: number, j: number): number {
  return i | (j << 7);
}

/** Archive id `i | j << 7`. The reference table loads once. */
export class PackedAddressing implements SquareAddressing {
  public readonly kind = "packed";
  public readonly limit: GridExtent = { width: 128, height: 256 };
  private refs: Promise<ReferenceTable> | undefined;

  public constructor(
    private readonly source: CacheSource,
    private readonly index: number = IndexType.MAPS,
  ) {}

  private referenceTable(): Promise<ReferenceTable> {
    this.refs ??= requireReferenceTable(this.source, this.index);
    return this.refs;
  }

  public async resolve(i: number, j: number): Promise<SquareArchive | undefined> {
    const refs = await this.referenceTable();
    return squareArchive(this.index, refs.archive(packedSquareId(i, j)));
  }

  public async queryExtent(): Promise<GridExtent> {
    const refs = await this.referenceTable();
    let width = 0;
    let height = 0;
    for (const id of refs.archiveIds()) {
      width = Math.max(width, (id & 0x7f) + 1);
      height = Math.max(height, (id >> 7) + 1);
    }
    return { width, height };
  }
}

export function locationArchiveName(i: number, j: number): string {
  return `l${i}_${j}`;
}

/** Archive whose name hash matches `l{i}_{j}`. The reference table loads once. */
export class NamedAddressing implements SquareAddressing {
  public readonly kind = "named";
  public readonly limit: GridExtent = { width: 256, height: 256 };
  private refs: Promise<ReferenceTable> | undefined;

  public constructor(
    private readonly source: CacheSource,
    private readonly index: number = IndexType.MAPS,
  ) {}

  private referenceTable(): Promise<ReferenceTable> {
    this.refs ??= requireReferenceTable(this.source, this.index);
    return this.refs;
  }

  public async resolve(i: number, j: number): Promise<SquareArchive | undefined> {
    const refs = await this.referenceTable();
    return squareArchive(this.index, refs.findArchiveByName(locationArchiveName(i, j)));
  }

  public async queryExtent(): Promise<GridExtent> {
    const refs = await this.referenceTable();
    let width = 0;
    let height = 0;
    for (let i = 0; i < this.limit.width; i++) {
      for (let j = 0; j < this.limit.height; j++) {
        if (refs.hasNameHash(hashName(locationArchiveName(i, j)))) {
          width = Math.max(width, i + 1);
          height = Math.max(height, j + 1);
        }
      }
    }
    return { width, height };
  }
}

export function createAddressing(
  kind: AddressingKind,
  source: CacheSource,
  index: number = IndexType.MAPS,
): SquareAddressing {
  return kind === "packed" ? new PackedAddressing(source, index) : new NamedAddressing(source, index);
}

/**
 * Handle to one square of the grid. Creating it touches nothing; the cache
 * is read only when its location data is requested.
 */
export class MapSquare {
  public constructor(
    public readonly i: number,
    public readonly j: number,
    private readonly source: CacheSource,
    private readonly addressing: SquareAddressing,
  ) {}

  public get regionId(): number {
    return (this.i << 8) | this.j;
  }

  public async resolveKey(): Promise<CacheKey | undefined> {
    return (await this.addressing.resolve(this.i, this.j))?.key;
  }

  /**
   * Location file of the square's archive. Throws {@link AbsentError} when the
   * archive is unlisted, missing from the store, or has no location file.
   */
  public async fetchLocationData(): Promise<Uint8Array> {
    const archive = await this.addressing.resolve(this.i, this.j);
    if (!archive) throw new AbsentError(this.i, this.j);

    const { key, fileIds } = archive;
    const bytes = await this.source.fetch(key.index, key.fileId);
    if (!bytes || !fileIds.includes(LOCATIONS_FILE)) throw new AbsentError(this.i, this.j, key);

    const file = splitArchive(bytes, fileIds).get(LOCATIONS_FILE);
    if (!file) throw new AbsentError(this.i, this.j, key);
    return file;
  }

  /**
   * Placements of this square, decoded afresh on every call.
   *
   * @throws {AbsentError} the cache has no location file for the square
   * @throws {MalformedRecordError} the file is present but structurally invalid
   */
  public async locations(): Promise<PlacedLocation[]> {
    return decodeLocations(await this.fetchLocationData(), this);
  }
}

export type MapSquareGridOptions = Readonly<{
  extent?: GridExtent;
  addressing?: SquareAddressing;
}>;

export type OpenGridOptions = Readonly<{
  /** Queried from the map index reference table when omitted. */
  extent?: GridExtent;
  addressing?: AddressingKind;
}>;

function checkExtent(extent: GridExtent, limit: GridExtent): void {
  const ok = (v: number, max: number): boolean => Number.isInteger(v) && v >= 0 && v <= max;
  if (!ok(extent.width, limit.width) || !ok(extent.height, limit.height)) {
    throw new RangeError(
      `Grid extent ${extent.width}x${extent.height} must be integers within ${limit.width}x${limit.height}`,
    );
  }
}

/**
 * Bounded address space of map squares.
 *
 * Coordinates outside `[0, width) x [0, height)` always throw {@link GridBoundsError}.
 */
export class MapSquareGrid implements Iterable<MapSquare> {
  public readonly extent: GridExtent;
  public readonly addressing: SquareAddressing;

  public constructor(
    private readonly source: CacheSource,
    opts: MapSquareGridOptions = {},
  ) {
    this.addressing = opts.addressing ?? new NamedAddressing(source);
    this.extent = opts.extent ?? DEFAULT_EXTENT;
    checkExtent(this.extent, this.addressing.limit);
  }

  public static async open(source: CacheSource, opts: OpenGridOptions = {}): Promise<MapSquareGrid> {
    const addressing = createAddressing(opts.addressing ?? "named", source);
    const extent = opts.extent ?? (await addressing.queryExtent());
    return new MapSquareGrid(source, { extent, addressing });
  }

  public get size(): number {
    return this.extent.width * this.extent.height;
  }

  public contains(i: number, j: number): boolean {
    return (
      Number.isInteger(i) &&
      Number.isInteger(j) &&
      i >= 0 &&
      j >= 0 &&
      i < this.extent.width &&
      j < this.extent.height
    );
  }

  public get(i: number, j: number): MapSquare {
    if (!this.contains(i, j)) {
      throw new GridBoundsError(i, j, this.extent.width, this.extent.height);
    }
    return new MapSquare(i, j, this.source, this.addressing);
  }

  /** Row-major (i outer, j inner). Each call starts a fresh pass. */
  public *squares(): Generator<MapSquare, void, undefined> {
    for (let i = 0; i < this.extent.width; i++) {
      for (let j = 0; j < this.extent.height; j++) {
        yield new MapSquare(i, j, this.source, this.addressing);
      }
    }
  }

  public [Symbol.iterator](): Iterator<MapSquare> {
    return this.squares();
  }
}
