// src/locs/locationConfigTable.ts
import { ByteCursor } from "../cache/binary.js";
import { splitArchive } from "../cache/archive.js";
import { CacheError, MalformedRecordError, decodeOrMalformed, type WarnFn } from "../cache/errors.js";
import { ReferenceTable } from "../cache/referenceTable.js";
import { ConfigArchive, IndexType, type CacheSource } from "../cache/source.js";
import { decodeLocationConfig, type LocationConfig } from "./locationConfig.js";

/**
 * Read-only id -> {@link LocationConfig} registry. Built all at once; a
 * decode failure anywhere leaves no table behind.
 */
export class LocationConfigTable implements Iterable<LocationConfig> {
  private constructor(private readonly configs: ReadonlyMap<number, LocationConfig>) {}

  /**
   * Packed table layout: repeated `[id: big smart][attribute block]` until
   * the buffer is exhausted.
   */
  public static decode(raw: Uint8Array, warn: WarnFn = () => {}): LocationConfigTable {
    const r = new ByteCursor(raw);
    const configs = new Map<number, LocationConfig>();

    while (!r.atEnd()) {
      const id = decodeOrMalformed("location config table", () => r.readBigSmart());
      if (configs.has(id)) {
        throw new MalformedRecordError(`location ${id}`, "duplicate id in table");
      }
      configs.set(id, decodeOrMalformed(`location ${id}`, () => decodeLocationConfig(id, r, warn)));
    }

    return new LocationConfigTable(sortById(configs));
  }

  /** One attribute block per archive file; the file id is the location id. */
  public static fromArchive(
    archive: Uint8Array,
    fileIds: ReadonlyArray<number>,
    warn: WarnFn = () => {},
  ): LocationConfigTable {
    const files = splitArchive(archive, fileIds);
    const configs = new Map<number, LocationConfig>();

    for (const [id, bytes] of files) {
      const config = decodeOrMalformed(`location ${id}`, () =>
        decodeLocationConfig(id, new ByteCursor(bytes), warn),
      );
      configs.set(id, config);
    }

    return new LocationConfigTable(sortById(configs));
  }

  /** Reads the location archive of the config index through its reference table. */
  public static async load(source: CacheSource, warn: WarnFn = () => {}): Promise<LocationConfigTable> {
    const refs = await ReferenceTable.load(source, IndexType.CONFIGS);
    if (!refs) throw new CacheError(`No reference table for config index ${IndexType.CONFIGS}`);

    const entry = refs.archive(ConfigArchive.LOCATIONS);
    if (!entry) {
      throw new CacheError(`Config index has no location archive ${ConfigArchive.LOCATIONS}`);
    }

    const bytes = await source.fetch(IndexType.CONFIGS, entry.id);
    if (!bytes) {
      throw new CacheError(
        `Missing location archive (index ${IndexType.CONFIGS}, file ${entry.id})`,
      );
    }

    return LocationConfigTable.fromArchive(bytes, entry.fileIds, warn);
  }

  public get size(): number {
    return this.configs.size;
  }

  public get(id: number): LocationConfig | undefined {
    return this.configs.get(id);
  }

  public has(id: number): boolean {
    return this.configs.has(id);
  }

  /** Ascending. */
  public ids(): number[] {
    return [...this.configs.keys()];
  }

  public findByName(name: string): LocationConfig[] {
    const wanted = name.toLowerCase();
    return [...this].filter((c) => c.name !== undefined && c.name.toLowerCase() === wanted);
  }

  public [Symbol.iterator](): Iterator<LocationConfig> {
    return this.configs.values();
  }
}

function sortById(configs: Map<number, LocationConfig>): ReadonlyMap<number, LocationConfig> {
  return new Map([...configs].sort((a, b) => a[0] - b[0]));
}
