import { describe, expect, it } from "vitest";

import { AbsentError, MalformedRecordError } from "../src/cache/errors.js";
import { IndexType, MemoryCacheSource, type CacheSource } from "../src/cache/source.js";
import { squareLocations, trySquareLocations } from "../src/mapsquares/decoder.js";
import { MapSquareGrid, PackedAddressing } from "../src/mapsquares/grid.js";
import { decodeLocations } from "../src/mapsquares/locations.js";
import { locationLayer } from "../src/mapsquares/locationTypes.js";
import {
  encodeArchive,
  encodeLocationFile,
  encodeReferenceTable,
  namedMapCache,
  packedMapCache,
} from "./helpers/cacheFixtures.js";

const SQUARE = { i: 50, j: 50 };

function packedGrid(source: CacheSource): MapSquareGrid {
  return new MapSquareGrid(source, { addressing: new PackedAddressing(source) });
}

describe("decodeLocations", () => {
  it("decodes an immediate terminator as an empty square", () => {
    expect(decodeLocations(Uint8Array.of(0x00), SQUARE)).toEqual([]);
  });

  it("decodes a hand-assembled placement", () => {
    // id delta 6561, position delta 4228 (plane 1, x 2, y 3), type 10 rotation 1
    const bytes = Uint8Array.of(0x99, 0xa1, 0x90, 0x84, 0x29, 0x00, 0x00);

    expect(decodeLocations(bytes, SQUARE)).toEqual([
      {
        id: 6560,
        plane: 1,
        localX: 2,
        localY: 3,
        x: 3202,
        y: 3203,
        type: "CENTREPIECE_STRAIGHT",
        orientation: "N",
      },
    ]);
  });

  it("accumulates id and position deltas", () => {
    const bytes = encodeLocationFile([
      {
        id: 6560,
        placements: [
          { plane: 0, localX: 10, localY: 20, type: "GROUND_DECOR", orientation: "W" },
          { plane: 0, localX: 10, localY: 20, type: "WALL_STRAIGHT", orientation: "S" },
        ],
      },
      {
        id: 40000,
        placements: [{ plane: 3, localX: 63, localY: 63, type: "ROOF_FLAT", orientation: "E" }],
      },
    ]);

    expect(decodeLocations(bytes, { i: 1, j: 2 })).toEqual([
      { id: 6560, plane: 0, localX: 10, localY: 20, x: 74, y: 148, type: "GROUND_DECOR", orientation: "W" },
      { id: 6560, plane: 0, localX: 10, localY: 20, x: 74, y: 148, type: "WALL_STRAIGHT", orientation: "S" },
      { id: 40000, plane: 3, localX: 63, localY: 63, x: 127, y: 191, type: "ROOF_FLAT", orientation: "E" },
    ]);
  });

  it("reports a file cut after an id as malformed", () => {
    expect(() => decodeLocations(Uint8Array.of(0x01), SQUARE)).toThrow(MalformedRecordError);
    expect(() => decodeLocations(Uint8Array.of(0x01, 0x80), SQUARE)).toThrow(MalformedRecordError);
  });

  it("names the square in a malformed record", () => {
    expect(() => decodeLocations(Uint8Array.of(0x01, 0x01), SQUARE)).toThrow(
      "Malformed locations of map square 50,50: Unexpected end of data at offset 2: need 1 bytes, have 0",
    );
  });

  it("rejects a position past plane 3", () => {
    // position delta 16385 lands on 16384
    expect(() => decodeLocations(Uint8Array.of(0x01, 0xc0, 0x01, 0x00, 0x00, 0x00), SQUARE)).toThrow(
      "Malformed locations of map square 50,50: position 16384 of location 0 is outside the square",
    );
  });

  it("rejects bytes after the closing terminator", () => {
    expect(() => decodeLocations(Uint8Array.of(0x00, 0x05), SQUARE)).toThrow(
      "Malformed locations of map square 50,50: 1 bytes after the end of the location list",
    );
  });

  it("rejects an unknown placement type", () => {
    expect(() => decodeLocations(Uint8Array.of(0x01, 0x01, 23 << 2, 0x00, 0x00), SQUARE)).toThrow(
      "Malformed locations of map square 50,50: unknown placement type 23 for location 0",
    );
  });
});

describe("locationLayer", () => {
  it("groups placement types by scene layer", () => {
    expect(locationLayer("WALL_SQUARE_CORNER")).toBe("WALL");
    expect(locationLayer("WALLDECOR_DIAGONAL_BOTH")).toBe("WALL_DECOR");
    expect(locationLayer("WALL_DIAGONAL")).toBe("OBJECT");
    expect(locationLayer("ROOFEDGE_SQUARE_CORNER")).toBe("OBJECT");
    expect(locationLayer("GROUND_DECOR")).toBe("GROUND_DECOR");
  });
});

describe("squareLocations", () => {
  const file = encodeLocationFile([
    {
      id: 6560,
      placements: [{ plane: 0, localX: 1, localY: 1, type: "CENTREPIECE_STRAIGHT", orientation: "W" }],
    },
  ]);

  it("decodes the square's file from the cache", async () => {
    const grid = packedGrid(packedMapCache([{ i: 50, j: 50, bytes: file }]));

    expect(await squareLocations(grid.get(50, 50))).toEqual([
      { id: 6560, plane: 0, localX: 1, localY: 1, x: 3201, y: 3201, type: "CENTREPIECE_STRAIGHT", orientation: "W" },
    ]);
  });

  it("decodes through the square handle itself", async () => {
    const grid = packedGrid(packedMapCache([{ i: 50, j: 50, bytes: file }]));
    const square = grid.get(50, 50);

    expect(await square.locations()).toEqual(await squareLocations(square));
  });

  it("returns equal but separate results on every call", async () => {
    const grid = packedGrid(packedMapCache([{ i: 50, j: 50, bytes: file }]));
    const square = grid.get(50, 50);

    const a = await squareLocations(square);
    const b = await squareLocations(square);
    expect(b).toEqual(a);
    expect(b).not.toBe(a);
  });

  it("raises AbsentError for a square the reference table does not list", async () => {
    const grid = packedGrid(packedMapCache([{ i: 1, j: 1, bytes: file }]));
    const err = await squareLocations(grid.get(50, 50)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AbsentError);
    expect(err).not.toBeInstanceOf(MalformedRecordError);
    expect(err instanceof AbsentError && err.key).toBeUndefined();
  });

  it("raises AbsentError for a listed archive missing from the store", async () => {
    const source = packedMapCache([{ i: 50, j: 50, bytes: file }]);
    source.delete(IndexType.MAPS, 6450);
    const err = await squareLocations(packedGrid(source).get(50, 50)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AbsentError);
    expect(err instanceof AbsentError && err.key).toEqual({ index: 5, fileId: 6450 });
  });

  it("takes file 0 of a multi-file archive split over two chunks", async () => {
    const tiles = Uint8Array.of(0x01, 0x02, 0x03, 0x04, 0x05);
    const source = new MemoryCacheSource()
      .set(IndexType.REFERENCE, IndexType.MAPS, encodeReferenceTable([{ id: 6450, fileIds: [0, 1] }]))
      .set(IndexType.MAPS, 6450, encodeArchive([file, tiles], 2));

    expect(await squareLocations(packedGrid(source).get(50, 50))).toEqual([
      { id: 6560, plane: 0, localX: 1, localY: 1, x: 3201, y: 3201, type: "CENTREPIECE_STRAIGHT", orientation: "W" },
    ]);
  });

  it("raises AbsentError for an archive without a location file", async () => {
    const source = new MemoryCacheSource()
      .set(IndexType.REFERENCE, IndexType.MAPS, encodeReferenceTable([{ id: 6450, fileIds: [3] }]))
      .set(IndexType.MAPS, 6450, Uint8Array.of(0x01, 0x02, 0x03));
    const err = await squareLocations(packedGrid(source).get(50, 50)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AbsentError);
    expect(err instanceof Error && err.message).toBe(
      "Map square 50,50 has no location data (index 5, file 6450)",
    );
  });

  it("raises AbsentError when no archive carries the square's name", async () => {
    const grid = new MapSquareGrid(namedMapCache([{ i: 1, j: 1, bytes: file }]));
    const err = await squareLocations(grid.get(2, 2)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AbsentError);
    expect(err instanceof AbsentError && err.key).toBeUndefined();
    expect(err instanceof Error && err.message).toBe("Map square 2,2 has no location data");
  });

  it("raises MalformedRecordError, not AbsentError, for a corrupt file", async () => {
    const grid = packedGrid(packedMapCache([{ i: 50, j: 50, bytes: Uint8Array.of(0x01) }]));
    const err = await squareLocations(grid.get(50, 50)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MalformedRecordError);
    expect(err).not.toBeInstanceOf(AbsentError);
  });
});

describe("trySquareLocations", () => {
  it("reports each outcome by status", async () => {
    const source = packedMapCache([
      { i: 0, j: 0, bytes: Uint8Array.of(0x00) },
      { i: 1, j: 0, bytes: Uint8Array.of(0x01) },
    ]);
    const grid = packedGrid(source);

    const ok = await trySquareLocations(grid.get(0, 0));
    const malformed = await trySquareLocations(grid.get(1, 0));
    const absent = await trySquareLocations(grid.get(2, 0));

    expect(ok.status).toBe("ok");
    expect(ok.status === "ok" && ok.locations).toEqual([]);
    expect(malformed.status).toBe("malformed");
    expect(absent.status).toBe("absent");
    expect(absent.square.i).toBe(2);
  });

  it("lets other failures through", async () => {
    const broken: CacheSource = {
      fetch: () => Promise.reject(new Error("disk unavailable")),
    };
    const grid = packedGrid(broken);

    await expect(trySquareLocations(grid.get(0, 0))).rejects.toThrow("disk unavailable");
  });
});
