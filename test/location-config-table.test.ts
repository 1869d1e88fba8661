import { describe, expect, it } from "vitest";

import { BinaryWriter, ByteCursor } from "../src/cache/binary.js";
import { CacheError, MalformedRecordError } from "../src/cache/errors.js";
import { MemoryCacheSource } from "../src/cache/source.js";
import { decodeLocationConfig } from "../src/locs/locationConfig.js";
import { LocationConfigTable } from "../src/locs/locationConfigTable.js";
import { selectConfigs, stringifyLocationConfigs } from "../src/locs/configsTool.js";
import { configCache, encodeArchive, encodeSimpleConfig } from "./helpers/cacheFixtures.js";

function packedTable(
  entries: ReadonlyArray<Readonly<{ id: number; name?: string; models?: number[] }>>,
): Buffer {
  const w = new BinaryWriter();
  for (const e of entries) encodeSimpleConfig(w.writeBigSmart(e.id), e);
  return w.toBuffer();
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err: unknown) {
    return err;
  }
  return undefined;
}

describe("LocationConfigTable.decode", () => {
  it("looks up a single record by id", () => {
    const table = LocationConfigTable.decode(
      packedTable([{ id: 6560, name: "TestObj", models: [10] }]),
    );

    expect(table.get(6560)).toEqual({ id: 6560, name: "TestObj", models: [10], flags: [] });
    expect(table.get(1)).toBeUndefined();
    expect(table.has(6560)).toBe(true);
    expect(table.size).toBe(1);
  });

  it("yields configs in ascending id order", () => {
    const table = LocationConfigTable.decode(
      packedTable([
        { id: 40000, name: "Far" },
        { id: 3, name: "Near" },
        { id: 700, name: "Middle" },
      ]),
    );

    expect(table.ids()).toEqual([3, 700, 40000]);
    expect([...table].map((c) => c.name)).toEqual(["Near", "Middle", "Far"]);
  });

  it("treats an empty buffer as an empty table", () => {
    expect(LocationConfigTable.decode(new Uint8Array(0)).size).toBe(0);
  });

  it("rejects a duplicate id", () => {
    const err = catchError(() =>
      LocationConfigTable.decode(packedTable([{ id: 9, name: "A" }, { id: 9, name: "B" }])),
    );
    expect(err).toBeInstanceOf(MalformedRecordError);
    expect(err instanceof MalformedRecordError && err.record).toBe("location 9");
  });

  it("reports a block without its terminator as malformed", () => {
    const raw = new BinaryWriter().writeBigSmart(5).writeU8(2).writeString("X").toBuffer();
    const err = catchError(() => LocationConfigTable.decode(raw));

    expect(err).toBeInstanceOf(MalformedRecordError);
    expect(err instanceof MalformedRecordError && err.record).toBe("location 5");
  });

  it("reports a truncated id as malformed", () => {
    const err = catchError(() => LocationConfigTable.decode(Uint8Array.of(0x00)));
    expect(err).toBeInstanceOf(MalformedRecordError);
    expect(err instanceof MalformedRecordError && err.record).toBe("location config table");
  });

  it("decodes the same bytes to equal tables", () => {
    const raw = packedTable([{ id: 1, name: "Rock", models: [4, 5] }]);
    expect([...LocationConfigTable.decode(raw)]).toEqual([...LocationConfigTable.decode(raw)]);
  });

  it("finds configs by name case-insensitively", () => {
    const table = LocationConfigTable.decode(
      packedTable([
        { id: 1, name: "Oak tree" },
        { id: 2, name: "Willow" },
        { id: 3, name: "OAK TREE" },
      ]),
    );
    expect(table.findByName("oak tree").map((c) => c.id)).toEqual([1, 3]);
    expect(table.findByName("Maple")).toEqual([]);
  });
});

describe("decodeLocationConfig opcodes", () => {
  it("decodes every attribute a block can carry", () => {
    const block = new BinaryWriter()
      .writeU8(1).writeU8(2).writeU16(100).writeU8(10).writeU16(101).writeU8(22)
      .writeU8(2).writeString("Door")
      .writeU8(14).writeU8(2)
      .writeU8(15).writeU8(3)
      .writeU8(17)
      .writeU8(19).writeU8(1)
      .writeU8(22)
      .writeU8(24).writeU16(0xffff)
      .writeU8(27)
      .writeU8(28).writeU8(16)
      .writeU8(29).writeI8(-5)
      .writeU8(39).writeI8(2)
      .writeU8(30).writeString("Open")
      .writeU8(32).writeString("Hidden")
      .writeU8(40).writeU8(1).writeU16(1).writeU16(2)
      .writeU8(41).writeU8(1).writeU16(3).writeU16(4)
      .writeU8(61).writeU16(7)
      .writeU8(62)
      .writeU8(64)
      .writeU8(65).writeU16(128)
      .writeU8(66).writeU16(129)
      .writeU8(67).writeU16(130)
      .writeU8(68).writeU16(9)
      .writeU8(69).writeU8(3)
      .writeU8(70).writeI16(-8)
      .writeU8(71).writeI16(16)
      .writeU8(72).writeI16(-1)
      .writeU8(73)
      .writeU8(74)
      .writeU8(75).writeU8(1)
      .writeU8(92).writeU16(0xffff).writeU16(500).writeU16(77).writeU8(1).writeU16(5).writeU16(0xffff)
      .writeU8(78).writeU16(1234).writeU8(5).writeU8(1)
      .writeU8(81).writeU8(2)
      .writeU8(82).writeU16(44)
      .writeU8(89)
      .writeU8(249).writeU8(2)
      .writeU8(1).writeU24(0x010203).writeString("hello")
      .writeU8(0).writeU24(5).writeI32(123456)
      .writeU8(0)
      .toBuffer();

    const r = new ByteCursor(block);
    const config = decodeLocationConfig(42, r);

    expect(r.atEnd()).toBe(true);
    expect(config).toEqual({
      id: 42,
      name: "Door",
      models: [100, 101],
      modelTypes: [10, 22],
      flags: [
        "PROJECTILE_PASSABLE",
        "MERGE_NORMALS",
        "ROTATED",
        "NO_SHADOW",
        "OBSTRUCTS_GROUND",
        "HOLLOW",
        "RANDOMIZE_ANIM_START",
      ],
      sizeX: 2,
      sizeY: 3,
      interactType: 1,
      wallOrDoor: 1,
      decorDisplacement: 16,
      ambient: -5,
      contrast: 50,
      actions: ["Open", null, null, null, null],
      recolors: [{ from: 1, to: 2 }],
      retextures: [{ from: 3, to: 4 }],
      category: 7,
      modelSizeX: 128,
      modelSizeHeight: 129,
      modelSizeY: 130,
      mapSceneId: 9,
      blockingMask: 3,
      offsetX: -8,
      offsetHeight: 16,
      offsetY: -1,
      supportsItems: 1,
      transforms: { varp: 500, ids: [5, null], fallback: 77 },
      ambientSound: { soundId: 1234, distance: 5, retain: 1 },
      contouredGround: 512,
      mapAreaId: 44,
      params: { "66051": "hello", "5": 123456 },
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("keeps the first model list when a second one follows", () => {
    const block = new BinaryWriter()
      .writeU8(5).writeU8(1).writeU16(7)
      .writeU8(1).writeU8(1).writeU16(8).writeU8(10)
      .writeU8(0)
      .toBuffer();

    expect(decodeLocationConfig(1, new ByteCursor(block))).toEqual({ id: 1, models: [7], flags: [] });
  });

  it("decodes randomised ambient sounds", () => {
    const block = new BinaryWriter()
      .writeU8(79).writeU16(10).writeU16(20).writeU8(3).writeU8(0).writeU8(2).writeU16(7).writeU16(8)
      .writeU8(0)
      .toBuffer();

    expect(decodeLocationConfig(1, new ByteCursor(block)).ambientSound).toEqual({
      minDelay: 10,
      maxDelay: 20,
      distance: 3,
      retain: 0,
      randomSoundIds: [7, 8],
    });
  });

  it("skips an unknown opcode by its declared width and warns", () => {
    const block = new BinaryWriter()
      .writeU8(200).writeU8(3).writeBytes(Uint8Array.of(1, 2, 3))
      .writeU8(2).writeString("After")
      .writeU8(0)
      .toBuffer();
    const warnings: string[] = [];

    const config = decodeLocationConfig(3, new ByteCursor(block), (m) => warnings.push(m));

    expect(config).toEqual({ id: 3, name: "After", models: [], flags: [] });
    expect(warnings).toEqual(["location 3: skipped unknown opcode 200 (3 bytes)"]);
  });

  it("reports an unknown opcode whose payload runs past the end", () => {
    const raw = new BinaryWriter()
      .writeBigSmart(3)
      .writeU8(200).writeU8(10).writeBytes(Uint8Array.of(1, 2))
      .toBuffer();
    const err = catchError(() => LocationConfigTable.decode(raw));

    expect(err).toBeInstanceOf(MalformedRecordError);
    expect(err instanceof MalformedRecordError && err.record).toBe("location 3");
  });
});

describe("LocationConfigTable from the cache", () => {
  it("decodes a chunked location archive, one file per id", () => {
    const files = [
      encodeSimpleConfig(new BinaryWriter(), { name: "Crate", models: [11] }).toBuffer(),
      encodeSimpleConfig(new BinaryWriter(), { name: "Barrel" }).toBuffer(),
    ];
    const table = LocationConfigTable.fromArchive(encodeArchive(files, 2), [6560, 6561]);

    expect(table.get(6560)).toEqual({ id: 6560, name: "Crate", models: [11], flags: [] });
    expect(table.get(6561)).toEqual({ id: 6561, name: "Barrel", models: [], flags: [] });
  });

  it("refuses an archive that lists one config id twice", () => {
    const files = [
      encodeSimpleConfig(new BinaryWriter(), { name: "Crate" }).toBuffer(),
      encodeSimpleConfig(new BinaryWriter(), { name: "Barrel" }).toBuffer(),
    ];
    expect(() => LocationConfigTable.fromArchive(encodeArchive(files), [6560, 6560])).toThrow(
      "Malformed archive: duplicate file id 6560",
    );
  });

  it("loads through the config reference table", async () => {
    const source = configCache([
      { id: 6560, name: "TestObj", models: [10] },
      { id: 12, name: "Fence" },
    ]);
    const table = await LocationConfigTable.load(source);

    expect(table.ids()).toEqual([12, 6560]);
    expect(table.get(6560)).toEqual({ id: 6560, name: "TestObj", models: [10], flags: [] });
  });

  it("fails when the config index has no reference table", async () => {
    await expect(LocationConfigTable.load(new MemoryCacheSource())).rejects.toThrow(CacheError);
    await expect(LocationConfigTable.load(new MemoryCacheSource())).rejects.toThrow(
      "No reference table for config index 2",
    );
  });
});

describe("config selection", () => {
  const table = LocationConfigTable.decode(
    packedTable([
      { id: 1, name: "Bank booth" },
      { id: 2, name: "Chest" },
      { id: 3, name: "Bank booth" },
    ]),
  );

  it("selects by id and warns about missing ids", () => {
    const warnings: string[] = [];
    const picked = selectConfigs(table, { ids: [2, 99] }, (m) => warnings.push(m));

    expect(picked.map((c) => c.id)).toEqual([2]);
    expect(warnings).toEqual(["No location config 99"]);
  });

  it("narrows by name", () => {
    expect(selectConfigs(table, { name: "bank BOOTH" }).map((c) => c.id)).toEqual([1, 3]);
    expect(selectConfigs(table, { ids: [1, 2], name: "Bank booth" }).map((c) => c.id)).toEqual([1]);
  });

  it("prints configs as indented JSON", () => {
    const one = table.get(2);
    expect(one).toBeDefined();
    if (!one) return;
    expect(stringifyLocationConfigs([one])).toBe(
      '[\n  {\n    "id": 2,\n    "models": [],\n    "flags": [],\n    "name": "Chest"\n  }\n]\n',
    );
  });
});
