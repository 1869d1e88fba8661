// src/locs/locationConfig.ts
//
// One location's attribute block: repeated (opcode u8, payload) ending with opcode 0.

import type { ByteCursor } from "../cache/binary.js";
import type { WarnFn } from "../cache/errors.js";

export type LocationFlag =
  | "PROJECTILE_PASSABLE"
  | "MERGE_NORMALS"
  | "OCCLUDES"
  | "ROTATED"
  | "NO_SHADOW"
  | "OBSTRUCTS_GROUND"
  | "HOLLOW"
  | "RANDOMIZE_ANIM_START";

const FLAG_ORDER: ReadonlyArray<LocationFlag> = [
  "PROJECTILE_PASSABLE",
  "MERGE_NORMALS",
  "OCCLUDES",
  "ROTATED",
  "NO_SHADOW",
  "OBSTRUCTS_GROUND",
  "HOLLOW",
  "RANDOMIZE_ANIM_START",
];

export type Recolor = Readonly<{ from: number; to: number }>;

export type LocationTransforms = Readonly<{
  varbit?: number;
  varp?: number;
  /** Location id per state value; `null` hides the location in that state. */
  ids: ReadonlyArray<number | null>;
  /** Fallback for state values past the end of `ids`. */
  fallback: number | null;
}>;

export type AmbientSound = Readonly<{
  soundId?: number;
  distance: number;
  retain: number;
  minDelay?: number;
  maxDelay?: number;
  randomSoundIds?: ReadonlyArray<number>;
}>;

type LocationConfigFields = {
  id: number;
  name?: string;
  models: ReadonlyArray<number>;
  modelTypes?: ReadonlyArray<number>;
  flags: ReadonlyArray<LocationFlag>;

  sizeX?: number;
  sizeY?: number;
  interactType?: number; // 0 walkable, 1 blocks movement only; default blocks both
  wallOrDoor?: number;
  contouredGround?: number;
  animationId?: number;
  decorDisplacement?: number;
  ambient?: number;
  contrast?: number;
  actions?: ReadonlyArray<string | null>; // five slots
  recolors?: ReadonlyArray<Recolor>;
  retextures?: ReadonlyArray<Recolor>;
  category?: number;
  modelSizeX?: number;
  modelSizeHeight?: number;
  modelSizeY?: number;
  mapSceneId?: number;
  blockingMask?: number;
  offsetX?: number;
  offsetHeight?: number;
  offsetY?: number;
  supportsItems?: number;
  transforms?: LocationTransforms;
  ambientSound?: AmbientSound;
  mapAreaId?: number;
  params?: Readonly<Record<string, string | number>>;
};

export type LocationConfig = Readonly<LocationConfigFields>;

const NONE_U16 = 0xffff;
const ACTION_COUNT = 5;

function optionalU16(r: ByteCursor): number | null {
  const v = r.readU16();
  return v === NONE_U16 ? null : v;
}

function readRecolors(r: ByteCursor): Recolor[] {
  const n = r.readU8();
  const out: Recolor[] = [];
  for (let i = 0; i < n; i++) out.push({ from: r.readU16(), to: r.readU16() });
  return out;
}

function readTransforms(r: ByteCursor, withFallback: boolean): LocationTransforms {
  const varbit = optionalU16(r);
  const varp = optionalU16(r);
  const fallback = withFallback ? optionalU16(r) : null;

  const n = r.readU8();
  const ids: Array<number | null> = [];
  for (let i = 0; i <= n; i++) ids.push(optionalU16(r));

  const out: { -readonly [K in keyof LocationTransforms]: LocationTransforms[K] } = {
    ids,
    fallback,
  };
  if (varbit !== null) out.varbit = varbit;
  if (varp !== null) out.varp = varp;
  return out;
}

function readParams(r: ByteCursor): Record<string, string | number> {
  const n = r.readU8();
  const out: Record<string, string | number> = {};
  for (let i = 0; i < n; i++) {
    const isString = r.readU8() === 1;
    const key = r.readU24();
    out[String(key)] = isString ? r.readString() : r.readI32();
  }
  return out;
}

/**
 * Decodes the attribute block for `id` at the cursor, consuming the terminator.
 *
 * Opcodes this decoder does not know are followed by a u8 payload width and
 * skipped; `warn` hears about each one.
 */
export function decodeLocationConfig(
  id: number,
  r: ByteCursor,
  warn: WarnFn = () => {},
): LocationConfig {
  const out: LocationConfigFields = { id, models: [], flags: [] };
  const flags = new Set<LocationFlag>();

  const apply = (opcode: number): void => {
    switch (opcode) {
      case 1: {
        const n = r.readU8();
        if (out.models.length > 0) {
          r.skip(n * 3);
          break;
        }
        const models: number[] = [];
        const types: number[] = [];
        for (let i = 0; i < n; i++) {
          models.push(r.readU16());
          types.push(r.readU8());
        }
        out.models = models;
        out.modelTypes = types;
        break;
      }

      case 2:
        out.name = r.readString();
        break;

      case 5: {
        const n = r.readU8();
        if (out.models.length > 0) {
          r.skip(n * 2);
          break;
        }
        const models: number[] = [];
        for (let i = 0; i < n; i++) models.push(r.readU16());
        out.models = models;
        break;
      }

      case 14:
        out.sizeX = r.readU8();
        break;
      case 15:
        out.sizeY = r.readU8();
        break;

      case 17:
        out.interactType = 0;
        flags.add("PROJECTILE_PASSABLE");
        break;
      case 18:
        flags.add("PROJECTILE_PASSABLE");
        break;

      case 19:
        out.wallOrDoor = r.readU8();
        break;
      case 21:
        out.contouredGround = 0;
        break;
      case 22:
        flags.add("MERGE_NORMALS");
        break;
      case 23:
        flags.add("OCCLUDES");
        break;

      case 24: {
        const anim = optionalU16(r);
        if (anim !== null) out.animationId = anim;
        break;
      }

      case 27:
        out.interactType = 1;
        break;
      case 28:
        out.decorDisplacement = r.readU8();
        break;
      case 29:
        out.ambient = r.readI8();
        break;
      case 39:
        out.contrast = r.readI8() * 25;
        break;

      case 30:
      case 31:
      case 32:
      case 33:
      case 34: {
        const actions = out.actions
          ? [...out.actions]
          : new Array<string | null>(ACTION_COUNT).fill(null);
        const label = r.readString();
        actions[opcode - 30] = label.toLowerCase() === "hidden" ? null : label;
        out.actions = actions;
        break;
      }

      case 40:
        out.recolors = readRecolors(r);
        break;
      case 41:
        out.retextures = readRecolors(r);
        break;

      case 61:
        out.category = r.readU16();
        break;
      case 62:
        flags.add("ROTATED");
        break;
      case 64:
        flags.add("NO_SHADOW");
        break;

      case 65:
        out.modelSizeX = r.readU16();
        break;
      case 66:
        out.modelSizeHeight = r.readU16();
        break;
      case 67:
        out.modelSizeY = r.readU16();
        break;
      case 68:
        out.mapSceneId = r.readU16();
        break;
      case 69:
        out.blockingMask = r.readU8();
        break;

      case 70:
        out.offsetX = r.readI16();
        break;
      case 71:
        out.offsetHeight = r.readI16();
        break;
      case 72:
        out.offsetY = r.readI16();
        break;

      case 73:
        flags.add("OBSTRUCTS_GROUND");
        break;
      case 74:
        flags.add("HOLLOW");
        break;
      case 75:
        out.supportsItems = r.readU8();
        break;

      case 77:
        out.transforms = readTransforms(r, false);
        break;
      case 92:
        out.transforms = readTransforms(r, true);
        break;

      case 78:
        out.ambientSound = { soundId: r.readU16(), distance: r.readU8(), retain: r.readU8() };
        break;

      case 79: {
        const minDelay = r.readU16();
        const maxDelay = r.readU16();
        const distance = r.readU8();
        const retain = r.readU8();
        const n = r.readU8();
        const randomSoundIds: number[] = [];
        for (let i = 0; i < n; i++) randomSoundIds.push(r.readU16());
        out.ambientSound = { minDelay, maxDelay, distance, retain, randomSoundIds };
        break;
      }

      case 81:
        out.contouredGround = r.readU8() * 256;
        break;
      case 82:
        out.mapAreaId = r.readU16();
        break;
      case 89:
        flags.add("RANDOMIZE_ANIM_START");
        break;

      case 249:
        out.params = readParams(r);
        break;

      default: {
        const width = r.readU8();
        r.skip(width);
        warn(`location ${id}: skipped unknown opcode ${opcode} (${width} bytes)`);
        break;
      }
    }
  };

  for (let opcode = r.readU8(); opcode !== 0; opcode = r.readU8()) apply(opcode);

  out.flags = FLAG_ORDER.filter((f) => flags.has(f));
  return Object.freeze(out);
}
