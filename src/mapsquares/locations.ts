// src/mapsquares/locations.ts
//
// Location file of one map square:
//
//   id = -1
//   repeat:
//     idDelta  extended smart   0 = end of file, nothing may follow
//     id += idDelta
//     repeat:
//       posDelta  smart         0 = next id
//       position += posDelta - 1        (plane << 12 | localX << 6 | localY)
//       attributes u8                   (type << 2 | rotation)

import { ByteCursor } from "../cache/binary.js";
import { MalformedRecordError, decodeOrMalformed } from "../cache/errors.js";
import { SQUARE_SIZE } from "../cache/source.js";
import { LOCATION_TYPES, ORIENTATIONS, type LocationType, type Orientation } from "./locationTypes.js";

export type PlacedLocation = Readonly<{
  id: number;
  plane: number; // 0..3
  localX: number; // 0..63
  localY: number; // 0..63
  x: number; // world tile
  y: number; // world tile
  type: LocationType;
  orientation: Orientation;
}>;

export type SquareCoordinate = Readonly<{ i: number; j: number }>;

const MAX_POSITION = 4 * SQUARE_SIZE * SQUARE_SIZE - 1;

export function decodeLocations(bytes: Uint8Array, square: SquareCoordinate): PlacedLocation[] {
  const record = `locations of map square ${square.i},${square.j}`;
  const r = new ByteCursor(bytes);
  const out: PlacedLocation[] = [];

  return decodeOrMalformed(record, () => {
    let id = -1;

    for (let idDelta = r.readExtendedSmart(); idDelta !== 0; idDelta = r.readExtendedSmart()) {
      id += idDelta;
      let position = 0;

      for (let posDelta = r.readSmart(); posDelta !== 0; posDelta = r.readSmart()) {
        position += posDelta - 1;
        if (position > MAX_POSITION) {
          throw new MalformedRecordError(
            record,
            `position ${position} of location ${id} is outside the square`,
          );
        }

        const attributes = r.readU8();
        const type = LOCATION_TYPES[attributes >> 2];
        if (type === undefined) {
          throw new MalformedRecordError(
            record,
            `unknown placement type ${attributes >> 2} for location ${id}`,
          );
        }

        const localX = (position >> 6) & 0x3f;
        const localY = position & 0x3f;
        out.push({
          id,
          plane: position >> 12,
          localX,
          localY,
          x: square.i * SQUARE_SIZE + localX,
          y: square.j * SQUARE_SIZE + localY,
          type,
          orientation: ORIENTATIONS[attributes & 0x3]!,
        });
      }
    }

    if (!r.atEnd()) {
      throw new MalformedRecordError(
        record,
        `${r.remaining()} bytes after the end of the location list`,
      );
    }
    return out;
  });
}
