// src/mapsquares/decoder.ts
import { AbsentError, MalformedRecordError } from "../cache/errors.js";
import type { MapSquare } from "./grid.js";
import type { PlacedLocation } from "./locations.js";

export type LocationsOutcome =
  | Readonly<{ status: "ok"; square: MapSquare; locations: ReadonlyArray<PlacedLocation> }>
  | Readonly<{ status: "absent"; square: MapSquare; error: AbsentError }>
  | Readonly<{ status: "malformed"; square: MapSquare; error: MalformedRecordError }>;

/**
 * Decodes the placements of `square`.
 *
 * @throws {AbsentError} the cache has no location file for the square
 * @throws {MalformedRecordError} the file is present but structurally invalid
 */
export function squareLocations(square: MapSquare): Promise<PlacedLocation[]> {
  return square.locations();
}

/**
 * Like {@link squareLocations}, with absence and corruption as distinct
 * outcomes. Any other failure (I/O, a missing reference table) still throws.
 */
export async function trySquareLocations(square: MapSquare): Promise<LocationsOutcome> {
  try {
    return { status: "ok", square, locations: await squareLocations(square) };
  } catch (err: unknown) {
    if (err instanceof AbsentError) return { status: "absent", square, error: err };
    if (err instanceof MalformedRecordError) return { status: "malformed", square, error: err };
    throw err;
  }
}
