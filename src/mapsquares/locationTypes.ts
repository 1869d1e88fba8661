// src/mapsquares/locationTypes.ts

/** Rotation 0..3 of a placed location. */
export type Orientation = "W" | "N" | "E" | "S";

export const ORIENTATIONS: ReadonlyArray<Orientation> = ["W", "N", "E", "S"];

export const LOCATION_TYPES = [
  "WALL_STRAIGHT",
  "WALL_DIAGONAL_CORNER",
  "WALL_L",
  "WALL_SQUARE_CORNER",
  "WALLDECOR_STRAIGHT_NOOFFSET",
  "WALLDECOR_STRAIGHT_OFFSET",
  "WALLDECOR_DIAGONAL_OFFSET",
  "WALLDECOR_DIAGONAL_NOOFFSET",
  "WALLDECOR_DIAGONAL_BOTH",
  "WALL_DIAGONAL",
  "CENTREPIECE_STRAIGHT",
  "CENTREPIECE_DIAGONAL",
  "ROOF_STRAIGHT",
  "ROOF_DIAGONAL_WITH_ROOFEDGE",
  "ROOF_DIAGONAL",
  "ROOF_L_CONCAVE",
  "ROOF_L_CONVEX",
  "ROOF_FLAT",
  "ROOFEDGE_STRAIGHT",
  "ROOFEDGE_DIAGONAL_CORNER",
  "ROOFEDGE_L",
  "ROOFEDGE_SQUARE_CORNER",
  "GROUND_DECOR",
] as const;

/** Placement shape, indexed by the 6-bit type code. */
export type LocationType = (typeof LOCATION_TYPES)[number];

/** Scene layer a placement type occupies on its tile. */
export type LocationLayer = "WALL" | "WALL_DECOR" | "OBJECT" | "GROUND_DECOR";

export function locationTypeCode(type: LocationType): number {
  return LOCATION_TYPES.indexOf(type);
}

export function locationLayer(type: LocationType): LocationLayer {
  const code = locationTypeCode(type);
  if (code <= 3) return "WALL";
  if (code <= 8) return "WALL_DECOR";
  if (code <= 21) return "OBJECT";
  return "GROUND_DECOR";
}
