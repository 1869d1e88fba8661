// src/render/squareRenderer.ts
import { SQUARE_SIZE } from "../cache/source.js";
import { locationLayer, type LocationLayer, type Orientation } from "../mapsquares/locationTypes.js";
import type { PlacedLocation } from "../mapsquares/locations.js";
import { createImage, fillRect, type Rgba, type RgbaImage } from "./rgbaImage.js";
import { writePngRgba } from "./png.js";

export type SquareRenderOptions = Readonly<{
  /** Pixels per tile side. */
  tileSize?: number;
  plane?: number;
}>;

export const BACKGROUND: Rgba = [24, 24, 24, 255];

export const LAYER_COLORS: Readonly<Record<LocationLayer, Rgba>> = {
  GROUND_DECOR: [72, 132, 56, 255],
  OBJECT: [204, 160, 64, 255],
  WALL_DECOR: [112, 120, 200, 255],
  WALL: [232, 232, 232, 255],
};

// Later layers paint over earlier ones.
const LAYER_ORDER: ReadonlyArray<LocationLayer> = ["GROUND_DECOR", "OBJECT", "WALL_DECOR", "WALL"];

const NEXT_CLOCKWISE: Readonly<Record<Orientation, Orientation>> = { W: "N", N: "E", E: "S", S: "W" };

/**
 * Top-down occupancy map of one square's placements on a single plane,
 * north up. Straight walls are drawn as a bar on the tile edge they face;
 * L-shaped walls on two edges; everything else fills its tile.
 */
export class SquareRenderer {
  public readonly tileSize: number;
  public readonly plane: number;

  public constructor(opts: SquareRenderOptions = {}) {
    this.tileSize = opts.tileSize ?? 4;
    this.plane = opts.plane ?? 0;
    if (!Number.isInteger(this.tileSize) || this.tileSize < 1 || this.tileSize > 64) {
      throw new Error(`tileSize must be an integer in [1, 64], got ${this.tileSize}`);
    }
    if (!Number.isInteger(this.plane) || this.plane < 0 || this.plane > 3) {
      throw new Error(`plane must be an integer in [0, 3], got ${this.plane}`);
    }
  }

  public render(locations: ReadonlyArray<PlacedLocation>): RgbaImage {
    const side = SQUARE_SIZE * this.tileSize;
    const img = createImage(side, side, BACKGROUND);

    const onPlane = locations.filter((l) => l.plane === this.plane);
    for (const layer of LAYER_ORDER) {
      for (const loc of onPlane) {
        if (locationLayer(loc.type) === layer) this.drawLocation(img, loc, layer);
      }
    }
    return img;
  }

  public renderToPng(locations: ReadonlyArray<PlacedLocation>): Buffer {
    return writePngRgba(this.render(locations));
  }

  private drawLocation(img: RgbaImage, loc: PlacedLocation, layer: LocationLayer): void {
    const ts = this.tileSize;
    const px = loc.localX * ts;
    const py = (SQUARE_SIZE - 1 - loc.localY) * ts;
    const color = LAYER_COLORS[layer];

    if (loc.type === "WALL_STRAIGHT") {
      this.drawEdge(img, px, py, loc.orientation, color);
    } else if (loc.type === "WALL_L") {
      this.drawEdge(img, px, py, loc.orientation, color);
      this.drawEdge(img, px, py, NEXT_CLOCKWISE[loc.orientation], color);
    } else {
      fillRect(img, px, py, ts, ts, color);
    }
  }

  private drawEdge(img: RgbaImage, px: number, py: number, side: Orientation, color: Rgba): void {
    const ts = this.tileSize;
    const t = Math.max(1, Math.floor(ts / 4));
    switch (side) {
      case "W":
        fillRect(img, px, py, t, ts, color);
        break;
      case "E":
        fillRect(img, px + ts - t, py, t, ts, color);
        break;
      case "N":
        fillRect(img, px, py, ts, t, color);
        break;
      case "S":
        fillRect(img, px, py + ts - t, ts, t, color);
        break;
    }
  }
}
