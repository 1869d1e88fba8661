// src/render/renderTool.ts
import path from "node:path";
import { mkdir, stat, writeFile } from "node:fs/promises";

import type { MapSquareGrid } from "../mapsquares/grid.js";
import { squareLocations } from "../mapsquares/decoder.js";
import { SquareRenderer } from "./squareRenderer.js";

export type RenderToolOptions = Readonly<{
  out?: string;
  tileSize?: number;
  plane?: number;
  overwrite?: boolean;
  dryRun?: boolean;
}>;

async function existsPath(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

function defaultOutFile(i: number, j: number, plane: number): string {
  return `square_${i}_${j}_p${plane}.png`;
}

/** Renders one square's placements to a PNG. Returns the written path, if any. */
export async function runRenderTool(
  grid: MapSquareGrid,
  i: number,
  j: number,
  opts: RenderToolOptions = {},
): Promise<string | undefined> {
  const renderer = new SquareRenderer({
    ...(opts.tileSize !== undefined ? { tileSize: opts.tileSize } : {}),
    ...(opts.plane !== undefined ? { plane: opts.plane } : {}),
  });
  const square = grid.get(i, j);
  const outPath = opts.out ?? defaultOutFile(i, j, renderer.plane);

  if (opts.overwrite !== true && (await existsPath(outPath))) {
    console.warn(`Skip (exists): ${outPath}`);
    return undefined;
  }

  const locations = await squareLocations(square);

  if (opts.dryRun === true) {
    console.log(`[dry-run] square ${i},${j} (${locations.length} locations) -> ${outPath}`);
    return undefined;
  }

  await mkdir(path.dirname(outPath), { recursive: true });
  await writeFile(outPath, renderer.renderToPng(locations));
  console.log(`square ${i},${j} (${locations.length} locations) -> ${outPath}`);
  return outPath;
}
