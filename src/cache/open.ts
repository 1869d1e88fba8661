// src/cache/open.ts
import { stat } from "node:fs/promises";

import type { AddressingKind, GridExtent } from "../mapsquares/grid.js";
import { DirectoryCacheSource } from "./source.js";

export type OpenCacheOptions = Readonly<{
  timeoutMs?: number;
}>;

export async function openCacheDirectory(
  root: string,
  opts: OpenCacheOptions = {},
): Promise<DirectoryCacheSource> {
  const st = await stat(root).catch((err: unknown) => {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot open cache directory ${root}: ${msg}`);
  });
  if (!st.isDirectory()) throw new Error(`Cache path is not a directory: ${root}`);
  return new DirectoryCacheSource(root, opts);
}

export function parseExtent(text: string): GridExtent {
  const m = /^\s*(\d+)\s*[xX]\s*(\d+)\s*$/.exec(text);
  if (!m) throw new Error(`Invalid extent '${text}'. Expected <width>x<height>, e.g. 100x200`);
  return { width: Number(m[1]), height: Number(m[2]) };
}

export function parseAddressingKind(text: string): AddressingKind {
  const s = text.trim().toLowerCase();
  if (s === "named" || s === "name" || s === "hashed") return "named";
  if (s === "packed" || s === "id" || s === "mapsv2") return "packed";
  throw new Error(`Unknown addressing '${text}'. Expected: named|packed`);
}

export function parseNonNegativeInt(text: string, what: string): number {
  const s = text.trim();
  if (!/^\d+$/.test(s)) throw new Error(`Invalid ${what} '${text}': expected a non-negative integer`);
  return Number(s);
}

export function parsePositiveInt(text: string, what: string): number {
  const s = text.trim();
  if (!/^\d+$/.test(s) || Number(s) < 1) {
    throw new Error(`Invalid ${what} '${text}': expected a positive integer`);
  }
  return Number(s);
}
