// src/locs/configsTool.ts
import { writeFile } from "node:fs/promises";

import type { CacheSource } from "../cache/source.js";
import type { LocationConfig } from "./locationConfig.js";
import { LocationConfigTable } from "./locationConfigTable.js";

export type ConfigsToolOptions = Readonly<{
  ids?: ReadonlyArray<number>;
  name?: string;
  out?: string;
}>;

export function stringifyLocationConfigs(configs: ReadonlyArray<LocationConfig>): string {
  return JSON.stringify(configs, null, 2) + "\n";
}

export function selectConfigs(
  table: LocationConfigTable,
  opts: Pick<ConfigsToolOptions, "ids" | "name">,
  warn: (msg: string) => void = () => {},
): LocationConfig[] {
  let selected: LocationConfig[] = opts.ids
    ? opts.ids.flatMap((id) => {
        const config = table.get(id);
        if (!config) warn(`No location config ${id}`);
        return config ? [config] : [];
      })
    : [...table];

  if (opts.name !== undefined) {
    const byName = new Set(table.findByName(opts.name).map((c) => c.id));
    selected = selected.filter((c) => byName.has(c.id));
  }
  return selected;
}

/** Dumps location configs as JSON. Returns how many were written. */
export async function runConfigsTool(source: CacheSource, opts: ConfigsToolOptions = {}): Promise<number> {
  const warnings: string[] = [];
  const table = await LocationConfigTable.load(source, (m) => warnings.push(m));
  const selected = selectConfigs(table, opts, (m) => warnings.push(m));
  for (const w of warnings) console.warn(w);

  const text = stringifyLocationConfigs(selected);
  if (opts.out) await writeFile(opts.out, text, "utf8");
  else process.stdout.write(text);

  return selected.length;
}
