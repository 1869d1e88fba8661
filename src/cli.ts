#!/usr/bin/env node
// src/cli.ts
import { Command, Option } from "commander";

import {
  openCacheDirectory,
  parseAddressingKind,
  parseExtent,
  parseNonNegativeInt,
  parsePositiveInt,
} from "./cache/open.js";
import type { CacheSource } from "./cache/source.js";
import { runConfigsTool } from "./locs/configsTool.js";
import { LocationConfigTable } from "./locs/locationConfigTable.js";
import { MapSquareGrid } from "./mapsquares/grid.js";
import { runFindTool, runSquaresTool } from "./mapsquares/findTool.js";
import { runRenderTool } from "./render/renderTool.js";

type CacheOpts = {
  cache: string;
  addressing: string;
  extent?: string;
  timeout?: string;
};

function withCacheOptions(cmd: Command): Command {
  return cmd
    .addOption(
      new Option("--cache <dir>", "Extracted cache directory (<dir>/<index>/<file>.dat)")
        .env("MSTOOLS_CACHE")
        .makeOptionMandatory(),
    )
    .option("--addressing <kind>", "Map square addressing: named|packed", "named")
    .option("--extent <WxH>", "Grid extent (default: queried from the map reference table)")
    .option("--timeout <ms>", "Per-file read timeout in milliseconds");
}

async function openSource(opts: CacheOpts): Promise<CacheSource> {
  return openCacheDirectory(
    opts.cache,
    opts.timeout !== undefined ? { timeoutMs: parsePositiveInt(opts.timeout, "timeout") } : {},
  );
}

async function openGrid(source: CacheSource, opts: CacheOpts): Promise<MapSquareGrid> {
  return MapSquareGrid.open(source, {
    addressing: parseAddressingKind(opts.addressing),
    ...(opts.extent !== undefined ? { extent: parseExtent(opts.extent) } : {}),
  });
}

function parseIds(ids: ReadonlyArray<string> | undefined): number[] | undefined {
  return ids?.map((s) => parseNonNegativeInt(s, "location id"));
}

const program = new Command();

program
  .name("mstools")
  .description("Map square and location config tools for extracted game caches")
  .version("0.1.0");

withCacheOptions(
  program
    .command("configs")
    .description("Dump location configs as JSON")
    .option("--id <ids...>", "Only these location ids")
    .option("--name <name>", "Only locations with this name (case-insensitive)")
    .option("-o, --output <path>", "Write JSON to a file (default: stdout)"),
).action(async (opts: CacheOpts & { id?: string[]; name?: string; output?: string }) => {
  const source = await openSource(opts);
  const ids = parseIds(opts.id);
  await runConfigsTool(source, {
    ...(ids !== undefined ? { ids } : {}),
    ...(opts.name !== undefined ? { name: opts.name } : {}),
    ...(opts.output !== undefined ? { out: opts.output } : {}),
  });
});

withCacheOptions(
  program
    .command("squares")
    .description("List map squares that have locations, with their location counts")
    .option("--concurrency <n>", "Squares decoded at once", "8"),
).action(async (opts: CacheOpts & { concurrency: string }) => {
  const source = await openSource(opts);
  const grid = await openGrid(source, opts);
  await runSquaresTool(grid, { concurrency: parsePositiveInt(opts.concurrency, "concurrency") });
});

withCacheOptions(
  program
    .command("find")
    .description("Find every placement of a location, by id or by name")
    .option("--id <ids...>", "Location ids")
    .option("--name <name>", "Location name, resolved through the config table")
    .option("--json", "Print matches as JSON", false)
    .option("--concurrency <n>", "Squares decoded at once", "8"),
).action(
  async (
    opts: CacheOpts & { id?: string[]; name?: string; json: boolean; concurrency: string },
  ) => {
    const source = await openSource(opts);
    const ids = new Set(parseIds(opts.id) ?? []);

    if (opts.name !== undefined) {
      const warnings: string[] = [];
      const table = await LocationConfigTable.load(source, (m) => warnings.push(m));
      for (const w of warnings) console.warn(w);

      const named = table.findByName(opts.name);
      if (named.length === 0) throw new Error(`No location named '${opts.name}'`);
      for (const c of named) ids.add(c.id);
    }
    if (ids.size === 0) throw new Error("find needs --id or --name");

    const grid = await openGrid(source, opts);
    await runFindTool(grid, {
      ids,
      json: opts.json,
      concurrency: parsePositiveInt(opts.concurrency, "concurrency"),
    });
  },
);

withCacheOptions(
  program
    .command("render")
    .description("Render one map square's placements to a PNG")
    .argument("<i>", "Square column")
    .argument("<j>", "Square row")
    .option("-o, --out <path>", "Output PNG (default: square_<i>_<j>_p<plane>.png)")
    .option("--tile-size <px>", "Pixels per tile", "4")
    .option("--plane <n>", "Plane 0..3", "0")
    .option("--overwrite", "Overwrite an existing PNG", false)
    .option("--dry-run", "Decode but do not write anything", false),
).action(
  async (
    i: string,
    j: string,
    opts: CacheOpts & {
      out?: string;
      tileSize: string;
      plane: string;
      overwrite: boolean;
      dryRun: boolean;
    },
  ) => {
    const source = await openSource(opts);
    const grid = await openGrid(source, opts);
    await runRenderTool(grid, parseNonNegativeInt(i, "i"), parseNonNegativeInt(j, "j"), {
      tileSize: parseNonNegativeInt(opts.tileSize, "tile size"),
      plane: parseNonNegativeInt(opts.plane, "plane"),
      overwrite: opts.overwrite,
      dryRun: opts.dryRun,
      ...(opts.out !== undefined ? { out: opts.out } : {}),
    });
  },
);

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(msg + "\n");
  process.exitCode = 1;
});
