// src/mapsquares/findTool.ts
import type { MapSquare, MapSquareGrid } from "./grid.js";
import { trySquareLocations, type LocationsOutcome } from "./decoder.js";
import type { PlacedLocation } from "./locations.js";

export type PlacementPredicate = (loc: PlacedLocation) => boolean;

export type MalformedSquare = Readonly<{ i: number; j: number; message: string }>;

export type WalkSummary = Readonly<{
  visited: number;
  withLocations: number;
  absent: number;
  malformed: ReadonlyArray<MalformedSquare>;
}>;

export type FindResult = WalkSummary & Readonly<{ matches: ReadonlyArray<PlacedLocation> }>;

export type WalkOptions = Readonly<{
  /** Squares decoded at once. */
  concurrency?: number;
}>;

/**
 * Decodes every square of the grid, handing outcomes to `visit` in row-major
 * order whatever the concurrency. Absent and malformed squares never stop the walk.
 */
export async function walkGrid(
  grid: MapSquareGrid,
  visit: (outcome: LocationsOutcome) => void,
  opts: WalkOptions = {},
): Promise<WalkSummary> {
  const concurrency = opts.concurrency ?? 1;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`Invalid concurrency: ${concurrency}`);
  }

  let visited = 0;
  let withLocations = 0;
  let absent = 0;
  const malformed: MalformedSquare[] = [];

  const handle = (outcome: LocationsOutcome): void => {
    visited++;
    switch (outcome.status) {
      case "ok":
        withLocations++;
        break;
      case "absent":
        absent++;
        break;
      case "malformed":
        malformed.push({ i: outcome.square.i, j: outcome.square.j, message: outcome.error.message });
        break;
    }
    visit(outcome);
  };

  let batch: MapSquare[] = [];
  const flush = async (): Promise<void> => {
    const outcomes = await Promise.all(batch.map((sq) => trySquareLocations(sq)));
    batch = [];
    for (const o of outcomes) handle(o);
  };

  for (const square of grid) {
    batch.push(square);
    if (batch.length >= concurrency) await flush();
  }
  if (batch.length > 0) await flush();

  return { visited, withLocations, absent, malformed };
}

export async function findPlacements(
  grid: MapSquareGrid,
  predicate: PlacementPredicate,
  opts: WalkOptions = {},
): Promise<FindResult> {
  const matches: PlacedLocation[] = [];
  const summary = await walkGrid(
    grid,
    (outcome) => {
      if (outcome.status !== "ok") return;
      for (const loc of outcome.locations) if (predicate(loc)) matches.push(loc);
    },
    opts,
  );
  return { ...summary, matches };
}

export function formatPlacement(loc: PlacedLocation): string {
  return `${loc.id}\t${loc.x},${loc.y},${loc.plane}\t${loc.type}\t${loc.orientation}`;
}

function reportMalformed(malformed: ReadonlyArray<MalformedSquare>): void {
  for (const m of malformed) console.warn(`Malformed square ${m.i},${m.j}: ${m.message}`);
}

export type FindToolOptions = WalkOptions &
  Readonly<{
    ids: ReadonlySet<number>;
    json?: boolean;
  }>;

export async function runFindTool(grid: MapSquareGrid, opts: FindToolOptions): Promise<FindResult> {
  const result = await findPlacements(grid, (loc) => opts.ids.has(loc.id), opts);

  if (opts.json === true) {
    process.stdout.write(JSON.stringify(result.matches, null, 2) + "\n");
  } else {
    for (const loc of result.matches) console.log(formatPlacement(loc));
  }

  reportMalformed(result.malformed);
  console.warn(
    `Done. squares=${result.visited} with-locations=${result.withLocations} absent=${result.absent}` +
      ` malformed=${result.malformed.length} matches=${result.matches.length}`,
  );
  return result;
}

export async function runSquaresTool(grid: MapSquareGrid, opts: WalkOptions = {}): Promise<WalkSummary> {
  const summary = await walkGrid(
    grid,
    (outcome) => {
      if (outcome.status === "ok") {
        console.log(`${outcome.square.i},${outcome.square.j}\t${outcome.locations.length}`);
      }
    },
    opts,
  );

  reportMalformed(summary.malformed);
  console.warn(
    `Done. squares=${summary.visited} with-locations=${summary.withLocations} absent=${summary.absent}` +
      ` malformed=${summary.malformed.length}`,
  );
  return summary;
}
