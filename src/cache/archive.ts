// src/cache/archive.ts
import { ByteCursor } from "./binary.js";
import { MalformedRecordError, decodeOrMalformed } from "./errors.js";

/**
 * Splits a decoded archive into its files, keyed by file id.
 *
 * A single-file archive is its own data. Otherwise the last byte holds the
 * chunk count and is preceded by `chunks * files` int32 size deltas (the
 * running size restarts for every chunk); file data is laid out chunk by
 * chunk, file by file.
 */
export function splitArchive(
  data: Uint8Array,
  fileIds: ReadonlyArray<number>,
): Map<number, Uint8Array> {
  const out = new Map<number, Uint8Array>();
  const n = fileIds.length;

  const seen = new Set<number>();
  for (const id of fileIds) {
    if (seen.has(id)) throw new MalformedRecordError("archive", `duplicate file id ${id}`);
    seen.add(id);
  }

  if (n === 0) return out;
  if (n === 1) {
    out.set(fileIds[0]!, data);
    return out;
  }

  if (data.length === 0) throw new MalformedRecordError("archive", "empty archive data");

  const chunks = data[data.length - 1]!;
  const tableStart = data.length - 1 - chunks * n * 4;
  if (chunks === 0 || tableStart < 0) {
    throw new MalformedRecordError(
      "archive",
      `chunk table (${chunks} chunks x ${n} files) does not fit in ${data.length} bytes`,
    );
  }

  const sizes = decodeOrMalformed("archive chunk table", () => {
    const r = new ByteCursor(data.subarray(tableStart, data.length - 1));
    const table: number[] = [];
    for (let c = 0; c < chunks; c++) {
      let running = 0;
      for (let f = 0; f < n; f++) {
        running += r.readI32();
        if (running < 0) {
          throw new MalformedRecordError("archive", `negative size for file ${fileIds[f]}`);
        }
        table.push(running);
      }
    }
    return table;
  });

  const totals = new Array<number>(n).fill(0);
  for (let k = 0; k < sizes.length; k++) totals[k % n] = (totals[k % n] ?? 0) + sizes[k]!;

  const files = totals.map((t) => new Uint8Array(t));
  const written = new Array<number>(n).fill(0);

  let offset = 0;
  for (let k = 0; k < sizes.length; k++) {
    const f = k % n;
    const size = sizes[k]!;
    if (offset + size > tableStart) {
      throw new MalformedRecordError("archive", `file ${fileIds[f]} overruns the data section`);
    }
    const at = written[f] ?? 0;
    files[f]!.set(data.subarray(offset, offset + size), at);
    written[f] = at + size;
    offset += size;
  }

  for (let f = 0; f < n; f++) out.set(fileIds[f]!, files[f]!);
  return out;
}
