import { mkdir, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import type { ExportedSnapshot, TimelineSnapshot } from "../contracts.js";

let tmpSeq = 0;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local-time `YYYYMMDD_HHMMSS`. */
export function exportStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function toExportedSnapshot(snapshot: TimelineSnapshot, date: Date): ExportedSnapshot {
  return {
    exportedAt: date.getTime() / 1000,
    exportedAtIso: date.toISOString(),
    events: snapshot.events,
    tasks: snapshot.tasks,
  };
}

/** Writes `timeline-<stamp>.json` under `dir` via a temp file and returns its path. */
export async function exportSnapshot(
  snapshot: TimelineSnapshot,
  dir: string,
  date = new Date()
): Promise<string> {
  await mkdir(dir, { recursive: true });
  const target = path.join(dir, `timeline-${exportStamp(date)}.json`);
  tmpSeq += 1;
  const tmp = `${target}.${process.pid}.${tmpSeq}.tmp`;
  await writeFile(tmp, `${JSON.stringify(toExportedSnapshot(snapshot, date), null, 2)}\n`, "utf8");
  await rename(tmp, target);
  return target;
}
