import { writeFileSync, mkdirSync } from "fs";
import { join } from "path";
import type { RosterParseResult } from "../roster.types.js";

export function ensureDir(p: string) {
  mkdirSync(p, { recursive: true });
}

export function emitFile(outdir: string, filename: string, text: string): string {
  ensureDir(outdir);
  const path = join(outdir, filename);
  writeFileSync(path, text);
  return path;
}

export function emitNDJSON(outdir: string, name: string, rows: unknown[]) {
  return emitFile(outdir, name + ".ndjson", rows.map(r => JSON.stringify(r)).join("\n") + "\n");
}

// course.ndjson holds one line; students.ndjson one line per index, in order
export function emitRoster(outdir: string, { course, students }: RosterParseResult) {
  emitNDJSON(outdir, "course", [course]);
  const rows = Array.from(students.entries())
    .sort(([a], [b]) => a - b)
    .map(([index, record]) => ({ index, ...record }));
  emitNDJSON(outdir, "students", rows);
}
