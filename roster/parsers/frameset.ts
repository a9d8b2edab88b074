import "dotenv/config";
import { readFileSync } from "fs";
import { dirname, join } from "path";
import { RosterFormatError } from "../errors.js";
import { debug } from "../utils/log.js";
import { RosterFieldMachine } from "./field.machine.js";
import { attributeValue, tokenize } from "./markup.js";
import type { RosterParseResult } from "../roster.types.js";

export const CONTENT_FRAME = process.env.ROSTER_FRAME_NAME ?? "TargetContent";
const FRAME_TAGS = new Set(["frame", "iframe"]);

/** `src` of the first frame named `frameName`, or null. */
export function findContentFrame(html: string, frameName = CONTENT_FRAME): string | null {
  const found: string[] = [];
  tokenize(html, event => {
    if (found.length || event.kind !== "start_tag" || !FRAME_TAGS.has(event.name)) return;
    const src = attributeValue(event.attributes, "src");
    if (attributeValue(event.attributes, "name") === frameName && src !== undefined) found.push(src);
  });
  return found[0] ?? null;
}

export function parseRosterHtml(html: string, baseDir: string): RosterParseResult {
  return new RosterFieldMachine(baseDir).feed(html).result();
}

export function parseRosterFile(file: string): RosterParseResult {
  debug(`roster file: ${file}`);
  return parseRosterHtml(readFileSync(file, "utf8"), dirname(file));
}

/**
 * Parse a saved roster frameset: find the content frame, then parse the
 * document it points at. Photos resolve against the frame document's
 * directory.
 */
export function parseRosterFrameset(file: string, frameName = CONTENT_FRAME): RosterParseResult {
  const src = findContentFrame(readFileSync(file, "utf8"), frameName);
  if (src === null) {
    throw new RosterFormatError({
      issue: "missing_frame",
      message: `No frame named "${frameName}" in ${file}`,
      detail: file,
    });
  }
  return parseRosterFile(join(dirname(file), src));
}
