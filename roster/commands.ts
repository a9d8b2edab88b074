import { copyFileSync, writeFileSync } from "fs";
import { join } from "path";
import { displayName, stripQuery, toContacts, tableRowToContact, type Contact } from "./contacts/contact.js";
import { cardFileName, serializeVcard } from "./contacts/vcard.js";
import { toAmcCsv } from "./contacts/amc.js";
import { parseRosterFile, parseRosterFrameset } from "./parsers/frameset.js";
import { parseRosterTableFile } from "./parsers/roster.table.js";
import { emitFile, emitRoster, ensureDir } from "./utils/emitter.js";
import { debug } from "./utils/log.js";
import type { RosterParseResult } from "./roster.types.js";

export type SourceOptions = {
  infile: string;
  direct?: boolean; // the file is the content page itself, not a frameset
};

export function readRoster({ infile, direct }: SourceOptions): RosterParseResult {
  const result = direct ? parseRosterFile(infile) : parseRosterFrameset(infile);
  debug("course:", result.course);
  debug("students:", Object.fromEntries(result.students));
  return result;
}

export type VcardOptions = SourceOptions & {
  save: boolean;
  saveDir: string;
  print: boolean;
};

// returns the paths written
export function convertToVcards(opts: VcardOptions): string[] {
  const contacts = toContacts(readRoster(opts));
  const written: string[] = [];
  for (const card of contacts) {
    const text = serializeVcard(card);
    if (opts.print) console.log(text);
    if (opts.save) {
      const path = emitFile(opts.saveDir, cardFileName(card), text);
      console.log(`Saving ${path}`);
      written.push(path);
    }
  }
  return written;
}

// One "<Given Family>.jpg" per student, for flashcard decks. Returns the paths written.
export function exportPhotos(opts: SourceOptions & { saveDir: string }): string[] {
  const { students } = readRoster(opts);
  ensureDir(opts.saveDir);
  const written: string[] = [];
  for (const index of Array.from(students.keys()).sort((a, b) => a - b)) {
    const student = students.get(index) ?? {};
    if (!student.name) {
      console.warn(`WARN skipping student ${index}: no name`);
      continue;
    }
    const name = displayName(student.name);
    if (!student.photo) {
      console.warn(`WARN no photo for ${name}; skipping`);
      continue;
    }
    const source = stripQuery(student.photo);
    const path = join(opts.saveDir, `${name}.jpg`);
    try {
      copyFileSync(source, path);
    } catch (e) {
      console.warn(`WARN photo not readable ${source}: ${(e as Error).message}`);
      continue;
    }
    console.log(`Saving ${path}`);
    written.push(path);
  }
  return written;
}

export function dumpNdjson(opts: SourceOptions & { outdir: string }) {
  const result = readRoster(opts);
  emitRoster(opts.outdir, result);
  console.log(`Wrote ${result.students.size} student(s) to ${opts.outdir}`);
}

function writeAmc(contacts: Contact[], output?: string) {
  const csv = toAmcCsv(contacts);
  if (output) writeFileSync(output, csv);
  else process.stdout.write(csv);
}

export function convertToAmc(opts: SourceOptions & { output?: string }) {
  writeAmc(toContacts(readRoster(opts)), opts.output);
}

export function convertTableToAmc(opts: { infile: string; output?: string }) {
  writeAmc(parseRosterTableFile(opts.infile).map(row => tableRowToContact(row)), opts.output);
}
