import type { Contact } from "./contact.js";

const MAX_OCTETS = 75;

export function escapeText(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/\r\n|\r|\n/g, "\\n")
    .replace(/,/g, "\\,")
    .replace(/;/g, "\\;");
}

/** Fold a content line at 75 octets; continuation lines start with a space. */
export function foldLine(line: string): string {
  const chunks: string[] = [];
  let current = "";
  let octets = 0;
  for (const ch of line) {
    const size = Buffer.byteLength(ch);
    const limit = chunks.length ? MAX_OCTETS - 1 : MAX_OCTETS;
    if (octets + size > limit) {
      chunks.push(current);
      current = "";
      octets = 0;
    }
    current += ch;
    octets += size;
  }
  chunks.push(current);
  return chunks.join("\r\n ");
}

export function serializeVcard(contact: Contact): string {
  const lines = [
    "BEGIN:VCARD",
    "VERSION:3.0",
    `FN:${escapeText(contact.fullName)}`,
    `N:${escapeText(contact.family)};${escapeText(contact.given)};;;`,
  ];
  if (contact.email) lines.push(`EMAIL;TYPE=INTERNET:${escapeText(contact.email)}`);
  lines.push("TITLE:Student");
  lines.push(`ORG:${contact.org.map(escapeText).join(";")}`);
  if (contact.progplan) lines.push(`X-ROSTER-PROGPLAN:${escapeText(contact.progplan)}`);
  if (contact.studentId) lines.push(`X-ROSTER-ID:${escapeText(contact.studentId)}`);
  if (contact.photo) lines.push(`PHOTO;ENCODING=b;TYPE=${contact.photo.type}:${contact.photo.data}`);
  if (contact.course) {
    lines.push("item1.X-ABLABEL:course");
    lines.push(`item1.X-ABRELATEDNAMES:${escapeText(contact.course)}`);
  }
  lines.push("END:VCARD");
  return lines.map(foldLine).join("\r\n") + "\r\n";
}

// Not unique: two students with the same name share a file name.
export function cardFileName(contact: Contact): string {
  return `${contact.fullName.replace(/ /g, "_")}.vcf`;
}
