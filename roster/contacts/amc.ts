import type { Contact } from "./contact.js";

// Column layout auto-multiple-choice expects for a student list
export const AMC_COLUMNS = ["Campus ID", "surname", "name", "NetID", "email", "id"] as const;

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function amcRow(contact: Contact): string[] {
  const campusId = contact.studentId ?? "";
  const email = contact.email ?? "";
  const at = email.indexOf("@");
  return [
    campusId,
    contact.family,
    contact.given,
    at < 0 ? email : email.slice(0, at),
    email,
    campusId.replace(/N/g, ""),
  ];
}

export function toAmcCsv(contacts: Contact[]): string {
  const rows = [[...AMC_COLUMNS], ...contacts.map(amcRow)];
  return rows.map(r => r.map(csvField).join(",")).join("\r\n") + "\r\n";
}
