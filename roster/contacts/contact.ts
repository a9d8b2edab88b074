import "dotenv/config";
import { readFileSync } from "fs";
import { extname } from "path";
import { RosterFormatError } from "../errors.js";
import { unpackProgramPlan } from "../parsers/course.description.js";
import type { CourseRecord, RosterParseResult, StudentRecord, TableRow } from "../roster.types.js";

export const DEFAULT_ORG = process.env.ROSTER_ORG ?? "New York University";

export type ContactPhoto = { type: "JPEG" | "PNG" | "GIF"; data: string }; // base64

export type Contact = {
  family: string;
  given: string;
  fullName: string;
  email: string | null;
  org: string[];
  progplan: string | null;
  studentId: string | null;
  photo: ContactPhoto | null;
  course: string | null; // related-name label, e.g. "MATH-UA 120.001, Spring 2017"
};

// "Family,Given"; no comma means all family name
export function splitName(raw: string): { family: string; given: string } {
  const at = raw.indexOf(",");
  if (at < 0) return { family: raw.trim(), given: "" };
  return { family: raw.slice(0, at).trim(), given: raw.slice(at + 1).trim() };
}

// "Doe,Jane" -> "Jane Doe"
export function displayName(raw: string): string {
  const { family, given } = splitName(raw);
  return [given, family].filter(Boolean).join(" ");
}

export function stripQuery(path: string): string {
  const at = path.indexOf("?");
  return at < 0 ? path : path.slice(0, at);
}

function photoType(path: string): ContactPhoto["type"] {
  const ext = extname(path).toLowerCase();
  if (ext === ".png") return "PNG";
  if (ext === ".gif") return "GIF";
  return "JPEG";
}

export function loadPhoto(path: string): ContactPhoto | null {
  const file = stripQuery(path);
  try {
    return { type: photoType(file), data: readFileSync(file).toString("base64") };
  } catch (e) {
    console.warn(`WARN photo not readable ${file}: ${(e as Error).message}`);
    return null;
  }
}

function courseLabel(course: CourseRecord): string | null {
  if (!course.code) return null;
  return course.term ? `${course.code}, ${course.term}` : course.code;
}

function baseContact(name: string, org: string, progplanRaw: string | undefined) {
  const { family, given } = splitName(name);
  const pp = progplanRaw ? unpackProgramPlan(progplanRaw) : null;
  return {
    family,
    given,
    fullName: displayName(name),
    org: pp ? [org, pp.program] : [org],
    progplan: pp ? [pp.program, pp.plan].filter(Boolean).join(" - ") : null,
  };
}

/**
 * Contact for one extracted student. A student without a name cannot be
 * filed and is rejected.
 */
export function toContact(student: StudentRecord, course: CourseRecord, index = 0): Contact {
  if (!student.name) {
    throw new RosterFormatError({
      issue: "student_name",
      message: `Student ${index} has no name`,
      detail: JSON.stringify(student),
    });
  }
  return {
    ...baseContact(student.name, course.org ?? DEFAULT_ORG, student.program),
    email: student.email ?? null,
    studentId: student.id ?? null,
    photo: student.photo ? loadPhoto(student.photo) : null,
    course: courseLabel(course),
  };
}

export function toContacts(result: RosterParseResult): Contact[] {
  const contacts: Contact[] = [];
  const indexes = Array.from(result.students.keys()).sort((a, b) => a - b);
  for (const index of indexes) {
    const student = result.students.get(index) ?? {};
    if (!student.name) {
      console.warn(`WARN skipping student ${index}: no name (${JSON.stringify(student)})`);
      continue;
    }
    contacts.push(toContact(student, result.course, index));
  }
  return contacts;
}

function column(row: TableRow, header: string): string {
  const value = row[header];
  if (value === undefined) {
    throw new RosterFormatError({
      issue: "table_column",
      message: `Roster export has no "${header}" column`,
      detail: header,
    });
  }
  return value;
}

export function tableRowToContact(row: TableRow, org = DEFAULT_ORG): Contact {
  const catalog = Number.parseInt(column(row, "Catalog"), 10);
  const section = Number.parseInt(column(row, "Section"), 10);
  return {
    ...baseContact(column(row, "Name"), org, column(row, "Program and Plan")),
    email: column(row, "Email Address") || null,
    studentId: column(row, "Campus ID") || null,
    photo: null,
    course: `${column(row, "Subject")} ${catalog} - ${String(section).padStart(3, "0")}`,
  };
}
