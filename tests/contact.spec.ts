import { describe, it, expect, vi, afterEach, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { RosterFormatError } from "../roster/errors.js";
import {
  DEFAULT_ORG,
  loadPhoto,
  splitName,
  stripQuery,
  tableRowToContact,
  toContact,
  toContacts,
} from "../roster/contacts/contact.js";
import type { CourseRecord, StudentRecord } from "../roster/roster.types.js";

const COURSE: CourseRecord = {
  code: "MATH-UA 120-001",
  term: "Spring 2017",
  org: "New York University",
};

let dir = "";

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), "roster-contact-"));
  writeFileSync(join(dir, "photo.jpg"), "fake-jpeg");
  writeFileSync(join(dir, "photo.png"), "fake-jpeg");
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("splitName", () => {
  it("splits family and given names on the first comma", () => {
    expect(splitName("Doe,Jane")).toEqual({ family: "Doe", given: "Jane" });
    expect(splitName("Doe, Jane Q,Jr")).toEqual({ family: "Doe", given: "Jane Q,Jr" });
  });

  it("treats a name without a comma as the family name", () => {
    expect(splitName("Cher")).toEqual({ family: "Cher", given: "" });
  });
});

describe("stripQuery", () => {
  it("drops the query suffix", () => {
    expect(stripQuery("Roster_files/p.jpg?v=2")).toBe("Roster_files/p.jpg");
    expect(stripQuery("Roster_files/p.jpg")).toBe("Roster_files/p.jpg");
  });
});

describe("loadPhoto", () => {
  it("reads the photo as base64", () => {
    expect(loadPhoto(join(dir, "photo.jpg?v=2"))).toEqual({ type: "JPEG", data: "ZmFrZS1qcGVn" });
    expect(loadPhoto(join(dir, "photo.png"))?.type).toBe("PNG");
  });

  it("warns and returns null for a missing file", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(loadPhoto(join(dir, "missing.jpg"))).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe("toContact", () => {
  const student: StudentRecord = {
    id: "N10000001",
    name: "Doe,Jane",
    email: "jd1@example.edu",
    program: "UA-Coll of Arts & Sci - \n\nUndecided",
  };

  it("maps a student and course to a contact", () => {
    expect(toContact(student, COURSE)).toEqual({
      family: "Doe",
      given: "Jane",
      fullName: "Jane Doe",
      email: "jd1@example.edu",
      org: ["New York University", "UA-Coll of Arts & Sci"],
      progplan: "UA-Coll of Arts & Sci - Undecided",
      studentId: "N10000001",
      photo: null,
      course: "MATH-UA 120-001, Spring 2017",
    });
  });

  it("attaches the photo", () => {
    const contact = toContact({ ...student, photo: join(dir, "photo.jpg?v=2") }, COURSE);
    expect(contact.photo).toEqual({ type: "JPEG", data: "ZmFrZS1qcGVn" });
  });

  it("tolerates missing optional fields", () => {
    expect(toContact({ name: "Roe,Richard" }, {})).toEqual({
      family: "Roe",
      given: "Richard",
      fullName: "Richard Roe",
      email: null,
      org: [DEFAULT_ORG],
      progplan: null,
      studentId: null,
      photo: null,
      course: null,
    });
  });

  it("rejects a student without a name", () => {
    expect(() => toContact({ id: "N1", photo: "p.jpg" }, COURSE, 7)).toThrow(RosterFormatError);
    expect(() => toContact({ id: "N1" }, COURSE, 7)).toThrow("Student 7 has no name");
  });
});

describe("toContacts", () => {
  it("orders contacts by index and skips nameless students", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const students = new Map<number, StudentRecord>([
      [2, { name: "Roe,Richard" }],
      [0, { name: "Doe,Jane" }],
      [1, { id: "N10000003" }],
    ]);
    const contacts = toContacts({ course: COURSE, students });
    expect(contacts.map(c => c.fullName)).toEqual(["Jane Doe", "Richard Roe"]);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe("tableRowToContact", () => {
  it("builds the course label from subject, catalog and section", () => {
    const contact = tableRowToContact(
      {
        "Campus ID": "N10000002",
        Name: "Roe,Richard",
        "Email Address": "rr2@example.edu",
        "Program and Plan": "UA-Stern School of Bus - \n\nFinance",
        Subject: "MATH-UA",
        Catalog: "0120",
        Section: "12",
      },
      "Test University"
    );
    expect(contact).toEqual({
      family: "Roe",
      given: "Richard",
      fullName: "Richard Roe",
      email: "rr2@example.edu",
      org: ["Test University", "UA-Stern School of Bus"],
      progplan: "UA-Stern School of Bus - Finance",
      studentId: "N10000002",
      photo: null,
      course: "MATH-UA 120 - 012",
    });
  });

  it("rejects a row without a required column", () => {
    expect(() => tableRowToContact({ Name: "Doe,Jane" })).toThrow(RosterFormatError);
  });
});
