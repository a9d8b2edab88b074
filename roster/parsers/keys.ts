import type { CourseField, StudentField } from "../roster.types.js";

export type KeyRegistry = {
  course: ReadonlyMap<string, CourseField>;
  student: ReadonlyMap<string, StudentField>;
  photo: string;
};

export type KeyMatch =
  | { kind: "course"; field: CourseField }
  | { kind: "student"; field: StudentField; index: number }
  | { kind: "photo"; index: number };

export const ROSTER_KEYS: KeyRegistry = Object.freeze({
  course: new Map<string, CourseField>([
    ["DERIVED_SSR_FC_SSR_CLASSNAME_LONG", "code"],
    ["DERIVED_SSR_FC_SSS_PAGE_KEYDESCR2", "description"],
    ["DERIVED_SSR_FC_DESCR254", "name"],
    ["MTG_INSTR$0", "instructor"],
    ["MTG_SCHED$0", "schedule"],
    ["MTG_LOC$0", "room"],
    ["MTG_DATE$0", "dates"],
  ]),
  student: new Map<string, StudentField>([
    ["CLASS_ROSTER_VW_EMPLID", "id"],
    ["SCC_PRFPRIMNMVW_NAME", "name"],
    ["DERIVED_SSSMAIL_EMAIL_ADDR", "email"],
    ["SCC_PREF_PHN_VW_PHONE", "phone"],
    ["PROGPLAN", "program"],
    ["PROGPLAN1", "level"],
    ["PSXLATITEM_XLATLONGNAME", "status"],
  ]),
  photo: "win10divEMPL_PHOTO_EMPLOYEE_PHOTO",
});

const COMPOSITE_ID = /^([^$]*)\$(\d+)$/;

// Course keys match exactly; student keys and the photo marker match the
// base of a `<base>$<index>` id.
export function classifyIdentifier(value: string, keys: KeyRegistry = ROSTER_KEYS): KeyMatch | null {
  const courseField = keys.course.get(value);
  if (courseField) return { kind: "course", field: courseField };

  const m = value.match(COMPOSITE_ID);
  if (!m) return null;
  const base = m[1];
  const index = Number(m[2]);
  // past 2^53 two suffixes can map to one number; such ids are not keys
  if (!Number.isSafeInteger(index)) return null;

  const studentField = keys.student.get(base);
  if (studentField) return { kind: "student", field: studentField, index };
  if (base === keys.photo) return { kind: "photo", index };
  return null;
}
