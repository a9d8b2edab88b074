export type CourseField =
  | "code"
  | "description"
  | "name"
  | "instructor"
  | "schedule"
  | "room"
  | "dates";

// unpacked from the course description
export type DescriptionPart = "term" | "session" | "org" | "level";

export type StudentField =
  | "id"
  | "name"
  | "email"
  | "phone"
  | "program"
  | "level"
  | "status";

export type FieldName = CourseField | StudentField | "photo";

export type CourseRecord = Partial<Record<CourseField | DescriptionPart, string>>;

export type StudentRecord = Partial<Record<StudentField | "photo", string>>;

export type RosterParseResult = {
  course: CourseRecord;
  students: Map<number, StudentRecord>; // keyed by the `$<index>` suffix
};

export type Attribute = { name: string; value: string };

export type MarkupEvent =
  | { kind: "start_tag"; name: string; attributes: Attribute[] }
  | { kind: "text"; content: string }
  | { kind: "entity"; name: string }          // "amp", "#38", "#x26"
  | { kind: "end_tag"; name: string };

// Row of the tabular roster export, header cell -> row cell
export type TableRow = Record<string, string>;
