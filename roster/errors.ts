import type { Attribute } from "./roster.types.js";

export type RosterFormatIssue =
  | "missing_frame"
  | "course_description"
  | "student_name"
  | "table_column";

export class RosterFormatError extends Error {
  readonly issue: RosterFormatIssue;
  readonly detail: string | null;

  constructor(input: { issue: RosterFormatIssue; message: string; detail?: string | null }) {
    super(input.message);
    this.name = "RosterFormatError";
    this.issue = input.issue;
    this.detail = input.detail ?? null;
  }
}

export type MachineErrorPayload = {
  state: string;
  trigger: string;
  field: string | null;
  tag?: string;
  attributes?: Attribute[];
};

/** A trigger reached a state with no transition for it. Always a bug. */
export class MachineError extends Error {
  readonly payload: MachineErrorPayload;

  constructor(payload: MachineErrorPayload) {
    super(`No transition for "${payload.trigger}" in state "${payload.state}"`);
    this.name = "MachineError";
    this.payload = payload;
  }
}
