import { isAbsolute, join } from "path";
import { MachineError } from "../errors.js";
import { debug } from "../utils/log.js";
import { classifyIdentifier, ROSTER_KEYS, type KeyRegistry } from "./keys.js";
import { decodeEntity, tokenize } from "./markup.js";
import { unpackCourseDescription } from "./course.description.js";
import type {
  Attribute,
  CourseField,
  CourseRecord,
  MarkupEvent,
  RosterParseResult,
  StudentField,
  StudentRecord,
} from "../roster.types.js";

export type MachineState =
  | { name: "seeking_key" }
  | { name: "found_course_key"; field: CourseField }
  | { name: "found_student_key"; field: StudentField; index: number }
  | { name: "seeking_course_data"; field: CourseField; buffer: string }
  | { name: "seeking_student_data"; field: StudentField; index: number; buffer: string }
  | { name: "seeking_student_image"; index: number };

// A start tag arrives as one `attribute` per attribute, then `attributes_done`.
export type MachineTrigger =
  | { kind: "attribute"; tag: string; name: string; value: string }
  | { kind: "attributes_done"; tag: string }
  | { kind: "text"; content: string }
  | { kind: "entity"; name: string }
  | { kind: "end_tag"; name: string };

export type MachineEffect =
  | { kind: "commit_course"; field: CourseField; value: string }
  | { kind: "commit_student"; index: number; field: StudentField; value: string }
  | { kind: "commit_photo"; index: number; src: string };

export type Transition = { state: MachineState; effect?: MachineEffect };

export const SEEKING_KEY: MachineState = Object.freeze({ name: "seeking_key" });

function stay(state: MachineState): Transition {
  return { state };
}

function append<S extends { buffer: string }>(state: S, text: string): S {
  return { ...state, buffer: state.buffer + text };
}

function fieldOf(state: MachineState): string | null {
  return "field" in state ? state.field : null;
}

function noTransition(state: MachineState, trigger: MachineTrigger): never {
  throw new MachineError({ state: state.name, trigger: trigger.kind, field: fieldOf(state) });
}

/**
 * One transition of the field-extraction machine. Pure: the caller applies
 * the returned effect to its records.
 */
export function step(state: MachineState, trigger: MachineTrigger, keys: KeyRegistry = ROSTER_KEYS): Transition {
  switch (state.name) {
    case "seeking_key": {
      if (trigger.kind !== "attribute" || trigger.name !== "id") return stay(state);
      const match = classifyIdentifier(trigger.value, keys);
      if (!match) return stay(state);
      debug(`key ${trigger.value} -> ${match.kind}`);
      if (match.kind === "course") return { state: { name: "found_course_key", field: match.field } };
      if (match.kind === "student") {
        return { state: { name: "found_student_key", field: match.field, index: match.index } };
      }
      return { state: { name: "seeking_student_image", index: match.index } };
    }

    // Elements may carry the key twice (id and name); only the first counts.
    case "found_course_key":
      if (trigger.kind === "attribute") return stay(state);
      if (trigger.kind === "attributes_done") {
        return { state: { name: "seeking_course_data", field: state.field, buffer: "" } };
      }
      return noTransition(state, trigger);

    case "found_student_key":
      if (trigger.kind === "attribute") return stay(state);
      if (trigger.kind === "attributes_done") {
        return { state: { name: "seeking_student_data", field: state.field, index: state.index, buffer: "" } };
      }
      return noTransition(state, trigger);

    case "seeking_course_data":
      switch (trigger.kind) {
        case "text":
          return { state: append(state, trigger.content) };
        case "entity":
          return { state: append(state, decodeEntity(trigger.name) ?? "") };
        case "end_tag":
          return {
            state: SEEKING_KEY,
            effect: { kind: "commit_course", field: state.field, value: state.buffer },
          };
        default:
          return noTransition(state, trigger);
      }

    case "seeking_student_data":
      switch (trigger.kind) {
        case "text":
          return { state: append(state, trigger.content) };
        case "entity":
          return { state: append(state, decodeEntity(trigger.name) ?? "") };
        case "end_tag":
          return {
            state: SEEKING_KEY,
            effect: { kind: "commit_student", index: state.index, field: state.field, value: state.buffer },
          };
        default:
          return noTransition(state, trigger);
      }

    case "seeking_student_image":
      if (trigger.kind === "attribute" && trigger.tag === "img" && trigger.name === "src") {
        return { state: SEEKING_KEY, effect: { kind: "commit_photo", index: state.index, src: trigger.value } };
      }
      return stay(state);

    default:
      return noTransition(state, trigger);
  }
}

// Relative sources join onto baseDir, absolute ones replace it; query strings are kept.
export function resolvePhotoPath(baseDir: string, src: string): string {
  return isAbsolute(src) ? src : join(baseDir, src);
}

export class RosterFieldMachine {
  readonly course: CourseRecord = {};
  readonly students = new Map<number, StudentRecord>();
  private current: MachineState = SEEKING_KEY;

  constructor(
    readonly baseDir: string,
    private readonly keys: KeyRegistry = ROSTER_KEYS
  ) {}

  get state(): MachineState {
    return this.current;
  }

  feed(html: string): this {
    tokenize(html, event => this.handle(event));
    return this;
  }

  handle(event: MarkupEvent): void {
    switch (event.kind) {
      case "start_tag":
        this.handleStartTag(event.name, event.attributes);
        return;
      case "text":
        this.fire({ kind: "text", content: event.content });
        return;
      case "entity":
        this.fire({ kind: "entity", name: event.name });
        return;
      case "end_tag":
        this.fire({ kind: "end_tag", name: event.name });
        return;
    }
  }

  result(): RosterParseResult {
    return { course: this.course, students: this.students };
  }

  private handleStartTag(tag: string, attributes: Attribute[]) {
    try {
      for (const attr of attributes) {
        this.fire({ kind: "attribute", tag, name: attr.name, value: attr.value });
      }
      this.fire({ kind: "attributes_done", tag });
    } catch (err) {
      if (err instanceof MachineError) {
        console.error(`current field: ${err.payload.field ?? ""}`);
        console.error(`state: ${err.payload.state}`);
        console.error(`tag: ${tag}`);
        console.error(`attributes: ${JSON.stringify(attributes)}`);
        throw new MachineError({ ...err.payload, tag, attributes });
      }
      throw err;
    }
  }

  private fire(trigger: MachineTrigger) {
    const { state, effect } = step(this.current, trigger, this.keys);
    if (effect) this.apply(effect);
    this.current = state;
  }

  private student(index: number): StudentRecord {
    let record = this.students.get(index);
    if (!record) {
      record = {};
      this.students.set(index, record);
    }
    return record;
  }

  private apply(effect: MachineEffect) {
    switch (effect.kind) {
      case "commit_course":
        this.course[effect.field] = effect.value;
        if (effect.field === "description") {
          Object.assign(this.course, unpackCourseDescription(effect.value));
        }
        return;
      case "commit_student":
        this.student(effect.index)[effect.field] = effect.value;
        return;
      case "commit_photo":
        this.student(effect.index).photo = resolvePhotoPath(this.baseDir, effect.src);
        return;
    }
  }
}
