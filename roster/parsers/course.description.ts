import { RosterFormatError } from "../errors.js";
import type { DescriptionPart } from "../roster.types.js";

const DELIMITER = " | ";

/**
 * Split the course description into its parts, e.g.
 * "Spring 2017 | Regular Academic Session | New York University | Undergraduate"
 */
export function unpackCourseDescription(raw: string): Record<DescriptionPart, string> {
  const parts = raw.split(DELIMITER);
  if (parts.length !== 4) {
    throw new RosterFormatError({
      issue: "course_description",
      message: `Course description has ${parts.length} part(s), expected 4: "${raw}"`,
      detail: raw,
    });
  }
  const [term, session, org, level] = parts;
  return { term, session, org, level };
}

// "UA-Coll of Arts & Sci - \n\nUndecided" -> program + plan
export function unpackProgramPlan(raw: string): { program: string; plan: string } {
  const [program, ...rest] = raw.split(/ - [\r\n]+/);
  return { program: program.trim(), plan: rest.join(" - ").trim() };
}
