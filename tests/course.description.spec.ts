import { describe, it, expect } from "vitest";
import { RosterFormatError } from "../roster/errors.js";
import { unpackCourseDescription, unpackProgramPlan } from "../roster/parsers/course.description.js";

describe("unpackCourseDescription", () => {
  it("splits the four parts", () => {
    expect(
      unpackCourseDescription("Spring 2017 | Regular Academic Session | New York University | Undergraduate")
    ).toEqual({
      term: "Spring 2017",
      session: "Regular Academic Session",
      org: "New York University",
      level: "Undergraduate",
    });
  });

  it("keeps empty parts", () => {
    expect(unpackCourseDescription(" |  |  | ")).toEqual({ term: "", session: "", org: "", level: "" });
  });

  it.each(["Spring 2017", "A | B | C", "A | B | C | D | E", "A|B|C|D"])("rejects %j", raw => {
    expect(() => unpackCourseDescription(raw)).toThrow(RosterFormatError);
  });

  it("reports the raw description", () => {
    let caught: unknown;
    try {
      unpackCourseDescription("A | B");
    } catch (e) {
      caught = e;
    }
    expect(caught instanceof RosterFormatError && [caught.issue, caught.detail]).toEqual(["course_description", "A | B"]);
  });
});

describe("unpackProgramPlan", () => {
  it("splits program and plan on the dash and line breaks", () => {
    expect(unpackProgramPlan("UA-Coll of Arts & Sci - \n\nUndecided")).toEqual({
      program: "UA-Coll of Arts & Sci",
      plan: "Undecided",
    });
  });

  it("accepts carriage returns", () => {
    expect(unpackProgramPlan("UA-Stern - \n\rFinance")).toEqual({ program: "UA-Stern", plan: "Finance" });
  });

  it("returns an empty plan when there is no separator", () => {
    expect(unpackProgramPlan("UA-Coll of Arts & Sci")).toEqual({ program: "UA-Coll of Arts & Sci", plan: "" });
  });
});
