import { describe, expect, it } from "vitest";
import { parseCourseCode } from "../courseCode";
import { flattenMetadata, joinMetadata } from "../metadata";
import { candidateNeedsRepair, isPlaceholder } from "../placeholders";

describe("isPlaceholder", () => {
  it("matches exactly the empty and unknown markers", () => {
    expect(["", "  ", null, undefined, "unknown", "NULL", " N/A "].map(isPlaceholder)).toEqual([
      true,
      true,
      true,
      true,
      true,
      true,
      true,
    ]);
    expect(["none", "TBD", "0", 0, false].map(isPlaceholder)).toEqual([false, false, false, false, false]);
  });

  it("flags a candidate when any present field is a placeholder", () => {
    expect(candidateNeedsRepair({ prefix: "ACC", number: "124", units: "Unknown" })).toBe(true);
    expect(candidateNeedsRepair({ prefix: "ACC", number: "124" })).toBe(false);
  });
});

describe("flattenMetadata", () => {
  it("joins lists and labels nested objects", () => {
    expect(flattenMetadata(["Lecture: 3", "Lab: 2"])).toBe("Lecture: 3; Lab: 2");
    expect(
      flattenMetadata({ prerequisites: "ACC 124", semester_offered: ["Fall", "Spring"], lab_hours: null }),
    ).toBe("Prerequisites: ACC 124; Semester Offered: Fall, Spring");
  });

  it("keeps strings as collapsed text", () => {
    expect(flattenMetadata("  Class Hours:   3 ")).toBe("Class Hours: 3");
    expect(flattenMetadata(undefined)).toBe("");
  });

  it("skips empty values when joining labelled parts", () => {
    expect(
      joinMetadata([
        ["Prerequisites", "ACC 124"],
        ["Class Hours", " "],
      ]),
    ).toBe("Prerequisites: ACC 124");
  });
});

describe("parseCourseCode", () => {
  it("finds codes in headings and URL paths", () => {
    expect(parseCourseCode("ACC 124 - Principles of Accounting")).toEqual({
      prefix: "ACC",
      number: "124",
      rest: "Principles of Accounting",
    });
    expect(parseCourseCode("/courses/bio-101l")).toEqual({ prefix: "BIO", number: "101L", rest: "" });
    expect(parseCourseCode("Principles of Accounting")).toBeUndefined();
  });
});
