import { describe, it, expect } from "vitest";
import { checkGradeConsistency } from "./gradeConsistency";

describe("checkGradeConsistency", () => {
  it("agrees when the stored grade matches the score", () => {
    expect(checkGradeConsistency(650, "C", "1.0")).toEqual({ mismatch: false });
    expect(checkGradeConsistency(800, "A", "1.0")).toEqual({ mismatch: false });
  });

  it("flags a stored grade that diverges from the score", () => {
    expect(checkGradeConsistency(699, "B", "1.0")).toEqual({ mismatch: true, expectedGrade: "C" });
    expect(checkGradeConsistency(499, "D", " 1.0 ")).toEqual({ mismatch: true, expectedGrade: "F" });
  });

  it("flags a score outside every band without an expected grade", () => {
    expect(checkGradeConsistency(1200, "A", "1.0")).toEqual({ mismatch: true });
  });

  it("does not assert for other model versions", () => {
    expect(checkGradeConsistency(699, "B", "0.9")).toEqual({ mismatch: false });
    expect(checkGradeConsistency(699, "B", null)).toEqual({ mismatch: false });
  });

  it("ignores missing scores and unknown grades", () => {
    expect(checkGradeConsistency(null, "A", "1.0")).toEqual({ mismatch: false });
    expect(checkGradeConsistency(Number.NaN, "A", "1.0")).toEqual({ mismatch: false });
    expect(checkGradeConsistency(900, "E", "1.0")).toEqual({ mismatch: false });
    expect(checkGradeConsistency(900, null, "1.0")).toEqual({ mismatch: false });
  });
});
