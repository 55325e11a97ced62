/**
 * Checks a stored grade against GRADE_BANDS: the score must fall inside the band the
 * stored grade names. Catches records written under drifted bands or by a bug.
 */

import type { Grade } from "./evidenceContract";
import { CREDIT_MODEL_VERSION, GRADE_BANDS } from "./creditScore";

export type GradeConsistencyResult = {
  mismatch: boolean;
  expectedGrade?: Grade;
};

function bandForScore(score: number) {
  return GRADE_BANDS.find((b) => score >= b.min && score <= b.max);
}

/** Bands are only asserted for records of the current model version. */
export function checkGradeConsistency(
  score: number | null,
  storedGrade: string | null,
  modelVersion: string | null
): GradeConsistencyResult {
  if (score == null || Number.isNaN(score)) return { mismatch: false };
  if (modelVersion?.trim() !== CREDIT_MODEL_VERSION) return { mismatch: false };
  const storedBand = GRADE_BANDS.find((b) => b.grade === storedGrade?.trim());
  if (!storedBand) return { mismatch: false };
  if (score >= storedBand.min && score <= storedBand.max) return { mismatch: false };
  const expected = bandForScore(score);
  return expected ? { mismatch: true, expectedGrade: expected.grade } : { mismatch: true };
}
