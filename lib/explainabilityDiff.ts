/**
 * Explainability diff: why a credit score changed between two records.
 * Compares each sub-score's contribution in score points (effective weight × value × 10).
 */

import type { CompositeScore, SubScoreName } from "./evidenceContract";

export type ExplainabilityDiffItem = {
  subScore: SubScoreName;
  previousPoints: number;
  currentPoints: number;
  deltaPoints: number;
};

type ScoreLike = Pick<CompositeScore, "subScores" | "modelVersion"> | null | undefined;

function pointsBySubScore(score: NonNullable<ScoreLike>): Map<SubScoreName, number> {
  const out = new Map<SubScoreName, number>();
  for (const s of score.subScores) {
    const points = s.value == null ? 0 : s.effectiveWeight * s.value * 10;
    out.set(s.name, (out.get(s.name) ?? 0) + points);
  }
  return out;
}

/**
 * Per-sub-score point diff between the latest and previous record, largest move first.
 * Empty when either record is missing or they come from different model versions.
 */
export function computeExplainabilityDiff(latest: ScoreLike, previous: ScoreLike): ExplainabilityDiffItem[] {
  if (!latest || !previous || latest.modelVersion !== previous.modelVersion) {
    return [];
  }
  const curr = pointsBySubScore(latest);
  const prev = pointsBySubScore(previous);
  const names = new Set([...prev.keys(), ...curr.keys()]);
  const out: ExplainabilityDiffItem[] = [];
  for (const subScore of names) {
    const previousPoints = Math.round((prev.get(subScore) ?? 0) * 100) / 100;
    const currentPoints = Math.round((curr.get(subScore) ?? 0) * 100) / 100;
    out.push({
      subScore,
      previousPoints,
      currentPoints,
      deltaPoints: Math.round((currentPoints - previousPoints) * 100) / 100,
    });
  }
  return out.sort((a, b) => Math.abs(b.deltaPoints) - Math.abs(a.deltaPoints));
}
