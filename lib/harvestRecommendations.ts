/**
 * Rule-based harvest recommendations. Rendered from the structured assessment only;
 * the text never feeds back into any number.
 */

import type { HarvestAssessment } from "./evidenceContract";

export type AssessmentBody = Omit<HarvestAssessment, "recommendations" | "assessedAt">;

export function renderHarvestRecommendations(a: AssessmentBody): string[] {
  const out: string[] = [];

  if (a.urgency === "CRITICAL") {
    out.push("Harvest immediately: roads are expected to close and crop losses are accelerating.");
  }

  if (a.optimalDate) {
    const span = a.windowDates.length;
    out.push(`Plan harvest for ${a.optimalDate} (${span} suitable day${span === 1 ? "" : "s"} in the window).`);
  } else {
    out.push("No suitable harvest day in the forecast; prepare covered storage and drying capacity.");
  }

  if (a.roadRisk.level === "HIGH") {
    const days = a.roadRisk.daysUntilClosure;
    out.push(
      days != null && days <= 1
        ? "Arrange transport now; access roads may be impassable within a day."
        : `Arrange transport within ${a.roadRisk.daysUntilClosure ?? 2} days before access roads close.`
    );
  } else if (a.roadRisk.level === "MEDIUM") {
    out.push(`Book transport early; road conditions may deteriorate in about ${a.roadRisk.daysUntilClosure} days.`);
  }

  if (a.loss.weatherMultiplier > 1) {
    out.push("Humid or wet conditions raise spoilage; dry produce promptly after harvest.");
  }

  if (a.projectedLossPct >= 10) {
    out.push(`Waiting for the window risks about ${a.projectedLossPct}% post-harvest loss.`);
  }

  return out;
}
