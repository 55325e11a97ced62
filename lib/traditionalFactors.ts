/**
 * Traditional risk factors: normalize registry indicators to 0–100 sub-factor values.
 * A missing indicator stays missing (null) so its weight is redistributed rather than
 * scored as zero or replaced with a neutral default.
 */

import type { TraditionalFactorEvidence, TraditionalFactorName } from "./evidenceContract";
import type { TraditionalRecord } from "./evidenceSources";

/** Farm size (acres) → adequacy score; first matching lower bound wins. */
export const FARM_SIZE_STEPS: readonly (readonly [number, number])[] = [
  [10, 100],
  [5, 90],
  [2.5, 80],
  [1.5, 70],
  [1, 60],
  [0.5, 50],
];
export const FARM_SIZE_FLOOR_SCORE = 40;

/** NDVI → crop-health score. */
export const NDVI_STEPS: readonly (readonly [number, number])[] = [
  [0.8, 100],
  [0.75, 95],
  [0.7, 90],
  [0.65, 85],
  [0.6, 80],
  [0.55, 75],
  [0.5, 70],
  [0.45, 65],
  [0.4, 60],
  [0.35, 55],
];
export const NDVI_FLOOR_SCORE = 50;

/** Late-but-paid installments earn this share of an on-time one. */
export const LATE_PAYMENT_CREDIT = 0.7;

function stepScore(value: number, steps: readonly (readonly [number, number])[], floor: number): number {
  for (const [lowerBound, score] of steps) {
    if (value >= lowerBound) return score;
  }
  return floor;
}

export function scoreFarmSize(acres: number | null): number | null {
  if (acres == null || !Number.isFinite(acres) || acres < 0) return null;
  return stepScore(acres, FARM_SIZE_STEPS, FARM_SIZE_FLOOR_SCORE);
}

export function scoreCropHealth(ndvi: number | null): number | null {
  if (ndvi == null || !Number.isFinite(ndvi) || ndvi < -1 || ndvi > 1) return null;
  return stepScore(ndvi, NDVI_STEPS, NDVI_FLOOR_SCORE);
}

/** Lower climate risk → higher score. */
export function scoreClimateRisk(riskScore: number | null): number | null {
  if (riskScore == null || !Number.isFinite(riskScore)) return null;
  return 100 - Math.max(0, Math.min(100, riskScore));
}

/** Null when the subject has no repayment history yet (nothing to judge). */
export function scorePaymentHistory(payments: TraditionalRecord["payments"]): number | null {
  if (payments.total <= 0) return null;
  const weighted = payments.onTime + payments.latePaid * LATE_PAYMENT_CREDIT;
  return Math.min(100, (weighted / payments.total) * 100);
}

/** Deforestation is a hard disqualifier for this factor. */
export function scoreDeforestation(detected: boolean | null): number | null {
  if (detected == null) return null;
  return detected ? 0 : 100;
}

function factorEvidence(
  factor: TraditionalFactorName,
  value: number | null,
  rawValue: number | boolean | null,
  unit: string,
  observedAt: string | null,
  missingReason: string
): TraditionalFactorEvidence {
  return {
    sourceKind: "traditional_factor",
    value,
    observedAt,
    confidenceHint: value == null ? 0 : observedAt ? 0.9 : 0.7,
    available: value != null,
    ...(value == null && { unavailableReason: missingReason }),
    detail: { factor, rawValue, unit },
  };
}

/** One evidence item per traditional factor, in weight-spec order. */
export function buildTraditionalEvidence(record: TraditionalRecord): Record<TraditionalFactorName, TraditionalFactorEvidence> {
  return {
    farm_size: factorEvidence(
      "farm_size",
      scoreFarmSize(record.farmSizeAcres),
      record.farmSizeAcres,
      "acres",
      null,
      "farm size not registered"
    ),
    crop_health: factorEvidence(
      "crop_health",
      scoreCropHealth(record.ndvi),
      record.ndvi,
      "ndvi",
      record.ndviObservedAt,
      "no satellite NDVI reading"
    ),
    climate_risk: factorEvidence(
      "climate_risk",
      scoreClimateRisk(record.climateRiskScore),
      record.climateRiskScore,
      "risk_0_100",
      record.climateAssessedAt,
      "no climate risk assessment"
    ),
    payment_history: factorEvidence(
      "payment_history",
      scorePaymentHistory(record.payments),
      record.payments.total,
      "installments",
      null,
      "no repayment history"
    ),
    deforestation: factorEvidence(
      "deforestation",
      scoreDeforestation(record.deforestationDetected),
      record.deforestationDetected,
      "detected",
      record.deforestationCheckedAt,
      "no deforestation check"
    ),
  };
}
