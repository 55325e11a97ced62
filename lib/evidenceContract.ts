/**
 * Evidence + decision record contract.
 * Evidence is a closed set of typed variants (satellite, neighbor, self_report, action,
 * traditional_factor) so every verdict can enumerate exactly what it was built from.
 * Records returned by the engines are frozen; nothing downstream may mutate them.
 */

export const CLAIM_TYPES = ["drought", "flood", "storm", "frost"] as const;
export type ClaimType = (typeof CLAIM_TYPES)[number];

export type EvidenceSourceKind =
  | "satellite"
  | "neighbor"
  | "self_report"
  | "action"
  | "traditional_factor";

type EvidenceBase<K extends EvidenceSourceKind, D> = {
  sourceKind: K;
  /** Normalized 0–100 contribution; null when the source is unavailable. */
  value: number | null;
  /** ISO timestamp of the underlying observation, when known. */
  observedAt: string | null;
  /** 0–1 trust hint for reviewers; not used in aggregation. */
  confidenceHint: number;
  available: boolean;
  unavailableReason?: string;
  detail: D;
};

export type SatelliteDetail = {
  scanId: string | null;
  scanDate: string | null;
  ndvi: number | null;
  radarBackscatterDb: number | null;
  /** Threshold the index was compared against (NDVI for drought, dB for flood). */
  threshold: number | null;
};

export type NeighborDetail = {
  farmsConsulted: number;
  reporterCount: number;
  minReporters: number;
  totalReports: number;
  matchingReports: number;
  /** Reporters at least half of whose reports describe the claimed event. */
  agreeingReporters: number;
  /** agreeingReporters / reporterCount; each reporter votes once. */
  agreementRate: number | null;
};

export type SelfReportDetail = {
  totalReports: number;
  matchingReports?: number;
  corroboratedReports?: number;
  reportingFrequencyScore?: number;
  accuracyRate?: number;
};

export type ActionDetail = {
  submitted: number;
  verified: number;
  verificationRate: number;
  distinctVerifiedTypes: number;
  monthsWithVerifiedAction: number;
  diversityBonus: number;
  consistencyBonus: number;
};

export const TRADITIONAL_FACTORS = [
  "farm_size",
  "crop_health",
  "climate_risk",
  "payment_history",
  "deforestation",
] as const;
export type TraditionalFactorName = (typeof TRADITIONAL_FACTORS)[number];

export type TraditionalFactorDetail = {
  factor: TraditionalFactorName;
  rawValue: number | boolean | null;
  unit: string;
};

export type SatelliteEvidence = EvidenceBase<"satellite", SatelliteDetail>;
export type NeighborEvidence = EvidenceBase<"neighbor", NeighborDetail>;
export type SelfReportEvidence = EvidenceBase<"self_report", SelfReportDetail>;
export type ActionEvidence = EvidenceBase<"action", ActionDetail>;
export type TraditionalFactorEvidence = EvidenceBase<"traditional_factor", TraditionalFactorDetail>;

export type EvidenceItem =
  | SatelliteEvidence
  | NeighborEvidence
  | SelfReportEvidence
  | ActionEvidence
  | TraditionalFactorEvidence;

// --- Credit score ---

export type SubScoreName = "traditional" | "action" | "ground_truth";

export type SubScore = {
  name: SubScoreName;
  /** 0–100; null when no contributing evidence was available. */
  value: number | null;
  weight: number;
  /** Weight after redistribution; 0 when unavailable. */
  effectiveWeight: number;
  available: boolean;
  contributingEvidence: EvidenceItem[];
};

export type Grade = "A" | "B" | "C" | "D" | "F";

export type GradeTerms = {
  grade: Grade;
  eligible: boolean;
  /** Annual interest rate in percent; null when ineligible. */
  interestRatePct: number | null;
};

export type CompositeScore = {
  id: string;
  subjectId: string;
  value: number;
  grade: Grade;
  terms: GradeTerms;
  subScores: SubScore[];
  /** 0–0.95 data-freshness confidence. */
  confidence: number;
  modelVersion: string;
  computedAt: string;
  validUntil: string;
};

// --- Claim verification ---

export type ClaimRecommendation = "APPROVE_STRONG" | "APPROVE" | "INVESTIGATE" | "REJECT";

export type ClaimEvidence = (SatelliteEvidence | NeighborEvidence | SelfReportEvidence) & {
  supportsClaim: boolean;
  weight: number;
  effectiveWeight: number;
};

export type ClaimVerdict = {
  claimId: string;
  subjectId: string;
  farmId: string;
  claimDate: string;
  claimType: ClaimType;
  confidence: number;
  recommendation: ClaimRecommendation;
  evidence: ClaimEvidence[];
  modelVersion: string;
};

// --- Harvest logistics ---

export type ForecastDay = {
  /** YYYY-MM-DD */
  date: string;
  rainfallMm: number;
  temperatureC: number;
  humidityPct: number;
  windSpeedKph?: number;
};

export type RoadRiskLevel = "LOW" | "MEDIUM" | "HIGH";
export type Urgency = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";

export type RoadRisk = {
  level: RoadRiskLevel;
  daysUntilClosure: number | null;
  cumulativeRainfallMm: number;
  accumulationRateMmPerDay: number;
};

export type LossProjection = {
  delayDays: number;
  weatherMultiplier: number;
  /** Loss slope in percent per day of delay. */
  lossRatePctPerDay: number;
  projectedLossPct: number;
};

export type HarvestAssessment = {
  farmId: string;
  optimalDate: string | null;
  windowDates: string[];
  roadRisk: RoadRisk;
  projectedLossPct: number;
  loss: LossProjection;
  urgency: Urgency;
  recommendations: string[];
  assessedAt: string;
};

// --- Published records ---

export type DecisionEvent =
  | { kind: "credit_score"; record: CompositeScore }
  | { kind: "claim_verdict"; record: ClaimVerdict }
  | { kind: "harvest_assessment"; record: HarvestAssessment };

/** Downstream consumer of issued decisions (notification, rendering, ledger anchoring). */
export interface DecisionSink {
  publish(event: DecisionEvent): Promise<void>;
}

/** Recursively freezes a record so issued decisions cannot change after the fact. */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
    Object.freeze(value);
  }
  return value;
}
