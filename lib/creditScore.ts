/**
 * Composite credit score: 0–1000 with a letter grade.
 * Final = round(1000 × (0.40 × traditional + 0.30 × action + 0.30 × groundTruth) / 100),
 * each sub-score 0–100. An empty action or report history scores 0. Only a source that
 * failed or timed out is unavailable and has its weight redistributed. A subject with no
 * record and both histories empty fails with InsufficientEvidence.
 * Grades (inclusive lower bound): A ≥800, B ≥700, C ≥600, D ≥500, F below.
 */

import type {
  ActionEvidence,
  CompositeScore,
  Grade,
  GradeTerms,
  SelfReportEvidence,
  SubScore,
  SubScoreName,
  TraditionalFactorEvidence,
  TraditionalFactorName,
} from "./evidenceContract";
import { deepFreeze } from "./evidenceContract";
import { InsufficientEvidenceError } from "./engineErrors";
import {
  daysBetween,
  fetchEvidence,
  toIsoDate,
  trailingWindow,
  type ActionRecord,
  type GroundTruthReport,
  type TraditionalRecord,
} from "./evidenceSources";
import type { EngineRuntime } from "./engineConfig";
import { buildTraditionalEvidence } from "./traditionalFactors";
import { aggregateWeighted, type FactorReading, type WeightSpec } from "./weightedAggregator";

/** Scoring logic version; stamped on every record so older scores stay interpretable. */
export const CREDIT_MODEL_VERSION = "1.0";

export const COMPOSITE_WEIGHTS: readonly (readonly [SubScoreName, number])[] = [
  ["traditional", 0.4],
  ["action", 0.3],
  ["ground_truth", 0.3],
];

export const TRADITIONAL_WEIGHTS: readonly (readonly [TraditionalFactorName, number])[] = [
  ["farm_size", 0.15],
  ["crop_health", 0.25],
  ["climate_risk", 0.2],
  ["payment_history", 0.25],
  ["deforestation", 0.15],
];

export const VERIFICATION_RATE_SHARE = 0.65;
export const DIVERSITY_POINTS_PER_TYPE = 5;
export const DIVERSITY_BONUS_CAP = 20;
export const CONSISTENCY_POINTS_PER_MONTH = 3;
export const CONSISTENCY_BONUS_CAP = 15;

/** Twelve reports in the rolling window earn full frequency credit. */
export const FULL_FREQUENCY_REPORTS = 12;
export const FREQUENCY_SHARE = 0.4;
export const ACCURACY_SHARE = 0.6;

export const SCORE_VALIDITY_DAYS = 30;
export const MAX_DATA_CONFIDENCE = 0.95;

export const GRADE_BANDS: readonly { grade: Grade; min: number; max: number; interestRatePct: number | null }[] = [
  { grade: "A", min: 800, max: 1000, interestRatePct: 8 },
  { grade: "B", min: 700, max: 799, interestRatePct: 10 },
  { grade: "C", min: 600, max: 699, interestRatePct: 12 },
  { grade: "D", min: 500, max: 599, interestRatePct: 15 },
  { grade: "F", min: 0, max: 499, interestRatePct: null },
];

export function scoreToGrade(score: number): Grade {
  if (score >= 800) return "A";
  if (score >= 700) return "B";
  if (score >= 600) return "C";
  if (score >= 500) return "D";
  return "F";
}

export function gradeTerms(grade: Grade): GradeTerms {
  const band = GRADE_BANDS.find((b) => b.grade === grade);
  const interestRatePct = band?.interestRatePct ?? null;
  return { grade, eligible: interestRatePct != null, interestRatePct };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function latestTimestamp(values: string[]): string | null {
  if (values.length === 0) return null;
  return values.reduce((a, b) => (a > b ? a : b));
}

/**
 * Action sub-score: 65% × verification rate + diversity bonus + consistency bonus, capped at 100.
 * Zero when the subject submitted no actions in the window.
 */
export function computeActionEvidence(actions: ActionRecord[]): ActionEvidence {
  const submitted = actions.length;
  const verifiedActions = actions.filter((a) => a.verified);
  const verified = verifiedActions.length;
  const verificationRate = submitted > 0 ? verified / submitted : 0;
  const distinctVerifiedTypes = new Set(verifiedActions.map((a) => a.actionType)).size;
  const monthsWithVerifiedAction = new Set(verifiedActions.map((a) => a.actionDate.slice(0, 7))).size;
  const diversityBonus = Math.min(DIVERSITY_BONUS_CAP, DIVERSITY_POINTS_PER_TYPE * distinctVerifiedTypes);
  const consistencyBonus = Math.min(CONSISTENCY_BONUS_CAP, CONSISTENCY_POINTS_PER_MONTH * monthsWithVerifiedAction);
  const detail = {
    submitted,
    verified,
    verificationRate,
    distinctVerifiedTypes,
    monthsWithVerifiedAction,
    diversityBonus,
    consistencyBonus,
  };
  const value = Math.min(100, VERIFICATION_RATE_SHARE * verificationRate * 100 + diversityBonus + consistencyBonus);
  return {
    sourceKind: "action",
    value,
    observedAt: latestTimestamp(actions.map((a) => a.actionDate)),
    confidenceHint: verificationRate,
    available: true,
    detail,
  };
}

/**
 * Ground-truth sub-score: 40% reporting frequency + 60% accuracy. A report counts as accurate
 * when later corroborated by verification or a satellite cross-check.
 */
export function computeGroundTruthEvidence(reports: GroundTruthReport[]): SelfReportEvidence {
  const totalReports = reports.length;
  const corroboratedReports = reports.filter((r) => r.verified || r.satelliteCorroborated).length;
  const reportingFrequencyScore = Math.min(100, (100 * totalReports) / FULL_FREQUENCY_REPORTS);
  const accuracyRate = totalReports > 0 ? (corroboratedReports / totalReports) * 100 : 0;
  return {
    sourceKind: "self_report",
    value: FREQUENCY_SHARE * reportingFrequencyScore + ACCURACY_SHARE * accuracyRate,
    observedAt: latestTimestamp(reports.map((r) => r.reportedAt)),
    confidenceHint: accuracyRate / 100,
    available: true,
    detail: { totalReports, corroboratedReports, reportingFrequencyScore, accuracyRate },
  };
}

/** Action evidence for a store that failed or timed out; its weight is redistributed. */
export function unavailableActionEvidence(reason: string): ActionEvidence {
  return { ...computeActionEvidence([]), value: null, available: false, unavailableReason: reason };
}

/** Ground-truth evidence for a store that failed or timed out; its weight is redistributed. */
export function unavailableGroundTruthEvidence(reason: string): SelfReportEvidence {
  return { ...computeGroundTruthEvidence([]), value: null, available: false, unavailableReason: reason };
}

export type TraditionalSubScore = {
  value: number | null;
  unavailableReason?: string;
  evidence: TraditionalFactorEvidence[];
};

/** Weighted blend of the five normalized traditional factors, with redistribution. */
export function computeTraditionalSubScore(
  record: TraditionalRecord,
  spec: WeightSpec<TraditionalFactorName>
): TraditionalSubScore {
  const byFactor = buildTraditionalEvidence(record);
  const evidence = spec.entries.map((e) => byFactor[e.name]);
  if (!evidence.some((e) => e.available)) {
    return { value: null, unavailableReason: "traditional record has no usable indicators", evidence };
  }
  const reading = (item: TraditionalFactorEvidence): FactorReading =>
    item.value == null ? { value: null, reason: item.unavailableReason ?? "missing" } : { value: item.value };
  const readings: Record<TraditionalFactorName, FactorReading> = {
    farm_size: reading(byFactor.farm_size),
    crop_health: reading(byFactor.crop_health),
    climate_risk: reading(byFactor.climate_risk),
    payment_history: reading(byFactor.payment_history),
    deforestation: reading(byFactor.deforestation),
  };
  const result = aggregateWeighted(spec, readings, "traditional sub-score");
  return { value: result.score, evidence };
}

/**
 * Combine sub-score values (0–100 or null) into the 0–1000 integer score.
 * Throws InsufficientEvidenceError when every sub-score is null.
 */
export function combineSubScores(
  values: Record<SubScoreName, { value: number | null; reason?: string }>,
  spec: WeightSpec<SubScoreName>
): { score: number; effectiveWeights: Record<SubScoreName, number> } {
  const readings: Record<SubScoreName, FactorReading> = {
    traditional: toReading(values.traditional),
    action: toReading(values.action),
    ground_truth: toReading(values.ground_truth),
  };
  const result = aggregateWeighted(spec, readings, "credit score");
  const effectiveWeights: Record<SubScoreName, number> = { traditional: 0, action: 0, ground_truth: 0 };
  for (const f of result.factors) effectiveWeights[f.name] = f.effectiveWeight;
  // Rounded to 1e-6 first so float noise (e.g. 649.9999999) cannot flip the integer.
  const score = Math.round(Math.round(((1000 * result.score) / 100) * 1e6) / 1e6);
  return { score: Math.max(0, Math.min(1000, score)), effectiveWeights };
}

function toReading(input: { value: number | null; reason?: string }): FactorReading {
  return input.value == null ? { value: null, reason: input.reason ?? "unavailable" } : { value: input.value };
}

function freshnessCredit(observedAt: string | null, now: Date, tiers: readonly (readonly [number, number])[], stale: number): number {
  if (!observedAt) return 0;
  const ageDays = daysBetween(observedAt, toIsoDate(now));
  for (const [maxAge, credit] of tiers) {
    if (ageDays <= maxAge) return credit;
  }
  return stale;
}

/** 0.30 base plus freshness credit for satellite, climate and deforestation data; capped at 0.95. */
export function computeDataConfidence(record: TraditionalRecord | null, now: Date): number {
  let confidence = 0.3;
  if (record) {
    confidence += freshnessCredit(record.ndviObservedAt, now, [[7, 0.25], [14, 0.2], [30, 0.15]], 0.1);
    confidence += freshnessCredit(record.climateAssessedAt, now, [[30, 0.2], [60, 0.15]], 0.1);
    confidence += freshnessCredit(record.deforestationCheckedAt, now, [[90, 0.15]], 0.1);
  }
  return round2(Math.min(confidence, MAX_DATA_CONFIDENCE));
}

type Fetched<T> = { value: T } | { value: null; reason: string };

/**
 * ComputeCreditScore(subjectId): fetch the three evidence families concurrently, score,
 * append the frozen record to the score ledger, and publish it to the decision sink.
 */
export async function computeCreditScore(
  runtime: EngineRuntime,
  subjectId: string,
  options: { signal?: AbortSignal } = {}
): Promise<CompositeScore> {
  const { config, sources, logger } = runtime;
  const now = runtime.now();
  const decision = `credit score for ${subjectId}`;
  const fetchParams = (source: string) => ({
    decision,
    source,
    timeoutMs: config.adapterTimeoutMs,
    signal: options.signal,
    logger,
  });

  const historyWindow = trailingWindow(now, config.credit.actionWindowDays);
  const reportWindow = trailingWindow(now, config.credit.groundTruthWindowDays);

  const [traditionalOutcome, actionOutcome, reportOutcome] = await Promise.all([
    fetchEvidence((o) => sources.farms.getTraditionalRecord(subjectId, o), fetchParams("farm_registry")),
    fetchEvidence((o) => sources.actions.listActions(subjectId, historyWindow, o), fetchParams("action_store")),
    fetchEvidence((o) => sources.reports.listReportsBySubject(subjectId, reportWindow, o), fetchParams("report_store")),
  ]);

  const traditionalRecord: Fetched<TraditionalRecord> = traditionalOutcome.ok
    ? traditionalOutcome.value
      ? { value: traditionalOutcome.value }
      : { value: null, reason: "no traditional record registered" }
    : { value: null, reason: `farm registry unavailable: ${traditionalOutcome.reason}` };

  const traditional = traditionalRecord.value
    ? computeTraditionalSubScore(traditionalRecord.value, runtime.weights.traditional)
    : { value: null, unavailableReason: traditionalRecord.reason, evidence: [] };

  const actionEvidence: ActionEvidence = actionOutcome.ok
    ? computeActionEvidence(actionOutcome.value)
    : unavailableActionEvidence(`action store unavailable: ${actionOutcome.reason}`);

  const groundTruthEvidence: SelfReportEvidence = reportOutcome.ok
    ? computeGroundTruthEvidence(reportOutcome.value)
    : unavailableGroundTruthEvidence(`report store unavailable: ${reportOutcome.reason}`);

  const actionCount = actionOutcome.ok ? actionOutcome.value.length : 0;
  const reportCount = reportOutcome.ok ? reportOutcome.value.length : 0;
  if (traditional.value == null && actionCount === 0 && reportCount === 0) {
    const missing = [
      { source: "traditional", reason: traditional.unavailableReason ?? "unavailable" },
      { source: "action", reason: actionEvidence.unavailableReason ?? "no actions submitted in window" },
      { source: "ground_truth", reason: groundTruthEvidence.unavailableReason ?? "no ground-truth reports in window" },
    ];
    logger.warn("credit score refused: no evidence family available", { subjectId, missing });
    throw new InsufficientEvidenceError("credit score", missing);
  }

  const values: Record<SubScoreName, { value: number | null; reason?: string }> = {
    traditional: { value: traditional.value, reason: traditional.unavailableReason },
    action: { value: actionEvidence.value, reason: actionEvidence.unavailableReason },
    ground_truth: { value: groundTruthEvidence.value, reason: groundTruthEvidence.unavailableReason },
  };

  let combined: ReturnType<typeof combineSubScores>;
  try {
    combined = combineSubScores(values, runtime.weights.composite);
  } catch (error) {
    if (error instanceof InsufficientEvidenceError) {
      logger.warn("credit score refused: no evidence family available", { subjectId, missing: error.missing });
    }
    throw error;
  }

  const evidenceFor: Record<SubScoreName, SubScore["contributingEvidence"]> = {
    traditional: traditional.evidence,
    action: [actionEvidence],
    ground_truth: [groundTruthEvidence],
  };
  const subScores: SubScore[] = runtime.weights.composite.entries.map((entry) => ({
    name: entry.name,
    value: values[entry.name].value == null ? null : round2(values[entry.name].value ?? 0),
    weight: entry.weight,
    effectiveWeight: combined.effectiveWeights[entry.name],
    available: values[entry.name].value != null,
    contributingEvidence: evidenceFor[entry.name],
  }));

  const grade = scoreToGrade(combined.score);
  const validUntil = new Date(now.getTime() + config.credit.scoreValidityDays * 86_400_000);
  const record: CompositeScore = deepFreeze({
    id: runtime.newId(),
    subjectId,
    value: combined.score,
    grade,
    terms: gradeTerms(grade),
    subScores,
    confidence: computeDataConfidence(traditionalRecord.value, now),
    modelVersion: CREDIT_MODEL_VERSION,
    computedAt: now.toISOString(),
    validUntil: validUntil.toISOString(),
  });

  await runtime.scoreLedger.append(record);
  logger.info("credit score issued", { subjectId, score: record.value, grade: record.grade });
  await runtime.publish({ kind: "credit_score", record });
  return record;
}
