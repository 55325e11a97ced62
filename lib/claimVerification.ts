/**
 * Insurance claim verification: satellite 30%, neighbor corroboration 40%, claimant
 * self-reports 30%. Each source scores 100 when it supports the claim and 0 when it does
 * not; an unavailable source has its weight redistributed. Confidence 0–100 maps to
 * APPROVE_STRONG ≥80, APPROVE ≥60, INVESTIGATE ≥40, REJECT below.
 *
 * Neighbor corroboration needs a quorum of distinct reporters other than the claimant, so a
 * single colluding neighbor cannot carry the heaviest-weighted source.
 */

import { createHash } from "node:crypto";
import type {
  ClaimEvidence,
  ClaimRecommendation,
  ClaimType,
  ClaimVerdict,
  NeighborEvidence,
  SatelliteEvidence,
  SelfReportEvidence,
} from "./evidenceContract";
import { deepFreeze } from "./evidenceContract";
import { InsufficientEvidenceError } from "./engineErrors";
import {
  fetchEvidence,
  isWithinWindow,
  windowAround,
  type GroundTruthReport,
  type NeighborFarm,
  type SatelliteScan,
} from "./evidenceSources";
import type { EngineRuntime } from "./engineConfig";
import type { ClaimRequest } from "./decisionRequestSchema";
import { aggregateWeighted, type FactorReading } from "./weightedAggregator";

export const CLAIM_MODEL_VERSION = "1.0";

export type ClaimSourceName = "satellite" | "neighbors" | "self_reports";

export const CLAIM_WEIGHTS: readonly (readonly [ClaimSourceName, number])[] = [
  ["satellite", 0.3],
  ["neighbors", 0.4],
  ["self_reports", 0.3],
];

export const SATELLITE_WINDOW_DAYS = 7;
export const NEIGHBOR_WINDOW_DAYS = 3;
export const SELF_REPORT_WINDOW_DAYS = 7;
export const NEIGHBOR_FARM_LIMIT = 10;
/** Distinct reporters (claimant excluded) needed before neighbor evidence counts. */
export const MIN_NEIGHBOR_REPORTERS = 3;
export const NEIGHBOR_AGREEMENT_THRESHOLD = 0.5;
export const DROUGHT_NDVI_THRESHOLD = 0.3;
export const FLOOD_BACKSCATTER_THRESHOLD_DB = -15;
export const MAX_CLAIM_AGE_DAYS = 365;

export const SUPPORT_VALUE = 100;

export function recommendationForConfidence(confidence: number): ClaimRecommendation {
  if (confidence >= 80) return "APPROVE_STRONG";
  if (confidence >= 60) return "APPROVE";
  if (confidence >= 40) return "INVESTIGATE";
  return "REJECT";
}

/** Whether a ground-truth report describes the claimed event. */
export function reportMatchesClaim(report: GroundTruthReport, claimType: ClaimType): boolean {
  switch (claimType) {
    case "drought":
      return report.condition === "clear" || report.condition === "cloudy" || report.rainfallAmount === "none";
    case "flood":
      return report.condition === "heavy_rain" || report.condition === "storm";
    case "storm":
      return report.condition === "storm" || report.condition === "windy";
    case "frost":
      return report.temperatureFeel === "very_cold";
  }
}

/** Stable claim identity: the same (subject, farm, date, type) always yields the same id. */
export function buildClaimId(claim: Pick<ClaimRequest, "subjectId" | "farmId" | "claimDate" | "claimType">): string {
  return createHash("sha256")
    .update([claim.subjectId, claim.farmId, claim.claimDate, claim.claimType].join("|"))
    .digest("hex");
}

type Assessed<E> = E & { supportsClaim: boolean };

const EMPTY_SATELLITE_DETAIL = {
  scanId: null,
  scanDate: null,
  ndvi: null,
  radarBackscatterDb: null,
  threshold: null,
};

export function assessSatellite(
  scan: SatelliteScan | null,
  claimType: ClaimType,
  unavailableReason?: string
): Assessed<SatelliteEvidence> {
  const unavailable = (reason: string, threshold: number | null = null): Assessed<SatelliteEvidence> => ({
    sourceKind: "satellite",
    value: null,
    observedAt: scan?.scanDate ?? null,
    confidenceHint: 0,
    available: false,
    unavailableReason: reason,
    detail: scan
      ? { scanId: scan.scanId, scanDate: scan.scanDate, ndvi: scan.ndvi, radarBackscatterDb: scan.radarBackscatterDb, threshold }
      : { ...EMPTY_SATELLITE_DETAIL, threshold },
    supportsClaim: false,
  });

  if (claimType === "storm" || claimType === "frost") {
    return unavailable(`satellite indices cannot observe ${claimType}`);
  }
  if (!scan) return unavailable(unavailableReason ?? "no completed scan in window");

  const threshold = claimType === "drought" ? DROUGHT_NDVI_THRESHOLD : FLOOD_BACKSCATTER_THRESHOLD_DB;
  const index = claimType === "drought" ? scan.ndvi : scan.radarBackscatterDb;
  if (index == null || !Number.isFinite(index)) {
    return unavailable(claimType === "drought" ? "scan has no NDVI value" : "scan has no radar backscatter", threshold);
  }
  const supportsClaim = index < threshold;
  return {
    sourceKind: "satellite",
    value: supportsClaim ? SUPPORT_VALUE : 0,
    observedAt: scan.scanDate,
    confidenceHint: 0.8,
    available: true,
    detail: {
      scanId: scan.scanId,
      scanDate: scan.scanDate,
      ndvi: scan.ndvi,
      radarBackscatterDb: scan.radarBackscatterDb,
      threshold,
    },
    supportsClaim,
  };
}

export type NeighborAssessmentParams = {
  claimantId: string;
  claimType: ClaimType;
  minReporters: number;
  agreementThreshold: number;
  window: { from: string; to: string };
};

/**
 * Neighbor corroboration over verified reports from the given farms. Reports filed by the
 * claimant, unverified reports and reports outside the window are ignored. Each reporter casts
 * one vote, agreeing when at least half of their reports match the claim.
 */
export function assessNeighbors(
  farms: NeighborFarm[],
  reports: GroundTruthReport[],
  params: NeighborAssessmentParams
): Assessed<NeighborEvidence> {
  const farmIds = new Set(farms.filter((f) => f.farmerId !== params.claimantId).map((f) => f.farmId));
  const eligible = reports.filter(
    (r) =>
      r.verified &&
      r.farmerId !== params.claimantId &&
      r.farmId != null &&
      farmIds.has(r.farmId) &&
      isWithinWindow(r.weatherTime, params.window)
  );
  const votes = new Map<string, { total: number; matching: number }>();
  for (const r of eligible) {
    const vote = votes.get(r.farmerId) ?? { total: 0, matching: 0 };
    vote.total += 1;
    if (reportMatchesClaim(r, params.claimType)) vote.matching += 1;
    votes.set(r.farmerId, vote);
  }
  const reporterCount = votes.size;
  const matchingReports = [...votes.values()].reduce((sum, v) => sum + v.matching, 0);
  const agreeingReporters = [...votes.values()].filter((v) => v.matching * 2 >= v.total).length;
  const base = {
    farmsConsulted: farmIds.size,
    reporterCount,
    minReporters: params.minReporters,
    totalReports: eligible.length,
    matchingReports,
    agreeingReporters,
  };
  const observedAt = eligible.length > 0 ? eligible.map((r) => r.weatherTime).reduce((a, b) => (a > b ? a : b)) : null;

  if (reporterCount < params.minReporters) {
    return {
      sourceKind: "neighbor",
      value: null,
      observedAt,
      confidenceHint: 0,
      available: false,
      unavailableReason: `only ${reporterCount} distinct neighbor reporter(s), need ${params.minReporters}`,
      detail: { ...base, agreementRate: null },
      supportsClaim: false,
    };
  }
  const agreementRate = agreeingReporters / reporterCount;
  const supportsClaim = agreementRate >= params.agreementThreshold;
  return {
    sourceKind: "neighbor",
    value: supportsClaim ? SUPPORT_VALUE : 0,
    observedAt,
    confidenceHint: Math.min(1, reporterCount / (params.minReporters * 2)),
    available: true,
    detail: { ...base, agreementRate },
    supportsClaim,
  };
}

/** Claimant's own reports for the farm: support when at least one describes the event. */
export function assessSelfReports(
  reports: GroundTruthReport[],
  farmId: string,
  claimType: ClaimType,
  window: { from: string; to: string },
  unavailableReason?: string
): Assessed<SelfReportEvidence> {
  const relevant = reports.filter(
    (r) => (r.farmId == null || r.farmId === farmId) && isWithinWindow(r.weatherTime, window)
  );
  const matchingReports = relevant.filter((r) => reportMatchesClaim(r, claimType)).length;
  if (relevant.length === 0) {
    return {
      sourceKind: "self_report",
      value: null,
      observedAt: null,
      confidenceHint: 0,
      available: false,
      unavailableReason: unavailableReason ?? "claimant filed no reports in window",
      detail: { totalReports: 0, matchingReports: 0 },
      supportsClaim: false,
    };
  }
  const supportsClaim = matchingReports > 0;
  return {
    sourceKind: "self_report",
    value: supportsClaim ? SUPPORT_VALUE : 0,
    observedAt: relevant.map((r) => r.weatherTime).reduce((a, b) => (a > b ? a : b)),
    confidenceHint: 0.5,
    available: true,
    detail: { totalReports: relevant.length, matchingReports },
    supportsClaim,
  };
}

function toReading(evidence: { value: number | null; unavailableReason?: string }): FactorReading {
  return evidence.value == null
    ? { value: null, reason: evidence.unavailableReason ?? "unavailable" }
    : { value: evidence.value };
}

/**
 * Combine assessed sources into a verdict body. Throws InsufficientEvidenceError when no
 * source is available.
 */
export function combineClaimEvidence(
  runtime: Pick<EngineRuntime, "weights">,
  claim: ClaimRequest,
  assessed: {
    satellite: Assessed<SatelliteEvidence>;
    neighbors: Assessed<NeighborEvidence>;
    self_reports: Assessed<SelfReportEvidence>;
  }
): ClaimVerdict {
  const spec = runtime.weights.claim;
  const result = aggregateWeighted(
    spec,
    {
      satellite: toReading(assessed.satellite),
      neighbors: toReading(assessed.neighbors),
      self_reports: toReading(assessed.self_reports),
    },
    `claim ${claim.claimType} on farm ${claim.farmId}`
  );
  const evidence: ClaimEvidence[] = result.factors.map((factor) => ({
    ...assessed[factor.name],
    weight: factor.weight,
    effectiveWeight: factor.effectiveWeight,
  }));
  const confidence = Math.round(result.score * 100) / 100;
  return {
    claimId: buildClaimId(claim),
    subjectId: claim.subjectId,
    farmId: claim.farmId,
    claimDate: claim.claimDate,
    claimType: claim.claimType,
    confidence,
    recommendation: recommendationForConfidence(confidence),
    evidence,
    modelVersion: CLAIM_MODEL_VERSION,
  };
}

/**
 * VerifyClaim: fetch satellite, neighbor and self-report evidence concurrently, combine,
 * append to the claim's verdict history and publish. The request is validated by the caller.
 */
export async function verifyClaim(
  runtime: EngineRuntime,
  claim: ClaimRequest,
  options: { signal?: AbortSignal } = {}
): Promise<ClaimVerdict> {
  const { config, sources, logger } = runtime;
  const decision = `claim verification for farm ${claim.farmId}`;
  const fetchParams = (source: string) => ({
    decision,
    source,
    timeoutMs: config.adapterTimeoutMs,
    signal: options.signal,
    logger,
  });

  const satelliteWindow = windowAround(claim.claimDate, config.claims.satelliteWindowDays);
  const neighborWindow = windowAround(claim.claimDate, config.claims.neighborWindowDays);
  const selfWindow = windowAround(claim.claimDate, config.claims.selfReportWindowDays);
  const satelliteObservable = claim.claimType === "drought" || claim.claimType === "flood";

  const satelliteTask = async (): Promise<Assessed<SatelliteEvidence>> => {
    if (!satelliteObservable) return assessSatellite(null, claim.claimType);
    const outcome = await fetchEvidence(
      (o) => sources.satellite.findLatestCompletedScan(claim.farmId, satelliteWindow, o),
      fetchParams("satellite_index")
    );
    return outcome.ok
      ? assessSatellite(outcome.value, claim.claimType)
      : assessSatellite(null, claim.claimType, `satellite index unavailable: ${outcome.reason}`);
  };

  const neighborTask = async (): Promise<Assessed<NeighborEvidence>> => {
    const params: NeighborAssessmentParams = {
      claimantId: claim.subjectId,
      claimType: claim.claimType,
      minReporters: config.claims.minNeighborReporters,
      agreementThreshold: config.claims.neighborAgreementThreshold,
      window: neighborWindow,
    };
    const farmsOutcome = await fetchEvidence(
      (o) =>
        sources.farms.findNearestFarms(
          claim.farmId,
          { limit: config.claims.neighborFarmLimit, excludeFarmerId: claim.subjectId },
          o
        ),
      fetchParams("farm_registry")
    );
    if (!farmsOutcome.ok) {
      return { ...assessNeighbors([], [], params), unavailableReason: `farm registry unavailable: ${farmsOutcome.reason}` };
    }
    const farms = farmsOutcome.value.filter((f) => f.farmId !== claim.farmId);
    if (farms.length === 0) return assessNeighbors([], [], params);
    const reportsOutcome = await fetchEvidence(
      (o) => sources.reports.listReportsByFarms(farms.map((f) => f.farmId), neighborWindow, o),
      fetchParams("report_store")
    );
    if (!reportsOutcome.ok) {
      return { ...assessNeighbors(farms, [], params), unavailableReason: `report store unavailable: ${reportsOutcome.reason}` };
    }
    return assessNeighbors(farms, reportsOutcome.value, params);
  };

  const selfTask = async (): Promise<Assessed<SelfReportEvidence>> => {
    const outcome = await fetchEvidence(
      (o) => sources.reports.listReportsBySubject(claim.subjectId, selfWindow, o),
      fetchParams("report_store")
    );
    return outcome.ok
      ? assessSelfReports(outcome.value, claim.farmId, claim.claimType, selfWindow)
      : assessSelfReports([], claim.farmId, claim.claimType, selfWindow, `report store unavailable: ${outcome.reason}`);
  };

  const [satellite, neighbors, selfReports] = await Promise.all([satelliteTask(), neighborTask(), selfTask()]);

  let verdict: ClaimVerdict;
  try {
    verdict = deepFreeze(combineClaimEvidence(runtime, claim, { satellite, neighbors, self_reports: selfReports }));
  } catch (error) {
    if (error instanceof InsufficientEvidenceError) {
      logger.warn("claim verification refused: no evidence source available", {
        farmId: claim.farmId,
        claimType: claim.claimType,
        missing: error.missing,
      });
    }
    throw error;
  }

  const entry = await runtime.claimLedger.append(verdict);
  logger.info("claim verdict issued", {
    claimId: verdict.claimId,
    confidence: verdict.confidence,
    recommendation: verdict.recommendation,
    sequence: entry.sequence,
  });
  await runtime.publish({ kind: "claim_verdict", record: verdict });
  return verdict;
}
