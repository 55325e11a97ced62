/**
 * Decision engine façade: credit scoring, claim verification and harvest logistics over one
 * set of evidence sources. Each call validates its request before touching an adapter.
 */

import { randomUUID } from "node:crypto";
import type {
  ClaimVerdict,
  CompositeScore,
  DecisionEvent,
  DecisionSink,
  HarvestAssessment,
  LossProjection,
} from "./evidenceContract";
import { buildClaimId, verifyClaim as runClaimVerification } from "./claimVerification";
import { computeCreditScore as runCreditScore } from "./creditScore";
import {
  creditRequestSchema,
  harvestRequestSchema,
  lossEstimateRequestSchema,
  parseClaimRequest,
  parseRequest,
} from "./decisionRequestSchema";
import { buildWeightSets, loadEngineConfig, type EngineConfig, type EngineRuntime } from "./engineConfig";
import type { EvidenceSources } from "./evidenceSources";
import { createLogger, type Logger } from "./logger";
import { assessHarvest as runHarvestAssessment, estimateHarvestLoss as runLossEstimate } from "./logisticsRisk";
import { getDecisionModelMetadata, type DecisionModelMetadata } from "./modelGovernance";
import {
  InMemoryClaimVerdictLedger,
  InMemoryScoreLedger,
  type ClaimVerdictEntry,
  type ClaimVerdictLedger,
  type ScoreLedger,
} from "./scoreHistory";
import { SupabaseClaimVerdictLedger, SupabaseScoreLedger } from "./supabase/decisionLedgers";
import { createSupabaseEvidenceSources } from "./supabase/evidenceStores";
import { createServiceRoleClient } from "./supabase/service";

export type DecisionOptions = { signal?: AbortSignal };

export type ClaimInput = {
  subjectId: string;
  farmId: string;
  claimDate: string;
  claimType: string;
};

export type DecisionEngineOptions = {
  sources: EvidenceSources;
  /** Defaults to loadEngineConfig(process.env). */
  config?: EngineConfig;
  scoreLedger?: ScoreLedger;
  claimLedger?: ClaimVerdictLedger;
  sink?: DecisionSink;
  /** Replaces the per-engine scoped console loggers. */
  logger?: Logger;
  now?: () => Date;
  newId?: () => string;
};

export type DecisionEngine = {
  computeCreditScore(subjectId: string, options?: DecisionOptions): Promise<CompositeScore>;
  verifyClaim(claim: ClaimInput, options?: DecisionOptions): Promise<ClaimVerdict>;
  assessHarvest(farmId: string, options?: DecisionOptions): Promise<HarvestAssessment>;
  estimateHarvestLoss(farmId: string, delayDays: number, options?: DecisionOptions): Promise<LossProjection>;
  getScoreHistory(subjectId: string): Promise<readonly CompositeScore[]>;
  getClaimVerdicts(claimId: string): Promise<readonly ClaimVerdictEntry[]>;
  claimIdFor(claim: ClaimInput): string;
  metadata(): DecisionModelMetadata;
};

/** Throws InvalidWeightConfigurationError when configured weights are invalid. */
export function createDecisionEngine(options: DecisionEngineOptions): DecisionEngine {
  const config = options.config ?? loadEngineConfig();
  const weights = buildWeightSets(config);
  const now = options.now ?? (() => new Date());
  const loggerFor = (scope: string): Logger => options.logger ?? createLogger(scope);
  const engineLog = loggerFor("decisions");
  const sink = options.sink;

  const publish = async (event: DecisionEvent): Promise<void> => {
    if (!sink) return;
    try {
      await sink.publish(event);
    } catch (error) {
      engineLog.error("decision sink failed; record kept", {
        kind: event.kind,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  };

  const base: Omit<EngineRuntime, "logger"> = {
    config,
    weights,
    sources: options.sources,
    scoreLedger: options.scoreLedger ?? new InMemoryScoreLedger(),
    claimLedger: options.claimLedger ?? new InMemoryClaimVerdictLedger(now),
    now,
    newId: options.newId ?? (() => randomUUID()),
    publish,
  };
  const credit: EngineRuntime = { ...base, logger: loggerFor("credit") };
  const claims: EngineRuntime = { ...base, logger: loggerFor("claims") };
  const harvest: EngineRuntime = { ...base, logger: loggerFor("harvest") };

  return {
    async computeCreditScore(subjectId, opts = {}) {
      const request = parseRequest("computeCreditScore", creditRequestSchema, { subjectId });
      return runCreditScore(credit, request.subjectId, opts);
    },

    async verifyClaim(claim, opts = {}) {
      const request = parseClaimRequest(claim, now(), config.claims.maxClaimAgeDays);
      return runClaimVerification(claims, request, opts);
    },

    async assessHarvest(farmId, opts = {}) {
      const request = parseRequest("assessHarvest", harvestRequestSchema, { farmId });
      return runHarvestAssessment(harvest, request.farmId, opts);
    },

    async estimateHarvestLoss(farmId, delayDays, opts = {}) {
      const request = parseRequest("estimateHarvestLoss", lossEstimateRequestSchema, { farmId, delayDays });
      return runLossEstimate(harvest, request.farmId, request.delayDays, opts);
    },

    async getScoreHistory(subjectId) {
      const request = parseRequest("getScoreHistory", creditRequestSchema, { subjectId });
      return base.scoreLedger.list(request.subjectId);
    },

    async getClaimVerdicts(claimId) {
      return base.claimLedger.list(claimId);
    },

    claimIdFor(claim) {
      const request = parseClaimRequest(claim, now(), config.claims.maxClaimAgeDays);
      return buildClaimId(request);
    },

    metadata() {
      return getDecisionModelMetadata(config, weights);
    },
  };
}

/** Production wiring: Supabase evidence stores and ledgers from SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY. */
export function createDecisionEngineFromEnv(
  env: Record<string, string | undefined> = process.env,
  options: Omit<DecisionEngineOptions, "sources" | "scoreLedger" | "claimLedger" | "config"> = {}
): DecisionEngine {
  const supabase = createServiceRoleClient(env);
  const now = options.now ?? (() => new Date());
  return createDecisionEngine({
    ...options,
    now,
    config: loadEngineConfig(env),
    sources: createSupabaseEvidenceSources(supabase, now),
    scoreLedger: new SupabaseScoreLedger(supabase),
    claimLedger: new SupabaseClaimVerdictLedger(supabase, now),
  });
}
