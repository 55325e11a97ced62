export * from "./evidenceContract";
export * from "./engineErrors";
export {
  aggregateWeighted,
  defineWeightSpec,
  redistributeWeights,
  type AggregateResult,
  type FactorReading,
  type WeightSpec,
} from "./weightedAggregator";
export type {
  ActionStore,
  EvidenceSources,
  FarmRegistry,
  ForecastStore,
  GroundTruthReport,
  GroundTruthReportStore,
  NearestFarmsQuery,
  NeighborFarm,
  SatelliteIndexStore,
} from "./evidenceSources";
export { createInMemorySources, type InMemoryEvidenceData } from "./inMemorySources";
export { scoreToGrade, gradeTerms, GRADE_BANDS, CREDIT_MODEL_VERSION } from "./creditScore";
export { recommendationForConfidence, CLAIM_MODEL_VERSION } from "./claimVerification";
export { loadEngineConfig, DEFAULT_ENGINE_CONFIG, type EngineConfig } from "./engineConfig";
export {
  InMemoryClaimVerdictLedger,
  InMemoryScoreLedger,
  buildScoreAuditRows,
  getScoreTrend,
  type ClaimVerdictEntry,
  type ClaimVerdictLedger,
  type ScoreLedger,
} from "./scoreHistory";
export { checkGradeConsistency } from "./gradeConsistency";
export { computeExplainabilityDiff } from "./explainabilityDiff";
export { getDecisionModelMetadata } from "./modelGovernance";
export { createLogger, type Logger } from "./logger";
export {
  createDecisionEngine,
  createDecisionEngineFromEnv,
  type ClaimInput,
  type DecisionEngine,
  type DecisionEngineOptions,
} from "./decisionEngine";
