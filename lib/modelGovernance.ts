/**
 * Model governance metadata for the decision engines.
 * All values are sourced from the engine modules; no duplicated magic numbers.
 */

import {
  COMPOSITE_WEIGHTS,
  CREDIT_MODEL_VERSION,
  GRADE_BANDS,
  SCORE_VALIDITY_DAYS,
  TRADITIONAL_WEIGHTS,
} from "./creditScore";
import {
  CLAIM_MODEL_VERSION,
  CLAIM_WEIGHTS,
  DROUGHT_NDVI_THRESHOLD,
  FLOOD_BACKSCATTER_THRESHOLD_DB,
  MIN_NEIGHBOR_REPORTERS,
  NEIGHBOR_AGREEMENT_THRESHOLD,
} from "./claimVerification";
import {
  BASE_LOSS_PCT_PER_DAY,
  CRITICAL_LOSS_SLOPE_PCT_PER_DAY,
  MAX_LOSS_PCT,
  ROAD_HIGH_RAINFALL_MM,
  ROAD_MEDIUM_RAINFALL_MM,
  ROAD_SATURATION_MM,
} from "./logisticsRisk";
import type { EngineConfig, WeightSets } from "./engineConfig";
import type { WeightSpec } from "./weightedAggregator";

export type DecisionModelMetadata = {
  credit: {
    version: string;
    composite_weights: Record<string, number>;
    traditional_weights: Record<string, number>;
    grade_bands: { grade: string; min: number; max: number; interest_rate_pct: number | null }[];
    validity_days: number;
  };
  claims: {
    version: string;
    source_weights: Record<string, number>;
    min_neighbor_reporters: number;
    neighbor_agreement: number;
    thresholds: { drought_ndvi: number; flood_backscatter_db: number };
  };
  logistics: {
    road_rainfall_mm: { medium: number; high: number; saturation: number };
    base_loss_pct_per_day: number;
    max_loss_pct: number;
    critical_loss_slope_pct_per_day: number;
  };
};

function weightsOf<N extends string>(spec: WeightSpec<N> | undefined, defaults: readonly (readonly [N, number])[]) {
  const entries = spec ? spec.entries.map((e) => [e.name, e.weight] as const) : defaults;
  return Object.fromEntries(entries);
}

/**
 * Governance metadata for the models in effect. Without arguments it reports the built-in
 * defaults; pass the loaded config and weight sets to report what an engine actually runs.
 */
export function getDecisionModelMetadata(config?: EngineConfig, weights?: WeightSets): DecisionModelMetadata {
  return {
    credit: {
      version: CREDIT_MODEL_VERSION,
      composite_weights: weightsOf(weights?.composite, COMPOSITE_WEIGHTS),
      traditional_weights: weightsOf(weights?.traditional, TRADITIONAL_WEIGHTS),
      grade_bands: GRADE_BANDS.map((b) => ({
        grade: b.grade,
        min: b.min,
        max: b.max,
        interest_rate_pct: b.interestRatePct,
      })),
      validity_days: config?.credit.scoreValidityDays ?? SCORE_VALIDITY_DAYS,
    },
    claims: {
      version: CLAIM_MODEL_VERSION,
      source_weights: weightsOf(weights?.claim, CLAIM_WEIGHTS),
      min_neighbor_reporters: config?.claims.minNeighborReporters ?? MIN_NEIGHBOR_REPORTERS,
      neighbor_agreement: config?.claims.neighborAgreementThreshold ?? NEIGHBOR_AGREEMENT_THRESHOLD,
      thresholds: { drought_ndvi: DROUGHT_NDVI_THRESHOLD, flood_backscatter_db: FLOOD_BACKSCATTER_THRESHOLD_DB },
    },
    logistics: {
      road_rainfall_mm: {
        medium: ROAD_MEDIUM_RAINFALL_MM,
        high: ROAD_HIGH_RAINFALL_MM,
        saturation: config?.logistics.roadSaturationMm ?? ROAD_SATURATION_MM,
      },
      base_loss_pct_per_day: BASE_LOSS_PCT_PER_DAY,
      max_loss_pct: MAX_LOSS_PCT,
      critical_loss_slope_pct_per_day: config?.logistics.criticalLossSlopePctPerDay ?? CRITICAL_LOSS_SLOPE_PCT_PER_DAY,
    },
  };
}
