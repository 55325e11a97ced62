/**
 * Engine configuration from the environment, with documented defaults taken from the engine
 * modules. Weight overrides are JSON objects keyed by sub-factor name; every weight set is
 * validated here, at load time, and never again at decision time.
 */

import { z } from "zod";
import type {
  DecisionEvent,
  SubScoreName,
  TraditionalFactorName,
} from "./evidenceContract";
import { InvalidWeightConfigurationError, MalformedInputError } from "./engineErrors";
import type { EvidenceSources } from "./evidenceSources";
import type { Logger } from "./logger";
import type { ClaimVerdictLedger, ScoreLedger } from "./scoreHistory";
import { defineWeightSpec, type WeightSpec } from "./weightedAggregator";
import {
  COMPOSITE_WEIGHTS,
  SCORE_VALIDITY_DAYS,
  TRADITIONAL_WEIGHTS,
} from "./creditScore";
import {
  CLAIM_WEIGHTS,
  MAX_CLAIM_AGE_DAYS,
  MIN_NEIGHBOR_REPORTERS,
  NEIGHBOR_AGREEMENT_THRESHOLD,
  NEIGHBOR_FARM_LIMIT,
  NEIGHBOR_WINDOW_DAYS,
  SATELLITE_WINDOW_DAYS,
  SELF_REPORT_WINDOW_DAYS,
  type ClaimSourceName,
} from "./claimVerification";
import {
  CRITICAL_LOSS_SLOPE_PCT_PER_DAY,
  FORECAST_HORIZON_DAYS,
  MIN_FORECAST_DAYS,
  ROAD_SATURATION_MM,
} from "./logisticsRisk";

export const DEFAULT_ADAPTER_TIMEOUT_MS = 2_000;
export const DEFAULT_HISTORY_WINDOW_DAYS = 365;

export type CreditConfig = {
  actionWindowDays: number;
  groundTruthWindowDays: number;
  scoreValidityDays: number;
};

export type ClaimConfig = {
  minNeighborReporters: number;
  neighborFarmLimit: number;
  neighborAgreementThreshold: number;
  satelliteWindowDays: number;
  neighborWindowDays: number;
  selfReportWindowDays: number;
  maxClaimAgeDays: number;
};

export type LogisticsConfig = {
  forecastDays: number;
  minForecastDays: number;
  roadSaturationMm: number;
  criticalLossSlopePctPerDay: number;
};

export type WeightOverrides = {
  composite?: Record<string, number>;
  traditional?: Record<string, number>;
  claim?: Record<string, number>;
};

export type EngineConfig = {
  adapterTimeoutMs: number;
  credit: CreditConfig;
  claims: ClaimConfig;
  logistics: LogisticsConfig;
  weightOverrides: WeightOverrides;
};

export type WeightSets = {
  composite: WeightSpec<SubScoreName>;
  traditional: WeightSpec<TraditionalFactorName>;
  claim: WeightSpec<ClaimSourceName>;
};

/** Everything a decision operation needs; built once by createDecisionEngine. */
export type EngineRuntime = {
  config: EngineConfig;
  weights: WeightSets;
  sources: EvidenceSources;
  scoreLedger: ScoreLedger;
  claimLedger: ClaimVerdictLedger;
  logger: Logger;
  now: () => Date;
  newId: () => string;
  publish: (event: DecisionEvent) => Promise<void>;
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  adapterTimeoutMs: DEFAULT_ADAPTER_TIMEOUT_MS,
  credit: {
    actionWindowDays: DEFAULT_HISTORY_WINDOW_DAYS,
    groundTruthWindowDays: DEFAULT_HISTORY_WINDOW_DAYS,
    scoreValidityDays: SCORE_VALIDITY_DAYS,
  },
  claims: {
    minNeighborReporters: MIN_NEIGHBOR_REPORTERS,
    neighborFarmLimit: NEIGHBOR_FARM_LIMIT,
    neighborAgreementThreshold: NEIGHBOR_AGREEMENT_THRESHOLD,
    satelliteWindowDays: SATELLITE_WINDOW_DAYS,
    neighborWindowDays: NEIGHBOR_WINDOW_DAYS,
    selfReportWindowDays: SELF_REPORT_WINDOW_DAYS,
    maxClaimAgeDays: MAX_CLAIM_AGE_DAYS,
  },
  logistics: {
    forecastDays: FORECAST_HORIZON_DAYS,
    minForecastDays: MIN_FORECAST_DAYS,
    roadSaturationMm: ROAD_SATURATION_MM,
    criticalLossSlopePctPerDay: CRITICAL_LOSS_SLOPE_PCT_PER_DAY,
  },
  weightOverrides: {},
};

const blankAsUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const positiveInt = (fallback: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(fallback));

const positiveNumber = (fallback: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().positive().finite().default(fallback));

const weightOverride = z.preprocess(
  (v) => {
    const value = blankAsUndefined(v);
    if (typeof value !== "string") return value;
    try {
      return JSON.parse(value);
    } catch {
      return value;
    }
  },
  z.record(z.string(), z.number()).optional()
);

const d = DEFAULT_ENGINE_CONFIG;

const envSchema = z.object({
  DECISION_ADAPTER_TIMEOUT_MS: positiveInt(d.adapterTimeoutMs),
  CREDIT_ACTION_WINDOW_DAYS: positiveInt(d.credit.actionWindowDays),
  CREDIT_GROUND_TRUTH_WINDOW_DAYS: positiveInt(d.credit.groundTruthWindowDays),
  CREDIT_SCORE_VALIDITY_DAYS: positiveInt(d.credit.scoreValidityDays),
  CLAIM_MIN_NEIGHBOR_REPORTERS: positiveInt(d.claims.minNeighborReporters),
  CLAIM_NEIGHBOR_FARM_LIMIT: positiveInt(d.claims.neighborFarmLimit),
  CLAIM_NEIGHBOR_AGREEMENT: z.preprocess(
    blankAsUndefined,
    z.coerce.number().gt(0).max(1).default(d.claims.neighborAgreementThreshold)
  ),
  CLAIM_SATELLITE_WINDOW_DAYS: positiveInt(d.claims.satelliteWindowDays),
  CLAIM_NEIGHBOR_WINDOW_DAYS: positiveInt(d.claims.neighborWindowDays),
  CLAIM_SELF_REPORT_WINDOW_DAYS: positiveInt(d.claims.selfReportWindowDays),
  CLAIM_MAX_AGE_DAYS: positiveInt(d.claims.maxClaimAgeDays),
  HARVEST_FORECAST_DAYS: positiveInt(d.logistics.forecastDays),
  HARVEST_ROAD_SATURATION_MM: positiveNumber(d.logistics.roadSaturationMm),
  HARVEST_CRITICAL_LOSS_SLOPE: positiveNumber(d.logistics.criticalLossSlopePctPerDay),
  CREDIT_COMPOSITE_WEIGHTS: weightOverride,
  CREDIT_TRADITIONAL_WEIGHTS: weightOverride,
  CLAIM_SOURCE_WEIGHTS: weightOverride,
});

/**
 * Load configuration from env (default process.env). Throws MalformedInputError for
 * unparsable values and InvalidWeightConfigurationError for bad weight overrides.
 */
export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new MalformedInputError(
      "engine configuration",
      parsed.error.issues.map((i) => ({ field: i.path.join("."), message: i.message }))
    );
  }
  const e = parsed.data;
  const config: EngineConfig = {
    adapterTimeoutMs: e.DECISION_ADAPTER_TIMEOUT_MS,
    credit: {
      actionWindowDays: e.CREDIT_ACTION_WINDOW_DAYS,
      groundTruthWindowDays: e.CREDIT_GROUND_TRUTH_WINDOW_DAYS,
      scoreValidityDays: e.CREDIT_SCORE_VALIDITY_DAYS,
    },
    claims: {
      minNeighborReporters: e.CLAIM_MIN_NEIGHBOR_REPORTERS,
      neighborFarmLimit: e.CLAIM_NEIGHBOR_FARM_LIMIT,
      neighborAgreementThreshold: e.CLAIM_NEIGHBOR_AGREEMENT,
      satelliteWindowDays: e.CLAIM_SATELLITE_WINDOW_DAYS,
      neighborWindowDays: e.CLAIM_NEIGHBOR_WINDOW_DAYS,
      selfReportWindowDays: e.CLAIM_SELF_REPORT_WINDOW_DAYS,
      maxClaimAgeDays: e.CLAIM_MAX_AGE_DAYS,
    },
    logistics: {
      forecastDays: Math.max(e.HARVEST_FORECAST_DAYS, MIN_FORECAST_DAYS),
      minForecastDays: MIN_FORECAST_DAYS,
      roadSaturationMm: e.HARVEST_ROAD_SATURATION_MM,
      criticalLossSlopePctPerDay: e.HARVEST_CRITICAL_LOSS_SLOPE,
    },
    weightOverrides: {
      composite: e.CREDIT_COMPOSITE_WEIGHTS,
      traditional: e.CREDIT_TRADITIONAL_WEIGHTS,
      claim: e.CLAIM_SOURCE_WEIGHTS,
    },
  };
  buildWeightSets(config);
  return config;
}

/**
 * Apply an override to the default weight list. The override must name exactly the default
 * sub-factors; anything else is a configuration error.
 */
function resolveWeights<N extends string>(
  specName: string,
  defaults: readonly (readonly [N, number])[],
  override: Record<string, number> | undefined
): (readonly [N, number])[] {
  if (!override) return [...defaults];
  const known = new Set<string>(defaults.map(([n]) => n));
  const unknown = Object.keys(override).filter((k) => !known.has(k));
  if (unknown.length > 0) {
    throw new InvalidWeightConfigurationError(specName, `unknown sub-factor(s): ${unknown.join(", ")}`, override);
  }
  return defaults.map(([name]) => {
    const weight = override[name];
    if (weight === undefined) {
      throw new InvalidWeightConfigurationError(specName, `override is missing "${name}"`, override);
    }
    return [name, weight] as const;
  });
}

export function buildWeightSets(config: Pick<EngineConfig, "weightOverrides">): WeightSets {
  const o = config.weightOverrides;
  return {
    composite: defineWeightSpec("credit composite", resolveWeights("credit composite", COMPOSITE_WEIGHTS, o.composite)),
    traditional: defineWeightSpec(
      "credit traditional",
      resolveWeights("credit traditional", TRADITIONAL_WEIGHTS, o.traditional)
    ),
    claim: defineWeightSpec("claim sources", resolveWeights("claim sources", CLAIM_WEIGHTS, o.claim)),
  };
}
