/**
 * Harvest logistics risk from a ≥7-day forecast: optimal harvest window, road-closure risk,
 * projected post-harvest loss for waiting, and an urgency level.
 *
 * Loss = min(50, 2 × delayDays × multiplier), multiplier = 1 + 0.5 when average humidity > 80%
 * + 0.3 when cumulative rainfall > 50 mm.
 */

import type { ForecastDay, HarvestAssessment, LossProjection, RoadRisk, Urgency } from "./evidenceContract";
import { deepFreeze } from "./evidenceContract";
import { MissingForecastError } from "./engineErrors";
import { fetchEvidence, isIsoDate } from "./evidenceSources";
import type { EngineRuntime, LogisticsConfig } from "./engineConfig";
import { renderHarvestRecommendations } from "./harvestRecommendations";

export const MIN_FORECAST_DAYS = 7;
export const FORECAST_HORIZON_DAYS = 7;

export const HARVEST_MAX_RAINFALL_MM = 5;
export const HARVEST_MIN_TEMPERATURE_C = 20;
export const HARVEST_MAX_TEMPERATURE_C = 30;
export const HARVEST_MAX_HUMIDITY_PCT = 80;

export const ROAD_HIGH_RAINFALL_MM = 100;
export const ROAD_MEDIUM_RAINFALL_MM = 50;
/** Rainfall a dirt road absorbs before it becomes impassable. */
export const ROAD_SATURATION_MM = 50;
export const HIGH_ROAD_MAX_CLOSURE_DAYS = 2;
export const MEDIUM_ROAD_MIN_CLOSURE_DAYS = 3;

export const BASE_LOSS_PCT_PER_DAY = 2;
export const HUMIDITY_LOSS_THRESHOLD_PCT = 80;
export const HUMIDITY_LOSS_FACTOR = 0.5;
export const RAINFALL_LOSS_THRESHOLD_MM = 50;
export const RAINFALL_LOSS_FACTOR = 0.3;
export const MAX_LOSS_PCT = 50;
export const CRITICAL_LOSS_SLOPE_PCT_PER_DAY = 2.8;
export const MATERIAL_LOSS_PCT = 10;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function isHarvestDay(day: ForecastDay): boolean {
  return (
    day.rainfallMm < HARVEST_MAX_RAINFALL_MM &&
    day.temperatureC >= HARVEST_MIN_TEMPERATURE_C &&
    day.temperatureC <= HARVEST_MAX_TEMPERATURE_C &&
    day.humidityPct < HARVEST_MAX_HUMIDITY_PCT
  );
}

/** Earliest qualifying day plus its contiguous qualifying successors. */
export function findHarvestWindow(forecast: ForecastDay[]): {
  optimalDate: string | null;
  optimalIndex: number | null;
  windowDates: string[];
} {
  const start = forecast.findIndex(isHarvestDay);
  if (start < 0) return { optimalDate: null, optimalIndex: null, windowDates: [] };
  const windowDates: string[] = [];
  for (let i = start; i < forecast.length && isHarvestDay(forecast[i]); i++) {
    windowDates.push(forecast[i].date);
  }
  return { optimalDate: forecast[start].date, optimalIndex: start, windowDates };
}

export function cumulativeRainfall(forecast: ForecastDay[]): number {
  return forecast.reduce((sum, d) => sum + d.rainfallMm, 0);
}

/**
 * Road level from cumulative rainfall over the horizon. Days until closure extrapolates the
 * average accumulation rate to the saturation threshold, held ≤2 for HIGH and ≥3 (within the
 * horizon) for MEDIUM; LOW has no projected closure.
 */
export function assessRoadRisk(forecast: ForecastDay[], saturationMm: number = ROAD_SATURATION_MM): RoadRisk {
  const horizon = forecast.length;
  const total = cumulativeRainfall(forecast);
  const rate = horizon > 0 ? total / horizon : 0;
  const cumulativeRainfallMm = round2(total);
  const accumulationRateMmPerDay = round2(rate);

  if (total < ROAD_MEDIUM_RAINFALL_MM) {
    return { level: "LOW", daysUntilClosure: null, cumulativeRainfallMm, accumulationRateMmPerDay };
  }
  const raw = rate > 0 ? Math.ceil(saturationMm / rate) : horizon;
  if (total > ROAD_HIGH_RAINFALL_MM) {
    return {
      level: "HIGH",
      daysUntilClosure: Math.max(0, Math.min(raw, HIGH_ROAD_MAX_CLOSURE_DAYS)),
      cumulativeRainfallMm,
      accumulationRateMmPerDay,
    };
  }
  const upper = Math.max(MEDIUM_ROAD_MIN_CLOSURE_DAYS, horizon);
  return {
    level: "MEDIUM",
    daysUntilClosure: Math.min(upper, Math.max(raw, MEDIUM_ROAD_MIN_CLOSURE_DAYS)),
    cumulativeRainfallMm,
    accumulationRateMmPerDay,
  };
}

export function weatherMultiplier(forecast: ForecastDay[]): number {
  if (forecast.length === 0) return 1;
  const avgHumidity = forecast.reduce((s, d) => s + d.humidityPct, 0) / forecast.length;
  let multiplier = 1;
  if (avgHumidity > HUMIDITY_LOSS_THRESHOLD_PCT) multiplier += HUMIDITY_LOSS_FACTOR;
  if (cumulativeRainfall(forecast) > RAINFALL_LOSS_THRESHOLD_MM) multiplier += RAINFALL_LOSS_FACTOR;
  return multiplier;
}

/** Loss for waiting `delayDays`, with weather taken over `weatherDays`. */
export function projectLoss(delayDays: number, weatherDays: ForecastDay[]): LossProjection {
  const multiplier = weatherMultiplier(weatherDays);
  const lossRatePctPerDay = round2(BASE_LOSS_PCT_PER_DAY * multiplier);
  const projected = Math.min(MAX_LOSS_PCT, BASE_LOSS_PCT_PER_DAY * Math.max(0, delayDays) * multiplier);
  return {
    delayDays,
    weatherMultiplier: round2(multiplier),
    lossRatePctPerDay,
    projectedLossPct: round2(projected),
  };
}

export function determineUrgency(
  roadRisk: RoadRisk,
  loss: LossProjection,
  criticalSlope: number = CRITICAL_LOSS_SLOPE_PCT_PER_DAY
): Urgency {
  const closureImminent = roadRisk.daysUntilClosure != null && roadRisk.daysUntilClosure <= HIGH_ROAD_MAX_CLOSURE_DAYS;
  const lossSteep = loss.lossRatePctPerDay > criticalSlope;
  if (closureImminent && lossSteep) return "CRITICAL";
  if (closureImminent || lossSteep) return "HIGH";
  if (roadRisk.level === "MEDIUM" || loss.projectedLossPct >= MATERIAL_LOSS_PCT) return "MEDIUM";
  return "LOW";
}

function describeBadDay(day: ForecastDay, index: number): string | null {
  if (!isIsoDate(day.date)) return `day ${index} has invalid date "${day.date}"`;
  for (const [field, value] of [
    ["rainfallMm", day.rainfallMm],
    ["temperatureC", day.temperatureC],
    ["humidityPct", day.humidityPct],
  ] as const) {
    if (!Number.isFinite(value)) return `day ${day.date} has non-numeric ${field}`;
  }
  if (day.rainfallMm < 0) return `day ${day.date} has negative rainfall`;
  return null;
}

/** Ordered, validated forecast; throws MissingForecastError when unusable. */
export function prepareForecast(farmId: string, forecast: ForecastDay[], minDays: number): ForecastDay[] {
  if (forecast.length < minDays) {
    throw new MissingForecastError(farmId, `forecast covers ${forecast.length} day(s), need at least ${minDays}`);
  }
  const ordered = [...forecast].sort((a, b) => a.date.localeCompare(b.date));
  for (let i = 0; i < ordered.length; i++) {
    const problem = describeBadDay(ordered[i], i);
    if (problem) throw new MissingForecastError(farmId, problem);
  }
  return ordered;
}

export function buildHarvestAssessment(
  farmId: string,
  forecast: ForecastDay[],
  config: LogisticsConfig,
  assessedAt: Date
): HarvestAssessment {
  const days = prepareForecast(farmId, forecast, config.minForecastDays);
  const window = findHarvestWindow(days);
  const roadRisk = assessRoadRisk(days, config.roadSaturationMm);
  const delayDays = window.optimalIndex ?? days.length;
  const loss = projectLoss(delayDays, days);
  const urgency = determineUrgency(roadRisk, loss, config.criticalLossSlopePctPerDay);
  const body = {
    farmId,
    optimalDate: window.optimalDate,
    windowDates: window.windowDates,
    roadRisk,
    projectedLossPct: loss.projectedLossPct,
    loss,
    urgency,
  };
  return { ...body, recommendations: renderHarvestRecommendations(body), assessedAt: assessedAt.toISOString() };
}

async function loadForecast(
  runtime: EngineRuntime,
  farmId: string,
  decision: string,
  signal?: AbortSignal
): Promise<ForecastDay[]> {
  const { config, sources, logger } = runtime;
  const outcome = await fetchEvidence((o) => sources.forecasts.getForecast(farmId, config.logistics.forecastDays, o), {
    decision,
    source: "forecast_store",
    timeoutMs: config.adapterTimeoutMs,
    signal,
    logger,
  });
  if (!outcome.ok) {
    logger.warn("harvest assessment refused: forecast unavailable", { farmId, reason: outcome.reason });
    throw new MissingForecastError(farmId, `forecast store unavailable: ${outcome.reason}`);
  }
  return outcome.value;
}

/** AssessHarvest: not persisted; published to the decision sink only. */
export async function assessHarvest(
  runtime: EngineRuntime,
  farmId: string,
  options: { signal?: AbortSignal } = {}
): Promise<HarvestAssessment> {
  const forecast = await loadForecast(runtime, farmId, `harvest assessment for farm ${farmId}`, options.signal);
  const assessment = deepFreeze(buildHarvestAssessment(farmId, forecast, runtime.config.logistics, runtime.now()));
  runtime.logger.info("harvest assessed", {
    farmId,
    optimalDate: assessment.optimalDate,
    roadRisk: assessment.roadRisk.level,
    urgency: assessment.urgency,
  });
  await runtime.publish({ kind: "harvest_assessment", record: assessment });
  return assessment;
}

/** Loss for an arbitrary delay, with weather taken over the first `delayDays` forecast days. */
export async function estimateHarvestLoss(
  runtime: EngineRuntime,
  farmId: string,
  delayDays: number,
  options: { signal?: AbortSignal } = {}
): Promise<LossProjection> {
  const forecast = await loadForecast(runtime, farmId, `harvest loss estimate for farm ${farmId}`, options.signal);
  const days = prepareForecast(farmId, forecast, runtime.config.logistics.minForecastDays);
  return deepFreeze(projectLoss(delayDays, days.slice(0, delayDays)));
}
