/**
 * Read-only collaborator ports the engines pull evidence through, plus the per-call
 * timeout/cancellation wrapper. Adapters own no state; the stores behind them belong to
 * the farm registry, report store, satellite index store and forecast store.
 */

import type { ForecastDay } from "./evidenceContract";
import { DecisionCancelledError } from "./engineErrors";
import type { Logger } from "./logger";

/** Inclusive window; bounds are YYYY-MM-DD dates. */
export type DateWindow = { from: string; to: string };

export type CallOptions = { signal: AbortSignal };

export type TraditionalRecord = {
  subjectId: string;
  farmSizeAcres: number | null;
  ndvi: number | null;
  ndviObservedAt: string | null;
  /** 0–100, higher is riskier. */
  climateRiskScore: number | null;
  climateAssessedAt: string | null;
  payments: { total: number; onTime: number; latePaid: number };
  deforestationDetected: boolean | null;
  deforestationCheckedAt: string | null;
};

export type NeighborFarm = {
  farmId: string;
  farmerId: string;
  distanceKm: number | null;
};

export type SatelliteScan = {
  scanId: string;
  farmId: string;
  scanDate: string;
  ndvi: number | null;
  /** Sentinel-1 VV backscatter in dB. */
  radarBackscatterDb: number | null;
};

export const WEATHER_CONDITIONS = [
  "clear",
  "cloudy",
  "light_rain",
  "heavy_rain",
  "drizzle",
  "storm",
  "fog",
  "windy",
] as const;
export type WeatherCondition = (typeof WEATHER_CONDITIONS)[number];

export const TEMPERATURE_FEELS = ["very_cold", "cold", "normal", "hot", "very_hot"] as const;
export type TemperatureFeel = (typeof TEMPERATURE_FEELS)[number];

export const RAINFALL_AMOUNTS = ["none", "light", "moderate", "heavy"] as const;
export type RainfallAmount = (typeof RAINFALL_AMOUNTS)[number];

export type GroundTruthReport = {
  reportId: string;
  farmerId: string;
  farmId: string | null;
  condition: WeatherCondition;
  temperatureFeel: TemperatureFeel;
  rainfallAmount: RainfallAmount;
  /** When the reported weather occurred (ISO timestamp). */
  weatherTime: string;
  reportedAt: string;
  verified: boolean;
  satelliteCorroborated: boolean;
};

export type ActionRecord = {
  actionId: string;
  actionType: string;
  actionDate: string;
  verified: boolean;
};

export type NearestFarmsQuery = {
  limit: number;
  excludeFarmerId: string;
};

export interface FarmRegistry {
  getTraditionalRecord(subjectId: string, options: CallOptions): Promise<TraditionalRecord | null>;
  /**
   * Nearest registered farms to farmId, closest first. Excludes farmId itself and every farm
   * of excludeFarmerId before the limit applies.
   */
  findNearestFarms(farmId: string, query: NearestFarmsQuery, options: CallOptions): Promise<NeighborFarm[]>;
}

export interface SatelliteIndexStore {
  /** Most recent completed scan inside the window, or null when none completed. */
  findLatestCompletedScan(farmId: string, window: DateWindow, options: CallOptions): Promise<SatelliteScan | null>;
}

export interface GroundTruthReportStore {
  listReportsBySubject(subjectId: string, window: DateWindow, options: CallOptions): Promise<GroundTruthReport[]>;
  listReportsByFarms(farmIds: string[], window: DateWindow, options: CallOptions): Promise<GroundTruthReport[]>;
}

export interface ActionStore {
  listActions(subjectId: string, window: DateWindow, options: CallOptions): Promise<ActionRecord[]>;
}

export interface ForecastStore {
  /** Forward-looking daily forecast starting today, ordered by date. */
  getForecast(farmId: string, days: number, options: CallOptions): Promise<ForecastDay[]>;
}

export type EvidenceSources = {
  farms: FarmRegistry;
  satellite: SatelliteIndexStore;
  reports: GroundTruthReportStore;
  actions: ActionStore;
  forecasts: ForecastStore;
};

// --- dates ---

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function shiftIsoDate(date: string, days: number): string {
  const base = new Date(`${date.slice(0, 10)}T00:00:00.000Z`);
  base.setUTCDate(base.getUTCDate() + days);
  return toIsoDate(base);
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: string, to: string): number {
  const a = Date.parse(`${from.slice(0, 10)}T00:00:00.000Z`);
  const b = Date.parse(`${to.slice(0, 10)}T00:00:00.000Z`);
  return Math.round((b - a) / 86_400_000);
}

export function windowAround(date: string, days: number): DateWindow {
  return { from: shiftIsoDate(date, -days), to: shiftIsoDate(date, days) };
}

export function trailingWindow(now: Date, days: number): DateWindow {
  const today = toIsoDate(now);
  return { from: shiftIsoDate(today, -days), to: today };
}

export function isWithinWindow(timestamp: string, window: DateWindow): boolean {
  const day = timestamp.slice(0, 10);
  return day >= window.from && day <= window.to;
}

// --- timed fetch ---

export type SourceOutcome<T> =
  | { ok: true; value: T; elapsedMs: number }
  | { ok: false; reason: string; elapsedMs: number };

export type FetchEvidenceParams = {
  /** Decision this fetch belongs to; named in DecisionCancelledError. */
  decision: string;
  source: string;
  timeoutMs: number;
  signal?: AbortSignal;
  logger?: Logger;
};

/**
 * Run one adapter call under a timeout. A timeout or adapter failure resolves to
 * `{ ok: false }` (the source is unavailable); the adapter's own signal is aborted so it
 * can stop work. Aborting the parent signal aborts the adapter and rejects with
 * DecisionCancelledError.
 */
export async function fetchEvidence<T>(
  call: (options: CallOptions) => Promise<T>,
  params: FetchEvidenceParams
): Promise<SourceOutcome<T>> {
  const parent = params.signal;
  if (parent?.aborted) {
    throw new DecisionCancelledError(params.decision);
  }

  const controller = new AbortController();
  const started = Date.now();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener("abort", onParentAbort, { once: true });

  const timedOut = new Promise<{ kind: "timeout" }>((resolve) => {
    timer = setTimeout(() => resolve({ kind: "timeout" }), params.timeoutMs);
  });
  const cancelled = new Promise<{ kind: "cancelled" }>((resolve) => {
    controller.signal.addEventListener(
      "abort",
      () => {
        if (parent?.aborted) resolve({ kind: "cancelled" });
      },
      { once: true }
    );
  });

  try {
    const outcome = await Promise.race([
      call({ signal: controller.signal }).then((value) => ({ kind: "value" as const, value })),
      timedOut,
      cancelled,
    ]);
    const elapsedMs = Date.now() - started;
    if (outcome.kind === "cancelled") {
      throw new DecisionCancelledError(params.decision);
    }
    if (outcome.kind === "timeout") {
      const reason = `timed out after ${params.timeoutMs}ms`;
      controller.abort(new Error(reason));
      params.logger?.warn("evidence source timed out", { source: params.source, timeoutMs: params.timeoutMs });
      return { ok: false, reason, elapsedMs };
    }
    params.logger?.debug("evidence source responded", { source: params.source, elapsedMs });
    return { ok: true, value: outcome.value, elapsedMs };
  } catch (error) {
    if (error instanceof DecisionCancelledError) throw error;
    if (parent?.aborted) throw new DecisionCancelledError(params.decision);
    const message = error instanceof Error ? error.message : String(error);
    params.logger?.warn("evidence source failed", { source: params.source, error: message });
    return { ok: false, reason: `adapter failed: ${message}`, elapsedMs: Date.now() - started };
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}
