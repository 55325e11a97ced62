/**
 * Supabase-backed evidence adapters. Read-only; every query carries the caller's abort
 * signal. Rows are validated with zod before they reach an engine, and any query or row
 * error is thrown so the timed fetch marks the source unavailable.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import {
  RAINFALL_AMOUNTS,
  TEMPERATURE_FEELS,
  WEATHER_CONDITIONS,
  type ActionStore,
  type EvidenceSources,
  type FarmRegistry,
  type ForecastStore,
  type GroundTruthReport,
  type GroundTruthReportStore,
  type SatelliteIndexStore,
} from "../evidenceSources";

/** Postgres numeric arrives as a string; float columns as numbers. */
const numeric = z
  .union([z.number(), z.string()])
  .nullable()
  .transform((v, ctx) => {
    if (v == null) return null;
    const n = typeof v === "number" ? v : Number(v);
    if (!Number.isFinite(n)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${v}` });
      return z.NEVER;
    }
    return n;
  });

const requiredNumeric = numeric.refine((v): v is number => v != null, "required");

const creditProfileRow = z.object({
  subject_id: z.string(),
  farm_size_acres: numeric,
  ndvi: numeric,
  ndvi_observed_at: z.string().nullable(),
  climate_risk_score: numeric,
  climate_assessed_at: z.string().nullable(),
  payments_total: z.number().int().nullable(),
  payments_on_time: z.number().int().nullable(),
  payments_late_paid: z.number().int().nullable(),
  deforestation_detected: z.boolean().nullable(),
  deforestation_checked_at: z.string().nullable(),
});

const nearestFarmRow = z.object({
  farm_id: z.string(),
  farmer_id: z.string(),
  distance_km: numeric,
});

const satelliteScanRow = z.object({
  id: z.string(),
  farm_id: z.string(),
  scan_date: z.string(),
  ndvi: numeric,
  radar_vv_db: numeric,
});

const weatherReportRow = z.object({
  id: z.string(),
  farmer_id: z.string(),
  farm_id: z.string().nullable(),
  weather_condition: z.enum(WEATHER_CONDITIONS),
  temperature_feel: z.enum(TEMPERATURE_FEELS),
  rainfall_amount: z.enum(RAINFALL_AMOUNTS),
  weather_time: z.string(),
  reported_at: z.string(),
  verified: z.boolean(),
  satellite_corroborated: z.boolean().nullable(),
});

const actionRow = z.object({
  id: z.string(),
  action_type: z.string(),
  action_date: z.string(),
  verified: z.boolean(),
});

const forecastRow = z.object({
  forecast_date: z.string(),
  rainfall_mm: requiredNumeric,
  temperature_c: requiredNumeric,
  humidity_pct: requiredNumeric,
  wind_speed_kph: numeric,
});

const REPORT_COLUMNS =
  "id, farmer_id, farm_id, weather_condition, temperature_feel, rainfall_amount, weather_time, reported_at, verified, satellite_corroborated";

function parseRows<T extends z.ZodTypeAny>(table: string, schema: T, data: unknown): z.infer<T>[] {
  const result = z.array(schema).safeParse(data ?? []);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new Error(`[${table}] malformed row at ${first?.path.join(".") ?? "?"}: ${first?.message ?? "invalid"}`);
  }
  return result.data;
}

function check(table: string, error: { message: string } | null): void {
  if (error) throw new Error(`[${table}] ${error.message}`);
}

function toReport(row: z.infer<typeof weatherReportRow>): GroundTruthReport {
  return {
    reportId: row.id,
    farmerId: row.farmer_id,
    farmId: row.farm_id,
    condition: row.weather_condition,
    temperatureFeel: row.temperature_feel,
    rainfallAmount: row.rainfall_amount,
    weatherTime: row.weather_time,
    reportedAt: row.reported_at,
    verified: row.verified,
    satelliteCorroborated: row.satellite_corroborated ?? false,
  };
}

/** Inclusive day window → timestamp bounds. */
function timestampBounds(window: { from: string; to: string }): { from: string; to: string } {
  return { from: `${window.from}T00:00:00.000Z`, to: `${window.to}T23:59:59.999Z` };
}

export function createSupabaseFarmRegistry(supabase: SupabaseClient): FarmRegistry {
  return {
    async getTraditionalRecord(subjectId, { signal }) {
      const { data, error } = await supabase
        .from("farm_credit_profiles")
        .select("*")
        .eq("subject_id", subjectId)
        .limit(1)
        .abortSignal(signal);
      check("farm_credit_profiles", error);
      const [row] = parseRows("farm_credit_profiles", creditProfileRow, data);
      if (!row) return null;
      return {
        subjectId: row.subject_id,
        farmSizeAcres: row.farm_size_acres,
        ndvi: row.ndvi,
        ndviObservedAt: row.ndvi_observed_at,
        climateRiskScore: row.climate_risk_score,
        climateAssessedAt: row.climate_assessed_at,
        payments: {
          total: row.payments_total ?? 0,
          onTime: row.payments_on_time ?? 0,
          latePaid: row.payments_late_paid ?? 0,
        },
        deforestationDetected: row.deforestation_detected,
        deforestationCheckedAt: row.deforestation_checked_at,
      };
    },

    async findNearestFarms(farmId, { limit, excludeFarmerId }, { signal }) {
      const { data, error } = await supabase
        .rpc("nearest_farms", { p_farm_id: farmId, p_exclude_farmer_id: excludeFarmerId, p_limit: limit })
        .abortSignal(signal);
      check("nearest_farms", error);
      return parseRows("nearest_farms", nearestFarmRow, data)
        .filter((r) => r.farm_id !== farmId && r.farmer_id !== excludeFarmerId)
        .map((r) => ({ farmId: r.farm_id, farmerId: r.farmer_id, distanceKm: r.distance_km }));
    },
  };
}

export function createSupabaseSatelliteIndexStore(supabase: SupabaseClient): SatelliteIndexStore {
  return {
    async findLatestCompletedScan(farmId, window, { signal }) {
      const { data, error } = await supabase
        .from("satellite_scans")
        .select("id, farm_id, scan_date, ndvi, radar_vv_db")
        .eq("farm_id", farmId)
        .eq("status", "completed")
        .gte("scan_date", window.from)
        .lte("scan_date", window.to)
        .order("scan_date", { ascending: false })
        .limit(1)
        .abortSignal(signal);
      check("satellite_scans", error);
      const [row] = parseRows("satellite_scans", satelliteScanRow, data);
      if (!row) return null;
      return {
        scanId: row.id,
        farmId: row.farm_id,
        scanDate: row.scan_date,
        ndvi: row.ndvi,
        radarBackscatterDb: row.radar_vv_db,
      };
    },
  };
}

export function createSupabaseReportStore(supabase: SupabaseClient): GroundTruthReportStore {
  return {
    async listReportsBySubject(subjectId, window, { signal }) {
      const bounds = timestampBounds(window);
      const { data, error } = await supabase
        .from("weather_reports")
        .select(REPORT_COLUMNS)
        .eq("farmer_id", subjectId)
        .gte("weather_time", bounds.from)
        .lte("weather_time", bounds.to)
        .order("weather_time", { ascending: true })
        .abortSignal(signal);
      check("weather_reports", error);
      return parseRows("weather_reports", weatherReportRow, data).map(toReport);
    },

    async listReportsByFarms(farmIds, window, { signal }) {
      if (farmIds.length === 0) return [];
      const bounds = timestampBounds(window);
      const { data, error } = await supabase
        .from("weather_reports")
        .select(REPORT_COLUMNS)
        .in("farm_id", farmIds)
        .gte("weather_time", bounds.from)
        .lte("weather_time", bounds.to)
        .order("weather_time", { ascending: true })
        .abortSignal(signal);
      check("weather_reports", error);
      return parseRows("weather_reports", weatherReportRow, data).map(toReport);
    },
  };
}

export function createSupabaseActionStore(supabase: SupabaseClient): ActionStore {
  return {
    async listActions(subjectId, window, { signal }) {
      const { data, error } = await supabase
        .from("farmer_actions")
        .select("id, action_type, action_date, verified")
        .eq("farmer_id", subjectId)
        .gte("action_date", window.from)
        .lte("action_date", window.to)
        .order("action_date", { ascending: true })
        .abortSignal(signal);
      check("farmer_actions", error);
      return parseRows("farmer_actions", actionRow, data).map((r) => ({
        actionId: r.id,
        actionType: r.action_type,
        actionDate: r.action_date,
        verified: r.verified,
      }));
    },
  };
}

/** Forecast days from the engine's current date onward; `now` is the engine clock. */
export function createSupabaseForecastStore(supabase: SupabaseClient, now: () => Date): ForecastStore {
  return {
    async getForecast(farmId, days, { signal }) {
      const from = now().toISOString().slice(0, 10);
      const { data, error } = await supabase
        .from("weather_forecasts")
        .select("forecast_date, rainfall_mm, temperature_c, humidity_pct, wind_speed_kph")
        .eq("farm_id", farmId)
        .gte("forecast_date", from)
        .order("forecast_date", { ascending: true })
        .limit(days)
        .abortSignal(signal);
      check("weather_forecasts", error);
      return parseRows("weather_forecasts", forecastRow, data).map((r) => ({
        date: r.forecast_date,
        rainfallMm: r.rainfall_mm,
        temperatureC: r.temperature_c,
        humidityPct: r.humidity_pct,
        ...(r.wind_speed_kph != null && { windSpeedKph: r.wind_speed_kph }),
      }));
    },
  };
}

export function createSupabaseEvidenceSources(supabase: SupabaseClient, now: () => Date): EvidenceSources {
  return {
    farms: createSupabaseFarmRegistry(supabase),
    satellite: createSupabaseSatelliteIndexStore(supabase),
    reports: createSupabaseReportStore(supabase),
    actions: createSupabaseActionStore(supabase),
    forecasts: createSupabaseForecastStore(supabase, now),
  };
}
