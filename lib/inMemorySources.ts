/**
 * In-process evidence adapters over plain arrays. Used by tests and the stress harness;
 * behaves like the Supabase stores (window filtering, ordering, limits).
 */

import type { ForecastDay } from "./evidenceContract";
import {
  isWithinWindow,
  type ActionRecord,
  type CallOptions,
  type DateWindow,
  type EvidenceSources,
  type GroundTruthReport,
  type NeighborFarm,
  type SatelliteScan,
  type TraditionalRecord,
} from "./evidenceSources";

export type RegisteredFarm = {
  farmId: string;
  farmerId: string;
  latitude: number;
  longitude: number;
};

export type InMemoryEvidenceData = {
  farms?: RegisteredFarm[];
  traditional?: TraditionalRecord[];
  scans?: SatelliteScan[];
  reports?: GroundTruthReport[];
  actions?: (ActionRecord & { subjectId: string })[];
  forecasts?: Record<string, ForecastDay[]>;
};

const EARTH_RADIUS_KM = 6371;

export function haversineKm(a: { latitude: number; longitude: number }, b: { latitude: number; longitude: number }): number {
  const rad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = rad(b.latitude - a.latitude);
  const dLon = rad(b.longitude - a.longitude);
  const h = Math.sin(dLat / 2) ** 2 + Math.cos(rad(a.latitude)) * Math.cos(rad(b.latitude)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

function checkAborted(options: CallOptions): void {
  if (options.signal.aborted) throw new Error("request aborted");
}

export function createInMemorySources(data: InMemoryEvidenceData): EvidenceSources {
  const farms = data.farms ?? [];
  return {
    farms: {
      async getTraditionalRecord(subjectId, options) {
        checkAborted(options);
        return data.traditional?.find((r) => r.subjectId === subjectId) ?? null;
      },
      async findNearestFarms(farmId, { limit, excludeFarmerId }, options): Promise<NeighborFarm[]> {
        checkAborted(options);
        const origin = farms.find((f) => f.farmId === farmId);
        if (!origin) return [];
        return farms
          .filter((f) => f.farmId !== farmId && f.farmerId !== excludeFarmerId)
          .map((f) => ({ farmId: f.farmId, farmerId: f.farmerId, distanceKm: haversineKm(origin, f) }))
          .sort((a, b) => a.distanceKm - b.distanceKm || a.farmId.localeCompare(b.farmId))
          .slice(0, limit);
      },
    },
    satellite: {
      async findLatestCompletedScan(farmId, window, options) {
        checkAborted(options);
        const inWindow = (data.scans ?? [])
          .filter((s) => s.farmId === farmId && isWithinWindow(s.scanDate, window))
          .sort((a, b) => b.scanDate.localeCompare(a.scanDate));
        return inWindow[0] ?? null;
      },
    },
    reports: {
      async listReportsBySubject(subjectId, window, options) {
        checkAborted(options);
        return (data.reports ?? []).filter((r) => r.farmerId === subjectId && isWithinWindow(r.weatherTime, window));
      },
      async listReportsByFarms(farmIds, window: DateWindow, options) {
        checkAborted(options);
        const ids = new Set(farmIds);
        return (data.reports ?? []).filter(
          (r) => r.farmId != null && ids.has(r.farmId) && isWithinWindow(r.weatherTime, window)
        );
      },
    },
    actions: {
      async listActions(subjectId, window, options) {
        checkAborted(options);
        return (data.actions ?? [])
          .filter((a) => a.subjectId === subjectId && isWithinWindow(a.actionDate, window))
          .map((a) => ({ actionId: a.actionId, actionType: a.actionType, actionDate: a.actionDate, verified: a.verified }));
      },
    },
    forecasts: {
      async getForecast(farmId, days, options) {
        checkAborted(options);
        return (data.forecasts?.[farmId] ?? []).slice(0, days);
      },
    },
  };
}
