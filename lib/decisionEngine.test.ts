import { describe, it, expect, vi } from "vitest";
import { createDecisionEngine, type DecisionEngineOptions } from "./decisionEngine";
import type { DecisionEvent, ForecastDay } from "./evidenceContract";
import { DEFAULT_ENGINE_CONFIG } from "./engineConfig";
import {
  DecisionCancelledError,
  InsufficientEvidenceError,
  InvalidWeightConfigurationError,
  MalformedInputError,
  MissingForecastError,
} from "./engineErrors";
import type { CallOptions, EvidenceSources, GroundTruthReport } from "./evidenceSources";
import { shiftIsoDate } from "./evidenceSources";
import { createInMemorySources, type InMemoryEvidenceData } from "./inMemorySources";
import type { Logger } from "./logger";

const NOW = new Date("2026-06-15T09:00:00.000Z");
const TODAY = "2026-06-15";

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function report(overrides: Partial<GroundTruthReport>): GroundTruthReport {
  return {
    reportId: "r",
    farmerId: "farmer-1",
    farmId: "farm-1",
    condition: "clear",
    temperatureFeel: "normal",
    rainfallAmount: "none",
    weatherTime: "2026-06-11T08:00:00.000Z",
    reportedAt: "2026-06-11T09:00:00.000Z",
    verified: true,
    satelliteCorroborated: false,
    ...overrides,
  };
}

function forecast(days: Partial<ForecastDay>[]): ForecastDay[] {
  return days.map((d, i) => ({
    date: shiftIsoDate(TODAY, i),
    rainfallMm: d.rainfallMm ?? 0,
    temperatureC: d.temperatureC ?? 25,
    humidityPct: d.humidityPct ?? 60,
  }));
}

function data(): InMemoryEvidenceData {
  return {
    farms: [
      { farmId: "farm-0", farmerId: "farmer-0", latitude: -1.2, longitude: 36.8 },
      { farmId: "farm-1", farmerId: "farmer-1", latitude: -1.21, longitude: 36.8 },
      { farmId: "farm-2", farmerId: "farmer-2", latitude: -1.22, longitude: 36.8 },
      { farmId: "farm-3", farmerId: "farmer-3", latitude: -1.23, longitude: 36.8 },
    ],
    traditional: [
      {
        subjectId: "farmer-0",
        farmSizeAcres: 6,
        ndvi: 0.66,
        ndviObservedAt: "2026-06-10",
        climateRiskScore: 30,
        climateAssessedAt: "2026-05-30",
        payments: { total: 10, onTime: 8, latePaid: 2 },
        deforestationDetected: false,
        deforestationCheckedAt: "2026-04-01",
      },
    ],
    actions: [
      { subjectId: "farmer-0", actionId: "1", actionType: "mulching", actionDate: "2026-01-10", verified: true },
      { subjectId: "farmer-0", actionId: "2", actionType: "cover_crop", actionDate: "2026-02-10", verified: true },
      { subjectId: "farmer-0", actionId: "3", actionType: "mulching", actionDate: "2026-02-20", verified: true },
      { subjectId: "farmer-0", actionId: "4", actionType: "agroforestry", actionDate: "2026-03-01", verified: false },
    ],
    reports: [
      // claimant history: 6 reports, 3 corroborated
      report({ reportId: "own-1", farmerId: "farmer-0", farmId: "farm-0", weatherTime: "2026-06-12T08:00:00.000Z" }),
      report({ reportId: "own-2", farmerId: "farmer-0", farmId: "farm-0", weatherTime: "2026-05-01T08:00:00.000Z" }),
      report({ reportId: "own-3", farmerId: "farmer-0", farmId: "farm-0", weatherTime: "2026-04-01T08:00:00.000Z", verified: false, satelliteCorroborated: true }),
      report({ reportId: "own-4", farmerId: "farmer-0", farmId: "farm-0", weatherTime: "2026-03-01T08:00:00.000Z", verified: false }),
      report({ reportId: "own-5", farmerId: "farmer-0", farmId: "farm-0", weatherTime: "2026-02-01T08:00:00.000Z", verified: false }),
      report({ reportId: "own-6", farmerId: "farmer-0", farmId: "farm-0", weatherTime: "2026-01-01T08:00:00.000Z", verified: false }),
      report({ reportId: "n-1", farmerId: "farmer-1", farmId: "farm-1" }),
      report({ reportId: "n-2", farmerId: "farmer-2", farmId: "farm-2" }),
      report({ reportId: "n-3", farmerId: "farmer-3", farmId: "farm-3" }),
    ],
    scans: [{ scanId: "scan-1", farmId: "farm-0", scanDate: "2026-06-10", ndvi: 0.22, radarBackscatterDb: -11 }],
    forecasts: {
      "farm-dry": forecast(Array.from({ length: 7 }, () => ({}))),
      "farm-humid": forecast(Array.from({ length: 7 }, () => ({ rainfallMm: 20, humidityPct: 85 }))),
      "farm-short": forecast(Array.from({ length: 5 }, () => ({}))),
    },
  };
}

function engineWith(overrides: Partial<DecisionEngineOptions> = {}) {
  let n = 0;
  return createDecisionEngine({
    sources: createInMemorySources(data()),
    config: DEFAULT_ENGINE_CONFIG,
    logger: silentLogger(),
    now: () => NOW,
    newId: () => `score-${++n}`,
    ...overrides,
  });
}

/** Adapter that only settles when its signal aborts; records the signal it was given. */
function hangingRegistry(seen: AbortSignal[]): EvidenceSources["farms"] {
  const hang = ({ signal }: CallOptions) =>
    new Promise<never>((_, reject) => {
      seen.push(signal);
      signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
    });
  return {
    getTraditionalRecord: (_subjectId, options) => hang(options),
    findNearestFarms: (_farmId, _query, options) => hang(options),
  };
}

const drought = { subjectId: "farmer-0", farmId: "farm-0", claimDate: "2026-06-11", claimType: "drought" };

describe("computeCreditScore", () => {
  it("scores a subject with all three evidence families", async () => {
    const engine = engineWith();
    const score = await engine.computeCreditScore("farmer-0");
    // 10 × (0.4×87.25 + 0.3×64.75 + 0.3×50)
    expect(score.value).toBe(693);
    expect(score.grade).toBe("C");
    expect(score.terms).toEqual({ grade: "C", eligible: true, interestRatePct: 12 });
    expect(score.subScores.map((s) => [s.name, s.value, s.effectiveWeight])).toEqual([
      ["traditional", 87.25, 0.4],
      ["action", 64.75, 0.3],
      ["ground_truth", 50, 0.3],
    ]);
    expect(score.confidence).toBe(0.9);
    expect(score.id).toBe("score-1");
    expect(score.computedAt).toBe("2026-06-15T09:00:00.000Z");
    expect(score.validUntil).toBe("2026-07-15T09:00:00.000Z");
    expect(score.modelVersion).toBe("1.0");
  });

  it("refuses a subject with no evidence at all", async () => {
    const engine = engineWith();
    const error = await engine.computeCreditScore("farmer-unknown").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InsufficientEvidenceError);
    if (!(error instanceof InsufficientEvidenceError)) return;
    expect(error.missing).toEqual([
      { source: "traditional", reason: "no traditional record registered" },
      { source: "action", reason: "no actions submitted in window" },
      { source: "ground_truth", reason: "no ground-truth reports in window" },
    ]);
    expect(await engine.getScoreHistory("farmer-unknown")).toEqual([]);
  });

  it("scores an empty action and report history as zero instead of redistributing it", async () => {
    const registryOnly: InMemoryEvidenceData = {
      traditional: [
        {
          subjectId: "farmer-9",
          farmSizeAcres: 12,
          ndvi: 0.85,
          ndviObservedAt: "2026-06-10",
          climateRiskScore: 0,
          climateAssessedAt: "2026-05-30",
          payments: { total: 5, onTime: 5, latePaid: 0 },
          deforestationDetected: false,
          deforestationCheckedAt: "2026-04-01",
        },
      ],
    };
    const score = await engineWith({ sources: createInMemorySources(registryOnly) }).computeCreditScore("farmer-9");
    // 10 × (0.4×100 + 0.3×0 + 0.3×0)
    expect(score.value).toBe(400);
    expect(score.grade).toBe("F");
    expect(score.subScores.map((s) => [s.name, s.value, s.effectiveWeight, s.available])).toEqual([
      ["traditional", 100, 0.4, true],
      ["action", 0, 0.3, true],
      ["ground_truth", 0, 0.3, true],
    ]);

    const unverified = { subjectId: "farmer-9", actionId: "a1", actionType: "mulching", actionDate: "2026-05-01", verified: false };
    const withUnverified = await engineWith({
      sources: createInMemorySources({ ...registryOnly, actions: [unverified] }),
    }).computeCreditScore("farmer-9");
    expect(withUnverified.value).toBe(400);

    const withVerified = await engineWith({
      sources: createInMemorySources({ ...registryOnly, actions: [{ ...unverified, verified: true }] }),
    }).computeCreditScore("farmer-9");
    // action = 0.65×100 + 5 + 3 = 73; 10 × (40 + 0.3×73)
    expect(withVerified.value).toBe(619);
    expect(withVerified.grade).toBe("C");
  });

  it("keeps issued scores immutable in history", async () => {
    const engine = engineWith();
    const first = await engine.computeCreditScore("farmer-0");
    await engine.computeCreditScore("farmer-0");
    const history = await engine.getScoreHistory("farmer-0");
    expect(history.map((s) => s.id)).toEqual(["score-1", "score-2"]);
    expect(Reflect.set(first, "value", 1000)).toBe(false);
    expect(Reflect.set(first.subScores[0], "value", 100)).toBe(false);
    expect(Reflect.set(history, 0, first)).toBe(false);
    expect(history[0].value).toBe(693);
  });

  it("redistributes weight when the registry times out", async () => {
    const seen: AbortSignal[] = [];
    const sources = createInMemorySources(data());
    const engine = engineWith({
      sources: { ...sources, farms: hangingRegistry(seen) },
      config: { ...DEFAULT_ENGINE_CONFIG, adapterTimeoutMs: 20 },
    });
    const score = await engine.computeCreditScore("farmer-0");
    // 10 × (0.5×64.75 + 0.5×50)
    expect(score.value).toBe(574);
    expect(score.grade).toBe("D");
    expect(score.subScores[0]).toMatchObject({ name: "traditional", value: null, effectiveWeight: 0, available: false });
    expect(score.confidence).toBe(0.3);
    expect(seen[0].aborted).toBe(true);
  });

  it("rejects with DecisionCancelledError when the caller aborts", async () => {
    const seen: AbortSignal[] = [];
    const sources = createInMemorySources(data());
    const engine = engineWith({ sources: { ...sources, farms: hangingRegistry(seen) } });
    const controller = new AbortController();
    const pending = engine.computeCreditScore("farmer-0", { signal: controller.signal });
    controller.abort();
    await expect(pending).rejects.toThrow(DecisionCancelledError);
    expect(await engine.getScoreHistory("farmer-0")).toEqual([]);
  });

  it("rejects a blank subject before calling any adapter", async () => {
    const getTraditionalRecord = vi.fn(async () => null);
    const sources = createInMemorySources(data());
    const engine = engineWith({ sources: { ...sources, farms: { ...sources.farms, getTraditionalRecord } } });
    await expect(engine.computeCreditScore("  ")).rejects.toThrow(MalformedInputError);
    expect(getTraditionalRecord).not.toHaveBeenCalled();
  });
});

describe("decision sink", () => {
  it("receives each issued decision", async () => {
    const events: DecisionEvent[] = [];
    const engine = engineWith({ sink: { publish: async (e) => void events.push(e) } });
    await engine.computeCreditScore("farmer-0");
    await engine.assessHarvest("farm-dry");
    expect(events.map((e) => e.kind)).toEqual(["credit_score", "harvest_assessment"]);
  });

  it("a failing sink is logged and the record is kept", async () => {
    const logger = silentLogger();
    const engine = engineWith({
      logger,
      sink: {
        publish: async () => {
          throw new Error("sink down");
        },
      },
    });
    const score = await engine.computeCreditScore("farmer-0");
    expect(score.value).toBe(693);
    expect(await engine.getScoreHistory("farmer-0")).toHaveLength(1);
    expect(logger.error).toHaveBeenCalledWith("decision sink failed; record kept", {
      kind: "credit_score",
      error: "sink down",
    });
  });
});

describe("verifyClaim", () => {
  it("approves a drought claim every source supports", async () => {
    const engine = engineWith();
    const verdict = await engine.verifyClaim(drought);
    expect(verdict.confidence).toBe(100);
    expect(verdict.recommendation).toBe("APPROVE_STRONG");
    expect(verdict.evidence.map((e) => [e.sourceKind, e.supportsClaim, e.effectiveWeight])).toEqual([
      ["satellite", true, 0.3],
      ["neighbor", true, 0.4],
      ["self_report", true, 0.3],
    ]);
    expect(verdict.claimId).toBe(engine.claimIdFor(drought));
  });

  it("re-verification yields the same verdict and supersedes the earlier entry", async () => {
    const engine = engineWith();
    const first = await engine.verifyClaim(drought);
    const second = await engine.verifyClaim(drought);
    expect(second).toEqual(first);
    const history = await engine.getClaimVerdicts(first.claimId);
    expect(history.map((h) => [h.sequence, h.supersedes])).toEqual([
      [1, null],
      [2, 1],
    ]);
    expect(history[1].recordedAt).toBe("2026-06-15T09:00:00.000Z");
  });

  it("rejects a storm claim nobody reported, without satellite weight", async () => {
    const engine = engineWith();
    const verdict = await engine.verifyClaim({ ...drought, claimType: "storm" });
    expect(verdict.confidence).toBe(0);
    expect(verdict.recommendation).toBe("REJECT");
    const satellite = verdict.evidence[0];
    expect(satellite.sourceKind).toBe("satellite");
    expect(satellite.effectiveWeight).toBe(0);
    expect(satellite.unavailableReason).toBe("satellite indices cannot observe storm");
  });

  it("fills the neighbor pool with other farmers when the claimant owns the nearest farms", async () => {
    const own = [0, 1, 2, 3].map((i) => ({
      farmId: `own-${i}`,
      farmerId: "farmer-own",
      latitude: -1.2 - i * 0.001,
      longitude: 36.8,
    }));
    const others = Array.from({ length: 11 }, (_, i) => ({
      farmId: `other-${i + 1}`,
      farmerId: `neighbor-${i + 1}`,
      latitude: -1.21 - i * 0.01,
      longitude: 36.8,
    }));
    const sources = createInMemorySources({
      farms: [...own, ...others],
      reports: others.map((f, i) => report({ reportId: `o${i}`, farmerId: f.farmerId, farmId: f.farmId })),
    });
    const engine = engineWith({ sources });
    const verdict = await engine.verifyClaim({ ...drought, subjectId: "farmer-own", farmId: "own-0" });
    const neighbor = verdict.evidence[1];
    expect(neighbor.sourceKind).toBe("neighbor");
    expect(neighbor.detail).toMatchObject({ farmsConsulted: 10, reporterCount: 10, agreeingReporters: 10 });
    expect(verdict.confidence).toBe(100);
  });

  it("rejects malformed claims before calling any adapter", async () => {
    const findLatestCompletedScan = vi.fn(async () => null);
    const sources = createInMemorySources(data());
    const engine = engineWith({ sources: { ...sources, satellite: { findLatestCompletedScan } } });
    await expect(engine.verifyClaim({ ...drought, claimType: "locusts" })).rejects.toThrow(MalformedInputError);
    await expect(engine.verifyClaim({ ...drought, claimDate: "2026-06-20" })).rejects.toThrow(
      "claimDate: must not be in the future"
    );
    expect(findLatestCompletedScan).not.toHaveBeenCalled();
  });
});

describe("assessHarvest", () => {
  it("a dry week is LOW urgency with harvest today", async () => {
    const engine = engineWith();
    const a = await engine.assessHarvest("farm-dry");
    expect(a.optimalDate).toBe("2026-06-15");
    expect(a.urgency).toBe("LOW");
    expect(a.assessedAt).toBe("2026-06-15T09:00:00.000Z");
    expect(Object.isFrozen(a.roadRisk)).toBe(true);
  });

  it("refuses a short or missing forecast", async () => {
    const engine = engineWith();
    await expect(engine.assessHarvest("farm-short")).rejects.toThrow(
      "No usable forecast for farm farm-short: forecast covers 5 day(s), need at least 7"
    );
    await expect(engine.assessHarvest("farm-unknown")).rejects.toThrow(MissingForecastError);
  });
});

describe("estimateHarvestLoss", () => {
  it("projects loss over the first delayDays of the forecast", async () => {
    const engine = engineWith();
    expect(await engine.estimateHarvestLoss("farm-humid", 3)).toEqual({
      delayDays: 3,
      weatherMultiplier: 1.8,
      lossRatePctPerDay: 3.6,
      projectedLossPct: 10.8,
    });
  });

  it("rejects a fractional delay", async () => {
    await expect(engineWith().estimateHarvestLoss("farm-humid", 2.5)).rejects.toThrow(MalformedInputError);
  });
});

describe("createDecisionEngine", () => {
  it("fails at construction on invalid weights", () => {
    expect(() =>
      engineWith({
        config: { ...DEFAULT_ENGINE_CONFIG, weightOverrides: { composite: { traditional: 0.5, action: 0.3, ground_truth: 0.3 } } },
      })
    ).toThrow(InvalidWeightConfigurationError);
  });

  it("reports the models it runs", () => {
    expect(engineWith().metadata().claims.min_neighbor_reporters).toBe(3);
  });
});
