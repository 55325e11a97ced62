import { describe, it, expect } from "vitest";
import {
  buildTraditionalEvidence,
  scoreClimateRisk,
  scoreCropHealth,
  scoreDeforestation,
  scoreFarmSize,
  scorePaymentHistory,
} from "./traditionalFactors";

describe("traditional factor normalization", () => {
  it("steps farm size", () => {
    expect(scoreFarmSize(12)).toBe(100);
    expect(scoreFarmSize(10)).toBe(100);
    expect(scoreFarmSize(7)).toBe(90);
    expect(scoreFarmSize(2.5)).toBe(80);
    expect(scoreFarmSize(1.2)).toBe(60);
    expect(scoreFarmSize(0.5)).toBe(50);
    expect(scoreFarmSize(0.2)).toBe(40);
    expect(scoreFarmSize(null)).toBeNull();
    expect(scoreFarmSize(-1)).toBeNull();
  });

  it("steps NDVI", () => {
    expect(scoreCropHealth(0.85)).toBe(100);
    expect(scoreCropHealth(0.72)).toBe(90);
    expect(scoreCropHealth(0.35)).toBe(55);
    expect(scoreCropHealth(0.1)).toBe(50);
    expect(scoreCropHealth(1.4)).toBeNull();
  });

  it("inverts climate risk and clamps it", () => {
    expect(scoreClimateRisk(30)).toBe(70);
    expect(scoreClimateRisk(140)).toBe(0);
    expect(scoreClimateRisk(null)).toBeNull();
  });

  it("credits late-but-paid installments at 70%", () => {
    expect(scorePaymentHistory({ total: 4, onTime: 2, latePaid: 2 })).toBeCloseTo(85, 10);
    expect(scorePaymentHistory({ total: 0, onTime: 0, latePaid: 0 })).toBeNull();
  });

  it("treats detected deforestation as zero", () => {
    expect(scoreDeforestation(true)).toBe(0);
    expect(scoreDeforestation(false)).toBe(100);
    expect(scoreDeforestation(null)).toBeNull();
  });

  it("keeps missing indicators missing in the evidence", () => {
    const evidence = buildTraditionalEvidence({
      subjectId: "farmer-1",
      farmSizeAcres: 3,
      ndvi: null,
      ndviObservedAt: null,
      climateRiskScore: 20,
      climateAssessedAt: "2026-05-01",
      payments: { total: 0, onTime: 0, latePaid: 0 },
      deforestationDetected: false,
      deforestationCheckedAt: null,
    });
    expect(evidence.crop_health).toEqual({
      sourceKind: "traditional_factor",
      value: null,
      observedAt: null,
      confidenceHint: 0,
      available: false,
      unavailableReason: "no satellite NDVI reading",
      detail: { factor: "crop_health", rawValue: null, unit: "ndvi" },
    });
    expect(evidence.farm_size.value).toBe(80);
    expect(evidence.farm_size.confidenceHint).toBe(0.7);
    expect(evidence.climate_risk.confidenceHint).toBe(0.9);
    expect(evidence.payment_history.available).toBe(false);
  });
});
