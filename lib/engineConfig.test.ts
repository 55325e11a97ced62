import { describe, it, expect } from "vitest";
import { DEFAULT_ENGINE_CONFIG, buildWeightSets, loadEngineConfig } from "./engineConfig";
import { InvalidWeightConfigurationError, MalformedInputError } from "./engineErrors";

describe("loadEngineConfig", () => {
  it("an empty environment yields the defaults", () => {
    expect(loadEngineConfig({})).toEqual({
      ...DEFAULT_ENGINE_CONFIG,
      weightOverrides: { composite: undefined, traditional: undefined, claim: undefined },
    });
    expect(DEFAULT_ENGINE_CONFIG.adapterTimeoutMs).toBe(2000);
    expect(DEFAULT_ENGINE_CONFIG.claims.minNeighborReporters).toBe(3);
    expect(DEFAULT_ENGINE_CONFIG.credit.scoreValidityDays).toBe(30);
  });

  it("reads numeric overrides", () => {
    const config = loadEngineConfig({
      DECISION_ADAPTER_TIMEOUT_MS: "500",
      CLAIM_MIN_NEIGHBOR_REPORTERS: "5",
      CLAIM_NEIGHBOR_AGREEMENT: "0.6",
      HARVEST_ROAD_SATURATION_MM: "65.5",
    });
    expect(config.adapterTimeoutMs).toBe(500);
    expect(config.claims.minNeighborReporters).toBe(5);
    expect(config.claims.neighborAgreementThreshold).toBe(0.6);
    expect(config.logistics.roadSaturationMm).toBe(65.5);
  });

  it("treats blank values as unset", () => {
    expect(loadEngineConfig({ DECISION_ADAPTER_TIMEOUT_MS: "  ", CLAIM_SOURCE_WEIGHTS: "" }).adapterTimeoutMs).toBe(2000);
  });

  it("never shortens the forecast below the minimum", () => {
    expect(loadEngineConfig({ HARVEST_FORECAST_DAYS: "3" }).logistics.forecastDays).toBe(7);
    expect(loadEngineConfig({ HARVEST_FORECAST_DAYS: "10" }).logistics.forecastDays).toBe(10);
  });

  it("rejects unparsable values", () => {
    expect(() => loadEngineConfig({ DECISION_ADAPTER_TIMEOUT_MS: "soon" })).toThrow(MalformedInputError);
    expect(() => loadEngineConfig({ CLAIM_NEIGHBOR_AGREEMENT: "1.5" })).toThrow(MalformedInputError);
    expect(() => loadEngineConfig({ CLAIM_SOURCE_WEIGHTS: "{not json" })).toThrow(MalformedInputError);
  });

  it("accepts a complete weight override", () => {
    const config = loadEngineConfig({ CLAIM_SOURCE_WEIGHTS: '{"satellite":0.5,"neighbors":0.25,"self_reports":0.25}' });
    expect(buildWeightSets(config).claim.entries).toEqual([
      { name: "satellite", weight: 0.5 },
      { name: "neighbors", weight: 0.25 },
      { name: "self_reports", weight: 0.25 },
    ]);
  });

  it("rejects weight overrides that do not sum to one", () => {
    expect(() =>
      loadEngineConfig({ CLAIM_SOURCE_WEIGHTS: '{"satellite":0.5,"neighbors":0.5,"self_reports":0.5}' })
    ).toThrow('Weight set "claim sources" is invalid: weights sum to 1.5, expected 1.0');
  });

  it("rejects overrides naming unknown or missing sub-factors", () => {
    expect(() => loadEngineConfig({ CREDIT_COMPOSITE_WEIGHTS: '{"traditional":0.5,"vibes":0.5}' })).toThrow(
      'Weight set "credit composite" is invalid: unknown sub-factor(s): vibes'
    );
    expect(() => loadEngineConfig({ CREDIT_COMPOSITE_WEIGHTS: '{"traditional":0.5,"action":0.5}' })).toThrow(
      InvalidWeightConfigurationError
    );
  });
});
