import { describe, it, expect } from "vitest";
import { MalformedInputError } from "./engineErrors";
import {
  claimRequestSchema,
  lossEstimateRequestSchema,
  parseClaimRequest,
  parseRequest,
} from "./decisionRequestSchema";

const NOW = new Date("2026-06-15T09:00:00.000Z");
const claim = { subjectId: "farmer-1", farmId: "farm-1", claimDate: "2026-06-10", claimType: "drought" };

describe("parseRequest", () => {
  it("returns the parsed request", () => {
    expect(parseRequest("verifyClaim", claimRequestSchema, claim)).toEqual(claim);
  });

  it("lists every offending field", () => {
    try {
      parseRequest("verifyClaim", claimRequestSchema, { ...claim, farmId: " ", claimType: "locusts" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedInputError);
      if (!(error instanceof MalformedInputError)) return;
      expect(error.code).toBe("MALFORMED_INPUT");
      expect(error.issues.map((i) => i.field)).toEqual(["farmId", "claimType"]);
      expect(error.issues[0].message).toBe("must be a non-empty identifier");
    }
  });

  it("rejects impossible calendar dates", () => {
    expect(() => parseRequest("verifyClaim", claimRequestSchema, { ...claim, claimDate: "2026-02-30" })).toThrow(
      "Malformed verifyClaim request: claimDate: must be a calendar date (YYYY-MM-DD)"
    );
  });

  it("requires whole, bounded delay days", () => {
    expect(() => parseRequest("estimateHarvestLoss", lossEstimateRequestSchema, { farmId: "f", delayDays: 1.5 })).toThrow(
      "delayDays: must be a whole number of days"
    );
    expect(() => parseRequest("estimateHarvestLoss", lossEstimateRequestSchema, { farmId: "f", delayDays: -1 })).toThrow(
      MalformedInputError
    );
  });

  it("names the request itself when the input is not an object", () => {
    expect(() => parseRequest("verifyClaim", claimRequestSchema, null)).toThrow(
      "Malformed verifyClaim request: request: Expected object, received null"
    );
  });
});

describe("parseClaimRequest", () => {
  it("accepts a claim dated today", () => {
    expect(parseClaimRequest({ ...claim, claimDate: "2026-06-15" }, NOW, 365).claimDate).toBe("2026-06-15");
  });

  it("rejects future claims", () => {
    expect(() => parseClaimRequest({ ...claim, claimDate: "2026-06-16" }, NOW, 365)).toThrow(
      "Malformed verifyClaim request: claimDate: must not be in the future"
    );
  });

  it("rejects claims older than the maximum age", () => {
    expect(() => parseClaimRequest({ ...claim, claimDate: "2026-05-01" }, NOW, 30)).toThrow(
      "claimDate: must be within the last 30 days"
    );
    expect(parseClaimRequest({ ...claim, claimDate: "2026-05-16" }, NOW, 30).claimDate).toBe("2026-05-16");
  });
});
