import { describe, it, expect } from "vitest";
import type { ClaimVerdict, CompositeScore } from "../evidenceContract";
import { SupabaseClaimVerdictLedger, SupabaseScoreLedger } from "./decisionLedgers";
import { createFakeSupabase } from "./fakePostgrest";

const score: CompositeScore = {
  id: "score-1",
  subjectId: "farmer-1",
  value: 693,
  grade: "C",
  terms: { grade: "C", eligible: true, interestRatePct: 12 },
  subScores: [
    {
      name: "action",
      value: 64.75,
      weight: 0.3,
      effectiveWeight: 0.3,
      available: true,
      contributingEvidence: [
        {
          sourceKind: "action",
          value: 64.75,
          observedAt: "2026-03-01",
          confidenceHint: 0.75,
          available: true,
          detail: {
            submitted: 4,
            verified: 3,
            verificationRate: 0.75,
            distinctVerifiedTypes: 2,
            monthsWithVerifiedAction: 2,
            diversityBonus: 10,
            consistencyBonus: 6,
          },
        },
      ],
    },
  ],
  confidence: 0.9,
  modelVersion: "1.0",
  computedAt: "2026-06-15T09:00:00.000Z",
  validUntil: "2026-07-15T09:00:00.000Z",
};

const verdict: ClaimVerdict = {
  claimId: "claim-1",
  subjectId: "farmer-0",
  farmId: "farm-0",
  claimDate: "2026-06-11",
  claimType: "storm",
  confidence: 0,
  recommendation: "REJECT",
  evidence: [
    {
      sourceKind: "satellite",
      value: null,
      observedAt: null,
      confidenceHint: 0,
      available: false,
      unavailableReason: "satellite indices cannot observe storm",
      detail: { scanId: null, scanDate: null, ndvi: null, radarBackscatterDb: null, threshold: null },
      supportsClaim: false,
      weight: 0.3,
      effectiveWeight: 0,
    },
  ],
  modelVersion: "1.0",
};

describe("SupabaseScoreLedger", () => {
  it("inserts the record with its indexed columns", async () => {
    const { supabase, requests } = createFakeSupabase(() => ({ status: 201 }));
    await new SupabaseScoreLedger(supabase).append(score);
    expect(requests[0].method).toBe("POST");
    expect(requests[0].path).toBe("/credit_scores");
    expect(requests[0].body).toEqual({
      id: "score-1",
      subject_id: "farmer-1",
      value: 693,
      grade: "C",
      model_version: "1.0",
      computed_at: "2026-06-15T09:00:00.000Z",
      valid_until: "2026-07-15T09:00:00.000Z",
      record: score,
    });
  });

  it("lists validated, frozen records oldest first", async () => {
    const { supabase, requests } = createFakeSupabase(() => ({ status: 200, body: [{ record: score }] }));
    const history = await new SupabaseScoreLedger(supabase).list("farmer-1");
    expect(history).toEqual([score]);
    expect(Object.isFrozen(history[0])).toBe(true);
    expect(requests[0].params.get("order")).toBe("computed_at.asc");
  });

  it("refuses a stored record that no longer matches the contract", async () => {
    const { supabase } = createFakeSupabase(() => ({ status: 200, body: [{ record: { ...score, grade: "E" } }] }));
    await expect(new SupabaseScoreLedger(supabase).list("farmer-1")).rejects.toThrow();
  });

  it("surfaces insert errors", async () => {
    const { supabase } = createFakeSupabase(() => ({
      status: 409,
      body: { message: "duplicate key value violates unique constraint", code: "23505", details: null, hint: null },
    }));
    await expect(new SupabaseScoreLedger(supabase).append(score)).rejects.toThrow(
      "[credit_scores] duplicate key value violates unique constraint"
    );
  });
});

describe("SupabaseClaimVerdictLedger", () => {
  const now = () => new Date("2026-06-15T09:00:00.000Z");

  it("the first verdict supersedes nothing", async () => {
    const { supabase, requests } = createFakeSupabase((r) => (r.method === "GET" ? { status: 200, body: [] } : { status: 201 }));
    const entry = await new SupabaseClaimVerdictLedger(supabase, now).append(verdict);
    expect(entry).toEqual({ sequence: 1, verdict, recordedAt: "2026-06-15T09:00:00.000Z", supersedes: null });
    expect(requests.map((r) => r.method)).toEqual(["GET", "POST"]);
    expect(requests[1].body).toMatchObject({ claim_id: "claim-1", sequence: 1, supersedes: null, recommendation: "REJECT" });
  });

  it("a re-verification supersedes the latest entry", async () => {
    const stored = { sequence: 1, supersedes: null, recorded_at: "2026-06-14T09:00:00.000Z", verdict };
    const { supabase, requests } = createFakeSupabase((r) =>
      r.method === "GET" ? { status: 200, body: [stored] } : { status: 201 }
    );
    const entry = await new SupabaseClaimVerdictLedger(supabase, now).append(verdict);
    expect(entry.sequence).toBe(2);
    expect(entry.supersedes).toBe(1);
    expect(requests[1].body).toMatchObject({ sequence: 2, supersedes: 1 });
  });

  it("lists entries by claim in sequence order", async () => {
    const stored = { sequence: 1, supersedes: null, recorded_at: "2026-06-14T09:00:00.000Z", verdict };
    const { supabase, requests } = createFakeSupabase(() => ({ status: 200, body: [stored] }));
    const history = await new SupabaseClaimVerdictLedger(supabase, now).list("claim-1");
    expect(history).toEqual([{ sequence: 1, verdict, recordedAt: "2026-06-14T09:00:00.000Z", supersedes: null }]);
    expect(requests[0].params.get("claim_id")).toBe("eq.claim-1");
    expect(requests[0].params.get("order")).toBe("sequence.asc");
  });
});
