/**
 * Insert-only Supabase ledgers for issued credit scores and claim verdicts. Records are
 * stored whole as jsonb next to indexed columns and validated on the way back out.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { CLAIM_TYPES, TRADITIONAL_FACTORS, deepFreeze } from "../evidenceContract";
import type { ClaimVerdict, CompositeScore } from "../evidenceContract";
import type { ClaimVerdictEntry, ClaimVerdictLedger, ScoreLedger } from "../scoreHistory";

const evidenceBase = {
  value: z.number().nullable(),
  observedAt: z.string().nullable(),
  confidenceHint: z.number(),
  available: z.boolean(),
  unavailableReason: z.string().optional(),
};

const satelliteEvidence = z.object({
  ...evidenceBase,
  sourceKind: z.literal("satellite"),
  detail: z.object({
    scanId: z.string().nullable(),
    scanDate: z.string().nullable(),
    ndvi: z.number().nullable(),
    radarBackscatterDb: z.number().nullable(),
    threshold: z.number().nullable(),
  }),
});

const neighborEvidence = z.object({
  ...evidenceBase,
  sourceKind: z.literal("neighbor"),
  detail: z.object({
    farmsConsulted: z.number(),
    reporterCount: z.number(),
    minReporters: z.number(),
    totalReports: z.number(),
    matchingReports: z.number(),
    agreeingReporters: z.number(),
    agreementRate: z.number().nullable(),
  }),
});

const selfReportEvidence = z.object({
  ...evidenceBase,
  sourceKind: z.literal("self_report"),
  detail: z.object({
    totalReports: z.number(),
    matchingReports: z.number().optional(),
    corroboratedReports: z.number().optional(),
    reportingFrequencyScore: z.number().optional(),
    accuracyRate: z.number().optional(),
  }),
});

const actionEvidence = z.object({
  ...evidenceBase,
  sourceKind: z.literal("action"),
  detail: z.object({
    submitted: z.number(),
    verified: z.number(),
    verificationRate: z.number(),
    distinctVerifiedTypes: z.number(),
    monthsWithVerifiedAction: z.number(),
    diversityBonus: z.number(),
    consistencyBonus: z.number(),
  }),
});

const traditionalEvidence = z.object({
  ...evidenceBase,
  sourceKind: z.literal("traditional_factor"),
  detail: z.object({
    factor: z.enum(TRADITIONAL_FACTORS),
    rawValue: z.union([z.number(), z.boolean()]).nullable(),
    unit: z.string(),
  }),
});

const compositeScoreSchema = z.object({
  id: z.string(),
  subjectId: z.string(),
  value: z.number(),
  grade: z.enum(["A", "B", "C", "D", "F"]),
  terms: z.object({
    grade: z.enum(["A", "B", "C", "D", "F"]),
    eligible: z.boolean(),
    interestRatePct: z.number().nullable(),
  }),
  subScores: z.array(
    z.object({
      name: z.enum(["traditional", "action", "ground_truth"]),
      value: z.number().nullable(),
      weight: z.number(),
      effectiveWeight: z.number(),
      available: z.boolean(),
      contributingEvidence: z.array(
        z.discriminatedUnion("sourceKind", [
          satelliteEvidence,
          neighborEvidence,
          selfReportEvidence,
          actionEvidence,
          traditionalEvidence,
        ])
      ),
    })
  ),
  confidence: z.number(),
  modelVersion: z.string(),
  computedAt: z.string(),
  validUntil: z.string(),
});

const claimWeighting = { supportsClaim: z.boolean(), weight: z.number(), effectiveWeight: z.number() };

const claimVerdictSchema = z.object({
  claimId: z.string(),
  subjectId: z.string(),
  farmId: z.string(),
  claimDate: z.string(),
  claimType: z.enum(CLAIM_TYPES),
  confidence: z.number(),
  recommendation: z.enum(["APPROVE_STRONG", "APPROVE", "INVESTIGATE", "REJECT"]),
  evidence: z.array(
    z.discriminatedUnion("sourceKind", [
      satelliteEvidence.extend(claimWeighting),
      neighborEvidence.extend(claimWeighting),
      selfReportEvidence.extend(claimWeighting),
    ])
  ),
  modelVersion: z.string(),
});

const scoreRow = z.object({ record: compositeScoreSchema });

const verdictRow = z.object({
  sequence: z.number().int(),
  supersedes: z.number().int().nullable(),
  recorded_at: z.string(),
  verdict: claimVerdictSchema,
});

export class SupabaseScoreLedger implements ScoreLedger {
  constructor(private readonly supabase: SupabaseClient) {}

  async append(record: CompositeScore): Promise<void> {
    const { error } = await this.supabase.from("credit_scores").insert({
      id: record.id,
      subject_id: record.subjectId,
      value: record.value,
      grade: record.grade,
      model_version: record.modelVersion,
      computed_at: record.computedAt,
      valid_until: record.validUntil,
      record,
    });
    if (error) throw new Error(`[credit_scores] ${error.message}`);
  }

  async list(subjectId: string): Promise<readonly CompositeScore[]> {
    const { data, error } = await this.supabase
      .from("credit_scores")
      .select("record")
      .eq("subject_id", subjectId)
      .order("computed_at", { ascending: true });
    if (error) throw new Error(`[credit_scores] ${error.message}`);
    const rows = z.array(scoreRow).parse(data ?? []);
    return deepFreeze(rows.map((r) => r.record));
  }
}

export class SupabaseClaimVerdictLedger implements ClaimVerdictLedger {
  constructor(
    private readonly supabase: SupabaseClient,
    private readonly now: () => Date = () => new Date()
  ) {}

  async append(verdict: ClaimVerdict): Promise<ClaimVerdictEntry> {
    const history = await this.list(verdict.claimId);
    const previous = history.length > 0 ? history[history.length - 1] : null;
    const entry: ClaimVerdictEntry = {
      sequence: history.length + 1,
      verdict,
      recordedAt: this.now().toISOString(),
      supersedes: previous?.sequence ?? null,
    };
    // (claim_id, sequence) is unique, so a concurrent append for the same claim fails here.
    const { error } = await this.supabase.from("claim_verdicts").insert({
      claim_id: verdict.claimId,
      sequence: entry.sequence,
      supersedes: entry.supersedes,
      recorded_at: entry.recordedAt,
      confidence: verdict.confidence,
      recommendation: verdict.recommendation,
      verdict,
    });
    if (error) throw new Error(`[claim_verdicts] ${error.message}`);
    return deepFreeze(entry);
  }

  async list(claimId: string): Promise<readonly ClaimVerdictEntry[]> {
    const { data, error } = await this.supabase
      .from("claim_verdicts")
      .select("sequence, supersedes, recorded_at, verdict")
      .eq("claim_id", claimId)
      .order("sequence", { ascending: true });
    if (error) throw new Error(`[claim_verdicts] ${error.message}`);
    const rows = z.array(verdictRow).parse(data ?? []);
    return deepFreeze(
      rows.map((r) => ({
        sequence: r.sequence,
        verdict: r.verdict,
        recordedAt: r.recorded_at,
        supersedes: r.supersedes,
      }))
    );
  }
}
