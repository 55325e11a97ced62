/**
 * Zod schemas for decision requests (untrusted input). Validated before any adapter is
 * called; failures surface as MalformedInputError listing every offending field.
 */

import { z } from "zod";
import { CLAIM_TYPES } from "./evidenceContract";
import { MalformedInputError } from "./engineErrors";
import { daysBetween, isIsoDate, toIsoDate } from "./evidenceSources";

const identifier = z.string().trim().min(1, "must be a non-empty identifier").max(128);

export const creditRequestSchema = z.object({ subjectId: identifier });

export const claimRequestSchema = z.object({
  subjectId: identifier,
  farmId: identifier,
  claimDate: z.string().refine(isIsoDate, "must be a calendar date (YYYY-MM-DD)"),
  claimType: z.enum(CLAIM_TYPES),
});

export const harvestRequestSchema = z.object({ farmId: identifier });

export const lossEstimateRequestSchema = z.object({
  farmId: identifier,
  delayDays: z.number().int("must be a whole number of days").min(0).max(365),
});

export type CreditRequest = z.infer<typeof creditRequestSchema>;
export type ClaimRequest = z.infer<typeof claimRequestSchema>;
export type HarvestRequest = z.infer<typeof harvestRequestSchema>;
export type LossEstimateRequest = z.infer<typeof lossEstimateRequestSchema>;

function toIssues(error: z.ZodError): { field: string; message: string }[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "request",
    message: issue.message,
  }));
}

/** Parse or throw MalformedInputError naming the operation. */
export function parseRequest<S extends z.ZodTypeAny>(operation: string, schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) throw new MalformedInputError(operation, toIssues(result.error));
  return result.data;
}

/** Claim request plus the date checks that need a clock: no future claims, none older than maxAgeDays. */
export function parseClaimRequest(input: unknown, now: Date, maxAgeDays: number): ClaimRequest {
  const claim = parseRequest("verifyClaim", claimRequestSchema, input);
  const age = daysBetween(claim.claimDate, toIsoDate(now));
  if (age < 0) {
    throw new MalformedInputError("verifyClaim", [{ field: "claimDate", message: "must not be in the future" }]);
  }
  if (age > maxAgeDays) {
    throw new MalformedInputError("verifyClaim", [
      { field: "claimDate", message: `must be within the last ${maxAgeDays} days` },
    ]);
  }
  return claim;
}
