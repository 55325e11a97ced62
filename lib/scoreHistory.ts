/**
 * Append-only decision ledgers: per-subject credit score history and per-claim verdict
 * history. Records are deep-frozen on entry; reads return frozen snapshots. A re-verified
 * claim appends a new entry that supersedes the prior one; nothing is overwritten.
 */

import type { ClaimVerdict, CompositeScore, Grade } from "./evidenceContract";
import { deepFreeze } from "./evidenceContract";

export type ClaimVerdictEntry = {
  /** 1-based position in the claim's history. */
  sequence: number;
  verdict: ClaimVerdict;
  recordedAt: string;
  /** Sequence of the entry this one supersedes; null for the first verdict. */
  supersedes: number | null;
};

export interface ScoreLedger {
  append(record: CompositeScore): Promise<void>;
  /** Oldest first. */
  list(subjectId: string): Promise<readonly CompositeScore[]>;
}

export interface ClaimVerdictLedger {
  append(verdict: ClaimVerdict): Promise<ClaimVerdictEntry>;
  /** Oldest first; the last entry is the current verdict. */
  list(claimId: string): Promise<readonly ClaimVerdictEntry[]>;
}

export class InMemoryScoreLedger implements ScoreLedger {
  private readonly bySubject = new Map<string, CompositeScore[]>();

  async append(record: CompositeScore): Promise<void> {
    const history = this.bySubject.get(record.subjectId) ?? [];
    history.push(deepFreeze(record));
    this.bySubject.set(record.subjectId, history);
  }

  async list(subjectId: string): Promise<readonly CompositeScore[]> {
    return Object.freeze([...(this.bySubject.get(subjectId) ?? [])]);
  }
}

export class InMemoryClaimVerdictLedger implements ClaimVerdictLedger {
  private readonly byClaim = new Map<string, ClaimVerdictEntry[]>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async append(verdict: ClaimVerdict): Promise<ClaimVerdictEntry> {
    const history = this.byClaim.get(verdict.claimId) ?? [];
    const previous = history.length > 0 ? history[history.length - 1] : null;
    const entry = deepFreeze({
      sequence: history.length + 1,
      verdict: deepFreeze(verdict),
      recordedAt: this.now().toISOString(),
      supersedes: previous?.sequence ?? null,
    });
    history.push(entry);
    this.byClaim.set(verdict.claimId, history);
    return entry;
  }

  async list(claimId: string): Promise<readonly ClaimVerdictEntry[]> {
    return Object.freeze([...(this.byClaim.get(claimId) ?? [])]);
  }
}

/** Compare current score to previous score for trend. */
export function getScoreTrend(
  currentScore: number | null,
  previousScore: number | null
): "improved" | "declined" | "stable" | null {
  if (currentScore == null || previousScore == null) return null;
  const delta = currentScore - previousScore;
  if (delta > 0) return "improved";
  if (delta < 0) return "declined";
  return "stable";
}

/** Format grade change for audit; null if same or either missing. */
export function gradeChange(from: Grade | null, to: Grade | null): string | null {
  if (from == null || to == null || from === to) return null;
  return `${from} → ${to}`;
}

export type ScoreAuditRow = {
  subjectId: string;
  scoreId: string;
  previousScore: number | null;
  newScore: number;
  /** Null when the previous score came from a different model version. */
  delta: number | null;
  gradeChange: string | null;
  modelVersion: string;
  computedAt: string;
};

/** One audit row per score in an oldest-first history, each compared with its predecessor. */
export function buildScoreAuditRows(history: readonly CompositeScore[]): ScoreAuditRow[] {
  return history.map((score, i) => {
    const prev = i > 0 ? history[i - 1] : null;
    const comparable = prev != null && prev.modelVersion === score.modelVersion;
    return {
      subjectId: score.subjectId,
      scoreId: score.id,
      previousScore: prev?.value ?? null,
      newScore: score.value,
      delta: comparable && prev ? score.value - prev.value : null,
      gradeChange: gradeChange(prev?.grade ?? null, score.grade),
      modelVersion: score.modelVersion,
      computedAt: score.computedAt,
    };
  });
}
