/**
 * Weighted aggregation with proportional redistribution.
 * score = Σ weight_i × value_i over available factors; an unavailable factor's weight is
 * spread across the remaining ones (w_j / Σ available), never scored as zero.
 * Weight sets are validated once, when defined; aggregation never re-checks them.
 */

import { InsufficientEvidenceError, InvalidWeightConfigurationError } from "./engineErrors";

export const WEIGHT_SUM_TOLERANCE = 1e-9;

export type WeightEntry<N extends string> = { readonly name: N; readonly weight: number };

export type WeightSpec<N extends string> = {
  readonly name: string;
  readonly entries: readonly WeightEntry<N>[];
};

export type FactorReading = { value: number } | { value: null; reason: string };

export type AggregatedFactor<N extends string> = {
  name: N;
  weight: number;
  effectiveWeight: number;
  value: number | null;
  available: boolean;
  /** effectiveWeight × value, in score points. */
  contribution: number;
  unavailableReason?: string;
};

export type AggregateResult<N extends string> = {
  score: number;
  factors: AggregatedFactor<N>[];
  redistributed: boolean;
};

function clamp100(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(100, value));
}

/**
 * Define an ordered weight set. Throws InvalidWeightConfigurationError when a weight is not a
 * finite fraction in [0,1], a name repeats, or the weights do not sum to 1.0.
 */
export function defineWeightSpec<N extends string>(
  name: string,
  weights: readonly (readonly [N, number])[]
): WeightSpec<N> {
  const asRecord = Object.fromEntries(weights.map(([n, w]) => [n, w]));
  if (weights.length === 0) {
    throw new InvalidWeightConfigurationError(name, "no sub-factors defined", asRecord);
  }
  const seen = new Set<string>();
  let sum = 0;
  for (const [factor, weight] of weights) {
    if (seen.has(factor)) {
      throw new InvalidWeightConfigurationError(name, `sub-factor "${factor}" listed twice`, asRecord);
    }
    seen.add(factor);
    if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
      throw new InvalidWeightConfigurationError(
        name,
        `weight for "${factor}" must be a fraction in [0,1], got ${weight}`,
        asRecord
      );
    }
    sum += weight;
  }
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new InvalidWeightConfigurationError(name, `weights sum to ${sum}, expected 1.0`, asRecord);
  }
  return Object.freeze({
    name,
    entries: Object.freeze(weights.map(([n, w]) => Object.freeze({ name: n, weight: w }))),
  });
}

/**
 * Effective weight per factor for a given availability set. Unavailable factors get 0;
 * available ones are renormalized to sum to 1. All-available returns the weights unchanged.
 */
export function redistributeWeights<N extends string>(
  spec: WeightSpec<N>,
  available: ReadonlySet<N>
): Map<N, number> {
  const out = new Map<N, number>();
  const allAvailable = spec.entries.every((e) => available.has(e.name));
  const availableWeight = spec.entries.reduce((s, e) => (available.has(e.name) ? s + e.weight : s), 0);
  for (const entry of spec.entries) {
    if (!available.has(entry.name) || availableWeight <= 0) {
      out.set(entry.name, 0);
    } else {
      out.set(entry.name, allAvailable ? entry.weight : entry.weight / availableWeight);
    }
  }
  return out;
}

/**
 * Combine readings into a 0–100 score. Throws InsufficientEvidenceError naming every factor
 * when none carries weight.
 */
export function aggregateWeighted<N extends string>(
  spec: WeightSpec<N>,
  readings: Readonly<Record<N, FactorReading>>,
  decision: string = spec.name
): AggregateResult<N> {
  const available = new Set<N>();
  for (const entry of spec.entries) {
    const reading = readings[entry.name];
    if (reading.value !== null && Number.isFinite(reading.value)) {
      available.add(entry.name);
    }
  }

  const weightBearing = spec.entries.filter((e) => available.has(e.name) && e.weight > 0);
  if (weightBearing.length === 0) {
    throw new InsufficientEvidenceError(
      decision,
      spec.entries.map((e) => {
        const reading = readings[e.name];
        return {
          source: e.name,
          reason: reading.value === null ? reading.reason : "carries no weight",
        };
      })
    );
  }

  const effective = redistributeWeights(spec, available);
  let score = 0;
  let redistributed = false;
  const factors: AggregatedFactor<N>[] = spec.entries.map((entry) => {
    const reading = readings[entry.name];
    const effectiveWeight = effective.get(entry.name) ?? 0;
    if (reading.value === null || !available.has(entry.name)) {
      if (entry.weight > 0) redistributed = true;
      return {
        name: entry.name,
        weight: entry.weight,
        effectiveWeight: 0,
        value: null,
        available: false,
        contribution: 0,
        unavailableReason: reading.value === null ? reading.reason : "non-finite value",
      };
    }
    const value = clamp100(reading.value);
    const contribution = effectiveWeight * value;
    score += contribution;
    return {
      name: entry.name,
      weight: entry.weight,
      effectiveWeight,
      value,
      available: true,
      contribution,
    };
  });

  return { score: clamp100(score), factors, redistributed };
}
