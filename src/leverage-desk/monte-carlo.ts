// src/leverage-desk/monte-carlo.ts
// Seeded Monte-Carlo sampling over the evidence scalars. Each sample is an
// independent Gateway call; aggregation happens here, never in the engine.

import { z } from 'zod';
import { ENGINE_RELEASE, runEngine } from '@engine';
import type { ConfidenceLevel, Decision, EvidenceValues } from '@shared/types';

export const MAX_SAMPLES = 100_000;

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const unit = z.number().finite().min(0).max(1);
const shape = z.number().finite().positive();

export const distributionSchema = z
  .discriminatedUnion('kind', [
    z.object({ kind: z.literal('fixed'), value: unit }),
    z.object({ kind: z.literal('uniform'), min: unit, max: unit }),
    z.object({ kind: z.literal('normal'), mean: unit, std: unit }),
    z.object({ kind: z.literal('triangular'), min: unit, mode: unit, max: unit }),
    z.object({ kind: z.literal('beta'), alpha: shape, beta: shape }),
  ])
  .superRefine((d, ctx) => {
    if (d.kind === 'uniform' && d.min > d.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'uniform min must not exceed max' });
    }
    if (d.kind === 'triangular' && !(d.min <= d.mode && d.mode <= d.max)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'triangular requires min <= mode <= max' });
    }
  });

export type DistributionSpec = z.infer<typeof distributionSchema>;

export const monteCarloOptionsSchema = z.object({
  samples: z.number().int().min(1).max(MAX_SAMPLES),
  seed: z.number().int(),
  distributions: z.object({
    claimValidity: distributionSchema,
    proceduralAdvantage: distributionSchema,
    costAsymmetry: distributionSchema,
  }),
});

export type MonteCarloOptions = z.infer<typeof monteCarloOptionsSchema>;

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface LeverageStatistics {
  mean: number;
  std: number;
  min: number;
  max: number;
  p5: number;
  p50: number;
  p95: number;
}

export interface MonteCarloSummary {
  samples: number;
  seed: number;
  release: string;
  decisionCounts: Record<Decision, number>;
  decisionProportions: Record<Decision, number>;
  confidenceProportions: Record<ConfidenceLevel, number>;
  triggerRate: number;
  leverage: LeverageStatistics;
  costPressure: { mean: number; max: number };
}

// ---------------------------------------------------------------------------
// Seeded PRNG -- mulberry32
// ---------------------------------------------------------------------------

export function mulberry32(seed: number) {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

type Random = () => number;

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

/** Box-Muller; 1 - rand() keeps the logarithm finite. */
function standardNormal(rand: Random): number {
  const u1 = 1 - rand();
  const u2 = rand();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/** Marsaglia-Tsang; shapes below 1 are boosted by U^(1/shape). */
function sampleGamma(shape: number, rand: Random): number {
  if (shape < 1) {
    return sampleGamma(shape + 1, rand) * (1 - rand()) ** (1 / shape);
  }
  const d = shape - 1 / 3;
  const c = 1 / Math.sqrt(9 * d);
  for (;;) {
    let x: number;
    let v: number;
    do {
      x = standardNormal(rand);
      v = 1 + c * x;
    } while (v <= 0);
    v = v * v * v;
    const u = 1 - rand();
    if (Math.log(u) < 0.5 * x * x + d - d * v + d * Math.log(v)) return d * v;
  }
}

export function drawSample(dist: DistributionSpec, rand: Random): number {
  switch (dist.kind) {
    case 'fixed':
      return dist.value;
    case 'uniform':
      return clamp01(dist.min + (dist.max - dist.min) * rand());
    case 'normal':
      return clamp01(dist.mean + dist.std * standardNormal(rand));
    case 'triangular': {
      const { min, mode, max } = dist;
      if (max === min) return min;
      const u = rand();
      const split = (mode - min) / (max - min);
      return clamp01(
        u < split
          ? min + Math.sqrt(u * (max - min) * (mode - min))
          : max - Math.sqrt((1 - u) * (max - min) * (max - mode)),
      );
    }
    case 'beta': {
      const x = sampleGamma(dist.alpha, rand);
      const y = sampleGamma(dist.beta, rand);
      // Both draws can underflow to zero for very small shapes.
      return x + y > 0 ? x / (x + y) : dist.alpha / (dist.alpha + dist.beta);
    }
  }
}

// ---------------------------------------------------------------------------
// Statistics
// ---------------------------------------------------------------------------

/** Linear-interpolation percentile over an ascending array. */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return Number.NaN;
  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const weight = rank - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * weight;
}

function summarize(values: readonly number[]): LeverageStatistics {
  const sorted = [...values].sort((a, b) => a - b);
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
  return {
    mean,
    std: Math.sqrt(variance),
    min: sorted[0],
    max: sorted[sorted.length - 1],
    p5: percentile(sorted, 5),
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
  };
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

export function runMonteCarlo(options: MonteCarloOptions): MonteCarloSummary {
  const { samples, seed, distributions } = monteCarloOptionsSchema.parse(options);
  const rand = mulberry32(seed);

  const decisionCounts: Record<Decision, number> = { ACCEPT: 0, COUNTER: 0, HOLD: 0, REJECT: 0 };
  const confidenceCounts: Record<ConfidenceLevel, number> = { LOW: 0, MODERATE: 0, HIGH: 0 };
  const leverageValues: number[] = [];
  let costSum = 0;
  let costMax = 0;
  let triggered = 0;

  for (let i = 0; i < samples; i++) {
    // Draw order is fixed so a seed always yields the same inputs.
    const values: EvidenceValues = {
      claimValidity: drawSample(distributions.claimValidity, rand),
      proceduralAdvantage: drawSample(distributions.proceduralAdvantage, rand),
      costAsymmetry: drawSample(distributions.costAsymmetry, rand),
    };

    const snapshot = runEngine(values);
    decisionCounts[snapshot.evaluation.decision] += 1;
    confidenceCounts[snapshot.evaluation.confidence] += 1;
    if (snapshot.evaluation.triggered) triggered += 1;
    leverageValues.push(snapshot.scores.leverageScore);
    costSum += snapshot.scores.costPressureIndicator;
    costMax = Math.max(costMax, snapshot.scores.costPressureIndicator);
  }

  const proportion = (count: number) => count / samples;

  return {
    samples,
    seed,
    release: ENGINE_RELEASE,
    decisionCounts,
    decisionProportions: {
      ACCEPT: proportion(decisionCounts.ACCEPT),
      COUNTER: proportion(decisionCounts.COUNTER),
      HOLD: proportion(decisionCounts.HOLD),
      REJECT: proportion(decisionCounts.REJECT),
    },
    confidenceProportions: {
      LOW: proportion(confidenceCounts.LOW),
      MODERATE: proportion(confidenceCounts.MODERATE),
      HIGH: proportion(confidenceCounts.HIGH),
    },
    triggerRate: proportion(triggered),
    leverage: summarize(leverageValues),
    costPressure: { mean: costSum / samples, max: costMax },
  };
}
