// src/leverage-desk/exposure/gdpr.ts
// Data-protection exposure: Article 82 compensation plus a regulator fine
// range. Independent of the engine score.

import { z } from 'zod';

export const DISTRESS_LEVELS = ['low', 'moderate', 'high', 'severe'] as const;
export type DistressLevel = (typeof DISTRESS_LEVELS)[number];

export const FINE_BANDS = ['minor', 'moderate', 'serious'] as const;
export type FineBand = (typeof FINE_BANDS)[number];

/** Per-subject compensation, £. */
export const DISTRESS_RANGES: Readonly<Record<DistressLevel, readonly [number, number]>> = {
  low: [100, 500],
  moderate: [500, 2_000],
  high: [2_000, 5_000],
  severe: [5_000, 10_000],
};

/** Share of annual turnover. The top of the serious band is the 4% cap. */
export const FINE_RATES: Readonly<Record<FineBand, readonly [number, number]>> = {
  minor: [0, 0.005],
  moderate: [0.005, 0.02],
  serious: [0.02, 0.04],
};

export const FINE_CAP_RATE = 0.04;

export const gdprProfileSchema = z.object({
  dataSubjects: z.number().int().nonnegative(),
  annualTurnoverGbp: z.number().finite().nonnegative(),
  distressLevel: z.enum(DISTRESS_LEVELS),
  violations: z.number().int().nonnegative(),
});

export type GdprProfile = z.infer<typeof gdprProfileSchema>;

export interface GdprExposure {
  article82: { perSubject: readonly [number, number]; lowGbp: number; highGbp: number };
  regulatorFine: { band: FineBand; lowGbp: number; highGbp: number };
  totalLowGbp: number;
  totalHighGbp: number;
}

export function fineBandFor(violations: number): FineBand {
  if (violations >= 4) return 'serious';
  if (violations >= 2) return 'moderate';
  return 'minor';
}

export function estimateGdprExposure(profile: GdprProfile): GdprExposure {
  const { dataSubjects, annualTurnoverGbp, distressLevel, violations } = gdprProfileSchema.parse(profile);

  const perSubject = DISTRESS_RANGES[distressLevel];
  const article82 = {
    perSubject,
    lowGbp: dataSubjects * perSubject[0],
    highGbp: dataSubjects * perSubject[1],
  };

  const band = fineBandFor(violations);
  const [lowRate, highRate] = FINE_RATES[band];
  const cap = Math.round(annualTurnoverGbp * FINE_CAP_RATE);
  const regulatorFine = {
    band,
    lowGbp: Math.min(Math.round(annualTurnoverGbp * lowRate), cap),
    highGbp: Math.min(Math.round(annualTurnoverGbp * highRate), cap),
  };

  return {
    article82,
    regulatorFine,
    totalLowGbp: article82.lowGbp + regulatorFine.lowGbp,
    totalHighGbp: article82.highGbp + regulatorFine.highGbp,
  };
}
