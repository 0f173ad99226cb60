// src/leverage-desk/exposure/insurance.ts
// Insurer reserve position against the current settlement band.

import { z } from 'zod';
import type { BandSummary } from '@engine';
import type { TailFlag } from '@shared/types';

export const STRESS_LEVELS = ['none', 'low', 'moderate', 'high'] as const;
export type StressLevel = (typeof STRESS_LEVELS)[number];

/** Contribution of each tail flag to coverage stress. */
export const COVERAGE_STRESS_WEIGHTS: Readonly<Record<TailFlag, number>> = {
  adverse_judicial_language: 0.25,
  sra_formal_action: 0.3,
  insurance_coverage_stress: 0.2,
  criminal_investigation_escalation: 0.4,
  administrative_override_admitted: 0.15,
};

export const reserveConfigSchema = z.object({
  caseReserveGbp: z.number().finite().nonnegative().default(2_000_000),
  policyLimitGbp: z.number().finite().positive().default(10_000_000),
  deductibleGbp: z.number().finite().nonnegative().default(250_000),
  ibnrRate: z.number().finite().min(0).max(1).default(0.15),
});

export type ReserveConfig = z.input<typeof reserveConfigSchema>;

export interface ReserveEstimate {
  band: BandSummary['currentBand'];
  exposureGbp: number;
  reserve: {
    caseReserveGbp: number;
    ibnrReserveGbp: number;
    totalReserveGbp: number;
    policyLimitGbp: number;
    deductibleGbp: number;
    headroomGbp: number;
  };
  gap: {
    reserveGapGbp: number;
    gapPercentage: number;
    withinPolicyLimit: boolean;
    reserveAdequate: boolean;
  };
  coverageStress: {
    score: number;
    level: StressLevel;
    triggeredFlags: TailFlag[];
    reserveEscalationRequired: boolean;
  };
}

function stressLevel(score: number): StressLevel {
  if (score >= 0.5) return 'high';
  if (score >= 0.3) return 'moderate';
  if (score > 0) return 'low';
  return 'none';
}

function isTailFlag(flag: string): flag is TailFlag {
  return Object.hasOwn(COVERAGE_STRESS_WEIGHTS, flag);
}

/** Exposure is taken at the band ceiling. */
export function estimateReserve(summary: BandSummary, config: ReserveConfig = {}): ReserveEstimate {
  const { caseReserveGbp, policyLimitGbp, deductibleGbp, ibnrRate } = reserveConfigSchema.parse(config);
  const exposureGbp = summary.maximumGbp;

  const ibnrReserveGbp = Math.round(exposureGbp * ibnrRate);
  const totalReserveGbp = caseReserveGbp + ibnrReserveGbp;
  const reserveGapGbp = exposureGbp - totalReserveGbp;
  const gapPercentage =
    totalReserveGbp > 0 ? Math.round((reserveGapGbp / totalReserveGbp) * 1000) / 10 : 0;

  const triggeredFlags = summary.activeFlags.filter(isTailFlag);
  const rawStress = triggeredFlags.reduce((sum, flag) => sum + COVERAGE_STRESS_WEIGHTS[flag], 0);
  const score = Math.round(Math.min(rawStress, 1) * 100) / 100;

  return {
    band: summary.currentBand,
    exposureGbp,
    reserve: {
      caseReserveGbp,
      ibnrReserveGbp,
      totalReserveGbp,
      policyLimitGbp,
      deductibleGbp,
      headroomGbp: policyLimitGbp - totalReserveGbp,
    },
    gap: {
      reserveGapGbp,
      gapPercentage,
      withinPolicyLimit: exposureGbp <= policyLimitGbp,
      reserveAdequate: reserveGapGbp <= 0,
    },
    coverageStress: {
      score,
      level: stressLevel(score),
      triggeredFlags,
      reserveEscalationRequired: score > 0.3,
    },
  };
}
