// src/leverage-engine/release.ts
// Release-pinned constants. Any change here changes the economics of the
// engine and must ship with a bumped ENGINE_RELEASE and updated golden tests.

import type { Decision, SettlementBand } from '@shared/types';

export const ENGINE_RELEASE = '1.3.0';

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

export const WEIGHTS = {
  claimValidity: 0.40,
  proceduralAdvantage: 0.35,
  costAsymmetry: 0.25,
} as const;

export const COST_PRESSURE_SCALE = 10;

/** Decimal places kept on each derived score. */
export const PRECISION = {
  LEVERAGE: 3,
  COST_PRESSURE: 2,
} as const;

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/**
 * Lower edges of each decision band above the first, ascending.
 * A score at a cut-point belongs to the band above it.
 */
export const DECISION_CUT_POINTS = [0.30, 0.50, 0.85] as const;

/** Decision for each band, lowest band first. One more entry than cut-points. */
export const DECISION_LADDER: readonly Decision[] = ['REJECT', 'COUNTER', 'HOLD', 'ACCEPT'];

/** Distance from the nearest cut-point below which confidence drops a level. */
export const CONFIDENCE_DISTANCE = {
  LOW_BELOW: 0.05,
  MODERATE_BELOW: 0.15,
} as const;

export const ESCALATION = {
  CAUTION_AT: 5.0,
  TRIGGER_AT: 7.5,
} as const;

// ---------------------------------------------------------------------------
// Settlement bands
// ---------------------------------------------------------------------------

export interface BandRange {
  minimumGbp: number;
  maximumGbp: number;
}

export const BAND_RANGES: Readonly<Record<SettlementBand, BandRange>> = {
  BASE: { minimumGbp: 2_500_000, maximumGbp: 4_000_000 },
  VALIDATION: { minimumGbp: 5_000_000, maximumGbp: 9_000_000 },
  TAIL: { minimumGbp: 12_000_000, maximumGbp: 15_000_000 },
};

export const BAND_TRIGGERS = {
  VALIDATION_MIN_FLAGS: 1,
  TAIL_MIN_FLAGS: 2,
} as const;
