// src/leverage-engine/scoring.ts
// The only place the leverage score and cost-pressure indicator are computed.
// Pure: (inputs) -> scores. No I/O, no randomness.

import { COST_PRESSURE_SCALE, PRECISION, WEIGHTS } from './release';
import type { EvidenceInputs, ScoreResult } from './types';

// Arithmetic noise below this many significant digits is discarded before
// rounding, so 0.64049999999999996 and 0.6405000000000001 both read as 0.6405.
const SIGNIFICANT_DIGITS = 12;

/**
 * Round half-up on the decimal representation of `value` (0.6405 -> 0.641).
 * Expects a non-negative value.
 */
export function roundHalfUp(value: number, places: number): number {
  const decimal = Number(value.toPrecision(SIGNIFICANT_DIGITS));
  const [mantissa, exponent = '0'] = decimal.toExponential().split('e');
  const shifted = Number(`${mantissa}e${Number(exponent) + places}`);
  return Number(`${Math.round(shifted)}e-${places}`);
}

export function score(inputs: EvidenceInputs): ScoreResult {
  const weighted =
    WEIGHTS.claimValidity * inputs.claimValidity +
    WEIGHTS.proceduralAdvantage * inputs.proceduralAdvantage +
    WEIGHTS.costAsymmetry * inputs.costAsymmetry;

  const leverageScore = roundHalfUp(weighted, PRECISION.LEVERAGE);
  const costPressureIndicator = roundHalfUp(
    leverageScore * COST_PRESSURE_SCALE,
    PRECISION.COST_PRESSURE,
  );

  return Object.freeze({ leverageScore, costPressureIndicator });
}
