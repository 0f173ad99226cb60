// src/leverage-engine/evaluation.ts
// Translates scores into a decision, a confidence level and an escalation
// signal. Never recomputes the leverage score.

import type { ConfidenceLevel, Decision, EscalationZone } from '@shared/types';
import { ContractError } from './errors';
import {
  CONFIDENCE_DISTANCE,
  COST_PRESSURE_SCALE,
  DECISION_CUT_POINTS,
  DECISION_LADDER,
  ESCALATION,
} from './release';
import type { EvaluationResult, ScoreResult } from './types';

// Confidence distances are compared in thousandths so that a score sitting
// exactly 0.05 from a cut-point is not misread through binary drift.
const MILLI = 1000;
const toMilli = (value: number): number => Math.round(value * MILLI);

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

function assertScoreContract(score: ScoreResult): void {
  const { leverageScore, costPressureIndicator } = score;
  if (!Number.isFinite(leverageScore) || leverageScore < 0 || leverageScore > 1) {
    throw new ContractError(
      `leverageScore must be in [0.0, 1.0], got ${leverageScore}`,
    );
  }
  if (
    !Number.isFinite(costPressureIndicator) ||
    costPressureIndicator < 0 ||
    costPressureIndicator > COST_PRESSURE_SCALE
  ) {
    throw new ContractError(
      `costPressureIndicator must be in [0.0, ${COST_PRESSURE_SCALE}.0], got ${costPressureIndicator}`,
    );
  }
}

// ---------------------------------------------------------------------------
// Classifiers
// ---------------------------------------------------------------------------

export function classifyDecision(leverageScore: number): Decision {
  const band = DECISION_CUT_POINTS.filter((cut) => leverageScore >= cut).length;
  return DECISION_LADDER[band];
}

/** Distance, in thousandths, to the nearest decision cut-point. */
export function boundaryDistance(leverageScore: number): number {
  const milli = toMilli(leverageScore);
  return Math.min(...DECISION_CUT_POINTS.map((cut) => Math.abs(milli - toMilli(cut))));
}

export function classifyConfidence(leverageScore: number): ConfidenceLevel {
  const distance = boundaryDistance(leverageScore);
  if (distance < toMilli(CONFIDENCE_DISTANCE.LOW_BELOW)) return 'LOW';
  if (distance < toMilli(CONFIDENCE_DISTANCE.MODERATE_BELOW)) return 'MODERATE';
  return 'HIGH';
}

export function classifyEscalation(costPressureIndicator: number): EscalationZone {
  if (costPressureIndicator >= ESCALATION.TRIGGER_AT) return 'CRITICAL';
  if (costPressureIndicator >= ESCALATION.CAUTION_AT) return 'CAUTION';
  return 'SAFE';
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

export function evaluate(score: ScoreResult): EvaluationResult {
  assertScoreContract(score);

  const escalationZone = classifyEscalation(score.costPressureIndicator);

  return Object.freeze({
    decision: classifyDecision(score.leverageScore),
    confidence: classifyConfidence(score.leverageScore),
    triggered: escalationZone === 'CRITICAL',
    escalationZone,
  });
}
