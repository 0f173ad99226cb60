// src/leverage-engine/interpretation.ts
// Converts classified results into fixed language. Keeps language out of the
// maths: every phrase is keyed on a classification Evaluation already made.

import type { ConfidenceLevel, Decision, EscalationZone } from '@shared/types';
import type { EvaluationResult, InterpretationText } from './types';

/** Every phrase must carry at least one of these. */
export const APPROVED_QUALIFIERS = ['alleged', 'supported by evidence', 'inferred'] as const;

/** No phrase may contain any of these. */
export const ABSOLUTE_TERMS = [
  'proven',
  'certain',
  'guaranteed',
  'definitely',
  'will succeed',
  'will fail',
] as const;

export const LEVERAGE_POSITION: Readonly<Record<Decision, string>> = {
  REJECT:
    'Low procedural leverage inferred from the scored evidence; the alleged position is weakly positioned.',
  COUNTER:
    'Limited procedural leverage inferred from the scored evidence; a defensive posture is supported by evidence.',
  HOLD:
    'Moderate procedural leverage inferred from the scored evidence; routine dispute parameters apply.',
  ACCEPT:
    'High procedural leverage inferred from the scored evidence; upper-bound positioning is supported by evidence.',
};

export const DECISION_EXPLANATION: Readonly<
  Record<Decision, { steady: string; triggered: string }>
> = {
  ACCEPT: {
    steady: 'Acceptance is inferred to be consistent with the current leverage posture.',
    triggered:
      'Acceptance is inferred to be consistent with the current leverage posture; cost pressure supported by evidence calls for prompt attention.',
  },
  COUNTER: {
    steady: 'A counter-offer is inferred to be appropriate given the current leverage posture.',
    triggered:
      'A counter-offer is inferred to be appropriate given the current leverage posture; cost pressure supported by evidence calls for prompt attention.',
  },
  HOLD: {
    steady: 'Maintaining position is inferred to be appropriate given the current leverage posture.',
    triggered:
      'Maintaining position is inferred to be appropriate given the current leverage posture; cost pressure supported by evidence calls for prompt attention.',
  },
  REJECT: {
    steady: 'Rejection is inferred to be consistent with the current leverage posture.',
    triggered:
      'Rejection is inferred to be consistent with the current leverage posture; cost pressure supported by evidence calls for prompt attention.',
  },
};

export const ESCALATION_STATUS: Readonly<Record<EscalationZone, string>> = {
  SAFE: 'Safe zone: no immediate procedural concern is inferred from current cost pressure.',
  CAUTION: 'Caution zone: cost pressure is inferred to be rising; monitor for changes.',
  CRITICAL:
    'Critical zone: escalation threshold crossed; elevated attention is supported by evidence.',
};

export const CONFIDENCE_EXPLANATION: Readonly<Record<ConfidenceLevel, string>> = {
  LOW:
    'Low confidence: the score sits close to a decision boundary, so a small change in alleged evidence strength may alter the inferred recommendation.',
  MODERATE:
    'Moderate confidence: the score sits a moderate distance from the nearest decision boundary, as inferred from current inputs.',
  HIGH:
    'High confidence: the score sits well inside its decision band; the inferred recommendation is stable against small changes in alleged evidence strength.',
};

export function interpret(evaluation: EvaluationResult): InterpretationText {
  const { decision, confidence, triggered, escalationZone } = evaluation;
  const explanation = DECISION_EXPLANATION[decision];

  return Object.freeze({
    leveragePosition: LEVERAGE_POSITION[decision],
    decisionExplanation: triggered ? explanation.triggered : explanation.steady,
    escalationStatus: ESCALATION_STATUS[escalationZone],
    confidenceExplanation: CONFIDENCE_EXPLANATION[confidence],
  });
}
