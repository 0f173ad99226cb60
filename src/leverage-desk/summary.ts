// src/leverage-desk/summary.ts
// Fixed-width plain-text rendering of an engine snapshot.

import type { EngineSnapshot } from '@engine';

const RULE = '='.repeat(60);

export function formatGbp(amount: number): string {
  return `£${Math.round(amount).toLocaleString('en-GB')}`;
}

export function formatCaseSummary(snapshot: EngineSnapshot): string {
  const { inputs, scores, evaluation, interpretation } = snapshot;

  return [
    RULE,
    `PROCEDURAL LEVERAGE ENGINE - CASE ANALYSIS (release ${snapshot.release})`,
    RULE,
    '',
    'INPUTS:',
    `  Claim Validity:       ${inputs.claimValidity.toFixed(2)}`,
    `  Procedural Advantage: ${inputs.proceduralAdvantage.toFixed(2)}`,
    `  Cost Asymmetry:       ${inputs.costAsymmetry.toFixed(2)}`,
    '',
    'SCORES:',
    `  Leverage Score:       ${scores.leverageScore.toFixed(3)}`,
    `  Cost Pressure:        ${scores.costPressureIndicator.toFixed(2)}`,
    '',
    'DECISION:',
    `  Action:               ${evaluation.decision}`,
    `  Confidence:           ${evaluation.confidence}`,
    `  Escalation Zone:      ${evaluation.escalationZone}`,
    `  Escalation Triggered: ${evaluation.triggered ? 'Yes' : 'No'}`,
    '',
    'INTERPRETATION:',
    `  ${interpretation.leveragePosition}`,
    `  ${interpretation.decisionExplanation}`,
    `  ${interpretation.escalationStatus}`,
    `  ${interpretation.confidenceExplanation}`,
    '',
    RULE,
  ].join('\n');
}
