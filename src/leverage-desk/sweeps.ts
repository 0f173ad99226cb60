// src/leverage-desk/sweeps.ts
// Sensitivity sweeps: hold two evidence scalars fixed and walk the third (or
// two of them, for a grid) across [0, 1], one Gateway call per point. Also
// the fixed what-if shifts compared against a base profile.

import { createEvidenceInputs, runEngine } from '@engine';
import { WHAT_IF_SCENARIOS } from '@shared/constants';
import type {
  ConfidenceLevel,
  Decision,
  EscalationZone,
  EvidenceField,
  EvidenceValues,
  WhatIfScenario,
} from '@shared/types';

export const DEFAULT_SWEEP_STEPS = 20;
export const MAX_SWEEP_STEPS = 201;

export interface SweepPoint {
  value: number;
  leverageScore: number;
  costPressureIndicator: number;
  decision: Decision;
  confidence: ConfidenceLevel;
}

export interface GridCell {
  x: number;
  y: number;
  leverageScore: number;
  decision: Decision;
}

export interface DecisionBoundary {
  from: Decision;
  to: Decision;
  /** Last swept value still in `from` and first value in `to`. */
  between: [number, number];
}

function evenlySpaced(steps: number): number[] {
  if (!Number.isInteger(steps) || steps < 2 || steps > MAX_SWEEP_STEPS) {
    throw new RangeError(`steps must be an integer between 2 and ${MAX_SWEEP_STEPS}, got ${steps}`);
  }
  return Array.from({ length: steps }, (_, i) => i / (steps - 1));
}

export function sweepInput(
  base: EvidenceValues,
  field: EvidenceField,
  steps: number = DEFAULT_SWEEP_STEPS,
): SweepPoint[] {
  return evenlySpaced(steps).map((value) => {
    const { scores, evaluation } = runEngine({ ...base, [field]: value });
    return {
      value,
      leverageScore: scores.leverageScore,
      costPressureIndicator: scores.costPressureIndicator,
      decision: evaluation.decision,
      confidence: evaluation.confidence,
    };
  });
}

export function sweepGrid(
  base: EvidenceValues,
  xField: EvidenceField,
  yField: EvidenceField,
  steps: number = DEFAULT_SWEEP_STEPS,
): GridCell[] {
  if (xField === yField) {
    throw new RangeError(`grid axes must differ, got ${xField} twice`);
  }
  const values = evenlySpaced(steps);
  return values.flatMap((y) =>
    values.map((x) => {
      const { scores, evaluation } = runEngine({ ...base, [xField]: x, [yField]: y });
      return { x, y, leverageScore: scores.leverageScore, decision: evaluation.decision };
    }),
  );
}

export function decisionBoundaries(points: readonly SweepPoint[]): DecisionBoundary[] {
  const boundaries: DecisionBoundary[] = [];
  for (let i = 1; i < points.length; i++) {
    const prev = points[i - 1];
    const curr = points[i];
    if (prev.decision !== curr.decision) {
      boundaries.push({ from: prev.decision, to: curr.decision, between: [prev.value, curr.value] });
    }
  }
  return boundaries;
}

// ---------------------------------------------------------------------------
// What-if scenarios
// ---------------------------------------------------------------------------

export const WHAT_IF_SHIFTS: Readonly<Record<WhatIfScenario, Partial<EvidenceValues>>> = {
  baseline: {},
  judge_hostile: { proceduralAdvantage: -0.3 },
  costs_spike: { costAsymmetry: -0.4 },
  invalidity_collapses: { claimValidity: -0.5 },
  evidence_breakthrough: { claimValidity: 0.25, proceduralAdvantage: 0.15 },
};

export interface ScenarioComparison {
  scenario: WhatIfScenario;
  values: EvidenceValues;
  leverageScore: number;
  /** Change from the baseline score, in the score's own precision. */
  leverageDelta: number;
  decision: Decision;
  confidence: ConfidenceLevel;
  escalationZone: EscalationZone;
}

const shifted = (value: number, delta = 0): number => Math.min(1, Math.max(0, value + delta));

/** Apply a named shift to a valid base profile, clamping each scalar to [0, 1]. */
export function whatIf(base: EvidenceValues, scenario: WhatIfScenario): EvidenceValues {
  const inputs = createEvidenceInputs(base);
  const shift = WHAT_IF_SHIFTS[scenario];
  return {
    claimValidity: shifted(inputs.claimValidity, shift.claimValidity),
    proceduralAdvantage: shifted(inputs.proceduralAdvantage, shift.proceduralAdvantage),
    costAsymmetry: shifted(inputs.costAsymmetry, shift.costAsymmetry),
  };
}

export function compareScenarios(base: EvidenceValues): ScenarioComparison[] {
  const baselineScore = runEngine(base).scores.leverageScore;
  return WHAT_IF_SCENARIOS.map((scenario) => {
    const values = whatIf(base, scenario);
    const { scores, evaluation } = runEngine(values);
    return {
      scenario,
      values,
      leverageScore: scores.leverageScore,
      leverageDelta: Math.round((scores.leverageScore - baselineScore) * 1000) / 1000,
      decision: evaluation.decision,
      confidence: evaluation.confidence,
      escalationZone: evaluation.escalationZone,
    };
  });
}

export function formatScenarioComparison(rows: readonly ScenarioComparison[]): string {
  const signed = (delta: number) => `${delta >= 0 ? '+' : ''}${delta.toFixed(3)}`;
  return [
    `${'Scenario'.padEnd(24)}Score  Delta   Decision  Confidence`,
    ...rows.map(
      (row) =>
        `${row.scenario.padEnd(24)}${row.leverageScore.toFixed(3)}  ${signed(row.leverageDelta)}  ${row.decision.padEnd(8)}  ${row.confidence}`,
    ),
  ].join('\n');
}
