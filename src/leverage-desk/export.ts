// src/leverage-desk/export.ts
// CSV and JSON renderings of engine snapshots and sampling summaries.

import type { EngineSnapshot } from '@engine';
import type { MonteCarloSummary } from './monte-carlo';

type Cell = string | number | boolean;

/** RFC 4180: quote a field holding a comma, quote or line break. */
export function csvField(value: Cell): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(rows: readonly (readonly Cell[])[]): string {
  return rows.map((row) => row.map(csvField).join(',')).join('\r\n') + '\r\n';
}

export const SNAPSHOT_CSV_HEADER = [
  'release',
  'claimValidity',
  'proceduralAdvantage',
  'costAsymmetry',
  'leverageScore',
  'costPressureIndicator',
  'decision',
  'confidence',
  'triggered',
  'escalationZone',
  'leveragePosition',
  'decisionExplanation',
  'escalationStatus',
  'confidenceExplanation',
] as const;

export function snapshotRow(snapshot: EngineSnapshot): Cell[] {
  const { inputs, scores, evaluation, interpretation } = snapshot;
  return [
    snapshot.release,
    inputs.claimValidity,
    inputs.proceduralAdvantage,
    inputs.costAsymmetry,
    scores.leverageScore,
    scores.costPressureIndicator,
    evaluation.decision,
    evaluation.confidence,
    evaluation.triggered,
    evaluation.escalationZone,
    interpretation.leveragePosition,
    interpretation.decisionExplanation,
    interpretation.escalationStatus,
    interpretation.confidenceExplanation,
  ];
}

export function snapshotToCsv(snapshots: readonly EngineSnapshot[]): string {
  return toCsv([[...SNAPSHOT_CSV_HEADER], ...snapshots.map(snapshotRow)]);
}

export function samplingToCsv(summary: MonteCarloSummary): string {
  const rows: Cell[][] = [
    ['metric', 'value'],
    ['release', summary.release],
    ['samples', summary.samples],
    ['seed', summary.seed],
    ['triggerRate', summary.triggerRate],
  ];
  for (const [decision, share] of Object.entries(summary.decisionProportions)) {
    rows.push([`decision.${decision}`, share]);
  }
  for (const [level, share] of Object.entries(summary.confidenceProportions)) {
    rows.push([`confidence.${level}`, share]);
  }
  for (const [stat, value] of Object.entries(summary.leverage)) {
    rows.push([`leverage.${stat}`, value]);
  }
  return toCsv(rows);
}

export function snapshotToJson(snapshot: EngineSnapshot): string {
  return JSON.stringify(snapshot, null, 2);
}
