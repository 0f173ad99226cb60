// src/leverage-engine/index.ts
// Public surface of the engine. Scoring, evaluation and interpretation stay
// internal: collaborators receive their results only through runEngine.

export { runEngine } from './gateway';
export { createEvidenceInputs } from './inputs';
export {
  BAND_DEFINITIONS,
  activeFlags,
  createFlagSet,
  flagSetOf,
  formatGbpRange,
  resolveBand,
  summarizeBand,
  whatMovesUp,
} from './settlement-bands';
export type {
  BandDefinition,
  BandEscalation,
  BandResolution,
  BandSummary,
  FlagSet,
} from './settlement-bands';
export { ContractError, DomainError, EngineError, UnknownFlagError } from './errors';
export {
  BAND_RANGES,
  BAND_TRIGGERS,
  COST_PRESSURE_SCALE,
  DECISION_CUT_POINTS,
  ENGINE_RELEASE,
  ESCALATION,
  WEIGHTS,
} from './release';
export type { BandRange } from './release';
export type {
  EngineSnapshot,
  EvaluationResult,
  EvidenceInputs,
  InterpretationText,
  ScoreResult,
} from './types';
export {
  engineSnapshotSchema,
  evidenceValuesSchema,
  settlementFlagSchema,
} from './schemas';
export type { EngineSnapshotPayload } from './schemas';
