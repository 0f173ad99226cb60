// Engine value types. Every value here is frozen once built.

import type {
  ConfidenceLevel,
  Decision,
  EscalationZone,
  EvidenceValues,
} from '@shared/types';

export type EvidenceInputs = Readonly<EvidenceValues>;

export interface ScoreResult {
  readonly leverageScore: number;
  readonly costPressureIndicator: number;
}

export interface EvaluationResult {
  readonly decision: Decision;
  readonly confidence: ConfidenceLevel;
  readonly triggered: boolean;
  readonly escalationZone: EscalationZone;
}

export interface InterpretationText {
  readonly leveragePosition: string;
  readonly decisionExplanation: string;
  readonly escalationStatus: string;
  readonly confidenceExplanation: string;
}

export interface EngineSnapshot {
  readonly release: string;
  readonly inputs: EvidenceInputs;
  readonly scores: ScoreResult;
  readonly evaluation: EvaluationResult;
  readonly interpretation: InterpretationText;
}
