import type {
  CONFIDENCE_LEVELS,
  DECISIONS,
  ESCALATION_ZONES,
  EVIDENCE_FIELDS,
  FACT_STATUSES,
  JOURNAL_ENTRY_TYPES,
  SCENARIO_PRESET_NAMES,
  SETTLEMENT_BANDS,
  TAIL_FLAGS,
  VALIDATION_FLAGS,
  WHAT_IF_SCENARIOS,
  WS_EVENTS,
} from './constants';

export type EvidenceField = (typeof EVIDENCE_FIELDS)[number];
export type Decision = (typeof DECISIONS)[number];
export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];
export type EscalationZone = (typeof ESCALATION_ZONES)[number];
export type ValidationFlag = (typeof VALIDATION_FLAGS)[number];
export type TailFlag = (typeof TAIL_FLAGS)[number];
export type SettlementFlag = ValidationFlag | TailFlag;
export type SettlementBand = (typeof SETTLEMENT_BANDS)[number];
export type JournalEntryType = (typeof JOURNAL_ENTRY_TYPES)[number];
export type FactStatus = (typeof FACT_STATUSES)[number];
export type ScenarioPresetName = (typeof SCENARIO_PRESET_NAMES)[number];
export type WhatIfScenario = (typeof WHAT_IF_SCENARIOS)[number];

export type EvidenceValues = Record<EvidenceField, number>;

export interface SnapshotRecord {
  id: string;
  release: string;
  leverageScore: number;
  decision: Decision;
  snapshot: Record<string, unknown>;
  createdAt: string;
}

export interface JournalEntryRecord {
  id: string;
  timestampUtc: string;
  entryType: JournalEntryType;
  source: string;
  text: string;
  factStatus: FactStatus | null;
}

export interface RunRecord {
  id: string;
  seed: number;
  samples: number;
  release: string;
  summary: Record<string, unknown> | null;
  createdAt: string;
}

export interface WsMessage {
  event: (typeof WS_EVENTS)[keyof typeof WS_EVENTS];
  data: unknown;
  timestamp: string;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}
