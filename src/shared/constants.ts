export const API_PREFIX = '/api';

export const WS_EVENTS = {
  CONNECTION_ESTABLISHED: 'connection_established',
  HEARTBEAT: 'heartbeat',
  SNAPSHOT_CREATED: 'snapshot_created',
  JOURNAL_APPENDED: 'journal_appended',
  RUN_COMPLETED: 'run_completed',
} as const;

export const EVIDENCE_FIELDS = [
  'claimValidity',
  'proceduralAdvantage',
  'costAsymmetry',
] as const;

export const DECISIONS = ['ACCEPT', 'COUNTER', 'HOLD', 'REJECT'] as const;

export const CONFIDENCE_LEVELS = ['LOW', 'MODERATE', 'HIGH'] as const;

export const ESCALATION_ZONES = ['SAFE', 'CAUTION', 'CRITICAL'] as const;

export const VALIDATION_FLAGS = [
  'judicial_comment_on_record',
  'sra_investigation_open',
  'insurer_reserves_rights',
  'police_metadata_validated',
] as const;

export const TAIL_FLAGS = [
  'adverse_judicial_language',
  'sra_formal_action',
  'insurance_coverage_stress',
  'criminal_investigation_escalation',
  'administrative_override_admitted',
] as const;

export const SETTLEMENT_BANDS = ['BASE', 'VALIDATION', 'TAIL'] as const;

export const JOURNAL_ENTRY_TYPES = [
  'text',
  'email',
  'court_note',
  'phone_call',
  'other',
] as const;

export const FACT_STATUSES = [
  'REALISED',
  'EVIDENCED',
  'ALLEGED',
  'PROSPECTIVE',
] as const;

export const SCENARIO_PRESET_NAMES = [
  'baseline',
  'authority_collapse',
  'procedural_win',
  'cost_spike',
  'nuclear',
] as const;

export const WHAT_IF_SCENARIOS = [
  'baseline',
  'judge_hostile',
  'costs_spike',
  'invalidity_collapses',
  'evidence_breakthrough',
] as const;
