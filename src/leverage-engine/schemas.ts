// src/leverage-engine/schemas.ts
// Wire schemas for values that cross a process boundary.

import { z } from 'zod';
import {
  CONFIDENCE_LEVELS,
  DECISIONS,
  ESCALATION_ZONES,
  TAIL_FLAGS,
  VALIDATION_FLAGS,
} from '@shared/constants';
import { COST_PRESSURE_SCALE } from './release';

const unitInterval = z.number().finite().min(0).max(1);

export const evidenceValuesSchema = z.object({
  claimValidity: unitInterval,
  proceduralAdvantage: unitInterval,
  costAsymmetry: unitInterval,
});

export const settlementFlagSchema = z.enum([...VALIDATION_FLAGS, ...TAIL_FLAGS]);

export const engineSnapshotSchema = z.object({
  release: z.string().min(1),
  inputs: evidenceValuesSchema,
  scores: z.object({
    leverageScore: unitInterval,
    costPressureIndicator: z.number().finite().min(0).max(COST_PRESSURE_SCALE),
  }),
  evaluation: z.object({
    decision: z.enum(DECISIONS),
    confidence: z.enum(CONFIDENCE_LEVELS),
    triggered: z.boolean(),
    escalationZone: z.enum(ESCALATION_ZONES),
  }),
  interpretation: z.object({
    leveragePosition: z.string(),
    decisionExplanation: z.string(),
    escalationStatus: z.string(),
    confidenceExplanation: z.string(),
  }),
});

export type EngineSnapshotPayload = z.infer<typeof engineSnapshotSchema>;
