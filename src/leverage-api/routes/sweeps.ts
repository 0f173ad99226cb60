import { Router } from 'express';
import { z } from 'zod';
import { evidenceValuesSchema } from '@engine';
import { EVIDENCE_FIELDS, SCENARIO_PRESET_NAMES } from '@shared/constants';
import { SCENARIO_PRESETS } from '@desk/presets';
import {
  DEFAULT_SWEEP_STEPS,
  MAX_SWEEP_STEPS,
  compareScenarios,
  decisionBoundaries,
  sweepGrid,
  sweepInput,
} from '@desk/sweeps';

export const sweepRequestSchema = z.object({
  base: evidenceValuesSchema,
  field: z.enum(EVIDENCE_FIELDS),
  steps: z.number().int().min(2).max(MAX_SWEEP_STEPS).default(DEFAULT_SWEEP_STEPS),
  /** Second axis: when present the response is a grid. */
  yField: z.enum(EVIDENCE_FIELDS).optional(),
});

export const whatIfRequestSchema = z
  .object({
    base: evidenceValuesSchema.optional(),
    preset: z.enum(SCENARIO_PRESET_NAMES).optional(),
  })
  .refine((body) => (body.base === undefined) !== (body.preset === undefined), {
    message: 'Provide exactly one of base or preset',
  });

const router = Router();

// POST /sweeps -- one-dimensional sweep, or a grid when yField is given
router.post('/', (req, res) => {
  const { base, field, steps, yField } = sweepRequestSchema.parse(req.body);

  if (yField) {
    return res.json({ success: true, data: { cells: sweepGrid(base, field, yField, steps) } });
  }

  const points = sweepInput(base, field, steps);
  res.json({ success: true, data: { points, boundaries: decisionBoundaries(points) } });
});

// GET /sweeps/presets -- named evidence profiles
router.get('/presets', (_req, res) => {
  res.json({
    success: true,
    data: SCENARIO_PRESET_NAMES.map((id) => ({ id, ...SCENARIO_PRESETS[id] })),
  });
});

// POST /sweeps/what-if -- fixed what-if shifts against a base profile or preset
router.post('/what-if', (req, res) => {
  const { base, preset } = whatIfRequestSchema.parse(req.body);
  const values = base ?? SCENARIO_PRESETS[preset ?? 'baseline'].values;
  res.json({ success: true, data: { base: values, scenarios: compareScenarios(values) } });
});

export default router;
