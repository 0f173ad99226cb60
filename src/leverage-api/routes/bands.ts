import { Router } from 'express';
import { z } from 'zod';
import {
  BAND_DEFINITIONS,
  BAND_RANGES,
  createFlagSet,
  evidenceValuesSchema,
  formatGbpRange,
  runEngine,
  summarizeBand,
} from '@engine';
import { SETTLEMENT_BANDS, TAIL_FLAGS, VALIDATION_FLAGS } from '@shared/constants';
import { draftSettlementLetter, explainWhatMovesUp } from '@desk/settlement-letter';

export const resolveBandRequestSchema = z.object({
  // Plain strings: unknown identifiers surface as UnknownFlagError with every offender listed.
  flags: z.array(z.string()).default([]),
  inputs: evidenceValuesSchema.optional(),
  explain: z.boolean().default(false),
  letter: z
    .object({
      caseReference: z.string().min(1),
      claimantName: z.string().min(1),
      respondentName: z.string().min(1),
      principalClaimGbp: z.number().finite().nonnegative(),
      openForDays: z.number().int().positive().optional(),
    })
    .optional(),
});

const router = Router();

// POST /bands/resolve -- flags -> band summary (+ explanation / letter)
router.post('/resolve', (req, res) => {
  const body = resolveBandRequestSchema.parse(req.body);
  const flags = createFlagSet(body.flags);
  const snapshot = body.inputs ? runEngine(body.inputs) : undefined;
  const summary = summarizeBand(flags, snapshot);

  res.json({
    success: true,
    data: {
      summary,
      explanation: body.explain ? explainWhatMovesUp(summary) : undefined,
      letter: body.letter ? draftSettlementLetter(summary, body.letter) : undefined,
    },
  });
});

// GET /bands/vocabulary -- closed flag vocabularies and band ranges
router.get('/vocabulary', (_req, res) => {
  res.json({
    success: true,
    data: {
      validationFlags: VALIDATION_FLAGS,
      tailFlags: TAIL_FLAGS,
      bands: SETTLEMENT_BANDS.map((band) => ({
        band,
        ...BAND_DEFINITIONS[band],
        ...BAND_RANGES[band],
        range: formatGbpRange(BAND_RANGES[band]),
      })),
    },
  });
});

export default router;
