import { Router } from 'express';
import { z } from 'zod';
import { createFlagSet, summarizeBand } from '@engine';
import { estimateReserve, reserveConfigSchema } from '@desk/exposure/insurance';
import { estimateGdprExposure, gdprProfileSchema } from '@desk/exposure/gdpr';

export const insuranceRequestSchema = z.object({
  flags: z.array(z.string()).default([]),
  config: reserveConfigSchema.partial().default({}),
});

const router = Router();

// POST /exposure/insurance -- reserve position against the current band
router.post('/insurance', (req, res) => {
  const { flags, config } = insuranceRequestSchema.parse(req.body);
  const summary = summarizeBand(createFlagSet(flags));
  res.json({ success: true, data: { band: summary, reserve: estimateReserve(summary, config) } });
});

// POST /exposure/gdpr -- compensation and regulator fine ranges
router.post('/gdpr', (req, res) => {
  const profile = gdprProfileSchema.parse(req.body);
  res.json({ success: true, data: estimateGdprExposure(profile) });
});

export default router;
