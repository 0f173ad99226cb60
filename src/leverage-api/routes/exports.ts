import { Router } from 'express';
import { z } from 'zod';
import { createFlagSet, evidenceValuesSchema, runEngine, summarizeBand } from '@engine';
import { snapshotToCsv } from '@desk/export';
import { renderSnapshotPdf } from '@desk/pdf';
import { asyncRoute } from '../middleware/index';

export const exportRequestSchema = evidenceValuesSchema.extend({
  flags: z.array(z.string()).optional(),
});

const router = Router();

// POST /exports/csv
router.post('/csv', (req, res) => {
  const snapshot = runEngine(evidenceValuesSchema.parse(req.body));
  res
    .type('text/csv')
    .attachment(`leverage-${snapshot.release}.csv`)
    .send(snapshotToCsv([snapshot]));
});

// POST /exports/pdf -- includes the band section when flags are given
router.post(
  '/pdf',
  asyncRoute(async (req, res) => {
    const { flags, ...values } = exportRequestSchema.parse(req.body);
    const snapshot = runEngine(values);
    const band = flags ? summarizeBand(createFlagSet(flags), snapshot) : undefined;
    const pdf = await renderSnapshotPdf(snapshot, band);
    res.type('application/pdf').attachment(`leverage-${snapshot.release}.pdf`).send(pdf);
  }),
);

export default router;
