import { Router } from 'express';
import { desc, eq } from 'drizzle-orm';
import { z } from 'zod';
import { WS_EVENTS } from '@shared/constants';
import { db } from '@db/connection';
import { runs } from '@db/schema/runs';
import { MAX_SAMPLES, distributionSchema, runMonteCarlo } from '@desk/monte-carlo';
import { asyncRoute } from '../middleware/index';
import { broadcast } from '../websocket';

export const createRunRequestSchema = z.object({
  samples: z.number().int().min(1).max(MAX_SAMPLES).default(1_000),
  seed: z.number().int().optional(),
  distributions: z.object({
    claimValidity: distributionSchema,
    proceduralAdvantage: distributionSchema,
    costAsymmetry: distributionSchema,
  }),
});

const router = Router();

// POST /runs -- seeded Monte-Carlo run, stored with its summary
router.post(
  '/',
  asyncRoute(async (req, res) => {
    const body = createRunRequestSchema.parse(req.body);
    const seed = (body.seed ?? Date.now()) % 2147483647;
    const summary = runMonteCarlo({ samples: body.samples, seed, distributions: body.distributions });

    const [run] = await db
      .insert(runs)
      .values({
        release: summary.release,
        seed,
        samples: body.samples,
        distributions: body.distributions,
        summary,
      })
      .returning();

    broadcast(WS_EVENTS.RUN_COMPLETED, { id: run.id, summary });
    res.status(201).json({ success: true, data: { run, summary } });
  }),
);

// GET /runs -- list all runs
router.get(
  '/',
  asyncRoute(async (_req, res) => {
    const rows = await db.select().from(runs).orderBy(desc(runs.createdAt));
    res.json({ success: true, data: rows });
  }),
);

// GET /runs/:id -- get a single run
router.get(
  '/:id',
  asyncRoute(async (req, res) => {
    const [row] = await db.select().from(runs).where(eq(runs.id, req.params.id));
    if (!row) {
      return res.status(404).json({ success: false, error: 'Run not found' });
    }
    res.json({ success: true, data: row });
  }),
);

export default router;
