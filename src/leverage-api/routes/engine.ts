import { Router } from 'express';
import { desc, eq } from 'drizzle-orm';
import { evidenceValuesSchema, runEngine } from '@engine';
import { WS_EVENTS } from '@shared/constants';
import { db } from '@db/connection';
import { snapshots } from '@db/schema/snapshots';
import { asyncRoute } from '../middleware/index';
import { broadcast } from '../websocket';

const router = Router();

// POST /engine/run -- score evidence and persist the snapshot
router.post(
  '/run',
  asyncRoute(async (req, res) => {
    const values = evidenceValuesSchema.parse(req.body);
    const snapshot = runEngine(values);

    const [row] = await db
      .insert(snapshots)
      .values({
        release: snapshot.release,
        leverageScore: snapshot.scores.leverageScore,
        decision: snapshot.evaluation.decision,
        snapshot,
      })
      .returning();

    broadcast(WS_EVENTS.SNAPSHOT_CREATED, { id: row.id, snapshot });
    res.status(201).json({ success: true, data: { id: row.id, snapshot } });
  }),
);

// GET /engine/snapshots -- most recent first
router.get(
  '/snapshots',
  asyncRoute(async (_req, res) => {
    const rows = await db.select().from(snapshots).orderBy(desc(snapshots.createdAt));
    res.json({ success: true, data: rows });
  }),
);

// GET /engine/snapshots/:id
router.get(
  '/snapshots/:id',
  asyncRoute(async (req, res) => {
    const [row] = await db.select().from(snapshots).where(eq(snapshots.id, req.params.id));
    if (!row) {
      return res.status(404).json({ success: false, error: 'Snapshot not found' });
    }
    res.json({ success: true, data: row });
  }),
);

export default router;
