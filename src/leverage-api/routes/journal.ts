import { Router } from 'express';
import { z } from 'zod';
import { WS_EVENTS } from '@shared/constants';
import { formatJournal, journalEntryInputSchema } from '@desk/journal';
import { asyncRoute } from '../middleware/index';
import { broadcast } from '../websocket';
import { journalStore } from '../journal-store';

const listQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
  format: z.enum(['json', 'text']).default('json'),
});

const router = Router();

// GET /journal -- oldest first; ?limit keeps the most recent N
router.get(
  '/',
  asyncRoute(async (req, res) => {
    const { limit, format } = listQuerySchema.parse(req.query);
    const entries = await journalStore.list(limit);
    if (format === 'text') {
      return res.type('text/plain').send(formatJournal(entries));
    }
    res.json({ success: true, data: entries });
  }),
);

// POST /journal -- append only; there is no update or delete route
router.post(
  '/',
  asyncRoute(async (req, res) => {
    const input = journalEntryInputSchema.parse({ source: 'dashboard', ...req.body });
    const entry = await journalStore.append(input);
    broadcast(WS_EVENTS.JOURNAL_APPENDED, entry);
    res.status(201).json({ success: true, data: entry });
  }),
);

export default router;
