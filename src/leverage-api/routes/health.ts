import { Router } from 'express';
import { ENGINE_RELEASE } from '@engine';

const router = Router();

router.get('/health', (_req, res) => {
  res.json({
    success: true,
    data: { status: 'ok', release: ENGINE_RELEASE, timestamp: new Date().toISOString() },
  });
});

export default router;
