import { Router } from 'express';
import healthRouter from './health';
import engineRouter from './engine';
import bandsRouter from './bands';
import runsRouter from './runs';
import sweepsRouter from './sweeps';
import exposureRouter from './exposure';
import journalRouter from './journal';
import exportsRouter from './exports';

const router = Router();
router.use(healthRouter);
router.use('/engine', engineRouter);
router.use('/bands', bandsRouter);
router.use('/runs', runsRouter);
router.use('/sweeps', sweepsRouter);
router.use('/exposure', exposureRouter);
router.use('/journal', journalRouter);
router.use('/exports', exportsRouter);

export default router;
