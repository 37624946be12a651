import { Router } from 'express';
import healthRouter from './health';
import processesRouter from './processes';
import transitionRouter from './transition';
import occupancyRouter from './occupancy';
import { departmentsRouter } from './departments';

const router = Router();
router.use(healthRouter);
router.use('/departments', departmentsRouter);
router.use(processesRouter);
router.use(transitionRouter);
router.use(occupancyRouter);

export default router;
