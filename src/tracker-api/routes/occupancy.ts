import { Router } from 'express';
import { asyncRoute, engineOf, sendResult } from '../middleware/index';

const router = Router();

// Active instances per location; re-triage instances count under INTAKE
router.get(
  '/occupancy',
  asyncRoute(async (req, res) => sendResult(res, await engineOf(req).occupancyByDepartment())),
);

export default router;
