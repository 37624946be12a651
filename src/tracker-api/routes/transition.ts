import { Router } from 'express';
import { transitionCommandSchema } from '@core/commands';
import { asyncRoute, engineOf, parseBody, sendResult } from '../middleware/index';

const router = Router();

router.post(
  '/processes/:id/transition',
  asyncRoute(async (req, res) => {
    // --- Validate command shape ---
    const command = parseBody(transitionCommandSchema, req, res);
    if (!command) return;

    // --- Apply; guards and duplicates are re-checked inside the transaction ---
    sendResult(res, await engineOf(req).transition(req.params.id, command));
  }),
);

export default router;
