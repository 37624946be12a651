import { Router } from 'express';
import { createInstanceSchema } from '@core/commands';
import { asyncRoute, engineOf, parseBody, sendResult } from '../middleware/index';

const router = Router();

// Group analysis and prefill for a raw case number
router.get(
  '/processes/inspect/:caseNumber',
  asyncRoute(async (req, res) => sendResult(res, await engineOf(req).inspect(req.params.caseNumber))),
);

// Create an instance (writes the creation event)
router.post(
  '/processes',
  asyncRoute(async (req, res) => {
    const input = parseBody(createInstanceSchema, req, res);
    if (!input) return;
    sendResult(res, await engineOf(req).createInstance(input), 201);
  }),
);

// Instance with the values it carried in each department it left
router.get(
  '/processes/:id',
  asyncRoute(async (req, res) => sendResult(res, await engineOf(req).view(req.params.id))),
);

// Group timeline
router.get(
  '/processes/:id/timeline',
  asyncRoute(async (req, res) => sendResult(res, await engineOf(req).timeline(req.params.id))),
);

export default router;
