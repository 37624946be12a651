import { Router } from 'express';
import { defineFieldSchema } from '@core/commands';
import type { ApiResponse } from '@shared/types';
import type { DepartmentVocabulary } from '@core/engine';
import { asyncRoute, engineOf, parseBody, sendResult } from '../middleware/index';

const router = Router();

router.get('/', (req, res) => {
  const response: ApiResponse<DepartmentVocabulary> = {
    success: true,
    data: engineOf(req).vocabulary(),
  };
  res.json(response);
});

router.get(
  '/:code/fields',
  asyncRoute(async (req, res) => sendResult(res, await engineOf(req).listFields(req.params.code))),
);

router.post(
  '/:code/fields',
  asyncRoute(async (req, res) => {
    const input = parseBody(defineFieldSchema, req, res);
    if (!input) return;
    sendResult(res, await engineOf(req).defineField({ ...input, department: req.params.code }), 201);
  }),
);

// Purges the key from every instance's attribute bag
router.delete(
  '/:code/fields/:key',
  asyncRoute(async (req, res) =>
    sendResult(res, await engineOf(req).deleteField(req.params.code, req.params.key)),
  ),
);

export { router as departmentsRouter };
