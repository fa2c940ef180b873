import { Router, Request, Response } from 'express';
import { selectionCheckSchema, timetableRequestSchema } from '../schemas/request';
import { getCatalogService } from '../services/catalogService';
import { CheckAddResult } from '../types';

const router = Router();

export function checkResultStatus(result: CheckAddResult): number {
  return result.ok ? 200 : 409;
}

/**
 * POST /api/selection/check
 * Request: { "selected": [{ "courseCode", "classNo" }], "candidates": [...], "creditLimit": 25 }
 * 200 with the new selection when the whole batch fits, 409 with the rejection otherwise
 */
router.post('/check', (req: Request, res: Response) => {
  const { selected, candidates, creditLimit } = selectionCheckSchema.parse(req.body);
  const result = getCatalogService().checkAdd(selected, candidates, creditLimit);

  res.status(checkResultStatus(result)).json(result);
});

/**
 * POST /api/selection/timetable
 * Request: { "selected": [...], "week": 3 }
 */
router.post('/timetable', (req: Request, res: Response) => {
  const { selected, week } = timetableRequestSchema.parse(req.body);
  const cells = getCatalogService().getTimetable(selected, week);

  res.json({ week, cells });
});

export default router;
