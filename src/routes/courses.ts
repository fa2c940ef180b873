import { Router, Request, Response } from 'express';
import { courseQuerySchema, loadRequestSchema } from '../schemas/request';
import { getCatalogService } from '../services/catalogService';

const router = Router();

/**
 * POST /api/courses/load
 * Body: { "rows": [{ "课程号": "...", "上课考试信息": "...", ... }] }
 * Replaces the loaded course list; returns counts and diagnostics
 */
router.post('/load', (req: Request, res: Response) => {
  const { rows } = loadRequestSchema.parse(req.body);
  const summary = getCatalogService().load(rows);

  res.json({ ok: true, ...summary });
});

/**
 * GET /api/courses
 * Query params: department, q (matches name, code or teacher)
 */
router.get('/', (req: Request, res: Response) => {
  const { department, q } = courseQuerySchema.parse(req.query);
  const courses = getCatalogService().getCourses(department, q);

  res.json({
    courses,
    count: courses.length,
  });
});

/**
 * GET /api/courses/departments
 */
router.get('/departments', (req: Request, res: Response) => {
  res.json({ departments: getCatalogService().getDepartments() });
});

/**
 * GET /api/courses/:courseCode/:classNo/cells
 * Every (week, weekday, period) the course occupies during the term
 */
router.get('/:courseCode/:classNo/cells', (req: Request, res: Response) => {
  const uid = { courseCode: req.params.courseCode, classNo: req.params.classNo };
  const cells = getCatalogService().getOccupiedCells(uid);

  res.json({ uid, cells, count: cells.length });
});

export default router;
