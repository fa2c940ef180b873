/**
 * Zod schemas for request validation
 */

import { z } from 'zod';
import { TERM_WEEKS } from '../services/occupancy';

const courseUidSchema = z.object({
  courseCode: z.string().trim().min(1),
  classNo: z.string().trim(),
});

// Rows are checked one by one during the load so a bad row never rejects the batch
export const loadRequestSchema = z.object({
  rows: z.array(z.unknown()),
});

export const courseQuerySchema = z.object({
  department: z.string().trim().optional(),
  q: z.string().trim().optional(),
});

export const selectionCheckSchema = z.object({
  selected: z.array(courseUidSchema).default([]),
  candidates: z.array(courseUidSchema).min(1),
  creditLimit: z.number().positive().optional(),
});

export const timetableRequestSchema = z.object({
  selected: z.array(courseUidSchema).default([]),
  week: z.number().int().min(TERM_WEEKS.first).max(TERM_WEEKS.last),
});

export type LoadRequest = z.infer<typeof loadRequestSchema>;
export type CourseQuery = z.infer<typeof courseQuerySchema>;
export type SelectionCheckRequest = z.infer<typeof selectionCheckSchema>;
export type TimetableRequest = z.infer<typeof timetableRequestSchema>;
