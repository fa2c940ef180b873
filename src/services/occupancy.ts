/**
 * Week/weekday/period occupancy of courses over the term
 */

import { Course, CourseUid, Meeting, OccupiedCell } from '../types';

// Instructional weeks of a term
export const TERM_WEEKS = { first: 1, last: 16 } as const;

export function occursOnWeek(meeting: Meeting, week: number): boolean {
  if (week < meeting.startWeek || week > meeting.endWeek) {
    return false;
  }

  switch (meeting.pattern) {
    case 'EVERY':
      return true;
    case 'ODD':
      return week % 2 === 1;
    case 'EVEN':
      return week % 2 === 0;
  }
}

export function occursOn(meeting: Meeting, week: number, weekday: number, period: number): boolean {
  return (
    occursOnWeek(meeting, week) &&
    meeting.weekday === weekday &&
    period >= meeting.startPeriod &&
    period <= meeting.endPeriod
  );
}

export function cellKey(cell: OccupiedCell): string {
  return `${cell.week}:${cell.weekday}:${cell.period}`;
}

const occupancyCache = new WeakMap<Course, ReadonlyMap<string, OccupiedCell>>();

/**
 * Every (week, weekday, period) a course claims during the term, keyed by cellKey.
 * Iteration order is week, then meeting order, then period. Cached per Course object.
 */
export function occupiedCells(course: Course): ReadonlyMap<string, OccupiedCell> {
  const cached = occupancyCache.get(course);
  if (cached) {
    return cached;
  }

  const cells = new Map<string, OccupiedCell>();
  for (let week = TERM_WEEKS.first; week <= TERM_WEEKS.last; week++) {
    for (const meeting of course.meetings) {
      if (!occursOnWeek(meeting, week)) continue;

      for (let period = meeting.startPeriod; period <= meeting.endPeriod; period++) {
        const cell: OccupiedCell = { week, weekday: meeting.weekday, period };
        const key = cellKey(cell);
        if (!cells.has(key)) {
          cells.set(key, cell);
        }
      }
    }
  }

  occupancyCache.set(course, cells);
  return cells;
}

export interface TimetableCell {
  weekday: number;
  period: number;
  courses: Array<{ uid: CourseUid; courseName: string; room: string }>;
}

/**
 * Occupied slots of one week, ordered by weekday then period
 */
export function weekTimetable(courses: readonly Course[], week: number): TimetableCell[] {
  const slots = new Map<string, TimetableCell>();

  for (const course of courses) {
    for (const meeting of course.meetings) {
      if (!occursOnWeek(meeting, week)) continue;

      for (let period = meeting.startPeriod; period <= meeting.endPeriod; period++) {
        const key = `${meeting.weekday}:${period}`;
        let slot = slots.get(key);
        if (!slot) {
          slot = { weekday: meeting.weekday, period, courses: [] };
          slots.set(key, slot);
        }
        if (!slot.courses.some(entry => entry.uid === course.uid)) {
          slot.courses.push({ uid: course.uid, courseName: course.courseName, room: meeting.room });
        }
      }
    }
  }

  return [...slots.values()].sort((a, b) => a.weekday - b.weekday || a.period - b.period);
}
