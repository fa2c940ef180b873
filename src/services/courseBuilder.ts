/**
 * Builds Course records from raw rows and assembles the per-load ParseResult
 * Rows are never dropped for bad data: problems end up in diagnostics
 */

import { z } from 'zod';
import { Course, CourseKey, CourseUid, ParseResult, RawRow } from '../types';
import { courseKeyString, formatCourseKey, formatUid, uidKey } from '../utils/identity';
import { CompiledRoomRule, DEFAULT_COMPILED_ROOM_RULES } from './roomExtractor';
import { parseScheduleText } from './meetingParser';

// Column names of the course list export
export const FIELD = {
  courseCode: '课程号',
  courseName: '课程名',
  category: '课程类别',
  credits: '学分',
  weeklyHours: '周学时',
  teacher: '教师',
  classNo: '班号',
  department: '开课单位',
  grade: '年级',
  info: '上课考试信息',
} as const;

export const ROOM_UNKNOWN = '（地点未知）';

export type RowIssue = 'UNPARSED_LINES' | 'ROOM_UNKNOWN';

export type RowOutcome =
  | { status: 'ok'; course: Course }
  | { status: 'partial'; course: Course; issues: RowIssue[] };

export type RowInterpretation =
  | { ok: true; row: RawRow }
  | { ok: false; reason: string };

export interface LoadOptions {
  rules?: readonly CompiledRoomRule[];
}

const rawRowSchema = z.record(z.unknown());

function cellToString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  return '';
}

/**
 * Accept any plain object as a row; scalar values are stringified, everything else becomes ''
 */
export function interpretRow(value: unknown): RowInterpretation {
  const parsed = rawRowSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, reason: issue ? issue.message : 'not an object' };
  }

  const row: Record<string, string> = {};
  for (const [field, cell] of Object.entries(parsed.data)) {
    row[field] = cellToString(cell);
  }
  return { ok: true, row };
}

const DECIMAL_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function parseCredits(text: string): number {
  const trimmed = text.trim();
  if (!DECIMAL_RE.test(trimmed)) return 0;

  const value = Number(trimmed);
  return Number.isFinite(value) && value >= 0 ? value : 0;
}

function field(row: RawRow, name: string): string {
  return (row[name] ?? '').trim();
}

export function parseCourseRow(
  row: RawRow,
  rules: readonly CompiledRoomRule[] = DEFAULT_COMPILED_ROOM_RULES
): RowOutcome {
  const courseCode = field(row, FIELD.courseCode);
  const courseName = field(row, FIELD.courseName);
  const classNo = field(row, FIELD.classNo);

  const schedule = parseScheduleText(field(row, FIELD.info), rules);
  const room = schedule.rooms[0] ?? ROOM_UNKNOWN;

  const uid: CourseUid = { courseCode, classNo };
  const key: CourseKey = { courseName, courseCode, room, classNo };

  const course: Course = {
    uid,
    key,
    courseName,
    courseCode,
    teacher: field(row, FIELD.teacher),
    department: field(row, FIELD.department),
    credits: parseCredits(field(row, FIELD.credits)),
    classNo,
    category: field(row, FIELD.category),
    grade: field(row, FIELD.grade),
    weeklyHours: field(row, FIELD.weeklyHours),
    meetings: schedule.meetings,
    raw: { ...row },
    parseWarnings: schedule.warnings,
  };

  const issues: RowIssue[] = [];
  if (schedule.warnings.length > 0) issues.push('UNPARSED_LINES');
  if (room === ROOM_UNKNOWN) issues.push('ROOM_UNKNOWN');

  return issues.length > 0 ? { status: 'partial', course, issues } : { status: 'ok', course };
}

/**
 * Batch entry point. Row numbers in diagnostics are 1-based input positions.
 */
export function loadCourses(rows: readonly unknown[], options: LoadOptions = {}): ParseResult {
  const rules = options.rules ?? DEFAULT_COMPILED_ROOM_RULES;

  const courses: Course[] = [];
  const byKey = new Map<string, Course[]>();
  const byUid = new Map<string, Course>();

  const globalWarnings: string[] = [];
  const emptyRoomRows: string[] = [];
  const meetingParseWarnings: string[] = [];
  const keyCollisions: string[] = [];

  rows.forEach((value, index) => {
    const rowNumber = index + 1;

    const interpreted = interpretRow(value);
    if (!interpreted.ok) {
      globalWarnings.push(`row ${rowNumber}: cannot interpret row (${interpreted.reason})`);
      return;
    }

    const { course } = parseCourseRow(interpreted.row, rules);
    courses.push(course);

    const uid = uidKey(course.uid);
    const previous = byUid.get(uid);
    if (previous) {
      globalWarnings.push(
        `row ${rowNumber}: duplicate uid ${formatUid(course.uid)} | previous teacher=${previous.teacher} new teacher=${course.teacher}`
      );
    }
    byUid.set(uid, course);

    if (course.key.room === ROOM_UNKNOWN) {
      emptyRoomRows.push(
        `row ${rowNumber}: room unknown | code=${course.courseCode} name=${course.courseName} class=${course.classNo} teacher=${course.teacher} | info=${JSON.stringify(interpreted.row[FIELD.info] ?? '')}`
      );
    }

    for (const warning of course.parseWarnings) {
      meetingParseWarnings.push(
        `row ${rowNumber} ${course.courseCode}/${course.courseName}/class ${course.classNo} | ${warning}`
      );
    }

    const keyString = courseKeyString(course.key);
    const sameKey = byKey.get(keyString);
    if (sameKey) {
      const first = sameKey[0];
      keyCollisions.push(
        `row ${rowNumber}: key collision ${formatCourseKey(course.key)} | existing (class=${first.classNo}, teacher=${first.teacher}) incoming (class=${course.classNo}, teacher=${course.teacher})`
      );
      sameKey.push(course);
    } else {
      byKey.set(keyString, [course]);
    }
  });

  return {
    courses,
    byKey,
    byUid,
    globalWarnings,
    emptyRoomRows,
    meetingParseWarnings,
    keyCollisions,
    totalRows: rows.length,
  };
}
