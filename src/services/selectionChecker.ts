/**
 * Admission checks for adding a batch of courses to a selection
 * Time conflicts are checked first, then the credit ceiling; a batch is taken whole or not at all
 */

import { CheckAddResult, Conflict, Course, CourseSummary, CourseUid, ParseResult } from '../types';
import { formatUid, uidKey } from '../utils/identity';
import { weekdayLabel } from '../utils/timeParser';
import { occupiedCells } from './occupancy';

export type Catalog = Pick<ParseResult, 'byUid'>;

export const CREDIT_EPSILON = 1e-9;

function summarize(course: Course): CourseSummary {
  return {
    uid: course.uid,
    courseName: course.courseName,
    teacher: course.teacher,
    classNo: course.classNo,
  };
}

/**
 * Like %g: 2.5 -> "2.5", 25 -> "25"
 */
export function formatCredits(value: number): string {
  return String(Number(value.toPrecision(6)));
}

export function describeConflict(conflict: Conflict): string {
  const { existing, incoming, cell } = conflict;
  return (
    `Time conflict: ${existing.courseName} | ${existing.teacher} | class ${existing.classNo}` +
    ` and ${incoming.courseName} | ${incoming.teacher} | class ${incoming.classNo}` +
    ` at week ${cell.week} ${weekdayLabel(cell.weekday)} period ${cell.period}`
  );
}

export function resolveUids(
  catalog: Catalog,
  uids: readonly CourseUid[]
): { courses: Course[]; missing: CourseUid[] } {
  const courses: Course[] = [];
  const missing: CourseUid[] = [];

  for (const uid of uids) {
    const course = catalog.byUid.get(uidKey(uid));
    if (course) {
      courses.push(course);
    } else {
      missing.push(uid);
    }
  }

  return { courses, missing };
}

/**
 * First cell claimed twice, walking the selected set then candidates in the given order
 */
export function findConflictAmong(selected: readonly Course[], candidates: readonly Course[]): Conflict | null {
  const owners = new Map<string, Course>();

  for (const course of selected) {
    for (const key of occupiedCells(course).keys()) {
      owners.set(key, course);
    }
  }

  for (const course of candidates) {
    for (const [key, cell] of occupiedCells(course)) {
      const owner = owners.get(key);
      if (owner) {
        return { existing: summarize(owner), incoming: summarize(course), cell };
      }
      owners.set(key, course);
    }
  }

  return null;
}

export function findConflict(
  catalog: Catalog,
  selected: readonly CourseUid[],
  candidates: readonly CourseUid[]
): Conflict | null {
  return findConflictAmong(resolveUids(catalog, selected).courses, resolveUids(catalog, candidates).courses);
}

export function sumCredits(courses: readonly Course[]): number {
  return courses.reduce((sum, course) => sum + course.credits, 0);
}

export function totalCredits(catalog: Catalog, uids: readonly CourseUid[]): number {
  return sumCredits(resolveUids(catalog, uids).courses);
}

function dedupe(uids: readonly CourseUid[], exclude: ReadonlySet<string> = new Set()): CourseUid[] {
  const seen = new Set(exclude);
  const result: CourseUid[] = [];
  for (const uid of uids) {
    const key = uidKey(uid);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(uid);
  }
  return result;
}

/**
 * Check whether candidates can join the selection
 * Candidates already selected, or repeated within the batch, are ignored.
 */
export function checkAdd(
  catalog: Catalog,
  selected: readonly CourseUid[],
  candidates: readonly CourseUid[],
  creditLimit: number
): CheckAddResult {
  const selectedUids = dedupe(selected);
  const candidateUids = dedupe(candidates, new Set(selectedUids.map(uidKey)));

  const current = resolveUids(catalog, selectedUids);
  const incoming = resolveUids(catalog, candidateUids);
  const missing = [...current.missing, ...incoming.missing];
  if (missing.length > 0) {
    return {
      ok: false,
      reason: 'UNKNOWN_COURSE',
      uids: missing,
      message: `Unknown course(s): ${missing.map(formatUid).join(', ')}`,
    };
  }

  const conflict = findConflictAmong(current.courses, incoming.courses);
  if (conflict) {
    return { ok: false, reason: 'CONFLICT', conflict, message: describeConflict(conflict) };
  }

  const currentCredits = sumCredits(current.courses);
  const addedCredits = sumCredits(incoming.courses);
  if (currentCredits + addedCredits > creditLimit + CREDIT_EPSILON) {
    return {
      ok: false,
      reason: 'CREDIT_EXCEEDED',
      current: currentCredits,
      added: addedCredits,
      limit: creditLimit,
      message:
        `Adding these courses exceeds the credit limit: current ${formatCredits(currentCredits)},` +
        ` adding ${formatCredits(addedCredits)}, limit ${formatCredits(creditLimit)}`,
    };
  }

  return {
    ok: true,
    selected: [...selectedUids, ...candidateUids],
    totalCredits: currentCredits + addedCredits,
  };
}
