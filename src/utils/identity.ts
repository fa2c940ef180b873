import { CourseKey, CourseUid } from '../types';

/**
 * Map key for a uid; JSON keeps codes containing separators unambiguous
 */
export function uidKey(uid: CourseUid): string {
  return JSON.stringify([uid.courseCode, uid.classNo]);
}

export function courseKeyString(key: CourseKey): string {
  return JSON.stringify([key.courseName, key.courseCode, key.room, key.classNo]);
}

export function formatUid(uid: CourseUid): string {
  return `(${uid.courseCode}, ${uid.classNo})`;
}

export function formatCourseKey(key: CourseKey): string {
  return `(${key.courseName}, ${key.courseCode}, ${key.room}, ${key.classNo})`;
}
