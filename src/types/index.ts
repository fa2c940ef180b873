// Core domain types

export type WeekPattern = 'EVERY' | 'ODD' | 'EVEN';

export type Weekday = 1 | 2 | 3 | 4 | 5 | 6 | 7; // Monday = 1

export interface Meeting {
  readonly startWeek: number; // 1-based, inclusive
  readonly endWeek: number;
  readonly pattern: WeekPattern;
  readonly weekday: Weekday;
  readonly startPeriod: number; // 1..12, inclusive
  readonly endPeriod: number;
  readonly room: string; // Normalized, may be empty
  readonly raw: string; // Line as it appeared in the info field
}

/**
 * (name, code, room, class number): identifies a true duplicate listing
 */
export interface CourseKey {
  readonly courseName: string;
  readonly courseCode: string;
  readonly room: string;
  readonly classNo: string;
}

/**
 * (code, class number): the handle callers select courses by
 */
export interface CourseUid {
  readonly courseCode: string;
  readonly classNo: string;
}

export interface Course {
  readonly uid: CourseUid;
  readonly key: CourseKey;
  readonly courseName: string;
  readonly courseCode: string;
  readonly teacher: string;
  readonly department: string;
  readonly credits: number;
  readonly classNo: string;
  readonly category: string;
  readonly grade: string;
  readonly weeklyHours: string;
  readonly meetings: readonly Meeting[];
  readonly raw: Readonly<Record<string, string>>; // Row fields, passed through unchanged
  readonly parseWarnings: readonly string[];
}

export interface ParseResult {
  readonly courses: readonly Course[];
  readonly byKey: ReadonlyMap<string, readonly Course[]>;
  readonly byUid: ReadonlyMap<string, Course>;
  readonly globalWarnings: readonly string[];
  readonly emptyRoomRows: readonly string[];
  readonly meetingParseWarnings: readonly string[];
  readonly keyCollisions: readonly string[];
  readonly totalRows: number;
}

export interface OccupiedCell {
  readonly week: number;
  readonly weekday: Weekday;
  readonly period: number;
}

export interface CourseSummary {
  readonly uid: CourseUid;
  readonly courseName: string;
  readonly teacher: string;
  readonly classNo: string;
}

export interface Conflict {
  readonly existing: CourseSummary;
  readonly incoming: CourseSummary;
  readonly cell: OccupiedCell;
}

export type CheckAddResult =
  | { readonly ok: true; readonly selected: readonly CourseUid[]; readonly totalCredits: number }
  | { readonly ok: false; readonly reason: 'CONFLICT'; readonly conflict: Conflict; readonly message: string }
  | {
      readonly ok: false;
      readonly reason: 'CREDIT_EXCEEDED';
      readonly current: number;
      readonly added: number;
      readonly limit: number;
      readonly message: string;
    }
  | { readonly ok: false; readonly reason: 'UNKNOWN_COURSE'; readonly uids: readonly CourseUid[]; readonly message: string };

export type RawRow = Readonly<Record<string, string>>;
