import { getConfig } from '../config';
import { CheckAddResult, Course, CourseUid, OccupiedCell, ParseResult } from '../types';
import { badRequest, conflict, notFound } from '../utils/errors';
import { formatUid, uidKey } from '../utils/identity';
import { logger } from '../utils/logger';
import { loadCourses } from './courseBuilder';
import { occupiedCells, TimetableCell, weekTimetable } from './occupancy';
import { CompiledRoomRule } from './roomExtractor';
import { getRoomRules } from './roomRulesLoader';
import { checkAdd, resolveUids } from './selectionChecker';

export interface LoadSummary {
  totalRows: number;
  courses: number;
  uniqueKeys: number;
  loadedAt: string;
  keyCollisions: readonly string[];
  emptyRoomRows: readonly string[];
  meetingParseWarnings: readonly string[];
  globalWarnings: readonly string[];
}

export interface CatalogServiceOptions {
  rules?: readonly CompiledRoomRule[];
  maxRowsPerLoad?: number;
  defaultCreditLimit?: number;
}

const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

// Department, name, teacher, class number
function compareCourses(a: Course, b: Course): number {
  return (
    compareText(a.department, b.department) ||
    compareText(a.courseName, b.courseName) ||
    compareText(a.teacher, b.teacher) ||
    compareText(a.classNo, b.classNo)
  );
}

/**
 * Holds the most recently loaded course list for the HTTP layer
 * Every load replaces the previous catalog entirely
 */
export class CatalogService {
  private catalog: ParseResult | null = null;
  private loadedAt: Date | null = null;

  constructor(private readonly options: CatalogServiceOptions = {}) {}

  load(rows: readonly unknown[]): LoadSummary {
    const maxRows = this.options.maxRowsPerLoad ?? getConfig().maxRowsPerLoad;
    if (rows.length > maxRows) {
      throw badRequest(`Too many rows: ${rows.length} (max ${maxRows})`);
    }

    const startTime = Date.now();
    const result = loadCourses(rows, { rules: this.options.rules ?? getRoomRules() });
    this.catalog = result;
    this.loadedAt = new Date();

    const summary: LoadSummary = {
      totalRows: result.totalRows,
      courses: result.courses.length,
      uniqueKeys: result.byKey.size,
      loadedAt: this.loadedAt.toISOString(),
      keyCollisions: result.keyCollisions,
      emptyRoomRows: result.emptyRoomRows,
      meetingParseWarnings: result.meetingParseWarnings,
      globalWarnings: result.globalWarnings,
    };

    logger.info('Course catalog loaded', {
      totalRows: summary.totalRows,
      courses: summary.courses,
      uniqueKeys: summary.uniqueKeys,
      keyCollisions: summary.keyCollisions.length,
      emptyRoomRows: summary.emptyRoomRows.length,
      meetingParseWarnings: summary.meetingParseWarnings.length,
      globalWarnings: summary.globalWarnings.length,
      duration: Date.now() - startTime,
    });
    if (result.meetingParseWarnings.length > 0) {
      logger.debug('Unparsed meeting lines (first 10)', { samples: result.meetingParseWarnings.slice(0, 10) });
    }

    return summary;
  }

  isLoaded(): boolean {
    return this.catalog !== null;
  }

  private requireCatalog(): ParseResult {
    if (!this.catalog) {
      throw conflict('CATALOG_NOT_LOADED', 'No course list loaded yet; POST rows to /api/courses/load first');
    }
    return this.catalog;
  }

  getCourses(department?: string, query?: string): Course[] {
    let courses = [...this.requireCatalog().byUid.values()];

    if (department) {
      courses = courses.filter(c => c.department === department);
    }

    if (query) {
      const lowerQuery = query.toLowerCase();
      courses = courses.filter(c =>
        c.courseName.toLowerCase().includes(lowerQuery) ||
        c.courseCode.toLowerCase().includes(lowerQuery) ||
        c.teacher.toLowerCase().includes(lowerQuery)
      );
    }

    return courses.sort(compareCourses);
  }

  getDepartments(): string[] {
    const departments = new Set<string>();
    for (const course of this.requireCatalog().courses) {
      if (course.department) {
        departments.add(course.department);
      }
    }
    return [...departments].sort(compareText);
  }

  getCourse(uid: CourseUid): Course {
    const course = this.requireCatalog().byUid.get(uidKey(uid));
    if (!course) {
      throw notFound(`Course ${formatUid(uid)} not found`);
    }
    return course;
  }

  getOccupiedCells(uid: CourseUid): OccupiedCell[] {
    return [...occupiedCells(this.getCourse(uid)).values()];
  }

  checkAdd(selected: readonly CourseUid[], candidates: readonly CourseUid[], creditLimit?: number): CheckAddResult {
    const limit = creditLimit ?? this.options.defaultCreditLimit ?? getConfig().defaultCreditLimit;
    const result = checkAdd(this.requireCatalog(), selected, candidates, limit);

    if (!result.ok) {
      logger.debug('Selection rejected', { reason: result.reason, message: result.message });
    }
    return result;
  }

  getTimetable(selected: readonly CourseUid[], week: number): TimetableCell[] {
    const { courses, missing } = resolveUids(this.requireCatalog(), selected);
    if (missing.length > 0) {
      throw notFound(`Unknown course(s): ${missing.map(formatUid).join(', ')}`);
    }
    return weekTimetable(courses, week);
  }
}

// Singleton instance
let catalogService: CatalogService | null = null;

export function getCatalogService(): CatalogService {
  if (!catalogService) {
    catalogService = new CatalogService();
  }
  return catalogService;
}
