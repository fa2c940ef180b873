/**
 * Meeting-time text parser
 *
 * Two independent grammars, tried in order on every line:
 * - period notation: "3~16周 每周 周三 3~4节 理教107(备注)"
 * - clock notation:  "第1-16周周二下午1-4点半,二教205" (often wrapped as "（备注：...）")
 * Lines matching neither become warnings; a room is still recovered for them when possible.
 */

import { Meeting, WeekPattern } from '../types';
import {
  applyTimeOfDay,
  clockToPeriods,
  parseChineseWeekday,
  parseClockParts,
  parseTimeOfDay,
} from '../utils/timeParser';
import {
  isExamLine,
  normalizeRoom,
  normalizeSpaces,
  splitInfoLines,
  stripWrappingParens,
} from '../utils/textNormalize';
import { CompiledRoomRule, DEFAULT_COMPILED_ROOM_RULES, extractRoomByRules } from './roomExtractor';

export const MIN_PERIOD = 1;
export const MAX_PERIOD = 12;

const PERIOD_LINE_RE =
  /^\s*(?<ws>\d+)\s*~\s*(?<we>\d+)\s*周\s+(?:(?<pat>每周|单周|双周)\s*)?周(?<wd>[一二三四五六日天])\s*(?<ps>\d+)\s*~\s*(?<pe>\d+)\s*节\s*(?<room>[^（(]+?)?\s*(?:[（(].*)?$/;

const CLOCK_LINE_RE =
  /^\s*第?\s*(?<ws>\d+)\s*[-~～]\s*(?<we>\d+)\s*周\s*周(?<wd>[一二三四五六日天])\s*(?<tod>上午|下午|晚上|晚)?\s*(?<h1>\d{1,2})\s*(?:[:：](?<m1>\d{1,2}))?\s*点?(?<half1>半)?\s*[-~～]\s*(?<h2>\d{1,2})\s*(?:[:：](?<m2>\d{1,2}))?\s*点?(?<half2>半)?\s*(?:[,，]\s*(?<room>.+?))?\s*$/;

export type ScheduleLineOutcome =
  | { kind: 'exam'; line: string }
  | { kind: 'meeting'; line: string; meeting: Meeting }
  | { kind: 'unparsed'; line: string; room: string; warning: string };

export interface ScheduleParse {
  meetings: Meeting[];
  rooms: string[]; // Non-empty rooms, in line order
  warnings: string[];
}

function group(match: RegExpMatchArray, name: string): string | undefined {
  return match.groups?.[name];
}

function patternFromText(text: string | undefined): WeekPattern {
  if (text === '单周') return 'ODD';
  if (text === '双周') return 'EVEN';
  return 'EVERY';
}

// "二教205(实验" -> "二教205"; the closing paren went with the wrapping ones
function clockRoom(match: RegExpMatchArray): string {
  return normalizeRoom((group(match, 'room') ?? '').replace(/[（(].*$/, ''));
}

function ordered(a: number, b: number): [number, number] {
  return a <= b ? [a, b] : [b, a];
}

function validRanges(startWeek: number, startPeriod: number, endPeriod: number): boolean {
  return startWeek >= 1 && startPeriod >= MIN_PERIOD && endPeriod <= MAX_PERIOD;
}

/**
 * Period notation; expects a space-normalized line
 */
export function parsePeriodLine(line: string, raw: string = line): Meeting | null {
  const match = line.match(PERIOD_LINE_RE);
  if (!match) return null;

  const weekday = parseChineseWeekday(group(match, 'wd') ?? '');
  if (weekday === null) return null;

  const [startWeek, endWeek] = ordered(Number(group(match, 'ws')), Number(group(match, 'we')));
  const [startPeriod, endPeriod] = ordered(Number(group(match, 'ps')), Number(group(match, 'pe')));
  if (!validRanges(startWeek, startPeriod, endPeriod)) return null;

  return {
    startWeek,
    endWeek,
    pattern: patternFromText(group(match, 'pat')),
    weekday,
    startPeriod,
    endPeriod,
    room: normalizeRoom(group(match, 'room') ?? ''),
    raw,
  };
}

/**
 * Clock notation; expects the line with wrapping parentheses and "备注：" removed
 */
export function parseClockLine(line: string, raw: string = line): Meeting | null {
  const match = line.match(CLOCK_LINE_RE);
  if (!match) return null;

  const weekday = parseChineseWeekday(group(match, 'wd') ?? '');
  if (weekday === null) return null;

  const tod = parseTimeOfDay(group(match, 'tod'));
  const startMin = applyTimeOfDay(
    parseClockParts(group(match, 'h1') ?? '0', group(match, 'm1'), group(match, 'half1')),
    tod
  );
  const endMin = applyTimeOfDay(
    parseClockParts(group(match, 'h2') ?? '0', group(match, 'm2'), group(match, 'half2')),
    tod
  );

  const periods = clockToPeriods(tod, startMin, endMin);
  if (!periods) return null;

  const [startWeek, endWeek] = ordered(Number(group(match, 'ws')), Number(group(match, 'we')));
  if (!validRanges(startWeek, periods[0], periods[1])) return null;

  return {
    startWeek,
    endWeek,
    pattern: 'EVERY',
    weekday,
    startPeriod: periods[0],
    endPeriod: periods[1],
    room: clockRoom(match),
    raw,
  };
}

/**
 * Parse one line into a Meeting; null for exam lines and lines matching neither grammar
 */
export function parseMeetingLine(line: string): Meeting | null {
  const raw = line.trim();
  if (!raw || isExamLine(raw)) return null;

  const normalized = normalizeSpaces(raw);
  return parsePeriodLine(normalized, raw) ?? parseClockLine(stripWrappingParens(normalized), raw);
}

/**
 * Room of a line: the grammar's room when either grammar matches the shape of the line,
 * else the first rule-table hit
 */
export function extractRoomFromAny(
  line: string,
  rules: readonly CompiledRoomRule[] = DEFAULT_COMPILED_ROOM_RULES
): string {
  const normalized = normalizeSpaces(line);

  const periodMatch = normalized.match(PERIOD_LINE_RE);
  if (periodMatch) {
    return normalizeRoom(group(periodMatch, 'room') ?? '');
  }

  const clockMatch = stripWrappingParens(normalized).match(CLOCK_LINE_RE);
  if (clockMatch) {
    return clockRoom(clockMatch);
  }

  return extractRoomByRules(normalized, rules);
}

export function unparsedLineWarning(line: string): string {
  return `unparsed meeting line: ${line}`;
}

export function parseScheduleLine(
  line: string,
  rules: readonly CompiledRoomRule[] = DEFAULT_COMPILED_ROOM_RULES
): ScheduleLineOutcome {
  if (isExamLine(line)) {
    return { kind: 'exam', line };
  }

  const meeting = parseMeetingLine(line);
  if (meeting) {
    return { kind: 'meeting', line, meeting };
  }

  return {
    kind: 'unparsed',
    line,
    room: extractRoomFromAny(line, rules),
    warning: unparsedLineWarning(line),
  };
}

/**
 * Parse a whole meeting-time field. Meetings keep line order; duplicates are not merged.
 */
export function parseScheduleText(
  text: string,
  rules: readonly CompiledRoomRule[] = DEFAULT_COMPILED_ROOM_RULES
): ScheduleParse {
  const result: ScheduleParse = { meetings: [], rooms: [], warnings: [] };

  for (const line of splitInfoLines(text)) {
    const outcome = parseScheduleLine(line, rules);
    switch (outcome.kind) {
      case 'exam':
        break;
      case 'meeting':
        result.meetings.push(outcome.meeting);
        if (outcome.meeting.room) {
          result.rooms.push(outcome.meeting.room);
        }
        break;
      case 'unparsed':
        result.warnings.push(outcome.warning);
        if (outcome.room) {
          result.rooms.push(outcome.room);
        }
        break;
    }
  }

  return result;
}
