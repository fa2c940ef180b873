import { Weekday } from '../types';

export type TimeOfDay = '上午' | '下午' | '晚' | '晚上';

export const WEEKDAY_LABELS = ['周一', '周二', '周三', '周四', '周五', '周六', '周日'] as const;

/**
 * Parse Chinese weekday characters (the part after "周") to Weekday
 */
export function parseChineseWeekday(dayStr: string): Weekday | null {
  const dayMap: Record<string, Weekday> = {
    '一': 1,
    '二': 2,
    '三': 3,
    '四': 4,
    '五': 5,
    '六': 6,
    '日': 7,
    '天': 7,
  };

  return dayMap[dayStr] ?? null;
}

export function weekdayLabel(weekday: number): string {
  return weekday >= 1 && weekday <= 7 ? WEEKDAY_LABELS[weekday - 1] : `周${weekday}`;
}

export function parseTimeOfDay(token: string | undefined): TimeOfDay | null {
  switch (token?.trim()) {
    case '上午':
      return '上午';
    case '下午':
      return '下午';
    case '晚':
      return '晚';
    case '晚上':
      return '晚上';
    default:
      return null;
  }
}

export function toMinutes(hours: number, minutes: number): number {
  return hours * 60 + minutes;
}

/**
 * Clock tokens from "1点半", "13:20", "6" to minutes since midnight
 * A trailing 半 always means :30, whatever minutes were written
 */
export function parseClockParts(hour: string, minute?: string, half?: string): number {
  const hh = parseInt(hour, 10);
  let mm = minute !== undefined ? parseInt(minute, 10) : 0;
  if (half !== undefined) {
    mm = 30;
  }
  return toMinutes(hh, mm);
}

/**
 * "下午1-4点半" means 13:00-16:30: afternoon/evening hours below 12 are on a 12-hour clock
 */
export function applyTimeOfDay(minutes: number, tod: TimeOfDay | null): number {
  if ((tod === '下午' || tod === '晚' || tod === '晚上') && minutes < 12 * 60) {
    return minutes + 12 * 60;
  }
  return minutes;
}

export interface ClockSlot {
  labels: readonly TimeOfDay[];
  start: number;
  end: number;
  periods: readonly [number, number];
}

export const SLOT_TOLERANCE_MINUTES = 20;

export const CLOCK_SLOTS: readonly ClockSlot[] = [
  { labels: ['下午'], start: toMinutes(13, 0), end: toMinutes(16, 30), periods: [5, 8] },
  { labels: ['晚', '晚上'], start: toMinutes(18, 0), end: toMinutes(21, 30), periods: [9, 12] },
];

/**
 * Map a clock interval onto a period range
 *
 * Tried in order: both ends near a slot's anchors, interval inside a widened slot,
 * then the two containment fallbacks (early afternoon start ending after 16:00,
 * anything starting from 17:00). Slots are filtered by the time-of-day token when
 * one was written.
 */
export function clockToPeriods(tod: TimeOfDay | null, startMin: number, endMin: number): [number, number] | null {
  const slots = CLOCK_SLOTS.filter(slot => tod === null || slot.labels.includes(tod));
  const tolerance = SLOT_TOLERANCE_MINUTES;

  for (const slot of slots) {
    if (Math.abs(startMin - slot.start) <= tolerance && Math.abs(endMin - slot.end) <= tolerance) {
      return [slot.periods[0], slot.periods[1]];
    }
  }

  for (const slot of slots) {
    if (startMin >= slot.start - tolerance && endMin <= slot.end + tolerance) {
      return [slot.periods[0], slot.periods[1]];
    }
  }

  if (startMin >= toMinutes(12, 0) && startMin <= toMinutes(15, 0) && endMin >= toMinutes(16, 0)) {
    return [5, 8];
  }
  if (startMin >= toMinutes(17, 0)) {
    return [9, 12];
  }
  return null;
}
