/**
 * Normalization helpers for the meeting-time field
 */

export const EXAM_PREFIXES = ['考试时间', '考试方式'] as const;

/**
 * Unify line breaks and full-width separators, collapse blank runs
 * e.g. "1~16周 每周  周一 1~2节；\r\n\r\n考试时间" -> "1~16周 每周 周一 1~2节;\n考试时间"
 */
export function normalizeSpaces(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .replace(/；/g, ';')
    .replace(/，/g, ',')
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{2,}/g, '\n')
    .trim();
}

/**
 * Split a meeting-time field into non-empty trimmed lines
 */
export function splitInfoLines(info: string): string[] {
  const normalized = normalizeSpaces(info);
  if (!normalized) return [];

  return normalized
    .split('\n')
    .map(line => line.trim())
    .filter(line => line);
}

/**
 * Exam schedule lines ("考试时间：...", "考试方式:...") carry no meeting information
 */
export function isExamLine(line: string): boolean {
  const trimmed = line.trim();
  return EXAM_PREFIXES.some(prefix => trimmed.startsWith(prefix));
}

/**
 * "（备注：第1-16周周二下午1-4点半,二教205）" -> "第1-16周周二下午1-4点半,二教205"
 */
export function stripWrappingParens(line: string): string {
  return line
    .trim()
    .replace(/^[（(]+/, '')
    .replace(/[）)]+$/, '')
    .replace(/^\s*备注[:：]\s*/, '')
    .trim();
}

/**
 * Drop trailing qualifiers ("机房", "内") and all whitespace
 */
export function normalizeRoom(room: string): string {
  const trimmed = room.trim();
  if (!trimmed) return '';

  return trimmed
    .replace(/(机房|内)$/, '')
    .trim()
    .replace(/\s+/g, '');
}
