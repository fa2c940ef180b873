/**
 * Room recovery for meeting lines neither grammar could structure
 * Building naming conventions live in a rule table so new ones can be added from config
 */

import { z } from 'zod';
import { normalizeRoom, normalizeSpaces } from '../utils/textNormalize';

export interface RoomRule {
  name: string;
  pattern: string; // RegExp source; the room is every capture group joined
  flags?: string;
}

export interface CompiledRoomRule {
  name: string;
  regex: RegExp;
}

export const DEFAULT_ROOM_RULES: readonly RoomRule[] = [
  // 理教107, 二教 205
  { name: 'teaching-building', pattern: '(理教|一教|二教|三教|四教)\\s*([0-9]{3,4})\\s*$' },
  // 理科1号楼1303
  { name: 'science-building', pattern: '(理科\\s*[一二三四五六七八九十0-9]+号楼)\\s*([0-9]{3,4})' },
];

const roomRuleSchema = z
  .object({
    name: z.string().min(1),
    pattern: z.string().min(1),
    // g/y make RegExp.exec stateful
    flags: z.string().regex(/^[imsu]*$/, 'Only i, m, s, u flags are allowed').optional(),
  })
  .superRefine((rule, ctx) => {
    try {
      new RegExp(rule.pattern, rule.flags);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['pattern'],
        message: error instanceof Error ? error.message : 'Invalid regular expression',
      });
    }
  });

export const roomRulesSchema = z.array(roomRuleSchema);

export function compileRoomRules(rules: readonly RoomRule[]): CompiledRoomRule[] {
  return rules.map(rule => ({ name: rule.name, regex: new RegExp(rule.pattern, rule.flags) }));
}

export const DEFAULT_COMPILED_ROOM_RULES: readonly CompiledRoomRule[] = compileRoomRules(DEFAULT_ROOM_RULES);

/**
 * Try the rule table against the last comma-separated segment of a line,
 * parenthesised annotations removed. Returns '' when no rule matches.
 */
export function extractRoomByRules(
  line: string,
  rules: readonly CompiledRoomRule[] = DEFAULT_COMPILED_ROOM_RULES
): string {
  const withoutNotes = normalizeSpaces(line).replace(/[（(].*?[）)]/g, '').trim();
  const segments = withoutNotes.split(',');
  const tail = segments[segments.length - 1].trim();
  if (!tail) return '';

  for (const rule of rules) {
    const match = rule.regex.exec(tail);
    if (!match) continue;

    const groups = match.slice(1).filter((g): g is string => g !== undefined);
    const room = normalizeRoom(groups.length > 0 ? groups.join('') : match[0]);
    if (room) {
      return room;
    }
  }

  return '';
}
