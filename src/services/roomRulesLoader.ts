/**
 * Room rules configured through ROOM_RULES_FILE
 */

import fs from 'fs';
import { getConfig } from '../config';
import { logger } from '../utils/logger';
import { CompiledRoomRule, compileRoomRules, DEFAULT_COMPILED_ROOM_RULES, RoomRule, roomRulesSchema } from './roomExtractor';

/**
 * Read extra rules from a JSON file: [{ "name": "...", "pattern": "..." }]
 */
export function loadRoomRulesFile(path: string): RoomRule[] {
  const content = fs.readFileSync(path, 'utf-8');
  const parsed = roomRulesSchema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid room rules in ${path}: ${problems.join('; ')}`);
  }
  return parsed.data;
}

let configuredRules: readonly CompiledRoomRule[] | null = null;

/**
 * Default rules followed by those from ROOM_RULES_FILE, if set
 */
export function getRoomRules(): readonly CompiledRoomRule[] {
  if (!configuredRules) {
    const { roomRulesFile } = getConfig();
    const extra = roomRulesFile ? loadRoomRulesFile(roomRulesFile) : [];
    if (extra.length > 0) {
      logger.info('Loaded extra room rules', { file: roomRulesFile, rules: extra.map(r => r.name) });
    }
    configuredRules = [...DEFAULT_COMPILED_ROOM_RULES, ...compileRoomRules(extra)];
  }
  return configuredRules;
}
