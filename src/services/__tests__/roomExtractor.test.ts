import {
  compileRoomRules,
  DEFAULT_COMPILED_ROOM_RULES,
  extractRoomByRules,
  roomRulesSchema,
} from '../roomExtractor';

describe('roomExtractor', () => {
  describe('extractRoomByRules', () => {
    it('should match teaching buildings at the end of the last segment', () => {
      expect(extractRoomByRules('另行通知,二教 205')).toBe('二教205');
    });

    it('should ignore parenthesised annotations', () => {
      expect(extractRoomByRules('理教 107（双语）')).toBe('理教107');
    });

    it('should match numbered science buildings', () => {
      expect(extractRoomByRules('理科 2号楼 2501 讨论')).toBe('理科2号楼2501');
    });

    it('should only look after the last comma', () => {
      expect(extractRoomByRules('二教205,待定')).toBe('');
    });

    it('should use custom rules and skip unmatched optional groups', () => {
      const rules = compileRoomRules([{ name: 'gym', pattern: '(体育馆)\\s*([0-9]{1,3})?\\s*$' }]);
      expect(extractRoomByRules('地点：体育馆', rules)).toBe('体育馆');
      expect(extractRoomByRules('地点：体育馆', DEFAULT_COMPILED_ROOM_RULES)).toBe('');
    });
  });

  describe('roomRulesSchema', () => {
    it('should accept valid rules', () => {
      expect(roomRulesSchema.safeParse([{ name: 'x', pattern: '(A)(\\d+)', flags: 'i' }]).success).toBe(true);
    });

    it('should reject invalid regular expressions and stateful flags', () => {
      expect(roomRulesSchema.safeParse([{ name: 'x', pattern: '(' }]).success).toBe(false);
      expect(roomRulesSchema.safeParse([{ name: 'x', pattern: 'a', flags: 'g' }]).success).toBe(false);
    });
  });
});
