import fs from 'fs';
import os from 'os';
import path from 'path';
import { getConfig, parseConfig } from '../../config';
import { DEFAULT_COMPILED_ROOM_RULES, extractRoomByRules } from '../roomExtractor';
import { getRoomRules, loadRoomRulesFile } from '../roomRulesLoader';

jest.mock('../../config', () => ({
  ...jest.requireActual('../../config'),
  getConfig: jest.fn(),
}));

const mockedGetConfig = jest.mocked(getConfig);

describe('roomRulesLoader', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'room-rules-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('loadRoomRulesFile', () => {
    it('should read rules from JSON', () => {
      const file = path.join(dir, 'rules.json');
      fs.writeFileSync(file, JSON.stringify([{ name: 'gym', pattern: '(体育馆)' }]));

      expect(loadRoomRulesFile(file)).toEqual([{ name: 'gym', pattern: '(体育馆)' }]);
    });

    it('should throw on invalid rules', () => {
      const file = path.join(dir, 'rules.json');
      fs.writeFileSync(file, JSON.stringify([{ name: '', pattern: '(体育馆)' }]));

      expect(() => loadRoomRulesFile(file)).toThrow('Invalid room rules');
    });
  });

  describe('getRoomRules', () => {
    it('should append rules from ROOM_RULES_FILE to the defaults', () => {
      const file = path.join(dir, 'rules.json');
      fs.writeFileSync(file, JSON.stringify([{ name: 'gym', pattern: '(体育馆)\\s*$' }]));
      mockedGetConfig.mockReturnValue(parseConfig({ ROOM_RULES_FILE: file, LOG_LEVEL: 'error' }));

      const rules = getRoomRules();

      expect(rules.map(rule => rule.name)).toEqual([...DEFAULT_COMPILED_ROOM_RULES.map(rule => rule.name), 'gym']);
      expect(extractRoomByRules('另行通知,体育馆', rules)).toBe('体育馆');
      expect(getRoomRules()).toBe(rules);
    });
  });
});
