import { parseConfig } from '..';

describe('parseConfig', () => {
  it('should apply defaults', () => {
    expect(parseConfig({})).toEqual({
      port: 3000,
      nodeEnv: 'development',
      frontendOrigin: '*',
      corsOrigins: [],
      defaultCreditLimit: 25,
      maxRowsPerLoad: 20000,
      logLevel: 'info',
      roomRulesFile: undefined,
    });
  });

  it('should coerce values and treat blank entries as unset', () => {
    const config = parseConfig({
      PORT: '8080',
      CORS_ORIGIN: 'http://a.test, http://b.test',
      DEFAULT_CREDIT_LIMIT: '30.5',
      ROOM_RULES_FILE: '',
      LOG_LEVEL: '',
    });

    expect(config.port).toBe(8080);
    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(config.defaultCreditLimit).toBe(30.5);
    expect(config.roomRulesFile).toBeUndefined();
    expect(config.logLevel).toBe('info');
  });

  it('should name invalid variables', () => {
    expect(() => parseConfig({ PORT: 'abc' })).toThrow(/PORT/);
    expect(() => parseConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
  });
});
