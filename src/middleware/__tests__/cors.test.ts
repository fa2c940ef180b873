import { getConfig, parseConfig } from '../../config';
import { isAllowedOrigin } from '../cors';

jest.mock('../../config', () => ({
  ...jest.requireActual('../../config'),
  getConfig: jest.fn(),
}));

const mockedGetConfig = jest.mocked(getConfig);

describe('isAllowedOrigin', () => {
  it('should allow requests without an Origin header', () => {
    mockedGetConfig.mockReturnValue(parseConfig({ NODE_ENV: 'production', FRONTEND_ORIGIN: 'https://app.test' }));

    expect(isAllowedOrigin(undefined)).toBe(true);
  });

  it('should allow every origin when FRONTEND_ORIGIN is *', () => {
    mockedGetConfig.mockReturnValue(parseConfig({ NODE_ENV: 'production' }));

    expect(isAllowedOrigin('https://anything.test')).toBe(true);
  });

  it('should only allow listed origins in production', () => {
    mockedGetConfig.mockReturnValue(
      parseConfig({
        NODE_ENV: 'production',
        FRONTEND_ORIGIN: 'https://app.test',
        CORS_ORIGIN: 'https://admin.test, https://staff.test',
      })
    );

    expect(isAllowedOrigin('https://app.test')).toBe(true);
    expect(isAllowedOrigin('https://staff.test')).toBe(true);
    expect(isAllowedOrigin('https://other.test')).toBe(false);
    expect(isAllowedOrigin('http://localhost:5173')).toBe(false);
  });

  it('should allow localhost during development', () => {
    mockedGetConfig.mockReturnValue(parseConfig({ NODE_ENV: 'development', FRONTEND_ORIGIN: 'https://app.test' }));

    expect(isAllowedOrigin('http://localhost:5173')).toBe(true);
    expect(isAllowedOrigin('http://127.0.0.1')).toBe(true);
    expect(isAllowedOrigin('http://localhost.other.test')).toBe(false);
  });
});
