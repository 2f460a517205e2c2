import { DEFAULT_CONFIG, loadConfig } from '../src/config';
import { LogLevel } from '../src/logger';

describe('loadConfig', () => {
  test('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  test('treats blank values as unset', () => {
    expect(loadConfig({ PORT: '  ', RDG_TRUST_PROXY: '' })).toEqual(DEFAULT_CONFIG);
  });

  test('reads every variable', () => {
    expect(
      loadConfig({
        PORT: '8080',
        RDG_TRUST_PROXY: 'yes',
        RDG_DDNS_ENABLED: '0',
        RDG_AUTO_IP_KEYWORDS: ' Auto, ME ,',
        RDG_RATE_LIMIT_MAX: '5',
        RDG_RATE_LIMIT_WINDOW_MS: '1000',
        RDG_BROAD_RANGE_POLICY: 'WARN',
        RDG_LOG_LEVEL: 'Debug',
        RDG_SEED_DEMO: 'true',
      }),
    ).toEqual({
      port: 8080,
      trustProxy: true,
      ddnsEnabled: false,
      autoIpKeywords: ['auto', 'me'],
      rateLimit: { maxRequests: 5, windowMs: 1000 },
      broadRangePolicy: 'warn',
      logLevel: LogLevel.Debug,
      seedDemo: true,
    });
  });

  test.each([
    [{ PORT: 'abc' }, 'PORT must be an integer between 0 and 65535, got "abc"'],
    [{ PORT: '70000' }, 'PORT must be an integer between 0 and 65535, got "70000"'],
    [{ RDG_RATE_LIMIT_MAX: '0' }, 'RDG_RATE_LIMIT_MAX must be an integer between 1 and'],
    [{ RDG_RATE_LIMIT_WINDOW_MS: '1.5' }, 'RDG_RATE_LIMIT_WINDOW_MS must be an integer'],
    [{ RDG_TRUST_PROXY: 'maybe' }, 'RDG_TRUST_PROXY must be a boolean, got "maybe"'],
    [{ RDG_BROAD_RANGE_POLICY: 'allow' }, 'RDG_BROAD_RANGE_POLICY must be "reject" or "warn", got "allow"'],
    [{ RDG_LOG_LEVEL: 'verbose' }, 'RDG_LOG_LEVEL must be one of debug, info, warn, error, critical, got "verbose"'],
  ])('rejects %o', (env, message) => {
    expect(() => loadConfig(env)).toThrow(message);
  });
});
