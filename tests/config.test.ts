import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      host: '0.0.0.0',
      logLevel: 'info',
      corsEnabled: true,
      bodyLimit: '1mb',
    });
  });

  it('should read every variable', () => {
    expect(
      loadConfig({
        PORT: '8080',
        HOST: '127.0.0.1',
        LOG_LEVEL: 'debug',
        CORS_ENABLED: 'false',
        BODY_LIMIT: '512kb',
      }),
    ).toEqual({
      port: 8080,
      host: '127.0.0.1',
      logLevel: 'debug',
      corsEnabled: false,
      bodyLimit: '512kb',
    });
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: '70000' })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
    expect(() => loadConfig({ BODY_LIMIT: 'lots' })).toThrow(ConfigError);
  });

  it('should name every offending variable', () => {
    try {
      loadConfig({ PORT: 'abc', CORS_ENABLED: 'maybe' });
      expect.unreachable('loadConfig should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues.map(issue => issue.split(':')[0])).toEqual(['PORT', 'CORS_ENABLED']);
      }
    }
  });
});
