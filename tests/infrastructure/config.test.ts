import { describe, it, expect } from 'vitest';
import { loadClientConfig } from '../../src/infrastructure/config.js';
import { ConfigurationError } from '../../src/domain/index.js';

describe('loadClientConfig', () => {
  it('falls back to defaults', () => {
    expect(loadClientConfig({})).toEqual({
      logLevel: 'info',
      streamKey: 'analytics_events',
      identityKey: 'analytics:identity',
      maxBufferedEvents: 1000,
    });
  });

  it('reads every supported variable', () => {
    expect(
      loadClientConfig({
        ANALYTICS_LOG_LEVEL: 'debug',
        ANALYTICS_REDIS_URL: 'redis://localhost:6379',
        ANALYTICS_STREAM_KEY: 'events',
        ANALYTICS_IDENTITY_KEY: 'app:identity',
        ANALYTICS_IDENTITY_FILE: '/var/lib/app/identity.json',
        ANALYTICS_MAX_BUFFERED_EVENTS: '50',
      }),
    ).toEqual({
      logLevel: 'debug',
      redisUrl: 'redis://localhost:6379',
      streamKey: 'events',
      identityKey: 'app:identity',
      identityFile: '/var/lib/app/identity.json',
      maxBufferedEvents: 50,
    });
  });

  it('treats empty strings as unset', () => {
    const config = loadClientConfig({ ANALYTICS_REDIS_URL: '', ANALYTICS_LOG_LEVEL: '' });
    expect(config.logLevel).toBe('info');
    expect('redisUrl' in config).toBe(false);
  });

  it('ignores unrelated variables', () => {
    expect(loadClientConfig({ HOME: '/root' }).logLevel).toBe('info');
  });

  it('rejects an unknown log level', () => {
    expect(() => loadClientConfig({ ANALYTICS_LOG_LEVEL: 'loud' })).toThrow(ConfigurationError);
    expect(() => loadClientConfig({ ANALYTICS_LOG_LEVEL: 'loud' })).toThrow(/ANALYTICS_LOG_LEVEL/);
  });

  it('rejects a non-positive buffer size and a malformed URL together', () => {
    expect(() =>
      loadClientConfig({ ANALYTICS_MAX_BUFFERED_EVENTS: '0', ANALYTICS_REDIS_URL: 'not a url' }),
    ).toThrow(/ANALYTICS_REDIS_URL: .*; ANALYTICS_MAX_BUFFERED_EVENTS: /);
  });
});
