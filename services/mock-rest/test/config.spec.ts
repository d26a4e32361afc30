import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('falls back to defaults on an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      host: '0.0.0.0',
      debug: false,
      logLevel: 'info',
      bodyLimitBytes: 5 * 1024 * 1024,
      credentials: { username: 'admin', password: 'password' },
      connectPolicy: 'acknowledge',
    });
  });

  it('reads overrides from the environment', () => {
    const cfg = loadConfig({
      PORT: '9001',
      HOST: '127.0.0.1',
      DEBUG: 'yes',
      BODY_LIMIT_BYTES: '1024',
      MOCK_USERNAME: 'qa',
      MOCK_PASSWORD: 'test-secret',
      CONNECT_POLICY: 'REJECT',
    });
    expect(cfg).toEqual({
      port: 9001,
      host: '127.0.0.1',
      debug: true,
      logLevel: 'debug',
      bodyLimitBytes: 1024,
      credentials: { username: 'qa', password: 'test-secret' },
      connectPolicy: 'reject',
    });
  });

  it('ignores unusable numbers and unknown policies', () => {
    const cfg = loadConfig({ PORT: 'eighty', BODY_LIMIT_BYTES: '-5', CONNECT_POLICY: 'tunnel' });
    expect(cfg.port).toBe(8000);
    expect(cfg.bodyLimitBytes).toBe(5 * 1024 * 1024);
    expect(cfg.connectPolicy).toBe('acknowledge');
  });

  it('lets LOG_LEVEL win over the debug default', () => {
    expect(loadConfig({ DEBUG: '1', LOG_LEVEL: 'warn' }).logLevel).toBe('warn');
  });
});
