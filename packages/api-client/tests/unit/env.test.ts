/**
 * Unit tests for environment parsing and control-mode resolution.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { _resetEnvCache, parseEnv, resolveControlMode } from '../../src/config/index.js';
import { ConfigError } from '../../src/types/index.js';

const base = { PANEL_URL: 'https://panel.test/', PANEL_APPLICATION_KEY: 'test-secret' };

beforeEach(() => {
  _resetEnvCache();
});

describe('parseEnv', () => {
  it('applies defaults and strips trailing slashes', () => {
    const env = parseEnv(base);

    expect(env.PANEL_URL).toBe('https://panel.test');
    expect(env.PANEL_REQUEST_TIMEOUT_MS).toBe(30000);
    expect(env.PANEL_WIZARD_IDLE_TIMEOUT_MS).toBe(180000);
    expect(env.PANEL_NODE_ENV).toBe('development');
    expect(env.PANEL_LOG_LEVEL).toBe('info');
    expect(env.PANEL_CLIENT_KEY).toBeUndefined();
  });

  it('coerces numeric settings', () => {
    const env = parseEnv({ ...base, PANEL_REQUEST_TIMEOUT_MS: '5000' });
    expect(env.PANEL_REQUEST_TIMEOUT_MS).toBe(5000);
  });

  it('treats blank values as unset', () => {
    const env = parseEnv({ ...base, PANEL_CLIENT_KEY: '  ', PANEL_LOG_LEVEL: '' });
    expect(env.PANEL_CLIENT_KEY).toBeUndefined();
    expect(env.PANEL_LOG_LEVEL).toBe('info');
  });

  it('caches the first result until reset', () => {
    const first = parseEnv(base);
    expect(parseEnv({ ...base, PANEL_URL: 'https://other.test' })).toBe(first);
  });

  it('lists every problem', () => {
    expect(() => parseEnv({ PANEL_REQUEST_TIMEOUT_MS: '10' })).toThrow(ConfigError);
    _resetEnvCache();
    let message = '';
    try {
      parseEnv({ PANEL_URL: 'not a url' });
    } catch (e) {
      message = e instanceof Error ? e.message : '';
    }
    expect(message).toContain('  - PANEL_URL: Invalid url');
    expect(message).toContain('  - PANEL_APPLICATION_KEY: Required');
  });

  it('rejects owner mode without a client key', () => {
    expect(() => parseEnv({ ...base, PANEL_CONTROL_MODE: 'owner' })).toThrow(
      'PANEL_CLIENT_KEY: required when PANEL_CONTROL_MODE=owner',
    );
  });
});

describe('resolveControlMode', () => {
  it('follows an explicit mode', () => {
    expect(resolveControlMode({ PANEL_CONTROL_MODE: 'admin', PANEL_CLIENT_KEY: 'client-secret' })).toBe(
      'admin-override',
    );
    expect(resolveControlMode({ PANEL_CONTROL_MODE: 'owner', PANEL_CLIENT_KEY: 'client-secret' })).toBe(
      'owner-scoped',
    );
  });

  it('derives the mode from the configured keys', () => {
    expect(resolveControlMode({ PANEL_CONTROL_MODE: undefined, PANEL_CLIENT_KEY: 'client-secret' })).toBe(
      'owner-scoped',
    );
    expect(resolveControlMode({ PANEL_CONTROL_MODE: undefined, PANEL_CLIENT_KEY: undefined })).toBe(
      'admin-override',
    );
  });
});
