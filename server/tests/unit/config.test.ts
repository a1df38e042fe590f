import { describe, it, expect } from 'vitest';
import { DEFAULT_MAX_INPUT_BYTES, loadConfig } from '../../bootstrap/config.js';
import { getLogger, runLogger } from '../../bootstrap/logger.js';
import { ConfigError } from '../../domain/errors.js';

describe('Configuration', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      nodeEnv: 'local',
      logLevel: 'info',
      logPretty: false,
      maxInputBytes: 67108864,
    });
    expect(DEFAULT_MAX_INPUT_BYTES).toBe(64 * 1024 * 1024);
  });

  it('reads the environment', () => {
    expect(
      loadConfig({ NODE_ENV: 'prod', LOG_LEVEL: 'warn', LOG_PRETTY: 'true', MAX_INPUT_BYTES: '1024' })
    ).toEqual({ nodeEnv: 'prod', logLevel: 'warn', logPretty: true, maxInputBytes: 1024 });
  });

  it('lists every invalid setting', () => {
    let caught: unknown;
    try {
      loadConfig({ NODE_ENV: 'staging', LOG_LEVEL: 'loud', MAX_INPUT_BYTES: 'lots' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(3);
      expect(caught.issues).toEqual(
        expect.arrayContaining([
          '/nodeEnv must be equal to one of the allowed values',
          '/logLevel must be equal to one of the allowed values',
          '/maxInputBytes must be integer',
        ])
      );
    }
  });

  it('rejects a zero input limit', () => {
    expect(() => loadConfig({ MAX_INPUT_BYTES: '0' })).toThrow('Invalid configuration: /maxInputBytes must be >= 1');
  });
});

describe('Logger', () => {
  it('honours the configured level', () => {
    expect(getLogger({ logLevel: 'silent', logPretty: false }).level).toBe('silent');
  });

  it('binds the tool name and a run id to each run', () => {
    const logger = runLogger(getLogger({ logLevel: 'silent', logPretty: false }), 'converter');
    const bindings = logger.bindings();
    expect(bindings.tool).toBe('converter');
    expect(bindings.runId).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });
});
