/**
 * Engine configuration and environment
 */

import { describe, it, expect } from 'vitest';
import { createConfig, DEFAULT_CONFIG, loadEnvironment } from '../../../core/config.js';
import { ConfigurationError } from '../../../core/errors.js';

describe('createConfig', () => {
  it('should merge overrides per group onto defaults', () => {
    const config = createConfig({ orchestrator: { concurrency: 4 } });
    expect(config.orchestrator.concurrency).toBe(4);
    expect(config.orchestrator.pageSize).toBe(DEFAULT_CONFIG.orchestrator.pageSize);
    expect(config.resolver).toEqual(DEFAULT_CONFIG.resolver);
  });

  it('should reject invalid values with every problem listed', () => {
    try {
      createConfig({ orchestrator: { seenSince: '2020', concurrency: 0 } });
      expect.unreachable('createConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.details).toEqual([
          'orchestrator.concurrency must be an integer >= 1',
          'orchestrator.seenSince must be YYYYMMDD',
        ]);
      }
    }
  });
});

describe('loadEnvironment', () => {
  it('should prefer WIGLE_API_TOKEN', () => {
    expect(loadEnvironment({ WIGLE_API_TOKEN: 'test-token' }).wigleAuthToken).toBe('test-token');
  });

  it('should build the token from name and key', () => {
    const env = loadEnvironment({ WIGLE_API_NAME: 'test-name', WIGLE_API_KEY: 'test-secret' });
    expect(env.wigleAuthToken).toBe(Buffer.from('test-name:test-secret').toString('base64'));
  });

  it('should treat blank values as unset', () => {
    expect(loadEnvironment({ WIGLE_API_TOKEN: '  ' }).wigleAuthToken).toBeNull();
  });

  it('should require the key when a name is given', () => {
    expect(() => loadEnvironment({ WIGLE_API_NAME: 'test-name' })).toThrow(ConfigurationError);
  });

  it('should normalize LOG_LEVEL', () => {
    expect(loadEnvironment({ LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
    expect(() => loadEnvironment({ LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
  });
});
