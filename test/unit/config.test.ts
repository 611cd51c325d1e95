import { describe, it, expect } from 'vitest';
import { loadServerConfig } from '../../src/server/config.js';

describe('loadServerConfig', () => {
  it('should apply defaults', () => {
    expect(loadServerConfig({})).toEqual({ port: 5000, host: '0.0.0.0', logLevel: 'info' });
  });

  it('should read values from the environment', () => {
    expect(loadServerConfig({ PORT: '8080', HOST: '127.0.0.1', LOG_LEVEL: 'debug' })).toEqual({
      port: 8080,
      host: '127.0.0.1',
      logLevel: 'debug',
    });
  });

  it('should reject invalid values', () => {
    expect(() => loadServerConfig({ PORT: 'http' })).toThrow('Invalid server configuration: PORT:');
    expect(() => loadServerConfig({ PORT: '70000' })).toThrow('Invalid server configuration: PORT:');
    expect(() => loadServerConfig({ LOG_LEVEL: 'verbose' })).toThrow('Invalid server configuration: LOG_LEVEL:');
  });
});
