import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should read paths, server and log level from the environment', () => {
    vi.stubEnv('DATA_PATH', 'notes');
    vi.stubEnv('TRASH_PATH', 'bin');
    vi.stubEnv('PORT', '8080');
    vi.stubEnv('LOG_LEVEL', 'debug');

    const config = loadConfig();

    expect(config.dataPath).toBe('notes');
    expect(config.trashPath).toBe('bin');
    expect(config.server.port).toBe(8080);
    expect(config.logLevel).toBe('debug');
  });

  it('should fall back to defaults', () => {
    vi.stubEnv('DATA_PATH', '');
    vi.stubEnv('PORT', '');
    vi.stubEnv('LOG_LEVEL', '');

    const config = loadConfig();

    expect(config.dataPath).toBe('data');
    expect(config.server.port).toBe(3000);
    expect(config.logLevel).toBe('info');
  });
});
