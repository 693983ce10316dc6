import { describe, it, expect } from 'vitest';
import { BUNDLED_DATA_DIR, DEFAULT_CONFIG, createConfig } from './config.js';

describe('createConfig()', () => {
  it('should default to the bundled dataset', () => {
    expect(createConfig({}, {})).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.dataDir).toBe(BUNDLED_DATA_DIR);
  });

  it('should read the environment', () => {
    const config = createConfig({}, { VN_DIVISIONS_DATA_DIR: '/srv/divisions', LOG_LEVEL: 'DEBUG' });

    expect(config).toEqual({ dataDir: '/srv/divisions', logLevel: 'debug' });
  });

  it('should ignore an empty data directory variable', () => {
    expect(createConfig({}, { VN_DIVISIONS_DATA_DIR: '' }).dataDir).toBe(BUNDLED_DATA_DIR);
  });

  it('should fall back to info for an unknown log level', () => {
    expect(createConfig({}, { LOG_LEVEL: 'verbose' }).logLevel).toBe('info');
  });

  it('should prefer explicit overrides over the environment', () => {
    const config = createConfig(
      { dataDir: '/opt/data', logLevel: 'error' },
      { VN_DIVISIONS_DATA_DIR: '/srv/divisions', LOG_LEVEL: 'debug' }
    );

    expect(config).toEqual({ dataDir: '/opt/data', logLevel: 'error' });
  });
});
