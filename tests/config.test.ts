import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { SCANNER_CONFIG } from '../src/utils/config.js';

describe('SCANNER_CONFIG', () => {
  it('takes the log level from LOG_LEVEL', () => {
    expect(SCANNER_CONFIG.logLevel).toBe('silent');
  });

  it('points at the bundled sample_data directory by default', () => {
    expect(SCANNER_CONFIG.sampleDataDir).toBe(path.resolve('sample_data'));
  });

  it('is frozen', () => {
    expect(Object.isFrozen(SCANNER_CONFIG)).toBe(true);
  });
});
