import { describe, it, expect, afterEach } from 'vitest';
import { setupLogger } from '@shared/utils/logger';

describe('setupLogger', () => {
  const originalLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    process.env.LOG_LEVEL = originalLevel;
  });

  it('should use an explicit level', () => {
    expect(setupLogger('test', 'debug').level).toBe('debug');
  });

  it('should read LOG_LEVEL case-insensitively', () => {
    process.env.LOG_LEVEL = 'WARN';
    expect(setupLogger('test').level).toBe('warn');
  });

  it('should fall back to info for unknown levels', () => {
    expect(setupLogger('test', 'verbose').level).toBe('info');
  });
});
