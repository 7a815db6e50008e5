import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { createLogger, createTimer } from '@/lib/logger';

describe('createLogger', () => {
  const savedLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    process.env.LOG_LEVEL = 'debug';
  });

  afterEach(() => {
    if (savedLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = savedLevel;
    }
  });

  it('should take the level from its options only', () => {
    expect(createLogger({ name: 'test', level: 'info' }).level).toBe('info');
  });

  it('should default to warn whatever LOG_LEVEL says', () => {
    expect(createLogger({ name: 'test' }).level).toBe('warn');
  });
});

describe('createTimer', () => {
  it('should return the elapsed milliseconds', () => {
    const timer = createTimer(createLogger({ name: 'test', level: 'silent' }), 'operation');

    expect(timer.end()).toBeGreaterThanOrEqual(0);
  });
});
