import { describe, expect, it } from 'vitest';
import { buildLogger, logger } from './logger';

describe('logger', () => {
  it('stays silent under test whatever level is configured', () => {
    expect(buildLogger({ env: 'test', level: 'debug', logsDir: '/tmp/unused' }).level).toBe('silent');
    expect(logger.level).toBe('silent');
  });
});
