import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, formatLogLine, setLogLevel } from './logger.js';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('formats a line with timestamp, level and scope', () => {
    expect(formatLogLine('warn', 'pipeline', 'Run failed', '2024-01-01T00:00:00.000Z'))
      .toBe('[2024-01-01T00:00:00.000Z] WARN [pipeline]: Run failed');
  });

  it('writes to stderr and drops messages below the threshold', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger('test');
    setLogLevel('warn');

    logger.info('hidden');
    logger.warn('shown', { runId: 'abc' });

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr.mock.calls[0][0]).toMatch(/^\[.+\] WARN \[test\]: shown$/);
    expect(stderr.mock.calls[0][1]).toEqual({ runId: 'abc' });
  });
});
