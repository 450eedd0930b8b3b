// =============================================================================
// Logger Tests — line rendering
// =============================================================================
import { renderLogLine } from '../utils/logger';

describe('renderLogLine', () => {
  it('should render timestamp, upper-cased level and message', () => {
    expect(
      renderLogLine({ timestamp: '2026-01-01T00:00:00.000Z', level: 'debug', message: 'LRU eviction' }),
    ).toBe('[2026-01-01T00:00:00.000Z] DEBUG: LRU eviction');
  });

  it('should append metadata as JSON', () => {
    expect(
      renderLogLine({
        timestamp: 't0',
        level: 'warn',
        message: 'Cache loader failed',
        key: 'user:1',
        error: 'timeout',
      }),
    ).toBe('[t0] WARN: Cache loader failed {"key":"user:1","error":"timeout"}');
  });

  it('should ignore symbol-keyed winston internals', () => {
    const info = {
      timestamp: 't0',
      level: 'info',
      message: 'ready',
      [Symbol.for('level')]: 'info',
    };
    expect(renderLogLine(info)).toBe('[t0] INFO: ready');
  });
});
