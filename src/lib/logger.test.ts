import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, logger, setLogLevel, setLogSink, type LogLevel } from './logger';

describe('logger', () => {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  let restore: () => void = () => undefined;

  afterEach(() => {
    restore();
    lines.length = 0;
    setLogLevel('info');
  });

  function capture() {
    restore = setLogSink((level, line) => lines.push({ level, line }));
  }

  it('formats level, tag, message and meta', () => {
    capture();
    createLogger('Store').warn('write failed', { path: '/tmp/x.json' });
    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe('warn');
    expect(lines[0].line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[WARN\] \[Store\] write failed \{"path":"\/tmp\/x.json"\}$/);
  });

  it('drops lines below the configured level', () => {
    capture();
    setLogLevel('warn');
    logger.info('Desk', 'hidden');
    logger.error('Desk', 'shown');
    expect(lines.map((l) => l.level)).toEqual(['error']);
  });

  it('serializes Error values in meta as their message', () => {
    capture();
    logger.error('Bot', 'send failed', { error: new Error('timeout') });
    expect(lines[0].line.endsWith('send failed {"error":"timeout"}')).toBe(true);
  });
});
