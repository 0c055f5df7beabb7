import { afterEach, describe, expect, it, vi } from 'vitest';
import { Logger, stderrTransport, type LogEntry } from './log';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('is silent until a transport is attached', () => {
    const log = new Logger({ level: 'debug' });
    expect(log.isEnabled('error')).toBe(false);
  });

  it('filters by level', () => {
    const seen: LogEntry[] = [];
    const log = new Logger({ level: 'warn' }).addTransport((e) => seen.push(e));
    log.debug('a');
    log.info('b');
    log.warn('c');
    log.error('d', { code: 1 });
    expect(seen.map((e) => `${e.level}:${e.message}`)).toEqual(['warn:c', 'error:d']);
    expect(seen[1].data).toEqual({ code: 1 });
  });

  it('shares level and transports with children', () => {
    const seen: LogEntry[] = [];
    const root = new Logger({ context: 'root' });
    const child = root.child('builder');
    root.addTransport((e) => seen.push(e));
    root.setLevel('debug');

    child.debug('cloned');
    expect(seen).toHaveLength(1);
    expect(seen[0].context).toBe('root.builder');
    expect(child.level).toBe('debug');
  });

  it('stops writing to a removed transport', () => {
    const seen: LogEntry[] = [];
    const transport = (e: LogEntry) => {
      seen.push(e);
    };
    const log = new Logger().addTransport(transport);
    log.info('one');
    log.removeTransport(transport);
    log.info('two');
    expect(seen.map((e) => e.message)).toEqual(['one']);
  });
});

describe('stderrTransport', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes one line per entry', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    stderrTransport({ level: 'warn', message: 'm', context: 'c', timestamp: 'T', data: { n: 1 } });
    stderrTransport({ level: 'info', message: 'plain', timestamp: 'T' });
    expect(write.mock.calls.map((call) => call[0])).toEqual(['T WARN [c] m {"n":1}\n', 'T INFO  plain\n']);
  });
});
