import { describe, it, expect } from 'vitest';
import { createLogger, errorMessage } from './logger.js';

function capture() {
  const lines: string[] = [];
  return { lines, write: (line: string) => void lines.push(line) };
}

describe('createLogger', () => {
  it('writes scoped lines with the level tag', () => {
    const sink = capture();
    const log = createLogger('runner', { write: sink.write, color: false });

    log.info('started');
    log.error('failed');

    expect(sink.lines).toEqual(['[runner] INFO started\n', '[runner] ERROR failed\n']);
  });

  it('drops messages below the configured level', () => {
    const sink = capture();
    const log = createLogger('runner', { level: 'warn', write: sink.write, color: false });

    log.debug('a');
    log.info('b');
    log.warn('c');

    expect(sink.lines).toEqual(['[runner] WARN c\n']);
  });

  it('writes nothing at silent', () => {
    const sink = capture();
    const log = createLogger('runner', { level: 'silent', write: sink.write, color: false });

    log.error('boom');

    expect(sink.lines).toEqual([]);
  });

  it('nests child scopes and keeps the level', () => {
    const sink = capture();
    const log = createLogger('pipeline', { level: 'debug', write: sink.write, color: false });

    log.child('loop').debug('pass 1');

    expect(sink.lines).toEqual(['[pipeline:loop] DEBUG pass 1\n']);
  });

  it('colors the level tag when asked', () => {
    const sink = capture();
    const log = createLogger('runner', { write: sink.write, color: true });

    log.warn('slow');

    expect(sink.lines[0]).toBe('[runner] \x1b[33mWARN\x1b[39m slow\n');
  });
});

describe('errorMessage', () => {
  it('uses the message of an Error', () => {
    expect(errorMessage(new Error('nope'))).toBe('nope');
  });

  it('stringifies anything else', () => {
    expect(errorMessage(42)).toBe('42');
  });
});
