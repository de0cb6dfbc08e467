import { describe, it, expect } from 'vitest';
import { createLogger } from '../../src/logging/logger.js';

function capture(): { lines: string[]; destination: { write(msg: string): void } } {
  const lines: string[] = [];
  return { lines, destination: { write: (msg: string) => { lines.push(msg); } } };
}

describe('createLogger', () => {
  it('writes JSON lines with a level label and ISO time', () => {
    const { lines, destination } = capture();
    const logger = createLogger({ destination });

    logger.info({ taskId: 7 }, 'task created');

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? '');
    expect(entry).toMatchObject({ level: 'info', name: 'tasklane', msg: 'task created', taskId: 7 });
    expect(entry).toHaveProperty('time', expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/));
  });

  it('drops entries below the configured level', () => {
    const { lines, destination } = capture();
    const logger = createLogger({ level: 'warn', destination });

    logger.info('hidden');
    logger.warn('shown');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ level: 'warn', msg: 'shown' });
  });

  it('uses the given name', () => {
    const { lines, destination } = capture();
    createLogger({ name: 'api', destination }).error('boom');
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ name: 'api', level: 'error' });
  });

  it('stays quiet when silent', () => {
    const { lines, destination } = capture();
    createLogger({ level: 'silent', destination }).fatal('nothing');
    expect(lines).toEqual([]);
  });
});
