import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { Priority, TaskValidationError } from '@tasklane/core';
import type { DataResult } from '@tasklane/core';
import type { MockInstance } from 'vitest';
import {
  parsePriorityArg,
  parseDueArg,
  parseTaskIdArg,
  unwrap,
  $try,
} from '../src/helpers.js';

let logSpy: MockInstance<typeof console.log>;

function printed(): string[] {
  return logSpy.mock.calls.map(args => args.map(String).join(' '));
}

beforeEach(() => {
  chalk.level = 0;
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  logSpy.mockRestore();
  process.exitCode = undefined;
});

describe('parsePriorityArg', () => {
  it('parses names', () => {
    expect(parsePriorityArg('lowest')).toBe(Priority.Lowest);
    expect(parsePriorityArg('high')).toBe(Priority.High);
    expect(parsePriorityArg(' Highest ')).toBe(Priority.Highest);
  });

  it('parses numbers and p-numbers', () => {
    expect(parsePriorityArg('3')).toBe(3);
    expect(parsePriorityArg('p2')).toBe(2);
  });

  it('passes out-of-range numbers through for validation', () => {
    expect(parsePriorityArg('9')).toBe(9);
    expect(parsePriorityArg('-1')).toBe(-1);
  });

  it('returns null for unknown', () => {
    expect(parsePriorityArg('critical')).toBeNull();
    expect(parsePriorityArg('2.5')).toBeNull();
  });
});

describe('parseDueArg', () => {
  const fixed = new Date(2026, 1, 8);

  it('resolves friendly dates', () => {
    expect(parseDueArg('tomorrow', fixed)).toBe('2026-02-09');
    expect(parseDueArg('+1w', fixed)).toBe('2026-02-15');
  });

  it('keeps unknown input as typed', () => {
    expect(parseDueArg('someday', fixed)).toBe('someday');
  });
});

describe('parseTaskIdArg', () => {
  it('accepts positive integers only', () => {
    expect(parseTaskIdArg('12')).toBe(12);
    expect(parseTaskIdArg('0')).toBeNull();
    expect(parseTaskIdArg('abc')).toBeNull();
  });
});

describe('unwrap', () => {
  it('returns data on success', () => {
    const result: DataResult<string> = { type: 'success', data: 'ok' };
    expect(unwrap(result)).toBe('ok');
  });

  it('reports not-found and returns null', () => {
    const result: DataResult<string> = { type: 'not-found', taskId: 7 };
    expect(unwrap(result)).toBeNull();
    expect(printed()).toEqual(['Task not found: 7']);
    expect(process.exitCode).toBe(1);
  });

  it('throws validation failures', () => {
    const result: DataResult<string> = { type: 'invalid', details: { priority: 'Priority must be between 1 and 5' } };
    expect(() => unwrap(result)).toThrow(TaskValidationError);
  });
});

describe('$try', () => {
  it('calls the wrapped function', () => {
    const fn = vi.fn();
    $try(fn);
    expect(fn).toHaveBeenCalledOnce();
    expect(process.exitCode).toBeUndefined();
  });

  it('prints the message of a thrown error', () => {
    $try(() => {
      throw new Error('test error');
    });
    expect(printed()).toEqual(['test error']);
    expect(process.exitCode).toBe(1);
  });

  it('prints validation failures one field per line', () => {
    $try(() => {
      throw new TaskValidationError({
        priority: 'Priority must be between 1 and 5',
        due_date: 'Due date cannot be in the past',
      });
    });
    expect(printed()).toEqual([
      'Validation failed:',
      '  priority: Priority must be between 1 and 5',
      '  due_date: Due date cannot be in the past',
    ]);
  });
});
