import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { FileTaskError, InvalidInputError, IOFailureError, toTaskError } from '../errors.js';

function errno(code: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`${code}: simulated, unlink '/tmp/x'`);
  error.code = code;
  error.path = '/tmp/x';
  error.syscall = 'unlink';
  return error;
}

describe('InvalidInputError', () => {
  it('should carry the parameter name', () => {
    const error = new InvalidInputError('No `sourcePath` provided', 'sourcePath');

    expect(error).toBeInstanceOf(FileTaskError);
    expect(error.name).toBe('InvalidInputError');
    expect(error.parameter).toBe('sourcePath');
    expect(error.getDetails()).toBe('No `sourcePath` provided');
  });

  it('should render zod issues as path: message lines', () => {
    const result = z.object({ name: z.string().min(1), logLevel: z.enum(['info']) }).safeParse({
      name: '',
      logLevel: 'loud',
    });
    if (result.success) throw new Error('expected schema to fail');

    const error = new InvalidInputError('Invalid task configuration', undefined, result.error);

    expect(error.getDetails()).toBe(
      [
        'name: String must contain at least 1 character(s)',
        "logLevel: Invalid enum value. Expected 'info', received 'loud'",
      ].join('\n')
    );
  });
});

describe('IOFailureError', () => {
  it('should copy errno fields and keep the cause', () => {
    const cause = errno('EPERM');
    const error = new IOFailureError(cause.message, cause, 'Remove');

    expect(error.name).toBe('IOFailureError');
    expect(error.code).toBe('EPERM');
    expect(error.path).toBe('/tmp/x');
    expect(error.syscall).toBe('unlink');
    expect(error.cause).toBe(cause);
    expect(error.task).toBe('Remove');
  });
});

describe('toTaskError', () => {
  it('should wrap errno errors', () => {
    const error = toTaskError(errno('ENOENT'), 'Remove');

    expect(error).toBeInstanceOf(IOFailureError);
    expect(error.message).toBe("ENOENT: simulated, unlink '/tmp/x'");
  });

  it('should tag task errors with the task name', () => {
    const original = new InvalidInputError('No `removePath` provided', 'removePath');

    const error = toTaskError(original, 'Remove');

    expect(error).toBe(original);
    expect(original.task).toBe('Remove');
  });

  it('should keep an existing task name', () => {
    const original = new FileTaskError('boom', 'first');

    toTaskError(original, 'second');

    expect(original.task).toBe('first');
  });

  it('should wrap non-Error values', () => {
    const error = toTaskError('plain string', 'Copy');

    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('plain string');
  });
});
