import { describe, it, expect } from 'vitest';
import {
  RemoveTaskConfigSchema,
  TransferTaskConfigSchema,
  parseTaskConfig,
} from '../schema.js';
import { InvalidInputError } from '../errors.js';
import { createRecordingLogger } from '../../__tests__/test-helpers.js';

describe('task configuration schemas', () => {
  it('should default missing paths to empty strings', () => {
    expect(parseTaskConfig(TransferTaskConfigSchema, {})).toEqual({ sourcePath: '', targetPath: '' });
    expect(parseTaskConfig(RemoveTaskConfigSchema, {})).toEqual({ removePath: '' });
  });

  it('should keep valid options', () => {
    const config = parseTaskConfig(TransferTaskConfigSchema, {
      sourcePath: 'a',
      targetPath: 'b',
      name: 'stage-input',
      logLevel: 'debug',
    });

    expect(config).toEqual({ sourcePath: 'a', targetPath: 'b', name: 'stage-input', logLevel: 'debug' });
  });

  it('should strip collaborators that are not part of the schema', () => {
    const config = parseTaskConfig(RemoveTaskConfigSchema, {
      removePath: '/tmp/x',
      logger: createRecordingLogger(),
    });

    expect(config).toEqual({ removePath: '/tmp/x' });
  });

  it('should reject an unknown log level', () => {
    expect(() => parseTaskConfig(RemoveTaskConfigSchema, { logLevel: 'verbose' })).toThrow(InvalidInputError);
  });

  it('should reject a non-string path', () => {
    try {
      parseTaskConfig(TransferTaskConfigSchema, { sourcePath: 7 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      if (error instanceof InvalidInputError) {
        expect(error.message).toBe('Invalid task configuration');
        expect(error.getDetails()).toBe('sourcePath: Expected string, received number');
      }
    }
  });
});
