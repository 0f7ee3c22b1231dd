import { describe, it, expect } from 'vitest';
import { StreamingError, isStreamingError } from '../../../src/domain/errors/StreamingError.js';

describe('StreamingError', () => {
  it('should carry code, message and line number', () => {
    const cause = new SyntaxError('Unexpected token');
    const error = new StreamingError('DECODE', 'bad record', { lineNumber: 7, cause });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('StreamingError');
    expect(error.code).toBe('DECODE');
    expect(error.message).toBe('bad record');
    expect(error.lineNumber).toBe(7);
    expect(error.cause).toBe(cause);
  });

  it('should leave lineNumber undefined when not given', () => {
    expect(new StreamingError('CONFIGURATION', 'oops').lineNumber).toBeUndefined();
  });

  it('should be recognised by isStreamingError', () => {
    expect(isStreamingError(new StreamingError('CONFIGURATION', 'x'))).toBe(true);
    expect(isStreamingError(new Error('x'))).toBe(false);
    expect(isStreamingError('x')).toBe(false);
  });
});
