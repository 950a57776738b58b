import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { describeError } from './errors.js';

describe('describeError', () => {
  it('uses the message of an Error', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
  });

  it('lists zod issues with their paths', () => {
    const result = z.object({ limit: z.number().positive() }).safeParse({ limit: -1 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(describeError(result.error)).toBe('limit: Number must be greater than 0');
    }
  });

  it('falls back for non-errors', () => {
    expect(describeError('nope')).toBe('Unknown error');
  });
});
