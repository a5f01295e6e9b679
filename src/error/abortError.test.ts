import { describe, expect, it } from 'vitest';
import { AbortError, isAbortError } from './abortError.js';
import { TransportError } from './transportError.js';

describe('isAbortError', () => {
  it('returns true for instances of AbortError', () => {
    expect(isAbortError(new AbortError('stopped'))).toBe(true);
  });

  it('returns true when wrapped by a transport error', () => {
    const err = new TransportError('error calling GET me', { cause: new AbortError('stopped') });
    expect(isAbortError(err)).toBe(true);
  });

  it('returns false for non-abort errors', () => {
    expect(isAbortError(new Error('boom'))).toBe(false);
  });
});
