import { describe, expect, it } from 'vitest';

import { CardwiseError, InvalidEaseError, SessionStateError, extractErrorCode, isCardwiseError } from '../errors';

describe('extractErrorCode', () => {
  it('reads the code of library errors', () => {
    const error = new InvalidEaseError(1.1);

    expect(error.name).toBe('InvalidEaseError');
    expect(error.message).toBe('Ease must be a number of at least 1.3, received 1.1.');
    expect(extractErrorCode(error)).toBe('INVALID_EASE');
    expect(isCardwiseError(error)).toBe(true);
    expect(error).toBeInstanceOf(CardwiseError);
  });

  it('follows the cause chain', () => {
    const wrapped = new Error('commit failed', { cause: new SessionStateError('finished') });

    expect(extractErrorCode(wrapped)).toBe('SESSION_STATE');
    expect(isCardwiseError(wrapped)).toBe(false);
  });

  it('accepts foreign errors that carry a string code', () => {
    expect(extractErrorCode({ code: 'ENOENT' })).toBe('ENOENT');
    expect(extractErrorCode(new Error('plain'))).toBeUndefined();
    expect(extractErrorCode(null)).toBeUndefined();
  });
});
