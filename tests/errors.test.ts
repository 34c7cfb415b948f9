import { describe, expect, it } from 'vitest';
import { MergeError, describeError, isMergeError } from '../src/lib/errors';

describe('isMergeError', () => {
  it('recognises merge errors and keeps their kind', () => {
    const error: unknown = new MergeError('EmptyInput', 'No PDF pages found in the provided inputs.');

    expect(isMergeError(error)).toBe(true);
    if (isMergeError(error)) {
      expect(error.kind).toBe('EmptyInput');
      expect(error.name).toBe('MergeError');
    }
  });

  it('rejects plain errors and thrown values', () => {
    expect(isMergeError(new Error('boom'))).toBe(false);
    expect(isMergeError('boom')).toBe(false);
    expect(isMergeError(undefined)).toBe(false);
  });
});

describe('describeError', () => {
  it('uses the message of an Error and stringifies anything else', () => {
    expect(describeError(new MergeError('NotFound', 'Input file not found: /tmp/a.pdf'))).toBe(
      'Input file not found: /tmp/a.pdf',
    );
    expect(describeError(42)).toBe('42');
  });

  it('keeps the cause it was given', () => {
    const cause = new Error('ENOENT');
    expect(new MergeError('NotFound', 'missing', { cause }).cause).toBe(cause);
  });
});
