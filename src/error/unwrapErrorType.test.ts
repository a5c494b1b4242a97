import { describe, expect, it } from 'vitest';
import { RequestError } from './requestError.js';
import { UnexpectedStatusError, UnknownError } from './unknownError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

class TargetError extends Error {}

class OtherError extends Error {}

describe('unwrapErrorType', () => {
  it('returns null for non-errors', () => {
    expect(unwrapErrorType(TargetError, { foo: 'bar' })).toBeNull();
    expect(unwrapErrorType(TargetError, 'boom')).toBeNull();
    expect(unwrapErrorType(TargetError, null)).toBeNull();
  });

  it('returns the error itself when it matches', () => {
    const err = new TargetError('target');
    expect(unwrapErrorType(TargetError, err)).toBe(err);
  });

  it('unwraps one layer of cause', () => {
    const err = new TargetError('target');
    const wrapped = new Error('outer', { cause: err });

    expect(unwrapErrorType(TargetError, wrapped)).toBe(err);
  });

  it('unwraps 5 layers', () => {
    const err = new TargetError('target');
    let wrapped: Error = err;
    for (let i = 0; i < 5; i++) {
      wrapped = new Error(`err${i}`, { cause: wrapped });
    }

    expect(unwrapErrorType(TargetError, wrapped)).toBe(err);
  });

  it('returns the outermost match', () => {
    const inner = new TargetError('inner');
    const outer = new TargetError('outer', { cause: inner });

    expect(unwrapErrorType(TargetError, new Error('wrap', { cause: outer }))).toBe(outer);
  });

  it('returns null when no error in the chain matches', () => {
    const err = new Error('outer', { cause: new OtherError('inner') });
    expect(unwrapErrorType(TargetError, err)).toBeNull();
  });

  it('stops at non-error causes', () => {
    const err = new Error('outer', { cause: { message: 'TargetError' } });
    expect(unwrapErrorType(TargetError, err)).toBeNull();
  });

  it('does not loop on circular causes', () => {
    const a = new Error('a');
    const b = new Error('b', { cause: a });
    a.cause = b;

    expect(unwrapErrorType(TargetError, a)).toBeNull();
  });

  it('matches subclasses through their base class', () => {
    const err = new UnexpectedStatusError(302, '', null);

    expect(unwrapErrorType(UnknownError, err)).toBe(err);
    expect(unwrapErrorType(RequestError, err)).toBeNull();
  });
});
