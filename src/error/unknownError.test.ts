import { describe, expect, it } from 'vitest';
import {
  getUnknownError,
  isUnexpectedStatusError,
  isUnknownError,
  UnexpectedStatusError,
  UnknownError,
} from './unknownError.js';

describe('UnknownError', () => {
  it('keeps status and body verbatim', () => {
    const err = new UnknownError(500, 'Internal Error');

    expect(err.status).toBe(500);
    expect(err.body).toBe('Internal Error');
    expect(err.message).toBe('unknown HTTP error response, json expected; status=500; body=Internal Error');
  });

  it('is not an UnexpectedStatusError', () => {
    expect(isUnexpectedStatusError(new UnknownError(500, ''))).toBe(false);
  });

  it('unwraps nested causes', () => {
    const err = new UnknownError(502, '<html></html>');
    expect(getUnknownError(new Error('outer', { cause: err }))).toBe(err);
  });
});

describe('UnexpectedStatusError', () => {
  it('carries status, body and decoded payload', () => {
    const err = new UnexpectedStatusError(302, '{"moved":true}', { moved: true });

    expect(err.status).toBe(302);
    expect(err.body).toBe('{"moved":true}');
    expect(err.errors).toEqual({ moved: true });
    expect(err.message).toBe('unexpected HTTP error status 302');
    expect(err.name).toBe('UnexpectedStatusError');
  });

  it('is also an UnknownError', () => {
    const err = new UnexpectedStatusError(302, '', null);

    expect(isUnknownError(err)).toBe(true);
    expect(isUnexpectedStatusError(err)).toBe(true);
  });
});
