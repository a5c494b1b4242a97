import { describe, expect, it } from 'vitest';
import { getApiError, isApiError, toErrorEntries } from './apiError.js';
import { RequestError } from './requestError.js';
import { ResourceError } from './resourceError.js';
import { ServerError } from './serverError.js';

describe('toErrorEntries', () => {
  it('normalizes a list of error objects', () => {
    const entries = toErrorEntries([
      {
        code: 'invalid',
        message: 'is required',
        details: 'name cannot be blank',
        resource: 'component',
        field: '/component/name',
      },
    ]);

    expect(entries).toEqual([
      {
        code: 'invalid',
        message: 'is required',
        details: 'name cannot be blank',
        resource: 'component',
        field: '/component/name',
      },
    ]);
  });

  it('falls back to the error code for entries without one', () => {
    expect(toErrorEntries([{ message: 'missing' }])).toEqual([{ code: 'error', message: 'missing' }]);
  });

  it('reads { error: string } bodies', () => {
    expect(toErrorEntries({ error: 'Unauthorized' })).toEqual([{ code: 'error', message: 'Unauthorized' }]);
  });

  it('reads { error: string[] } bodies', () => {
    expect(toErrorEntries({ error: ['name is taken', 'status is invalid'] })).toEqual([
      { code: 'error', message: 'name is taken' },
      { code: 'error', message: 'status is invalid' },
    ]);
  });

  it('reads { errors: [...] } bodies', () => {
    expect(toErrorEntries({ errors: [{ code: 'not_found' }] })).toEqual([{ code: 'not_found' }]);
  });

  it('treats a single object as one entry', () => {
    expect(toErrorEntries({ code: 'conflict', detail: 'already exists' })).toEqual([
      { code: 'conflict', details: 'already exists' },
    ]);
  });

  it('stringifies non-string fields', () => {
    expect(toErrorEntries([{ code: 42 }])).toEqual([{ code: '42' }]);
  });

  it('returns no entries for null', () => {
    expect(toErrorEntries(null)).toEqual([]);
  });
});

describe('ApiError', () => {
  it('keeps status and the payload verbatim', () => {
    const payload = [{ code: 'invalid', field: 'name' }];
    const err = new ResourceError(422, payload);

    expect(err.status).toBe(422);
    expect(err.errors).toBe(payload);
    expect(err.entries).toEqual([{ code: 'invalid', field: 'name' }]);
    expect(err.message).toBe('invalid (name)');
    expect(err.name).toBe('ResourceError');
  });

  it('lists one entry per line in the message', () => {
    const err = new RequestError(400, [
      { code: 'invalid_param', message: 'unknown parameter' },
      { code: 'invalid_param', message: 'bad sort order', field: '/sort' },
    ]);

    expect(err.message).toBe('invalid_param: unknown parameter\ninvalid_param: bad sort order (/sort)');
  });

  it('falls back to the status when there are no entries', () => {
    expect(new ServerError(503, null).message).toBe('HTTP Error: 503');
  });

  it('matches every subclass', () => {
    const errors = [new RequestError(404, []), new ResourceError(422, []), new ServerError(500, [])];

    for (const err of errors) {
      expect(isApiError(err)).toBe(true);
      expect(getApiError(new Error('wrapped', { cause: err }))).toBe(err);
    }

    expect(isApiError(new Error('boom'))).toBe(false);
  });
});
