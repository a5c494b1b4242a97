import { describe, expect, it } from 'vitest';
import { getRequestError, isRequestError, RequestError } from './requestError.js';
import { ResourceError } from './resourceError.js';

describe('RequestError', () => {
  it('returns true for instances of RequestError', () => {
    expect(isRequestError(new RequestError(401, { error: 'Unauthorized' }))).toBe(true);
  });

  it('returns false for other api errors', () => {
    expect(isRequestError(new ResourceError(422, []))).toBe(false);
  });

  it('unwraps nested causes', () => {
    const err = new RequestError(404, []);
    expect(getRequestError(new Error('outer', { cause: err }))?.status).toBe(404);
  });
});
