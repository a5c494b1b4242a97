import { describe, expect, it } from 'vitest';
import { toResource, unwrapEnvelope, wrapEnvelope } from './envelope.js';
import { Resource } from './resource.js';

describe('wrapEnvelope', () => {
  it('nests the body under the container', () => {
    const wrapped = wrapEnvelope('component', { name: 'x' });

    expect(wrapped).toEqual({ component: { name: 'x' } });
    expect(JSON.stringify(wrapped)).toBe('{"component":{"name":"x"}}');
  });
});

describe('unwrapEnvelope', () => {
  it('returns one resource per item, in order', () => {
    const [err, body] = unwrapEnvelope({ items: [{ id: 'a' }, { id: 'b' }, { id: 'c' }] });

    expect(err).toBeNull();
    expect(Array.isArray(body)).toBe(true);
    if (!Array.isArray(body)) return;

    expect(body).toHaveLength(3);
    expect(body.map((item) => item.get('id'))).toEqual(['a', 'b', 'c']);
    expect(body.every((item) => item instanceof Resource)).toBe(true);
  });

  it('returns an empty list for empty items', () => {
    expect(unwrapEnvelope({ items: [] })).toEqual([null, []]);
  });

  it('returns a single resource equal to a bare object', () => {
    const decoded = { id: 'c1', name: 'API', meta: { total: 1 } };
    const [err, body] = unwrapEnvelope(decoded);

    expect(err).toBeNull();
    expect(body).toBeInstanceOf(Resource);
    expect(body instanceof Resource && body.toJSON()).toEqual(decoded);
  });

  it('treats a bare list like items', () => {
    const [, body] = unwrapEnvelope([{ id: 'a' }, { id: 'b' }]);

    expect(Array.isArray(body) && body.map((item) => item.toJSON())).toEqual([{ id: 'a' }, { id: 'b' }]);
  });

  it('fails when items is not a list', () => {
    const [err, body] = unwrapEnvelope({ items: 'nope' });

    expect(body).toBeNull();
    expect(err?.message).toBe('error unwrapping envelope, items is not a list');
  });

  it('fails when an item is not an object', () => {
    const [err] = unwrapEnvelope({ items: [{ id: 'a' }, 2] });

    expect(err?.message).toBe('error unwrapping envelope, item 1 is not an object');
  });
});

describe('toResource', () => {
  it('keeps items nested', () => {
    const [err, body] = toResource({ items: [{ id: 'a' }] });

    expect(err).toBeNull();
    expect(body instanceof Resource && body.keys()).toEqual(['items']);
  });

  it('fails for scalar bodies', () => {
    expect(toResource('ok')[0]?.message).toBe('error decoding body, expected an object, got string');
    expect(toResource(null)[0]?.message).toBe('error decoding body, expected an object, got null');
  });
});
