import { Headers } from 'undici';
import { describe, expect, test } from 'vitest';
import { mergeHeaderOptions } from './utils.js';

function plain(headers: Headers): Record<string, string> {
  return Object.fromEntries(headers.entries());
}

describe('mergeHeaderOptions', () => {
  test('merge two-dimensional arrays', () => {
    const merged = mergeHeaderOptions([['a', 'b']], [['c', 'd']]);

    expect(plain(merged)).toEqual({ a: 'b', c: 'd' });
  });

  test('last array takes precedence', () => {
    const merged = mergeHeaderOptions([['a', 'b']], [['a', 'd']]);

    expect(plain(merged)).toEqual({ a: 'd' });
  });

  test('merge objects', () => {
    const merged = mergeHeaderOptions({ a: 'b' }, { c: 'd' });

    expect(plain(merged)).toEqual({ a: 'b', c: 'd' });
  });

  test('header names are case-insensitive', () => {
    const merged = mergeHeaderOptions(
      { 'Content-Type': 'application/x-www-form-urlencoded' },
      { 'content-type': 'text/plain' },
    );

    expect(plain(merged)).toEqual({ 'content-type': 'text/plain' });
  });

  test('null and undefined remove headers', () => {
    const merged = mergeHeaderOptions({ a: 'b', c: 'd' }, { a: null, c: undefined });

    expect(plain(merged)).toEqual({});
  });

  test('merge Headers instances', () => {
    const merged = mergeHeaderOptions(new Headers({ a: 'b' }), { c: 'd' });

    expect(plain(merged)).toEqual({ a: 'b', c: 'd' });
  });

  test('merge any iterable of pairs', () => {
    const merged = mergeHeaderOptions(new Map([['a', 'b']]), [['c', 'd']]);

    expect(plain(merged)).toEqual({ a: 'b', c: 'd' });
  });

  test('empty input gives empty headers', () => {
    expect(plain(mergeHeaderOptions())).toEqual({});
  });
});
