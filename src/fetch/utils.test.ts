import { describe, expect, test } from 'vitest';
import { joinUrl, mergeHeaderOptions } from './index.js';

describe('mergeHeaderOptions', () => {
  test('merge two-dimensional arrays', () => {
    const merged = mergeHeaderOptions([['a', 'b']], [['c', 'd']]);

    expect(Object.fromEntries(merged)).toEqual({ a: 'b', c: 'd' });
  });

  test('merge objects', () => {
    const merged = mergeHeaderOptions({ a: 'b' }, { c: 'd' });

    expect(Object.fromEntries(merged)).toEqual({ a: 'b', c: 'd' });
  });

  test('merge headers', () => {
    const merged = mergeHeaderOptions(new Headers({ a: 'b' }), new Headers({ c: 'd' }));

    expect(Object.fromEntries(merged)).toEqual({ a: 'b', c: 'd' });
  });

  test('last source takes precedence, case-insensitively', () => {
    const merged = mergeHeaderOptions({ 'Content-Type': 'text/plain' }, new Headers({ 'content-type': 'application/json' }));

    expect(merged.get('content-type')).toBe('application/json');
  });

  test('drops headers explicitly set to undefined/null', () => {
    const merged = mergeHeaderOptions({ keep: '1', remove: 'x' }, { remove: null, gone: undefined, added: '2' });

    expect(Object.fromEntries(merged)).toEqual({ keep: '1', added: '2' });
    expect(merged.get('remove')).toBeNull();
  });

  test('skips missing sources', () => {
    expect(Object.fromEntries(mergeHeaderOptions(undefined, { a: 'b' }, undefined))).toEqual({ a: 'b' });
  });
});

describe('joinUrl', () => {
  test('joins with a single separator', () => {
    expect(joinUrl('https://ai.example.org', '/api/traceix/v1/upload')).toBe(
      'https://ai.example.org/api/traceix/v1/upload',
    );
    expect(joinUrl('https://ai.example.org/', 'api/traceix/v1/upload')).toBe(
      'https://ai.example.org/api/traceix/v1/upload',
    );
    expect(joinUrl('https://ai.example.org//', '//api/v1/traceix/status')).toBe(
      'https://ai.example.org/api/v1/traceix/status',
    );
  });

  test('keeps a base path prefix', () => {
    expect(joinUrl('http://localhost:8080/proxy', '/api/traceix/v1/capa')).toBe(
      'http://localhost:8080/proxy/api/traceix/v1/capa',
    );
  });
});
