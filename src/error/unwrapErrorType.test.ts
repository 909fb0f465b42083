import { describe, expect, it } from 'vitest';
import { DecodeError } from './decodeError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

class CustomError extends Error {}

describe('unwrapErrorType', () => {
  it('non-error correctly returns null', () => {
    expect(unwrapErrorType(CustomError, { foo: 'bar' })).toEqual(null);
    expect(unwrapErrorType(CustomError, undefined)).toEqual(null);
  });

  it('unwrap simplest layer', () => {
    const err = new CustomError('test');

    expect(unwrapErrorType(CustomError, err)).toBe(err);
  });

  it('unwrap 5 layers', () => {
    const err = new DecodeError('error parsing json response body', 200);
    const wrapped1 = new Error('err1', { cause: err });
    const wrapped2 = new Error('err2', { cause: wrapped1 });
    const wrapped3 = new Error('err3', { cause: wrapped2 });
    const wrapped4 = new Error('err4', { cause: wrapped3 });

    const unwrapped = unwrapErrorType(DecodeError, wrapped4);

    expect(unwrapped).toBe(err);
    expect(unwrapped?.status).toBe(200);
  });

  it('returns the outermost match when the type appears twice', () => {
    const inner = new CustomError('inner');
    const outer = new CustomError('outer', { cause: new Error('middle', { cause: inner }) });

    expect(unwrapErrorType(CustomError, outer)).toBe(outer);
  });

  it('stops on a non-error cause', () => {
    const wrapped = new Error('wrapped', { cause: 'CustomError' });

    expect(unwrapErrorType(CustomError, wrapped)).toBeNull();
  });

  it('terminates on a cause chain that loops', () => {
    const first = new Error('first');
    const second = new Error('second', { cause: first });
    first.cause = second;

    expect(unwrapErrorType(CustomError, second)).toBeNull();
  });
});
