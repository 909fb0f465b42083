import { describe, expect, it } from 'vitest';
import { HTTPError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { TransportError } from './transportError.js';

class CustomError extends Error {}

class DifferentError extends Error {}

describe('isErrorType', () => {
  it('non-error correctly returns false', () => {
    expect(isErrorType(CustomError, { foo: 'bar' })).toEqual(false);
    expect(isErrorType(CustomError, 'CustomError')).toEqual(false);
    expect(isErrorType(CustomError, null)).toEqual(false);
  });

  it('expect shallow to correctly return true', () => {
    expect(isErrorType(CustomError, new CustomError('test'))).toEqual(true);
  });

  it('expect 4 layers deep to correctly return true, even though self wraps another', () => {
    const err = new CustomError('test', { cause: new Error('first') });
    const wrapped1 = new Error('err1', { cause: err });
    const wrapped2 = new DifferentError('err2', { cause: wrapped1 });
    const wrapped3 = new Error('err3', { cause: wrapped2 });

    expect(isErrorType(CustomError, wrapped3)).toEqual(true);
  });

  it('expect false on wrapped different error', () => {
    const err = new DifferentError('err');
    const wrapped = new Error('err1', { cause: err });

    expect(isErrorType(CustomError, wrapped)).toEqual(false);
  });

  it('expect same message but different class to return false', () => {
    const err = new Error('CustomError: test');

    expect(isErrorType(CustomError, err)).toEqual(false);
  });

  it('tells transport and http failures apart inside a wrapped chain', () => {
    const transport = new TransportError('error calling fetch', 'https://api.example.com/upload');
    const wrapped = new Error('error doing request in aiPrediction', { cause: transport });

    expect(isErrorType(TransportError, wrapped)).toEqual(true);
    expect(isErrorType(HTTPError, wrapped)).toEqual(false);
  });
});
