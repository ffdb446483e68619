import { describe, expect, it } from 'vitest';
import { causeChain, unwrapErrorType } from './unwrapErrorType.js';

class CatalogError extends Error {}

class OtherCatalogError extends Error {}

class StatusError extends Error {
  constructor(
    message: string,
    readonly status: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

describe('unwrapErrorType', () => {
  it('returns null for non-error values', () => {
    expect(unwrapErrorType(CatalogError, { message: 'boom' })).toBeNull();
    expect(unwrapErrorType(CatalogError, 'boom')).toBeNull();
    expect(unwrapErrorType(CatalogError, undefined)).toBeNull();
  });

  it('returns the error itself when it matches', () => {
    const err = new StatusError('not found', 404);

    expect(unwrapErrorType(StatusError, err)).toBe(err);
  });

  it('unwraps an error nested several causes deep', () => {
    const err = new StatusError('not found', 404);
    const wrapped1 = new Error('error doing request in get', { cause: err });
    const wrapped2 = new Error('error dispatching GET', { cause: wrapped1 });
    const wrapped3 = new Error('error running request', { cause: wrapped2 });

    expect(unwrapErrorType(StatusError, wrapped3)?.status).toBe(404);
  });

  it('returns the outermost match when the type appears twice', () => {
    const inner = new CatalogError('inner');
    const outer = new CatalogError('outer', { cause: new Error('middle', { cause: inner }) });

    expect(unwrapErrorType(CatalogError, outer)).toBe(outer);
  });

  it('returns null when the chain holds only other types', () => {
    const err = new OtherCatalogError('other', { cause: new Error('plain') });

    expect(unwrapErrorType(CatalogError, err)).toBeNull();
  });

  it('stops at a cause that is not an error', () => {
    const err = new Error('outer', { cause: { message: 'not an error' } });

    expect(unwrapErrorType(CatalogError, err)).toBeNull();
  });
});

describe('causeChain', () => {
  it('lists the error and its causes outermost first', () => {
    const root = new Error('root');
    const middle = new CatalogError('middle', { cause: root });
    const outer = new Error('outer', { cause: middle });

    expect(causeChain(outer)).toEqual([outer, middle, root]);
  });

  it('returns an empty list for non-errors', () => {
    expect(causeChain('boom')).toEqual([]);
  });

  it('stops on a cyclic chain', () => {
    const a = new Error('a');
    const b = new Error('b', { cause: a });
    a.cause = b;

    expect(causeChain(b)).toEqual([b, a]);
  });
});
