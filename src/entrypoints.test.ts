import { describe, expect, it } from 'vitest';
import * as core from './core/index.js';
import * as error from './error/index.js';
import * as root from './index.js';

describe('entrypoints', () => {
  it('core exposes the client and session', () => {
    expect(core.ResourceClient).toBe(root.ResourceClient);
    expect(core.Resource).toBe(root.Resource);
    expect(core.Session).toBe(root.Session);
    expect(core.createSession).toBe(root.createSession);
    expect(typeof core.resolveBaseUrl).toBe('function');
  });

  it('error exposes the error classes and their helpers', () => {
    expect(error.HTTPError).toBe(root.HTTPError);
    expect(error.UsageError).toBe(root.UsageError);
    expect(error.UnsupportedMethodError).toBe(root.UnsupportedMethodError);
    expect(error.ValidationError).toBe(root.ValidationError);
    expect(error.isUsageError(new root.UsageError('bad flag'))).toBe(true);
    expect(error.getUsageError(new Error('outer', { cause: new root.UsageError('bad flag') }))?.message).toBe(
      'bad flag',
    );
  });
});
