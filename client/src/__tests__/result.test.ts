import { describe, it, expect } from 'vitest';
import { err, isOk, ok, type Result, unwrap } from '../types';

describe('Result helpers', () => {
  it('creates successful results with ok()', () => {
    const result = ok<number, Error>(42);
    if (!isOk(result)) {
      throw new Error('expected ok result');
    }
    expect(result.value).toBe(42);
  });

  it('creates failure results with err()', () => {
    const cause = new Error('boom');
    const result = err<number, Error>(cause);
    if (result.ok) {
      throw new Error('expected error result');
    }
    expect(result.error).toBe(cause);
  });

  it('unwraps successful results', () => {
    expect(unwrap(ok('value'))).toBe('value');
  });

  it('rethrows Error instances from unwrap unchanged', () => {
    const cause = new RangeError('out of range');
    expect(() => unwrap(err(cause))).toThrow(cause);
  });

  it('wraps non-Error failures in unwrap', () => {
    expect(() => unwrap(err('id must be a non-empty string'))).toThrow('id must be a non-empty string');
  });

  it('guards correctly with isOk', () => {
    const values: Array<Result<number, string>> = [ok(7), err('bad')];
    const oks = values.filter(isOk);
    expect(oks).toEqual([{ ok: true, value: 7 }]);
  });
});
