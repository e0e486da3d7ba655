import { describe, expect, it } from 'vitest';

import { dropNilKeys, toPlainObject } from '../src/object';

class Frame {
  public constructor(
    public filename: string,
    public lineno: number,
  ) {}

  public get location(): string {
    return `${this.filename}:${this.lineno}`;
  }
}

describe('toPlainObject', () => {
  it('copies own fields into a plain object', () => {
    const plain = toPlainObject(new Frame('app.js', 10));

    expect(Object.getPrototypeOf(plain)).toBe(Object.prototype);
    expect(Object.keys(plain)).toEqual(['filename', 'lineno']);
  });
});

describe('dropNilKeys', () => {
  it('removes null and undefined values only', () => {
    const record = { a: 1, b: null, c: undefined, d: 0, e: '', f: false };

    const result = dropNilKeys(record);

    expect(Object.keys(result)).toEqual(['a', 'd', 'e', 'f']);
    expect(Object.keys(record)).toHaveLength(6);
  });
});
