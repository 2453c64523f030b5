import { comparePathSegments, compareStrings, toPosixPath } from '../path';
import { stableStringify } from '../deterministicJson';

describe('path helpers', () => {
  it('converts backslashes to forward slashes', () => {
    expect(toPosixPath('native\\flecs\\src\\world.c')).toBe('native/flecs/src/world.c');
    expect(toPosixPath('native/flecs/src/world.c')).toBe('native/flecs/src/world.c');
  });

  it('orders by code unit', () => {
    expect(['b.c', 'B.c', 'a/b.c', 'a.c'].sort(compareStrings)).toEqual(['B.c', 'a.c', 'a/b.c', 'b.c']);
  });

  it('orders paths segment by segment', () => {
    expect(['a-b/x.c', 'a/y.c'].sort(comparePathSegments)).toEqual(['a/y.c', 'a-b/x.c']);
    expect(['a/b/c.c', 'a/b', 'a'].sort(comparePathSegments)).toEqual(['a', 'a/b', 'a/b/c.c']);
    expect(comparePathSegments('src/x.c', 'src/x.c')).toBe(0);
  });
});

describe('stableStringify', () => {
  it('sorts keys recursively and keeps array order', () => {
    expect(stableStringify({ b: [{ z: 1, a: 2 }], a: null }, 0)).toBe('{"a":null,"b":[{"a":2,"z":1}]}\n');
  });
});
