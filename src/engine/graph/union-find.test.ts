import { describe, it, expect } from 'vitest';
import { UnionFind } from './union-find.ts';

describe('UnionFind', () => {
  it('starts with singleton sets', () => {
    const uf = new UnionFind(3);
    expect(uf.size).toBe(3);
    expect(uf.connected(0, 1)).toBe(false);
    expect(uf.find(2)).toBe(2);
  });

  it('joins transitively', () => {
    const uf = new UnionFind(4);
    expect(uf.union(0, 1)).toBe(true);
    expect(uf.union(2, 3)).toBe(true);
    expect(uf.connected(0, 3)).toBe(false);
    expect(uf.union(1, 3)).toBe(true);
    expect(uf.connected(0, 2)).toBe(true);
  });

  it('reports redundant unions', () => {
    const uf = new UnionFind(2);
    uf.union(0, 1);
    expect(uf.union(1, 0)).toBe(false);
  });

  it('resets to singletons', () => {
    const uf = new UnionFind(2);
    uf.union(0, 1);
    uf.reset();
    expect(uf.connected(0, 1)).toBe(false);
  });
});
