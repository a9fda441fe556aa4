/**
 * Disjoint-set forest over the integers `0 .. size-1`, with path halving
 * and union by size. Used to group cells into nodes and, per tick, to group
 * nodes joined by conducting relays.
 */
export class UnionFind {
  private readonly parent: Int32Array;
  private readonly rank: Int32Array;

  constructor(size: number) {
    this.parent = new Int32Array(size);
    this.rank = new Int32Array(size).fill(1);
    for (let i = 0; i < size; i++) this.parent[i] = i;
  }

  get size(): number {
    return this.parent.length;
  }

  find(i: number): number {
    let root = i;
    while (this.parent[root] !== root) {
      this.parent[root] = this.parent[this.parent[root]];
      root = this.parent[root];
    }
    return root;
  }

  /** Join the sets of `a` and `b`. Returns false when they were already joined. */
  union(a: number, b: number): boolean {
    let ra = this.find(a);
    let rb = this.find(b);
    if (ra === rb) return false;
    if (this.rank[ra] < this.rank[rb]) {
      const t = ra;
      ra = rb;
      rb = t;
    }
    this.parent[rb] = ra;
    this.rank[ra] += this.rank[rb];
    return true;
  }

  connected(a: number, b: number): boolean {
    return this.find(a) === this.find(b);
  }

  /** Put every element back in its own set. */
  reset(): void {
    for (let i = 0; i < this.parent.length; i++) {
      this.parent[i] = i;
      this.rank[i] = 1;
    }
  }
}
