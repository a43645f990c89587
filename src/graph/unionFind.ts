/**
 * Disjoint-set forest over string identifiers with path halving and union by
 * size. Elements are registered lazily; {@link components} lists every set in
 * the order its first member was registered.
 */
export class DisjointSet {
  private readonly parent = new Map<string, string>();
  private readonly size = new Map<string, number>();

  add(id: string): void {
    if (!this.parent.has(id)) {
      this.parent.set(id, id);
      this.size.set(id, 1);
    }
  }

  has(id: string): boolean {
    return this.parent.has(id);
  }

  find(id: string): string {
    this.add(id);
    let current = id;
    let parent = this.parent.get(current) ?? current;
    while (parent !== current) {
      const grandParent = this.parent.get(parent) ?? parent;
      this.parent.set(current, grandParent);
      current = grandParent;
      parent = this.parent.get(current) ?? current;
    }
    return current;
  }

  /** Merges the sets of {@link a} and {@link b}. Returns false when already joined. */
  union(a: string, b: string): boolean {
    let rootA = this.find(a);
    let rootB = this.find(b);
    if (rootA === rootB) {
      return false;
    }
    const sizeA = this.size.get(rootA) ?? 1;
    const sizeB = this.size.get(rootB) ?? 1;
    if (sizeA < sizeB) {
      [rootA, rootB] = [rootB, rootA];
    }
    this.parent.set(rootB, rootA);
    this.size.set(rootA, sizeA + sizeB);
    return true;
  }

  connected(a: string, b: string): boolean {
    return this.has(a) && this.has(b) && this.find(a) === this.find(b);
  }

  components(): string[][] {
    const grouped = new Map<string, string[]>();
    for (const id of this.parent.keys()) {
      const root = this.find(id);
      const bucket = grouped.get(root);
      if (bucket) {
        bucket.push(id);
      } else {
        grouped.set(root, [id]);
      }
    }
    return Array.from(grouped.values());
  }
}
