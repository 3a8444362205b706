/** Integer grid cell → ordered entries. Rebuilt every frame, drained as it's drawn. */
export class CellBuckets<T> {
  private readonly cells = new Map<string, T[]>();

  static key(x: number, y: number): string {
    // `${-0}` is "0", so a position rounded to -0 lands in cell 0.
    return `${x},${y}`;
  }

  add(x: number, y: number, entry: T): void {
    const key = CellBuckets.key(x, y);
    const list = this.cells.get(key);
    if (list) list.push(entry);
    else this.cells.set(key, [entry]);
  }

  /** Remove and return the entries of a cell, in insertion order. */
  take(x: number, y: number): T[] {
    const key = CellBuckets.key(x, y);
    const list = this.cells.get(key);
    if (!list) return [];
    this.cells.delete(key);
    return list;
  }

  /** Remove and return everything left, cells in first-insertion order. */
  drain(): T[] {
    const rest: T[] = [];
    for (const list of this.cells.values()) rest.push(...list);
    this.cells.clear();
    return rest;
  }
}
