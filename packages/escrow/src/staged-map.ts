/**
 * @escrowpoint/escrow — Staged writes over a committed Map.
 *
 * Reads see staged values first, then the committed map.
 * Nothing reaches the committed map until commit().
 */

const DELETED: unique symbol = Symbol("deleted");

export class StagedMap<K, V> {
  private readonly _pending: Map<K, V | typeof DELETED> = new Map();

  constructor(private readonly _committed: Map<K, V>) {}

  get(key: K): V | undefined {
    if (this._pending.has(key)) {
      const value = this._pending.get(key);
      return value === DELETED ? undefined : value;
    }
    return this._committed.get(key);
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  set(key: K, value: V): void {
    this._pending.set(key, value);
  }

  delete(key: K): void {
    this._pending.set(key, DELETED);
  }

  /**
   * Number of staged (uncommitted) keys.
   */
  get pendingCount(): number {
    return this._pending.size;
  }

  commit(): void {
    for (const [key, value] of this._pending) {
      if (value === DELETED) {
        this._committed.delete(key);
      } else {
        this._committed.set(key, value);
      }
    }
    this._pending.clear();
  }
}
