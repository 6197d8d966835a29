import type { RegistryLock } from './registry-lock'

/**
 * Ordered collection guarded by a shared {@link RegistryLock}.
 *
 * Keys are computed from items at lookup time, so an order keeps matching
 * after the brokerage assigns its identifier.
 *
 * @example
 * ```typescript
 * const filled = new TrackingList<Order>('filled', lock, orderKey)
 * filled.append(order)
 * filled.remove('b-1') // true
 * filled.remove('b-1') // false, already gone
 * ```
 */
export class TrackingList<T> {
  private readonly items: T[] = []

  constructor(
    readonly name: string,
    private readonly lock: RegistryLock,
    private readonly keyOf: (item: T) => string
  ) {}

  append(item: T): void {
    this.lock.runExclusive(() => {
      this.items.push(item)
    })
  }

  /**
   * Removes the item with the given key. Removing an absent key is a no-op.
   *
   * @returns true if an item was removed
   */
  remove(key: string): boolean {
    return this.lock.runExclusive(() => {
      const index = this.items.findIndex((item) => this.keyOf(item) === key)
      if (index === -1) return false
      this.items.splice(index, 1)
      return true
    })
  }

  /**
   * Removes every listed item, matched by reference.
   *
   * @returns number of items removed
   */
  removeItems(doomed: ReadonlySet<T>): number {
    return this.lock.runExclusive(() => {
      const before = this.items.length
      const kept = this.items.filter((item) => !doomed.has(item))
      this.items.length = 0
      for (const item of kept) this.items.push(item)
      return before - kept.length
    })
  }

  /** Snapshot copy, safe to iterate without the lock */
  list(): T[] {
    return this.lock.runExclusive(() => [...this.items])
  }

  get(key: string): T | undefined {
    return this.lock.runExclusive(() => this.items.find((item) => this.keyOf(item) === key))
  }

  find(predicate: (item: T) => boolean): T | undefined {
    return this.lock.runExclusive(() => this.items.find(predicate))
  }

  includes(item: T): boolean {
    return this.lock.runExclusive(() => this.items.includes(item))
  }

  get size(): number {
    return this.items.length
  }
}
