import {
  assetKey,
  isActiveStatus,
  isSameAsset,
  orderKey,
  OrderStatus,
  type Asset,
  type Order,
  type Position
} from '@brokerkit/shared'
import { RegistryLock } from './registry-lock'
import { TrackingList } from './tracking-list'

/** Named order collections held by the registry */
export type OrderCollection =
  | 'unprocessed'
  | 'new'
  | 'partiallyFilled'
  | 'filled'
  | 'canceled'
  | 'error'
  | 'placeholder'

export const ACTIVE_COLLECTIONS: readonly OrderCollection[] = ['unprocessed', 'new', 'partiallyFilled']
export const TERMINAL_COLLECTIONS: readonly OrderCollection[] = ['filled', 'canceled', 'error']

const ALL_COLLECTIONS: readonly OrderCollection[] = [...ACTIVE_COLLECTIONS, ...TERMINAL_COLLECTIONS, 'placeholder']

/**
 * Collection an order in the given status is filed under.
 *
 * @returns undefined for unsubmitted orders, which the registry never holds
 */
export function collectionForStatus(status: OrderStatus): OrderCollection | undefined {
  switch (status) {
    case OrderStatus.UNPROCESSED:
      return 'unprocessed'
    case OrderStatus.NEW:
      return 'new'
    case OrderStatus.PARTIALLY_FILLED:
      return 'partiallyFilled'
    case OrderStatus.FILLED:
    case OrderStatus.CASH_SETTLED:
      return 'filled'
    case OrderStatus.CANCELED:
      return 'canceled'
    case OrderStatus.ERROR:
      return 'error'
    case OrderStatus.PLACEHOLDER:
      return 'placeholder'
    case OrderStatus.UNSUBMITTED:
      return undefined
  }
}

/** Evicted identifiers remembered so reconciliation does not replay them */
export const EVICTED_MEMORY = 10_000

export function positionKey(strategy: string, asset: Asset): string {
  return `${strategy}|${assetKey(asset)}`
}

/**
 * Filter for {@link OrderRegistry.getOrders}
 */
export interface OrderFilter {
  readonly strategy?: string
  readonly asset?: Asset
  readonly collections?: readonly OrderCollection[]
}

/**
 * In-memory registry of every order and position one engine tracks.
 *
 * All collections share one re-entrant lock. An order is held by at most
 * one collection at a time; {@link moveOrder} removes it from wherever it is
 * and files it under the target inside a single critical section.
 */
export class OrderRegistry {
  readonly lock = new RegistryLock()

  private readonly collections: Record<OrderCollection, TrackingList<Order>>
  private readonly positions: TrackingList<Position>
  private readonly pinnedSymbols = new Set<string>()
  private readonly evicted = new Set<string>()

  constructor() {
    const list = (name: OrderCollection) => new TrackingList<Order>(name, this.lock, orderKey)
    this.collections = {
      unprocessed: list('unprocessed'),
      new: list('new'),
      partiallyFilled: list('partiallyFilled'),
      filled: list('filled'),
      canceled: list('canceled'),
      error: list('error'),
      placeholder: list('placeholder')
    }
    this.positions = new TrackingList<Position>('filledPositions', this.lock, (p) =>
      positionKey(p.strategy, p.asset)
    )
  }

  collection(name: OrderCollection): TrackingList<Order> {
    return this.collections[name]
  }

  get filledPositions(): TrackingList<Position> {
    return this.positions
  }

  /**
   * Name of the collection holding this order, matched by key.
   */
  collectionOf(order: Order): OrderCollection | undefined {
    const key = orderKey(order)
    return this.lock.runExclusive(() =>
      ALL_COLLECTIONS.find((name) => this.collections[name].get(key) !== undefined)
    )
  }

  /**
   * Removes the order from every collection and files it under `target`.
   */
  moveOrder(order: Order, target: OrderCollection): void {
    const key = orderKey(order)
    this.lock.runExclusive(() => {
      for (const name of ALL_COLLECTIONS) {
        this.collections[name].remove(key)
      }
      this.collections[target].append(order)
    })
  }

  /**
   * Files the order under `target` unless some collection already holds it.
   *
   * @returns true if the order was filed
   */
  fileIfUntracked(order: Order, target: OrderCollection): boolean {
    return this.lock.runExclusive(() => {
      if (this.collectionOf(order) !== undefined) return false
      this.collections[target].append(order)
      return true
    })
  }

  /**
   * Tracked order with the given brokerage identifier, from any collection.
   */
  findOrder(identifier: string): Order | undefined {
    return this.lock.runExclusive(() => {
      for (const name of ALL_COLLECTIONS) {
        const order = this.collections[name].get(identifier)
        if (order) return order
      }
      return undefined
    })
  }

  getOrders(filter: OrderFilter = {}): Order[] {
    const names = filter.collections ?? ALL_COLLECTIONS
    return this.lock
      .runExclusive(() => names.flatMap((name) => this.collections[name].list()))
      .filter(
        (order) =>
          (filter.strategy === undefined || order.strategy === filter.strategy) &&
          (filter.asset === undefined || isSameAsset(order.asset, filter.asset))
      )
  }

  /**
   * Orders still awaiting a terminal event
   */
  activeOrders(strategy?: string): Order[] {
    return this.getOrders({ strategy, collections: ACTIVE_COLLECTIONS }).filter((order) =>
      isActiveStatus(order.status)
    )
  }

  getPosition(strategy: string, asset: Asset): Position | undefined {
    return this.positions.get(positionKey(strategy, asset))
  }

  listPositions(strategy?: string): Position[] {
    const all = this.positions.list()
    return strategy === undefined ? all : all.filter((position) => position.strategy === strategy)
  }

  /**
   * Files a position, replacing any held for the same strategy and asset.
   */
  putPosition(position: Position): void {
    this.lock.runExclusive(() => {
      this.positions.remove(positionKey(position.strategy, position.asset))
      this.positions.append(position)
    })
  }

  removePosition(position: Position): boolean {
    return this.positions.remove(positionKey(position.strategy, position.asset))
  }

  /**
   * Records settled orders dropped by retention. The oldest identifiers are
   * forgotten beyond {@link EVICTED_MEMORY}.
   */
  markEvicted(orders: Iterable<Order>): void {
    for (const order of orders) {
      if (!order.identifier) continue
      this.evicted.delete(order.identifier)
      this.evicted.add(order.identifier)
    }
    for (const identifier of this.evicted) {
      if (this.evicted.size <= EVICTED_MEMORY) break
      this.evicted.delete(identifier)
    }
  }

  /**
   * True if retention dropped a settled order with this identifier.
   */
  wasEvicted(identifier: string): boolean {
    return this.evicted.has(identifier)
  }

  /**
   * Pins a quote currency: its positions survive reconciliation and cleanup
   * even at zero or negative quantity.
   */
  pin(symbol: string): void {
    this.pinnedSymbols.add(symbol.toUpperCase())
  }

  isPinned(asset: Asset): boolean {
    return this.pinnedSymbols.has(asset.symbol)
  }
}
