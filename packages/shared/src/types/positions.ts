import type { Asset } from './assets'
import type { EpochDate } from './dates'
import { epochDateNow } from './dates'
import type { Order } from './orders'
import type { Quantity } from './quantity'
import { toDecimal, toOptionalDecimal } from './quantity'
import type Decimal from 'decimal.js'

/**
 * Holding of one asset by one strategy.
 * Quantity is signed: positive long, negative short.
 */
export interface Position {
  strategy: string
  readonly asset: Asset
  quantity: Quantity
  /** Volume-weighted average fill price of the open quantity */
  avgFillPrice?: Quantity
  /** Orders whose fills built this position */
  orders: Order[]
  updatedAt: EpochDate
}

/**
 * Creates a position, typically from an adapter's position listing.
 *
 * @example
 * createPosition('momentum', createAsset('AAPL'), 10, { avgFillPrice: 101.5 })
 */
export function createPosition(
  strategy: string,
  asset: Asset,
  quantity: Decimal.Value,
  options: { avgFillPrice?: Decimal.Value; orders?: Order[]; updatedAt?: EpochDate } = {}
): Position {
  return {
    strategy,
    asset,
    quantity: toDecimal(quantity),
    avgFillPrice: toOptionalDecimal(options.avgFillPrice),
    orders: options.orders ?? [],
    updatedAt: options.updatedAt ?? epochDateNow()
  }
}

/**
 * Most recent activity on a position: its own update time or the latest of its orders.
 */
export function positionTimestamp(position: Position): EpochDate {
  let latest = position.updatedAt
  for (const order of position.orders) {
    const orderTime = order.brokerUpdatedAt ?? order.updatedAt
    if (orderTime > latest) latest = orderTime
  }
  return latest
}
