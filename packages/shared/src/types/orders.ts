import { v4 as uuidv4 } from 'uuid'
import type { Asset } from './assets'
import type { EpochDate } from './dates'
import { epochDateNow } from './dates'
import type { Quantity } from './quantity'
import { toDecimal, toOptionalDecimal, ZERO } from './quantity'
import type Decimal from 'decimal.js'

/** Order direction, including the directional variants used for options */
export type OrderSide =
  | 'buy'
  | 'sell'
  | 'buy_to_open'
  | 'buy_to_close'
  | 'sell_to_open'
  | 'sell_to_close'
  | 'sell_short'
  | 'buy_to_cover'

/** Supported order execution types */
export type OrderType = 'market' | 'limit' | 'stop' | 'stop_limit' | 'trailing_stop'

/**
 * Structural class of an order.
 * Parents of `bracket`, `oto` and `oco` orders carry their legs in `childOrders`.
 */
export type OrderClass = 'simple' | 'bracket' | 'oto' | 'oco' | 'multileg'

export type TimeInForce = 'day' | 'gtc' | 'ioc' | 'fok' | 'opg' | 'cls'

/**
 * Canonical order states.
 *
 * UNSUBMITTED → UNPROCESSED → NEW → {PARTIALLY_FILLED → FILLED} | CANCELED | ERROR | CASH_SETTLED
 *
 * PLACEHOLDER anchors child orders and never fills itself.
 */
export enum OrderStatus {
  UNSUBMITTED = 'unsubmitted',
  UNPROCESSED = 'unprocessed',
  NEW = 'new',
  PARTIALLY_FILLED = 'partially_filled',
  FILLED = 'filled',
  CANCELED = 'canceled',
  ERROR = 'error',
  CASH_SETTLED = 'cash_settled',
  PLACEHOLDER = 'placeholder'
}

/**
 * Lifecycle events delivered to the state machine and fanned out to subscribers.
 * The string values are the event names subscribers see.
 */
export enum TradeEventKind {
  NEW = 'new',
  CANCELED = 'canceled',
  FILLED = 'fill',
  PARTIALLY_FILLED = 'partial_fill',
  ERROR = 'error',
  CASH_SETTLED = 'cash_settled'
}

const TERMINAL_STATUSES: ReadonlySet<OrderStatus> = new Set([
  OrderStatus.FILLED,
  OrderStatus.CANCELED,
  OrderStatus.ERROR,
  OrderStatus.CASH_SETTLED
])

const ACTIVE_STATUSES: ReadonlySet<OrderStatus> = new Set([
  OrderStatus.UNPROCESSED,
  OrderStatus.NEW,
  OrderStatus.PARTIALLY_FILLED
])

/**
 * A single execution against an order.
 */
export interface OrderFill {
  readonly price: Quantity
  readonly quantity: Quantity
  readonly timestamp: EpochDate
}

/**
 * Order entity.
 *
 * Identity fields are readonly. `identifier` is assigned once by the brokerage
 * through {@link assignOrderIdentifier}; status and fill fields are mutated only
 * by the engine's state machine.
 */
export interface Order {
  /** Brokerage identifier, unset until the adapter confirms receipt */
  identifier?: string
  /** Local identity, stable from creation */
  readonly clientOrderId: string
  /** Owning strategy name */
  strategy: string
  readonly asset: Asset
  /** Quote currency for crypto and forex trades */
  readonly quote?: Asset
  readonly side: OrderSide
  readonly quantity: Quantity
  readonly type: OrderType
  readonly orderClass: OrderClass
  readonly timeInForce: TimeInForce
  limitPrice?: Quantity
  stopPrice?: Quantity
  trailPercent?: Quantity
  status: OrderStatus
  filledQuantity: Quantity
  avgFillPrice?: Quantity
  /** Commission and fees charged by the brokerage */
  tradeCost?: Quantity
  parentIdentifier?: string
  childOrders: Order[]
  fills: OrderFill[]
  readonly createdAt: EpochDate
  updatedAt: EpochDate
  brokerCreatedAt?: EpochDate
  brokerUpdatedAt?: EpochDate
  error?: string
  /** Vendor payload from the last adapter response */
  raw?: unknown
  /** True once the adapter has transmitted the order to the brokerage */
  transmitted: boolean
}

/**
 * Parameters accepted by {@link createOrder}.
 */
export interface OrderParams {
  readonly strategy: string
  readonly asset: Asset
  readonly quantity: Decimal.Value
  readonly side: OrderSide
  readonly quote?: Asset
  readonly limitPrice?: Decimal.Value
  readonly stopPrice?: Decimal.Value
  readonly trailPercent?: Decimal.Value
  readonly type?: OrderType
  readonly orderClass?: OrderClass
  readonly timeInForce?: TimeInForce
  readonly identifier?: string
  readonly status?: OrderStatus
  readonly childOrders?: Order[]
  readonly createdAt?: EpochDate
}

/**
 * Infers the execution type from the prices present.
 */
function inferOrderType(params: OrderParams): OrderType {
  if (params.trailPercent !== undefined) return 'trailing_stop'
  if (params.limitPrice !== undefined && params.stopPrice !== undefined) return 'stop_limit'
  if (params.limitPrice !== undefined) return 'limit'
  if (params.stopPrice !== undefined) return 'stop'
  return 'market'
}

/**
 * Creates an unsubmitted order with validated quantity and prices.
 *
 * @throws Error if quantity is not positive or a price is negative
 *
 * @example
 * const order = createOrder({ strategy: 'momentum', asset: createAsset('AAPL'), quantity: 10, side: 'buy', limitPrice: 101.5 })
 * order.type // 'limit'
 */
export function createOrder(params: OrderParams): Order {
  const quantity = toDecimal(params.quantity)
  if (quantity.lte(0)) {
    throw new Error(`Quantity must be positive, received ${quantity.toString()}`)
  }

  const limitPrice = toOptionalDecimal(params.limitPrice)
  const stopPrice = toOptionalDecimal(params.stopPrice)
  for (const [label, price] of [['limitPrice', limitPrice], ['stopPrice', stopPrice]] as const) {
    if (price?.isNegative()) {
      throw new Error(`${label} must not be negative, received ${price.toString()}`)
    }
  }

  const createdAt = params.createdAt ?? epochDateNow()
  const childOrders = params.childOrders ?? []
  return {
    identifier: params.identifier,
    clientOrderId: uuidv4(),
    strategy: params.strategy,
    asset: params.asset,
    quote: params.quote,
    side: params.side,
    quantity,
    type: params.type ?? inferOrderType(params),
    orderClass: params.orderClass ?? (childOrders.length > 0 ? 'bracket' : 'simple'),
    timeInForce: params.timeInForce ?? 'day',
    limitPrice,
    stopPrice,
    trailPercent: toOptionalDecimal(params.trailPercent),
    status: params.status ?? OrderStatus.UNSUBMITTED,
    filledQuantity: ZERO,
    childOrders,
    fills: [],
    createdAt,
    updatedAt: createdAt,
    transmitted: false
  }
}

/**
 * Assigns the brokerage identifier. An identifier, once set, never changes.
 *
 * @throws Error if the order already carries a different identifier
 */
export function assignOrderIdentifier(order: Order, identifier: string): void {
  if (order.identifier !== undefined && order.identifier !== identifier) {
    throw new Error(
      `Order ${order.identifier} cannot be re-identified as ${identifier}`
    )
  }
  order.identifier = identifier
}

/**
 * Key used by the registry: the brokerage identifier once known, the local id before.
 */
export function orderKey(order: Order): string {
  return order.identifier ?? `local:${order.clientOrderId}`
}

export function isBuySide(side: OrderSide): boolean {
  return side === 'buy' || side === 'buy_to_open' || side === 'buy_to_close' || side === 'buy_to_cover'
}

/**
 * Signed position change this order produces when fully filled.
 *
 * @example
 * orderIncrement(sellTenShares) // Decimal(-10)
 */
export function orderIncrement(order: Order): Quantity {
  return isBuySide(order.side) ? order.quantity : order.quantity.negated()
}

export function isTerminalStatus(status: OrderStatus): boolean {
  return TERMINAL_STATUSES.has(status)
}

export function isActiveStatus(status: OrderStatus): boolean {
  return ACTIVE_STATUSES.has(status)
}

export function isActiveOrder(order: Order): boolean {
  return isActiveStatus(order.status)
}

/**
 * Short description used in log lines.
 *
 * @example
 * describeOrder(order) // 'limit buy 10 AAPL @ 101.5 [new] #abc123'
 */
export function describeOrder(order: Order): string {
  const price = order.limitPrice ?? order.stopPrice
  const priceText = price ? ` @ ${price.toString()}` : ''
  const id = order.identifier ? ` #${order.identifier}` : ''
  return `${order.type} ${order.side} ${order.quantity.toString()} ${order.asset.symbol}${priceText} [${order.status}]${id}`
}
