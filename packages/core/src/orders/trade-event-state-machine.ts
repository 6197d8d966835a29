import {
  createPosition,
  describeAsset,
  describeOrder,
  isBuySide,
  OrderStatus,
  TradeEventKind,
  ZERO,
  type Asset,
  type Order,
  type Position,
  type Quantity
} from '@brokerkit/shared'
import type { Logger, TradeEvent } from '@brokerkit/types'
import { ContractViolationError } from '../errors'
import type { SubscriberBus } from '../events/subscriber-bus'
import type { TimeSource } from '../events/time-source'
import { collectionForStatus, TERMINAL_COLLECTIONS, type OrderRegistry } from '../registry/order-registry'
import type { TradeEventLog } from '../trade-log/trade-event-log'

/**
 * Optional data carried by a trade event.
 * `price` and `filledQuantity` are required for fills.
 */
export interface TradeEventDetails {
  readonly price?: Quantity
  /** Quantity executed by this event, not the cumulative total */
  readonly filledQuantity?: Quantity
  /** Contract multiplier reported to subscribers. Defaults to 1 */
  readonly multiplier?: number
  readonly error?: string
  /** Fees charged for this event, added to the order's trade cost */
  readonly tradeCost?: Quantity
}

interface HeldEvent {
  readonly order: Order
  readonly kind: TradeEventKind
  readonly details: TradeEventDetails
}

export interface TradeEventStateMachineOptions {
  /** Hold mode is ignored when backtesting */
  readonly backtesting?: boolean
  readonly logger?: Logger
}

/**
 * Target status of each event kind
 */
const EVENT_TARGET: Record<TradeEventKind, OrderStatus> = {
  [TradeEventKind.NEW]: OrderStatus.NEW,
  [TradeEventKind.PARTIALLY_FILLED]: OrderStatus.PARTIALLY_FILLED,
  [TradeEventKind.FILLED]: OrderStatus.FILLED,
  [TradeEventKind.CANCELED]: OrderStatus.CANCELED,
  [TradeEventKind.ERROR]: OrderStatus.ERROR,
  [TradeEventKind.CASH_SETTLED]: OrderStatus.CASH_SETTLED
}

const AFTER_SUBMISSION: OrderStatus[] = [
  OrderStatus.NEW,
  OrderStatus.PARTIALLY_FILLED,
  OrderStatus.FILLED,
  OrderStatus.CANCELED,
  OrderStatus.ERROR,
  OrderStatus.CASH_SETTLED
]

/**
 * Single authority over order status and position quantities.
 *
 * Every lifecycle event, whether pushed by an adapter or derived by the
 * poller, enters through {@link processEvent}. An applied event moves the
 * order between registry collections, updates its fill fields, mutates the
 * owning position, appends a trade-log row and notifies the subscriber bus.
 *
 * @remarks
 * State transition rules:
 * - UNSUBMITTED (untracked) → any state reached after submission
 * - UNPROCESSED → NEW, PARTIALLY_FILLED, FILLED, CANCELED, ERROR, CASH_SETTLED
 * - NEW → PARTIALLY_FILLED, FILLED, CANCELED, ERROR, CASH_SETTLED
 * - PARTIALLY_FILLED → PARTIALLY_FILLED, FILLED, CANCELED, ERROR, CASH_SETTLED
 * - PLACEHOLDER → CANCELED, ERROR
 * - Terminal states (FILLED, CANCELED, ERROR, CASH_SETTLED) → no transitions
 *
 * An event that is not a valid transition is ignored, which makes
 * re-delivery of an applied terminal event a no-op. Events for orders
 * retention has evicted are ignored too.
 */
export class TradeEventStateMachine {
  private readonly transitions: Record<OrderStatus, OrderStatus[]> = {
    [OrderStatus.UNSUBMITTED]: AFTER_SUBMISSION,
    [OrderStatus.UNPROCESSED]: AFTER_SUBMISSION,
    [OrderStatus.NEW]: AFTER_SUBMISSION.filter((status) => status !== OrderStatus.NEW),
    [OrderStatus.PARTIALLY_FILLED]: AFTER_SUBMISSION.filter((status) => status !== OrderStatus.NEW),
    [OrderStatus.PLACEHOLDER]: [OrderStatus.CANCELED, OrderStatus.ERROR],
    [OrderStatus.FILLED]: [],
    [OrderStatus.CANCELED]: [],
    [OrderStatus.ERROR]: [],
    [OrderStatus.CASH_SETTLED]: []
  }

  private readonly held: HeldEvent[] = []
  private holding = false
  private readonly backtesting: boolean
  private logger?: Logger

  constructor(
    private readonly registry: OrderRegistry,
    private readonly bus: SubscriberBus,
    private readonly tradeLog: TradeEventLog,
    private readonly time: TimeSource,
    options: TradeEventStateMachineOptions = {}
  ) {
    this.backtesting = options.backtesting ?? false
    this.logger = options.logger
  }

  setLogger(logger: Logger): void {
    this.logger = logger
  }

  /**
   * Check if a state transition is valid.
   *
   * @example
   * ```typescript
   * stateMachine.canTransition(OrderStatus.NEW, OrderStatus.FILLED) // true
   * stateMachine.canTransition(OrderStatus.FILLED, OrderStatus.CANCELED) // false
   * ```
   */
  canTransition(from: OrderStatus, to: OrderStatus): boolean {
    return this.transitions[from].includes(to)
  }

  /**
   * Applies a lifecycle event to an order.
   *
   * The order is resolved to the tracked instance with the same identifier
   * when one exists, so adapters may pass freshly parsed copies.
   *
   * @returns true if the event was applied, false if held or ignored
   * @throws ContractViolationError if a fill lacks price or quantity, or either is negative
   *
   * @example
   * ```typescript
   * stateMachine.processEvent(order, TradeEventKind.FILLED, {
   *   price: toDecimal('101.5'),
   *   filledQuantity: toDecimal(10)
   * })
   * ```
   */
  processEvent(order: Order, kind: TradeEventKind, details: TradeEventDetails = {}): boolean {
    const resolved = this.validate(order, kind, details)

    if (this.holding && !this.backtesting) {
      this.held.push({ order, kind, details: resolved })
      return false
    }

    return this.registry.lock.runExclusive(() => this.apply(order, kind, resolved))
  }

  /**
   * Buffers events instead of applying them until {@link releaseHeldEvents}.
   */
  holdEvents(): void {
    this.holding = true
  }

  /**
   * Leaves hold mode and replays buffered events in arrival order.
   *
   * @returns number of replayed events that were applied
   */
  releaseHeldEvents(): number {
    this.holding = false
    let applied = 0
    while (this.held.length > 0) {
      const next = this.held.shift()
      if (next && this.processEvent(next.order, next.kind, next.details)) applied++
    }
    return applied
  }

  isHolding(): boolean {
    return this.holding
  }

  get heldCount(): number {
    return this.held.length
  }

  /**
   * Checks fill data and fills in the OCO fallbacks.
   */
  private validate(order: Order, kind: TradeEventKind, details: TradeEventDetails): TradeEventDetails {
    if (details.filledQuantity?.isNegative()) {
      throw new ContractViolationError(
        `filledQuantity must not be negative, received ${details.filledQuantity.toString()} for ${describeOrder(order)}`
      )
    }
    if (details.price?.isNegative()) {
      throw new ContractViolationError(
        `price must not be negative, received ${details.price.toString()} for ${describeOrder(order)}`
      )
    }
    if (kind !== TradeEventKind.FILLED && kind !== TradeEventKind.PARTIALLY_FILLED) {
      return details
    }

    let { price, filledQuantity } = details
    if (order.orderClass === 'oco') {
      price = price ?? order.avgFillPrice ?? order.limitPrice ?? order.stopPrice
      filledQuantity = filledQuantity ?? order.quantity
    }
    if (price === undefined || filledQuantity === undefined) {
      throw new ContractViolationError(
        `A ${kind} event requires price and filledQuantity, received ${String(price)} and ${String(filledQuantity)} for ${describeOrder(order)}`
      )
    }
    return { ...details, price, filledQuantity }
  }

  private apply(incoming: Order, kind: TradeEventKind, details: TradeEventDetails): boolean {
    const tracked = incoming.identifier ? this.registry.findOrder(incoming.identifier) : undefined
    if (!tracked && incoming.identifier && this.registry.wasEvicted(incoming.identifier)) {
      this.logger?.debug('Ignoring event for evicted order', { kind, identifier: incoming.identifier })
      return false
    }
    const order = tracked ?? incoming
    const collection = this.registry.collectionOf(order)
    const from = collection === undefined ? OrderStatus.UNSUBMITTED : order.status
    const to = EVENT_TARGET[kind]

    if (collection !== undefined && TERMINAL_COLLECTIONS.includes(collection)) {
      this.logger?.debug('Ignoring event for settled order', { kind, identifier: order.identifier })
      return false
    }
    if (!this.canTransition(from, to)) {
      this.logger?.debug('Ignoring invalid transition', { kind, from, to, identifier: order.identifier })
      return false
    }

    const event = this.transition(order, kind, to, details)
    this.logger?.info(`Order ${kind}: ${describeOrder(order)}`)
    this.record(order, details)
    this.bus.notify(event)
    return true
  }

  private transition(order: Order, kind: TradeEventKind, to: OrderStatus, details: TradeEventDetails): TradeEvent {
    const now = this.time.nowEpoch()
    order.status = to
    order.updatedAt = now
    if (details.tradeCost) {
      order.tradeCost = (order.tradeCost ?? ZERO).plus(details.tradeCost)
    }

    switch (kind) {
      case TradeEventKind.NEW:
      case TradeEventKind.CANCELED:
        this.file(order)
        return { kind, payload: { order } }
      case TradeEventKind.ERROR: {
        const error = details.error ?? order.error ?? 'Unknown error'
        order.error = error
        this.file(order)
        return { kind, payload: { order, error } }
      }
      case TradeEventKind.CASH_SETTLED: {
        if (details.price && details.filledQuantity) {
          this.recordFill(order, details.price, details.filledQuantity)
        }
        this.file(order)
        const position = this.registry.getPosition(order.strategy, order.asset)
        if (position && !position.orders.includes(order)) {
          position.orders.push(order)
        }
        return { kind, payload: { order } }
      }
      case TradeEventKind.PARTIALLY_FILLED:
      case TradeEventKind.FILLED: {
        const price = details.price ?? ZERO
        const quantity = details.filledQuantity ?? ZERO
        this.recordFill(order, price, quantity)
        this.file(order)
        const position = this.applyFill(order, price, quantity)
        return {
          kind,
          payload: { order, position, price, quantity, multiplier: details.multiplier ?? 1 }
        }
      }
    }
  }

  private file(order: Order): void {
    const target = collectionForStatus(order.status)
    if (target) this.registry.moveOrder(order, target)
  }

  private recordFill(order: Order, price: Quantity, quantity: Quantity): void {
    const total = order.filledQuantity.plus(quantity)
    if (total.gt(0)) {
      const previousNotional = (order.avgFillPrice ?? ZERO).times(order.filledQuantity)
      order.avgFillPrice = previousNotional.plus(price.times(quantity)).dividedBy(total)
    }
    order.filledQuantity = total
    order.fills.push({ price, quantity, timestamp: order.updatedAt })
  }

  /**
   * Moves the order's position, and the quote position for currency trades.
   *
   * @returns the position after the fill, undefined if it closed
   */
  private applyFill(order: Order, price: Quantity, quantity: Quantity): Position | undefined {
    const signed = isBuySide(order.side) ? quantity : quantity.negated()
    const position = this.adjustPosition(order.strategy, order.asset, signed, price, order)

    if (order.quote && (order.asset.assetType === 'crypto' || order.asset.assetType === 'forex')) {
      const notional = quantity.times(price)
      this.adjustPosition(order.strategy, order.quote, isBuySide(order.side) ? notional.negated() : notional)
    }
    return position
  }

  private adjustPosition(
    strategy: string,
    asset: Asset,
    delta: Quantity,
    price?: Quantity,
    order?: Order
  ): Position | undefined {
    const now = this.time.nowEpoch()
    let position = this.registry.getPosition(strategy, asset)

    if (!position) {
      if (delta.isZero()) return undefined
      position = createPosition(strategy, asset, delta, { avgFillPrice: price, updatedAt: now })
      if (order) position.orders.push(order)
      this.registry.putPosition(position)
      return position
    }

    const before = position.quantity
    const after = before.plus(delta)
    if (price) {
      position.avgFillPrice = nextAveragePrice(before, after, delta, position.avgFillPrice, price)
    }
    position.quantity = after
    position.updatedAt = now
    if (order && !position.orders.includes(order)) position.orders.push(order)

    if (after.isZero() && !this.registry.isPinned(asset)) {
      this.registry.removePosition(position)
      this.logger?.info(`Position closed: ${describeAsset(asset)}`, { strategy })
      return undefined
    }
    return position
  }

  private record(order: Order, details: TradeEventDetails): void {
    this.tradeLog.append({
      time: this.time.nowEpoch(),
      strategy: order.strategy,
      identifier: order.identifier,
      asset: describeAsset(order.asset),
      side: order.side,
      type: order.type,
      status: order.status,
      price: details.price,
      filledQuantity: details.filledQuantity,
      multiplier: details.multiplier ?? 1,
      tradeCost: order.tradeCost
    })
  }
}

/**
 * Average entry price after a fill.
 * Adding to a position weights the prices; reducing keeps the entry price;
 * crossing through zero starts over at the fill price.
 */
function nextAveragePrice(
  before: Quantity,
  after: Quantity,
  delta: Quantity,
  current: Quantity | undefined,
  price: Quantity
): Quantity | undefined {
  if (after.isZero()) return current
  if (before.isZero() || current === undefined || before.isNegative() !== after.isNegative()) {
    return price
  }
  const adding = before.isNegative() === delta.isNegative()
  if (!adding) return current
  return current.times(before.abs()).plus(price.times(delta.abs())).dividedBy(after.abs())
}
