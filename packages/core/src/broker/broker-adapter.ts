import type { Asset, Order, Position, Quantity, TradeEventKind } from '@brokerkit/shared'
import type { TradeEventDetails } from '../orders/trade-event-state-machine'

/**
 * Account balances in the quote currency
 */
export interface Balances {
  readonly cash: Quantity
  readonly positionsValue: Quantity
  readonly totalValue: Quantity
}

/**
 * Price changes accepted by {@link BrokerAdapter.modifyOrder}
 */
export interface OrderModification {
  readonly limitPrice?: Quantity
  readonly stopPrice?: Quantity
}

/**
 * Callbacks a push stream drives
 */
export interface PushHandlers {
  /** Signal that events can now be received. Called once. */
  established(): void
  /**
   * Deliver a lifecycle event. The event may be a canonical kind or any
   * vendor status spelling the alias table knows.
   */
  onTradeEvent(order: Order, event: TradeEventKind | string, details?: TradeEventDetails): void
}

/**
 * Low-latency event channel offered by adapters whose brokerage pushes updates
 */
export interface PushStream {
  /** Runs until closed; resolves when the subscription ends */
  run(handlers: PushHandlers): Promise<void>
  close(): Promise<void>
}

/**
 * Contract each brokerage integration implements.
 *
 * Adapters own wire formats, authentication and retries. They convert vendor
 * numbers with `toDecimal` and vendor statuses with `canonicalStatus`.
 *
 * @example
 * ```typescript
 * class PaperAdapter implements BrokerAdapter {
 *   readonly name = 'paper'
 *   async submitOrder(order: Order): Promise<Order> {
 *     const response = await this.client.place(toWire(order))
 *     assignOrderIdentifier(order, response.id)
 *     order.transmitted = true
 *     order.raw = response
 *     return order
 *   }
 *   // ...
 * }
 * ```
 */
export interface BrokerAdapter {
  readonly name: string

  /**
   * Places an order. On success assigns the identifier and sets
   * `transmitted`; on a rejection sets `error`. May throw on transport failure.
   */
  submitOrder(order: Order): Promise<Order>

  /** Requests cancellation. Confirmation arrives as a later event. */
  cancelOrder(order: Order): Promise<void>

  modifyOrder(order: Order, changes: OrderModification): Promise<void>

  /** Every order the brokerage currently reports, in vendor format */
  pullAllOrders(): Promise<unknown[]>

  /**
   * Decodes one vendor order. Multi-leg responses may yield several orders;
   * undefined skips the row. `filledQuantity` and `avgFillPrice` are cumulative.
   */
  parseOrder(raw: unknown, strategy: string): Order | Order[] | undefined

  pullPositions(strategy: string): Promise<Position[]>

  getBalances(quoteAsset: Asset, strategy: string): Promise<Balances>

  /** Present when the brokerage offers push notifications */
  createPushStream?(): PushStream
}
