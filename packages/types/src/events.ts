import type { Order, Position, Quantity, TradeEventKind } from '@brokerkit/shared'

/**
 * Payload shared by every trade event
 */
export interface OrderEventPayload {
  readonly order: Order
}

/**
 * Payload delivered with `fill` and `partial_fill` events
 */
export interface FillEventPayload extends OrderEventPayload {
  /** Position after the fill was applied, undefined once it closed to zero */
  readonly position?: Position
  readonly price: Quantity
  readonly quantity: Quantity
  readonly multiplier: number
}

/**
 * Payload delivered with `error` events
 */
export interface ErrorEventPayload extends OrderEventPayload {
  readonly error: string
}

/**
 * Lifecycle event fanned out to the subscriber that owns the order.
 * Discriminated by `kind`.
 */
export type TradeEvent =
  | { readonly kind: TradeEventKind.NEW; readonly payload: OrderEventPayload }
  | { readonly kind: TradeEventKind.CANCELED; readonly payload: OrderEventPayload }
  | { readonly kind: TradeEventKind.FILLED; readonly payload: FillEventPayload }
  | { readonly kind: TradeEventKind.PARTIALLY_FILLED; readonly payload: FillEventPayload }
  | { readonly kind: TradeEventKind.ERROR; readonly payload: ErrorEventPayload }
  | { readonly kind: TradeEventKind.CASH_SETTLED; readonly payload: OrderEventPayload }

/**
 * Strategy-side listener. One subscriber per strategy name.
 *
 * @example
 * ```typescript
 * const subscriber: TradeEventSubscriber = {
 *   name: 'momentum',
 *   onTradeEvent(event) {
 *     if (event.kind === TradeEventKind.FILLED) {
 *       console.log(event.payload.price.toString())
 *     }
 *   }
 * }
 * ```
 */
export interface TradeEventSubscriber {
  /** Strategy name the subscriber receives events for */
  readonly name: string
  /** Called synchronously; a thrown error is logged and does not reach the engine */
  onTradeEvent(event: TradeEvent): void
}

/**
 * Logger interface for consistent logging across packages
 * Implement for debug/info/warn/error logging
 */
export interface Logger {
  /** Log debug message */
  debug(message: string, context?: Record<string, unknown>): void
  /** Log info message */
  info(message: string, context?: Record<string, unknown>): void
  /** Log warning */
  warn(message: string, context?: Record<string, unknown>): void
  /** Log error */
  error(message: string, context?: Record<string, unknown>): void
}
