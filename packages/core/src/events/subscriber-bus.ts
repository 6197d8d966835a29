import type { Logger, TradeEvent, TradeEventSubscriber } from '@brokerkit/types'
import { asError } from '../errors'

/**
 * Delivers trade events to the subscriber registered for the owning strategy.
 *
 * One subscriber per strategy name. Delivery is synchronous and best-effort:
 * an event for a strategy with no subscriber is logged and dropped, and a
 * subscriber that throws is logged without affecting the engine.
 *
 * @example
 * ```typescript
 * const bus = new SubscriberBus(logger)
 * bus.register({ name: 'momentum', onTradeEvent: (event) => console.log(event.kind) })
 * bus.notify({ kind: TradeEventKind.NEW, payload: { order } })
 * ```
 */
export class SubscriberBus {
  private readonly subscribers = new Map<string, TradeEventSubscriber>()

  constructor(private logger?: Logger) {}

  setLogger(logger: Logger): void {
    this.logger = logger
  }

  /**
   * Registers a subscriber, replacing any previous one with the same name.
   */
  register(subscriber: TradeEventSubscriber): void {
    if (this.subscribers.has(subscriber.name)) {
      this.logger?.warn('Replacing subscriber', { strategy: subscriber.name })
    }
    this.subscribers.set(subscriber.name, subscriber)
  }

  unregister(name: string): boolean {
    return this.subscribers.delete(name)
  }

  /**
   * Subscriber registered for a strategy name
   */
  get(name: string): TradeEventSubscriber | undefined {
    return this.subscribers.get(name)
  }

  /**
   * Delivers the event to the owning strategy's subscriber.
   *
   * @returns true if a subscriber received the event without throwing
   */
  notify(event: TradeEvent): boolean {
    const strategy = event.payload.order.strategy
    const subscriber = this.subscribers.get(strategy)
    if (!subscriber) {
      this.logger?.debug('No subscriber for trade event, dropping', {
        strategy,
        kind: event.kind,
        identifier: event.payload.order.identifier
      })
      return false
    }

    try {
      subscriber.onTradeEvent(event)
      return true
    } catch (error) {
      this.handleError(error, event)
      return false
    }
  }

  /**
   * Handle errors from subscribers
   */
  private handleError(error: unknown, event: TradeEvent): void {
    const err = asError(error)
    this.logger?.error('Subscriber failed to handle trade event', {
      strategy: event.payload.order.strategy,
      kind: event.kind,
      error: err.message
    })
  }
}
