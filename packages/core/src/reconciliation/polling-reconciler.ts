import {
  assetKey,
  describeOrder,
  isTerminalStatus,
  OrderStatus,
  TradeEventKind,
  ZERO,
  type Order,
  type Quantity
} from '@brokerkit/shared'
import type { Logger } from '@brokerkit/types'
import type { BrokerAdapter } from '../broker/broker-adapter'
import { ReconciliationError, toBrokerError } from '../errors'
import type { TimeSource } from '../events/time-source'
import type { TradeEventStateMachine } from '../orders/trade-event-state-machine'
import { collectionForStatus, type OrderRegistry } from '../registry/order-registry'

/**
 * Outcome of one position diff
 */
export interface PositionSyncResult {
  readonly added: number
  readonly updated: number
  readonly removed: number
}

/**
 * Outcome of one poll cycle
 */
export interface PollResult {
  /** Orders the brokerage reported */
  readonly orders: number
  /** Events the state machine applied */
  readonly applied: number
  /** Unseen terminal orders filed without replay on the first cycle */
  readonly fastForwarded: number
  /** Active orders canceled because the brokerage stopped reporting them */
  readonly canceledMissing: number
  readonly positions: PositionSyncResult
}

export interface PollingReconcilerOptions {
  readonly intervalMs: number
  /** Treat tracked active orders missing from the listing as canceled */
  readonly cancelMissingOrders: boolean
  /** Strategy name orders and positions are attributed to */
  readonly strategy: () => string
  readonly logger?: Logger
}

/**
 * Cumulative quantity the brokerage reports as filled.
 * A filled order that reports no quantity counts as fully filled.
 */
function reportedFill(order: Order): Quantity {
  if (order.status === OrderStatus.FILLED && order.filledQuantity.isZero()) {
    return order.quantity
  }
  return order.filledQuantity
}

/**
 * Price of the quantity filled since the last observation, from the change
 * in cumulative notional. Falls back to the reported average price.
 */
function deltaPrice(tracked: Order, reported: Order, delta: Quantity): Quantity {
  const reportedAvg = reported.avgFillPrice
  if (reportedAvg && delta.gt(0)) {
    const before = (tracked.avgFillPrice ?? ZERO).times(tracked.filledQuantity)
    const after = reportedAvg.times(reportedFill(reported))
    const price = after.minus(before).dividedBy(delta)
    if (price.gte(0)) return price
  }
  return reportedAvg ?? tracked.avgFillPrice ?? tracked.limitPrice ?? tracked.stopPrice ?? ZERO
}

function asOrderList(parsed: Order | Order[] | undefined): Order[] {
  if (parsed === undefined) return []
  return Array.isArray(parsed) ? parsed : [parsed]
}

/**
 * Reconciles the registry against periodic brokerage snapshots.
 *
 * Each cycle walks the order listing: unseen orders become NEW, seen orders
 * whose status or cumulative fill changed get the matching transition, and
 * active orders the brokerage no longer lists are canceled when
 * `cancelMissingOrders` is set. Orders settled and evicted by retention are
 * skipped. On the first cycle, unseen orders already past NEW are filed as
 * they are instead of replayed.
 *
 * Orders are reconciled before positions are diffed, the reverse of the
 * positions-then-orders sequence, so the brokerage's position quantities
 * overwrite the fills just applied from the order listing instead of being
 * added to them.
 *
 * @example
 * ```typescript
 * const poller = new PollingReconciler(adapter, registry, stateMachine, clock, {
 *   intervalMs: 5000,
 *   cancelMissingOrders: true,
 *   strategy: () => 'momentum'
 * })
 * poller.start()
 * // ...
 * await poller.stop()
 * ```
 */
export class PollingReconciler {
  private cycles = 0
  private running = false
  private timer?: NodeJS.Timeout
  private current?: Promise<unknown>
  private logger?: Logger

  constructor(
    private readonly adapter: BrokerAdapter,
    private readonly registry: OrderRegistry,
    private readonly stateMachine: TradeEventStateMachine,
    private readonly time: TimeSource,
    private readonly options: PollingReconcilerOptions
  ) {
    this.logger = options.logger
  }

  setLogger(logger: Logger): void {
    this.logger = logger
  }

  /**
   * Polls now and then every `intervalMs` until stopped.
   */
  start(): void {
    if (this.running) return
    this.running = true
    this.schedule(0)
  }

  /**
   * Stops the loop and waits for an in-flight cycle.
   */
  async stop(): Promise<void> {
    this.running = false
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = undefined
    }
    await this.current
  }

  isRunning(): boolean {
    return this.running
  }

  /** Completed cycles */
  get iterations(): number {
    return this.cycles
  }

  /**
   * Runs one reconciliation cycle. A failing cycle is logged and skipped;
   * nothing already tracked is discarded.
   *
   * @returns the cycle outcome, or undefined if it failed
   */
  async pollOnce(): Promise<PollResult | undefined> {
    try {
      const orders = await this.reconcileOrders()
      const positions = await this.syncPositions(this.options.strategy())
      const result: PollResult = { ...orders, positions }
      this.cycles++
      this.logger?.debug('Poll cycle complete', { ...result })
      return result
    } catch (error) {
      const failure = toBrokerError(error, (message, cause) => new ReconciliationError(message, cause))
      this.logger?.error('Poll cycle failed, skipping', { code: failure.code, error: failure.message })
      return undefined
    }
  }

  /**
   * Diffs the brokerage's positions for a strategy against the registry.
   * New nonzero positions are added, changed quantities updated, and
   * positions the brokerage no longer reports removed unless pinned.
   */
  async syncPositions(strategy: string): Promise<PositionSyncResult> {
    const reported = await this.adapter.pullPositions(strategy)
    const now = this.time.nowEpoch()

    return this.registry.lock.runExclusive(() => {
      let added = 0
      let updated = 0
      let removed = 0
      const seen = new Set<string>()

      for (const position of reported) {
        const local = this.registry.getPosition(strategy, position.asset)
        seen.add(assetKey(position.asset))
        if (!local) {
          if (position.quantity.isZero()) continue
          this.registry.putPosition({ ...position, strategy, orders: [...position.orders], updatedAt: now })
          added++
          continue
        }
        if (local.quantity.eq(position.quantity)) continue

        local.quantity = position.quantity
        local.avgFillPrice = position.avgFillPrice ?? local.avgFillPrice
        local.updatedAt = now
        if (local.quantity.isZero() && !this.registry.isPinned(local.asset)) {
          this.registry.removePosition(local)
          removed++
        } else {
          updated++
        }
      }

      for (const local of this.registry.listPositions(strategy)) {
        if (seen.has(assetKey(local.asset))) continue
        if (this.registry.isPinned(local.asset)) continue
        this.registry.removePosition(local)
        removed++
      }

      if (added + updated + removed > 0) {
        this.logger?.info('Positions reconciled', { strategy, added, updated, removed })
      }
      return { added, updated, removed }
    })
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = undefined
      this.current = this.pollOnce().finally(() => {
        this.current = undefined
        if (this.running) this.schedule(this.options.intervalMs)
      })
    }, delayMs)
  }

  private async reconcileOrders(): Promise<Omit<PollResult, 'positions'>> {
    const strategy = this.options.strategy()
    const rows = await this.adapter.pullAllOrders()
    const reported = rows.flatMap((row) => asOrderList(this.adapter.parseOrder(row, strategy)))
    const firstCycle = this.cycles === 0
    const seen = new Set<string>()
    let applied = 0
    let fastForwarded = 0

    for (const order of reported) {
      if (!order.identifier) continue
      seen.add(order.identifier)
      const tracked = this.registry.findOrder(order.identifier)

      if (tracked) {
        applied += this.reconcileSeen(tracked, order)
      } else if (this.registry.wasEvicted(order.identifier)) {
        continue
      } else if (firstCycle && order.status !== OrderStatus.NEW && order.status !== OrderStatus.UNPROCESSED) {
        if (this.fastForward(order)) fastForwarded++
      } else {
        applied += this.reconcileUnseen(order)
      }
    }

    let canceledMissing = 0
    if (this.options.cancelMissingOrders) {
      for (const order of this.registry.activeOrders()) {
        if (!order.identifier || seen.has(order.identifier)) continue
        this.logger?.debug('Order no longer reported by brokerage, canceling', { order: describeOrder(order) })
        if (this.stateMachine.processEvent(order, TradeEventKind.CANCELED)) canceledMissing++
      }
    }

    return { orders: reported.length, applied: applied + canceledMissing, fastForwarded, canceledMissing }
  }

  /**
   * Files an order already past NEW without replaying its history.
   */
  private fastForward(order: Order): boolean {
    const target = collectionForStatus(order.status)
    if (!target) return false
    order.updatedAt = this.time.nowEpoch()
    return this.registry.fileIfUntracked(order, target)
  }

  /**
   * An order first seen after start-up: announce it, then catch up on
   * whatever the brokerage already reports beyond NEW.
   */
  private reconcileUnseen(order: Order): number {
    const reported: Order = { ...order }
    order.filledQuantity = ZERO
    order.avgFillPrice = undefined
    if (!this.stateMachine.processEvent(order, TradeEventKind.NEW)) return 0
    if (reported.status === OrderStatus.NEW || reported.status === OrderStatus.UNPROCESSED) return 1
    return 1 + this.transition(order, reported)
  }

  private reconcileSeen(tracked: Order, reported: Order): number {
    tracked.brokerCreatedAt = reported.brokerCreatedAt ?? tracked.brokerCreatedAt
    tracked.brokerUpdatedAt = reported.brokerUpdatedAt ?? tracked.brokerUpdatedAt
    if (isTerminalStatus(tracked.status)) return 0
    return this.transition(tracked, reported)
  }

  /**
   * Dispatches the event that brings `tracked` to the reported status.
   */
  private transition(tracked: Order, reported: Order): number {
    switch (reported.status) {
      case OrderStatus.NEW:
        if (tracked.status !== OrderStatus.UNPROCESSED) return 0
        return this.stateMachine.processEvent(tracked, TradeEventKind.NEW) ? 1 : 0
      case OrderStatus.PARTIALLY_FILLED:
      case OrderStatus.FILLED: {
        const delta = reportedFill(reported).minus(tracked.filledQuantity)
        if (reported.status === tracked.status && delta.lte(0)) return 0
        const kind = reported.status === OrderStatus.FILLED ? TradeEventKind.FILLED : TradeEventKind.PARTIALLY_FILLED
        const filledQuantity = delta.gt(0) ? delta : ZERO
        return this.stateMachine.processEvent(tracked, kind, {
          price: deltaPrice(tracked, reported, filledQuantity),
          filledQuantity
        })
          ? 1
          : 0
      }
      case OrderStatus.CANCELED:
        return this.stateMachine.processEvent(tracked, TradeEventKind.CANCELED) ? 1 : 0
      case OrderStatus.ERROR:
        return this.stateMachine.processEvent(tracked, TradeEventKind.ERROR, {
          error: reported.error ?? `${this.adapter.name} reported an error for order ${String(reported.identifier)}`
        })
          ? 1
          : 0
      case OrderStatus.CASH_SETTLED:
        return this.stateMachine.processEvent(tracked, TradeEventKind.CASH_SETTLED) ? 1 : 0
      case OrderStatus.UNSUBMITTED:
      case OrderStatus.UNPROCESSED:
      case OrderStatus.PLACEHOLDER:
        return 0
    }
  }
}
