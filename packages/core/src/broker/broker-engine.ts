import { setTimeout as sleep } from 'node:timers/promises'
import {
  createOrder,
  describeOrder,
  isBuySide,
  ZERO,
  type Asset,
  type Order,
  type Position,
  type Quantity
} from '@brokerkit/shared'
import type { Logger, TradeEventSubscriber } from '@brokerkit/types'
import { parseEngineConfig, type EngineConfig, type ReconciliationMode } from '../config/engine-config'
import { asError, EngineStateError, ReconciliationError, toBrokerError } from '../errors'
import { SubscriberBus } from '../events/subscriber-bus'
import { RealTimeSource, type TimeSource } from '../events/time-source'
import { SubmissionPipeline } from '../orders/submission-pipeline'
import { TradeEventStateMachine } from '../orders/trade-event-state-machine'
import { PollingReconciler, type PollResult, type PositionSyncResult } from '../reconciliation/polling-reconciler'
import { PushReconciler } from '../reconciliation/push-reconciler'
import { OrderRegistry, type OrderFilter } from '../registry/order-registry'
import { RetentionManager, type CleanupReport } from '../retention/retention-manager'
import { TradeEventLog, type TradeLogRow } from '../trade-log/trade-event-log'
import { runWithConcurrency } from '../utils/concurrency'
import { createRootLogger, resolveLogLevel, type LogLevel, type WinstonLogger } from '../utils/logger'
import type { Balances, BrokerAdapter, OrderModification } from './broker-adapter'

export interface BrokerEngineOptions {
  /** Used for every component instead of the winston loggers */
  readonly logger?: Logger
  /** Defaults to the wall clock */
  readonly timeSource?: TimeSource
}

interface ResolvedEngineOptions {
  readonly logLevel: LogLevel
  readonly logger?: Logger
  readonly time: TimeSource
}

export interface SellAllOptions {
  /** Cancel open orders and wait for them to clear first. Defaults to true */
  readonly cancelOpenOrders?: boolean
}

/**
 * Creates an engine for an adapter, validating the configuration and
 * resolving every default.
 *
 * @throws ConfigValidationError if the configuration is invalid
 *
 * @example
 * ```typescript
 * const engine = createBrokerEngine(adapter, { name: 'paper', quoteAssets: ['USD'] })
 * engine.registerSubscriber({ name: 'momentum', onTradeEvent: handleEvent })
 * await engine.start()
 * ```
 */
export function createBrokerEngine(
  adapter: BrokerAdapter,
  rawConfig: unknown,
  options: BrokerEngineOptions = {}
): BrokerEngine {
  const config = parseEngineConfig(rawConfig)
  return new BrokerEngine(adapter, config, {
    logLevel: config.logLevel ?? resolveLogLevel(process.env['LOG_LEVEL']),
    logger: options.logger,
    time: options.timeSource ?? new RealTimeSource()
  })
}

/**
 * Broker-agnostic order and position engine for one adapter.
 *
 * Owns the registry and wires the submission pipeline, the trade-event
 * state machine, reconciliation and retention around it. Construction
 * starts nothing; {@link start} picks push or poll reconciliation and
 * opens the pipeline.
 *
 * @remarks
 * Strategy code talks to this class only. Orders submitted here come back
 * as the same objects, updated in place as events arrive.
 */
export class BrokerEngine {
  readonly config: EngineConfig

  private readonly registry = new OrderRegistry()
  private readonly tradeLog = new TradeEventLog()
  private readonly bus: SubscriberBus
  private readonly stateMachine: TradeEventStateMachine
  private readonly pipeline: SubmissionPipeline
  private readonly poller: PollingReconciler
  private readonly retention: RetentionManager
  private readonly time: TimeSource
  private push?: PushReconciler
  private mode?: Exclude<ReconciliationMode, 'auto'>
  private logger: Logger
  private rootLogger?: WinstonLogger
  private strategyName?: string
  private running = false

  constructor(
    private readonly adapter: BrokerAdapter,
    config: EngineConfig,
    private readonly options: ResolvedEngineOptions
  ) {
    this.config = config
    this.time = options.time
    this.logger = this.loggerFor('engine')

    for (const symbol of config.quoteAssets) {
      this.registry.pin(symbol)
    }

    this.bus = new SubscriberBus(this.loggerFor('subscribers'))
    this.stateMachine = new TradeEventStateMachine(this.registry, this.bus, this.tradeLog, this.time, {
      backtesting: config.backtesting,
      logger: this.loggerFor('state-machine')
    })
    this.retention = new RetentionManager(this.registry, config.cleanup, this.time, this.loggerFor('retention'))
    this.pipeline = new SubmissionPipeline(adapter, this.registry, this.stateMachine, {
      maxWorkers: config.maxWorkers,
      onItemProcessed: () => {
        this.retention.tick()
      },
      logger: this.loggerFor('pipeline')
    })
    this.poller = new PollingReconciler(adapter, this.registry, this.stateMachine, this.time, {
      intervalMs: config.pollIntervalMs,
      cancelMissingOrders: config.cancelMissingOrders,
      strategy: () => this.defaultStrategy,
      logger: this.loggerFor('poller')
    })
  }

  /**
   * Starts reconciliation and opens the submission pipeline.
   * In live push mode this resolves once the stream is established.
   *
   * @throws EngineStateError if push mode is configured for an adapter without a stream
   * @throws ReconciliationError if the push stream ends before it is established
   */
  async start(): Promise<void> {
    if (this.running) return
    const mode = this.resolveMode()

    if (mode === 'push') {
      const stream = this.adapter.createPushStream?.()
      if (!stream) {
        throw new EngineStateError(`Adapter ${this.adapter.name} offers no push stream`)
      }
      const push = new PushReconciler(stream, this.stateMachine, {
        backtesting: this.config.backtesting,
        logger: this.loggerFor('push')
      })
      await push.start()
      this.push = push
    } else {
      this.poller.start()
    }

    this.pipeline.start()
    this.mode = mode
    this.running = true
    this.logger.info('Engine started', { adapter: this.adapter.name, mode })
  }

  /**
   * Drains the submission queue, then stops reconciliation.
   */
  async stop(): Promise<void> {
    if (!this.running) return
    this.running = false
    await this.pipeline.stop()
    await this.poller.stop()
    await this.push?.stop()
    this.push = undefined
    this.logger.info('Engine stopped', { adapter: this.adapter.name, mode: this.mode })
  }

  isRunning(): boolean {
    return this.running
  }

  /** Reconciliation mode in use, once started */
  get reconciliationMode(): Exclude<ReconciliationMode, 'auto'> | undefined {
    return this.mode
  }

  registerSubscriber(subscriber: TradeEventSubscriber): void {
    this.bus.register(subscriber)
  }

  unregisterSubscriber(name: string): boolean {
    return this.bus.unregister(name)
  }

  /**
   * Names the strategy driving this engine. Log lines carry the name and
   * polled orders without their own strategy are attributed to it; until
   * then they are attributed to the engine's configured name.
   */
  setStrategyName(name: string): void {
    this.strategyName = name
    this.logger = this.loggerFor('engine')
    this.bus.setLogger(this.loggerFor('subscribers'))
    this.stateMachine.setLogger(this.loggerFor('state-machine'))
    this.retention.setLogger(this.loggerFor('retention'))
    this.pipeline.setLogger(this.loggerFor('pipeline'))
    this.poller.setLogger(this.loggerFor('poller'))
    this.push?.setLogger(this.loggerFor('push'))
  }

  // ---- Orders ----

  /**
   * Queues an order for placement. A rejected order resolves in ERROR state.
   *
   * @throws EngineStateError if the engine is not running
   */
  submitOrder(order: Order): Promise<Order> {
    return this.pipeline.submit(order)
  }

  /**
   * Places independent orders concurrently, at most `maxWorkers` at a time.
   *
   * @throws EngineStateError if the engine is not running
   */
  submitOrders(orders: Order[]): Promise<Order[]> {
    return this.pipeline.submitMany(orders)
  }

  /**
   * Asks the brokerage to cancel. The order is marked canceled only once
   * the brokerage confirms, by push or by the next poll.
   *
   * @returns false if the request failed
   */
  async cancelOrder(order: Order): Promise<boolean> {
    try {
      await this.adapter.cancelOrder(order)
      this.logger.info(`Cancel requested: ${describeOrder(order)}`)
      return true
    } catch (error) {
      this.logger.error('Order cancel failed', { order: describeOrder(order), error: asError(error).message })
      return false
    }
  }

  /**
   * Cancels orders over a bounded worker pool.
   *
   * @returns one result per order, in input order
   */
  cancelOrders(orders: readonly Order[]): Promise<boolean[]> {
    return runWithConcurrency(orders, this.config.maxWorkers, (order) => this.cancelOrder(order))
  }

  /**
   * Cancels every active order of a strategy.
   */
  cancelOpenOrders(strategy: string): Promise<boolean[]> {
    return this.cancelOrders(this.registry.activeOrders(strategy))
  }

  /**
   * @returns false if the request failed
   */
  async modifyOrder(order: Order, changes: OrderModification): Promise<boolean> {
    try {
      await this.adapter.modifyOrder(order, changes)
      return true
    } catch (error) {
      this.logger.error('Order modify failed', { order: describeOrder(order), error: asError(error).message })
      return false
    }
  }

  // ---- Queries ----

  getTrackedOrder(identifier: string): Order | undefined {
    return this.registry.findOrder(identifier)
  }

  getTrackedOrders(filter: Pick<OrderFilter, 'strategy' | 'asset'> = {}): Order[] {
    return this.registry.getOrders(filter)
  }

  getAllOrders(): Order[] {
    return this.registry.getOrders()
  }

  /**
   * Tracked order with this identifier, else the brokerage's current view of it.
   */
  async getOrder(identifier: string): Promise<Order | undefined> {
    const tracked = this.registry.findOrder(identifier)
    if (tracked) return tracked

    const rows = await this.adapter.pullAllOrders()
    for (const row of rows) {
      const parsed = this.adapter.parseOrder(row, this.defaultStrategy)
      const orders = parsed === undefined ? [] : Array.isArray(parsed) ? parsed : [parsed]
      const match = orders.find((order) => order.identifier === identifier)
      if (match) return match
    }
    return undefined
  }

  getTrackedPosition(strategy: string, asset: Asset): Position | undefined {
    return this.registry.getPosition(strategy, asset)
  }

  getTrackedPositions(strategy?: string): Position[] {
    return this.registry.listPositions(strategy)
  }

  getTrackedAssets(strategy: string): Asset[] {
    return this.registry.listPositions(strategy).map((position) => position.asset)
  }

  /**
   * Position quantity once every active order of the strategy on this asset fills.
   *
   * @example
   * // Long 10, with a working sell for 4
   * engine.getAssetPotentialTotal('momentum', aapl).toString() // '6'
   */
  getAssetPotentialTotal(strategy: string, asset: Asset): Quantity {
    let total = this.registry.getPosition(strategy, asset)?.quantity ?? ZERO
    for (const order of this.registry.activeOrders(strategy)) {
      if (order.asset.symbol !== asset.symbol || order.asset.assetType !== asset.assetType) continue
      total = isBuySide(order.side) ? total.plus(order.quantity) : total.minus(order.quantity)
    }
    return total
  }

  // ---- Account ----

  /**
   * @throws ReconciliationError if the brokerage request fails
   */
  async getBalances(quoteAsset: Asset, strategy: string): Promise<Balances> {
    try {
      return await this.adapter.getBalances(quoteAsset, strategy)
    } catch (error) {
      throw toBrokerError(error, (message, cause) => new ReconciliationError(message, cause))
    }
  }

  /**
   * Files the brokerage's current positions for a strategy.
   *
   * @returns number of positions filed
   */
  async setInitialPositions(strategy: string): Promise<number> {
    const positions = await this.adapter.pullPositions(strategy)
    const now = this.time.nowEpoch()
    return this.registry.lock.runExclusive(() => {
      let filed = 0
      for (const position of positions) {
        if (position.quantity.isZero() && !this.registry.isPinned(position.asset)) continue
        this.registry.putPosition({ ...position, strategy, orders: [...position.orders], updatedAt: now })
        filed++
      }
      this.logger.info('Initial positions filed', { strategy, positions: filed })
      return filed
    })
  }

  /**
   * Runs one poll cycle now, outside the interval.
   *
   * @returns the cycle outcome, or undefined if it failed
   */
  reconcileNow(): Promise<PollResult | undefined> {
    return this.poller.pollOnce()
  }

  /**
   * Diffs the brokerage's positions against the registry now.
   */
  syncPositions(strategy: string): Promise<PositionSyncResult> {
    return this.poller.syncPositions(strategy)
  }

  /**
   * Waits for a strategy's active orders to reach a terminal state.
   *
   * @returns true if none remain
   */
  async waitForOrdersClear(strategy: string, maxLoops = 5, intervalMs = 250): Promise<boolean> {
    for (let loop = 0; loop < maxLoops; loop++) {
      if (this.registry.activeOrders(strategy).length === 0) return true
      await sleep(intervalMs)
    }
    return this.registry.activeOrders(strategy).length === 0
  }

  /**
   * Closes every position of a strategy except pinned quote assets.
   *
   * @returns the closing orders, as placed
   */
  async sellAll(strategy: string, options: SellAllOptions = {}): Promise<Order[]> {
    if (options.cancelOpenOrders ?? true) {
      await this.cancelOpenOrders(strategy)
      const cleared = await this.waitForOrdersClear(strategy)
      if (!cleared) {
        this.logger.warn('Open orders still active before selling all', { strategy })
      }
    }

    const closing = this.registry
      .listPositions(strategy)
      .filter((position) => !position.quantity.isZero() && !this.registry.isPinned(position.asset))
      .map((position) =>
        createOrder({
          strategy,
          asset: position.asset,
          quantity: position.quantity.abs(),
          side: position.quantity.isPositive() ? 'sell' : 'buy'
        })
      )

    this.logger.info('Selling all positions', { strategy, orders: closing.length })
    return this.submitOrders(closing)
  }

  // ---- Trade events ----

  /**
   * Buffers trade events until {@link releaseHeldTradeEvents}. Ignored when backtesting.
   */
  holdTradeEvents(): void {
    this.stateMachine.holdEvents()
  }

  /**
   * @returns number of held events that were applied
   */
  releaseHeldTradeEvents(): number {
    return this.stateMachine.releaseHeldEvents()
  }

  getTradeLog(): TradeLogRow[] {
    return this.tradeLog.snapshot()
  }

  /**
   * Writes the trade log as CSV.
   *
   * @returns number of rows written
   */
  exportTradeLog(filePath: string): Promise<number> {
    return this.tradeLog.exportCsv(filePath)
  }

  // ---- Maintenance ----

  /**
   * Prunes terminal collections now, whether or not periodic cleanup is enabled.
   *
   * @returns what was removed, or undefined if cleanup failed
   */
  forceCleanup(): CleanupReport | undefined {
    return this.retention.forceCleanup()
  }

  /** Strategy polled orders and positions are attributed to */
  private get defaultStrategy(): string {
    return this.strategyName ?? this.config.name
  }

  private resolveMode(): Exclude<ReconciliationMode, 'auto'> {
    if (this.config.mode !== 'auto') return this.config.mode
    return this.adapter.createPushStream ? 'push' : 'poll'
  }

  private loggerFor(component: string): Logger {
    if (this.options.logger) return this.options.logger
    if (!this.rootLogger) {
      this.rootLogger = createRootLogger({ level: this.options.logLevel, logFile: this.config.logFile })
    }
    return this.rootLogger.child(this.strategyName ? { component, strategy: this.strategyName } : { component })
  }
}
