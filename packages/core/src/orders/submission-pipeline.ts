import { describeOrder, OrderStatus, TradeEventKind, type Order } from '@brokerkit/shared'
import type { Logger } from '@brokerkit/types'
import type { BrokerAdapter } from '../broker/broker-adapter'
import { EngineStateError, SubmissionError, toBrokerError } from '../errors'
import type { OrderRegistry, OrderCollection } from '../registry/order-registry'
import { runWithConcurrency } from '../utils/concurrency'
import type { TradeEventStateMachine } from './trade-event-state-machine'

interface QueueItem {
  readonly orders: Order[]
  readonly batch: boolean
  readonly resolve: (orders: Order[]) => void
  readonly reject: (error: unknown) => void
}

export interface SubmissionPipelineOptions {
  /** Worker pool size for batch submissions */
  readonly maxWorkers: number
  /** Called after each queue item is processed */
  readonly onItemProcessed?: () => void
  readonly logger?: Logger
}

/**
 * Parent first, then every descendant leg
 */
function flattenOrders(order: Order): Order[] {
  return [order, ...order.childOrders.flatMap(flattenOrders)]
}

/**
 * Serializes order placement through one consumer.
 *
 * Single orders reach the adapter in the order they were submitted. A batch
 * occupies one queue slot and fans out over a bounded worker pool. Transmitted
 * orders, with their legs, are filed as unprocessed; OCO parents become
 * placeholders. Rejections never throw: the order comes back in ERROR state.
 *
 * @example
 * ```typescript
 * pipeline.start()
 * const placed = await pipeline.submit(order)
 * if (placed.status === OrderStatus.ERROR) console.warn(placed.error)
 * await pipeline.stop()
 * ```
 */
export class SubmissionPipeline {
  private readonly queue: QueueItem[] = []
  private draining?: Promise<void>
  private accepting = false
  private logger?: Logger

  constructor(
    private readonly adapter: BrokerAdapter,
    private readonly registry: OrderRegistry,
    private readonly stateMachine: TradeEventStateMachine,
    private readonly options: SubmissionPipelineOptions
  ) {
    this.logger = options.logger
  }

  setLogger(logger: Logger): void {
    this.logger = logger
  }

  start(): void {
    this.accepting = true
  }

  /**
   * Stops accepting orders and waits for queued ones to be placed.
   */
  async stop(): Promise<void> {
    this.accepting = false
    while (this.draining) {
      await this.draining
    }
  }

  isRunning(): boolean {
    return this.accepting
  }

  get pending(): number {
    return this.queue.length
  }

  /**
   * Queues one order and resolves once the adapter has handled it.
   *
   * @throws EngineStateError if the pipeline is not running
   */
  async submit(order: Order): Promise<Order> {
    const [placed] = await this.enqueue([order], false)
    return placed ?? order
  }

  /**
   * Places independent orders concurrently and resolves with all results.
   *
   * @throws EngineStateError if the pipeline is not running
   */
  async submitMany(orders: Order[]): Promise<Order[]> {
    if (orders.length === 0) return []
    return this.enqueue(orders, true)
  }

  private enqueue(orders: Order[], batch: boolean): Promise<Order[]> {
    if (!this.accepting) {
      return Promise.reject(new EngineStateError('Submission pipeline is not running'))
    }
    for (const order of orders) {
      order.status = OrderStatus.UNPROCESSED
    }
    return new Promise<Order[]>((resolve, reject) => {
      this.queue.push({ orders, batch, resolve, reject })
      this.kick()
    })
  }

  private kick(): void {
    if (this.draining) return
    this.draining = this.drain().finally(() => {
      this.draining = undefined
      // Items queued while the last drain was settling
      if (this.queue.length > 0) this.kick()
    })
  }

  private async drain(): Promise<void> {
    let item = this.queue.shift()
    while (item) {
      try {
        item.resolve(await this.process(item))
      } catch (error) {
        item.reject(error)
      }
      try {
        this.options.onItemProcessed?.()
      } catch (error) {
        this.logger?.error('Post-submission hook failed', {
          error: error instanceof Error ? error.message : String(error)
        })
      }
      item = this.queue.shift()
    }
  }

  private async process(item: QueueItem): Promise<Order[]> {
    if (!item.batch) {
      return Promise.all(item.orders.map((order) => this.place(order)))
    }
    return runWithConcurrency(item.orders, this.options.maxWorkers, (order) => this.place(order))
  }

  private async place(order: Order): Promise<Order> {
    let placed: Order
    try {
      placed = await this.adapter.submitOrder(order)
    } catch (error) {
      const failure = toBrokerError(error, (message, cause) => new SubmissionError(message, cause))
      this.logger?.error('Order submission failed', { order: describeOrder(order), error: failure.message })
      this.stateMachine.processEvent(order, TradeEventKind.ERROR, { error: failure.message })
      return order
    }

    if (placed.error !== undefined || !placed.transmitted) {
      const message = placed.error ?? 'Order was not transmitted'
      this.logger?.warn('Order rejected', { order: describeOrder(placed), error: message })
      this.stateMachine.processEvent(placed, TradeEventKind.ERROR, { error: message })
      return placed
    }

    this.file(placed)
    this.logger?.info(`Order sent: ${describeOrder(placed)}`)
    return placed
  }

  /**
   * Files the order and its legs unless an event already filed them.
   */
  private file(placed: Order): void {
    const isPlaceholder = placed.orderClass === 'oco' && placed.childOrders.length > 0
    this.registry.lock.runExclusive(() => {
      for (const order of flattenOrders(placed)) {
        const parent = order === placed && isPlaceholder
        const target: OrderCollection = parent ? 'placeholder' : 'unprocessed'
        if (this.registry.collectionOf(order) !== undefined) continue
        order.status = parent ? OrderStatus.PLACEHOLDER : OrderStatus.UNPROCESSED
        order.transmitted = true
        this.registry.fileIfUntracked(order, target)
      }
    })
  }
}
