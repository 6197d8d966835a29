import { canonicalStatus, describeOrder, eventKindForStatus, type Order, type TradeEventKind } from '@brokerkit/shared'
import type { Logger } from '@brokerkit/types'
import type { PushHandlers, PushStream } from '../broker/broker-adapter'
import { ReconciliationError, toBrokerError } from '../errors'
import type { TradeEventDetails, TradeEventStateMachine } from '../orders/trade-event-state-machine'

export interface PushReconcilerOptions {
  /** Backtests start without waiting for the connection */
  readonly backtesting?: boolean
  readonly logger?: Logger
}

/**
 * Resolves a pushed event name, canonical or vendor spelling, to an event kind.
 *
 * @example
 * resolveEventKind('fill') // TradeEventKind.FILLED
 * resolveEventKind('Cancelled') // TradeEventKind.CANCELED
 * resolveEventKind('pending_new') // TradeEventKind.NEW
 */
export function resolveEventKind(event: TradeEventKind | string): TradeEventKind | undefined {
  const status = canonicalStatus(event)
  return status === undefined ? undefined : eventKindForStatus(status)
}

/**
 * Feeds an adapter's push stream into the state machine.
 *
 * {@link start} resolves once the stream reports the connection established.
 * Each delivered event is applied to the tracked order with the same
 * identifier, so adapters may hand over freshly parsed copies.
 *
 * @example
 * ```typescript
 * const push = new PushReconciler(adapter.createPushStream(), stateMachine, { logger })
 * await push.start()
 * // ...
 * await push.stop()
 * ```
 */
export class PushReconciler {
  private running?: Promise<void>
  private logger?: Logger

  constructor(
    private readonly stream: PushStream,
    private readonly stateMachine: TradeEventStateMachine,
    private readonly options: PushReconcilerOptions = {}
  ) {
    this.logger = options.logger
  }

  setLogger(logger: Logger): void {
    this.logger = logger
  }

  /**
   * Opens the stream and waits for it to be established.
   *
   * @throws ReconciliationError if the stream ends or fails before it is established
   */
  async start(): Promise<void> {
    if (this.running) return

    let settle: { resolve: () => void; reject: (error: Error) => void } | undefined
    const established = this.options.backtesting
      ? Promise.resolve()
      : new Promise<void>((resolve, reject) => {
          settle = { resolve, reject }
        })

    const handlers: PushHandlers = {
      established: () => {
        this.logger?.info('Push stream established')
        settle?.resolve()
      },
      onTradeEvent: (order, event, details) => {
        this.handleEvent(order, event, details)
      }
    }

    this.running = this.stream.run(handlers).then(
      () => {
        this.logger?.info('Push stream closed')
        settle?.reject(new ReconciliationError('Push stream closed before it was established'))
      },
      (error: unknown) => {
        const failure = toBrokerError(error, (message, cause) => new ReconciliationError(message, cause))
        this.logger?.error('Push stream failed', { code: failure.code, error: failure.message })
        settle?.reject(failure)
      }
    )

    try {
      await established
    } catch (error) {
      this.running = undefined
      throw error
    }
  }

  /**
   * Closes the stream and waits for it to end.
   */
  async stop(): Promise<void> {
    const running = this.running
    if (!running) return
    this.running = undefined
    await this.stream.close()
    await running
  }

  isRunning(): boolean {
    return this.running !== undefined
  }

  /**
   * Applies one pushed event.
   *
   * @returns true if the state machine applied it
   * @throws ContractViolationError if a fill arrives without price or quantity
   */
  handleEvent(order: Order, event: TradeEventKind | string, details: TradeEventDetails = {}): boolean {
    const kind = resolveEventKind(event)
    if (kind === undefined) {
      this.logger?.warn('Ignoring unrecognized push event', { event, order: describeOrder(order) })
      return false
    }
    return this.stateMachine.processEvent(order, kind, details)
  }
}
