import { ageInDays, positionTimestamp, type EpochDate, type Order, type Position } from '@brokerkit/shared'
import type { Logger } from '@brokerkit/types'
import type { EngineConfig, RetentionCollection, RetentionPolicy } from '../config/engine-config'
import { asError, CleanupError } from '../errors'
import type { TimeSource } from '../events/time-source'
import type { OrderCollection, OrderRegistry } from '../registry/order-registry'

/**
 * Items removed per collection by one cleanup pass
 */
export type CleanupReport = Readonly<Record<RetentionCollection, number>> & { readonly total: number }

const ORDER_COLLECTIONS: ReadonlyArray<readonly [RetentionCollection, OrderCollection]> = [
  ['filledOrders', 'filled'],
  ['canceledOrders', 'canceled'],
  ['errorOrders', 'error']
]

/**
 * Picks the items a retention policy drops.
 *
 * Items are ranked newest first. The first `minKeep` always stay; beyond
 * that an item goes if it is older than `maxAgeDays` or ranked at or past
 * `maxCount`. Items without a timestamp are never selected.
 *
 * @example
 * ```typescript
 * // 10 filled orders: keeps the 2 newest by minKeep and the next 3 by maxCount
 * selectForRemoval(orders, { maxAgeDays: 7, maxCount: 5, minKeep: 2 }, now, orderTimestamp).size // 5
 * ```
 */
export function selectForRemoval<T>(
  items: readonly T[],
  policy: RetentionPolicy,
  now: EpochDate,
  timestampOf: (item: T) => EpochDate | undefined
): Set<T> {
  const dated: Array<{ item: T; time: EpochDate }> = []
  for (const item of items) {
    const time = timestampOf(item)
    if (time !== undefined && Number.isFinite(time)) dated.push({ item, time })
  }
  dated.sort((a, b) => b.time - a.time)

  const doomed = new Set<T>()
  dated.forEach(({ item, time }, rank) => {
    if (rank < policy.minKeep) return
    if (ageInDays(time, now) > policy.maxAgeDays || rank >= policy.maxCount) {
      doomed.add(item)
    }
  })
  return doomed
}

/**
 * Most recent activity on an order
 */
export function orderTimestamp(order: Order): EpochDate | undefined {
  return order.brokerUpdatedAt ?? order.updatedAt ?? order.createdAt
}

/**
 * Bounds the terminal collections of a registry.
 *
 * Runs every `intervalIterations` calls to {@link tick} and on demand through
 * {@link forceCleanup}. Active collections, placeholders and pinned quote
 * positions are never touched. Evicted orders are dropped from their
 * positions' order lists and remembered by the registry, so a brokerage
 * still listing them does not get them replayed. Failures are logged, never
 * thrown.
 */
export class RetentionManager {
  private iterations = 0
  private logger?: Logger

  constructor(
    private readonly registry: OrderRegistry,
    private readonly config: EngineConfig['cleanup'],
    private readonly time: TimeSource,
    logger?: Logger
  ) {
    this.logger = logger
  }

  setLogger(logger: Logger): void {
    this.logger = logger
  }

  /**
   * Counts one pipeline iteration and cleans up when the interval is reached.
   *
   * @returns the report when a pass ran
   */
  tick(): CleanupReport | undefined {
    if (!this.config.enabled) return undefined
    this.iterations++
    if (this.iterations < this.config.intervalIterations) return undefined
    this.iterations = 0
    return this.forceCleanup()
  }

  /**
   * Runs a cleanup pass now, whether or not periodic cleanup is enabled.
   *
   * @returns the report, or undefined if the pass failed
   */
  forceCleanup(): CleanupReport | undefined {
    try {
      const report = this.registry.lock.runExclusive(() => this.run())
      if (report.total > 0) {
        this.logger?.info('Cleanup removed tracked items', { ...report })
      } else {
        this.logger?.debug('Cleanup found nothing to remove')
      }
      return report
    } catch (error) {
      const failure = new CleanupError('Cleanup pass failed', asError(error))
      this.logger?.error(failure.message, { code: failure.code, error: failure.cause?.message })
      return undefined
    }
  }

  private run(): CleanupReport {
    const now = this.time.nowEpoch()
    const policies = this.config.retentionPolicies
    const counts: Record<RetentionCollection, number> = {
      filledOrders: 0,
      canceledOrders: 0,
      errorOrders: 0,
      filledPositions: 0
    }

    for (const [policyName, collectionName] of ORDER_COLLECTIONS) {
      const collection = this.registry.collection(collectionName)
      const doomed = selectForRemoval(collection.list(), policies[policyName], now, orderTimestamp)
      counts[policyName] = doomed.size > 0 ? collection.removeItems(doomed) : 0
      if (doomed.size > 0) {
        this.registry.markEvicted(doomed)
        for (const position of this.registry.listPositions()) {
          position.orders = position.orders.filter((order) => !doomed.has(order))
        }
      }
    }

    const positions = this.registry.filledPositions
    const candidates = positions.list().filter((position: Position) => !this.registry.isPinned(position.asset))
    const doomedPositions = selectForRemoval(candidates, policies.filledPositions, now, positionTimestamp)
    counts.filledPositions = doomedPositions.size > 0 ? positions.removeItems(doomedPositions) : 0

    const total = counts.filledOrders + counts.canceledOrders + counts.errorOrders + counts.filledPositions
    return { ...counts, total }
  }
}
