import { epochDateNow, toEpochDate, type EpochDate } from '@brokerkit/shared'

/**
 * Clock injected into every time-dependent engine component.
 * Retention ages, trade-log rows and order timestamps all read from it.
 */
export interface TimeSource {
  /** Current time as EpochDate (milliseconds since Unix epoch) */
  nowEpoch(): EpochDate

  nowDate(): Date
}

/**
 * Wall clock for live trading
 */
export class RealTimeSource implements TimeSource {
  nowEpoch(): EpochDate {
    return epochDateNow()
  }

  nowDate(): Date {
    return new Date()
  }
}

/**
 * Manually driven clock for backtests and tests
 *
 * @example
 * ```typescript
 * const clock = new SimulatedTimeSource(toEpochDate(new Date('2024-01-15T00:00:00Z')))
 * clock.advance(DAY_MS)
 * clock.nowDate().toISOString() // '2024-01-16T00:00:00.000Z'
 * ```
 */
export class SimulatedTimeSource implements TimeSource {
  private currentTime: EpochDate
  private readonly startTime: EpochDate

  constructor(startTime: EpochDate = epochDateNow()) {
    this.startTime = startTime
    this.currentTime = startTime
  }

  nowEpoch(): EpochDate {
    return this.currentTime
  }

  nowDate(): Date {
    return new Date(this.currentTime)
  }

  /**
   * Advance time by specified milliseconds
   */
  advance(milliseconds: number): void {
    if (milliseconds < 0) {
      throw new Error('Cannot move time backwards')
    }
    this.currentTime = (this.currentTime + milliseconds) as EpochDate
  }

  /**
   * Advance time to specific date
   */
  advanceTo(date: EpochDate | Date): void {
    const ms = date instanceof Date ? toEpochDate(date) : date
    if (ms < this.currentTime) {
      throw new Error('Cannot move time backwards')
    }
    this.currentTime = ms
  }

  /**
   * Reset to start time
   */
  reset(): void {
    this.currentTime = this.startTime
  }
}
