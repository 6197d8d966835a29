import { promises as fs } from 'node:fs'
import * as path from 'node:path'
import { toIsoDate, type EpochDate, type OrderSide, type OrderStatus, type OrderType, type Quantity } from '@brokerkit/shared'

/**
 * One applied lifecycle event
 */
export interface TradeLogRow {
  readonly time: EpochDate
  readonly strategy: string
  readonly identifier?: string
  /** Asset descriptor, e.g. 'AAPL' or 'SPY 2024-06-21 500 CALL' */
  readonly asset: string
  readonly side: OrderSide
  readonly type: OrderType
  /** Order status after the event */
  readonly status: OrderStatus
  readonly price?: Quantity
  readonly filledQuantity?: Quantity
  readonly multiplier: number
  readonly tradeCost?: Quantity
}

export const TRADE_LOG_COLUMNS = [
  'time',
  'strategy',
  'identifier',
  'asset',
  'side',
  'type',
  'status',
  'price',
  'filled_quantity',
  'multiplier',
  'trade_cost'
] as const

const CSV_DELIMITER = ','

/**
 * Quote a CSV field containing the delimiter, quotes or line breaks
 */
function escapeCsvValue(value: string): string {
  if (value.includes(CSV_DELIMITER) || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

function formatRow(row: TradeLogRow): string {
  return [
    toIsoDate(row.time),
    row.strategy,
    row.identifier ?? '',
    row.asset,
    row.side,
    row.type,
    row.status,
    row.price?.toString() ?? '',
    row.filledQuantity?.toString() ?? '',
    String(row.multiplier),
    row.tradeCost?.toString() ?? ''
  ]
    .map(escapeCsvValue)
    .join(CSV_DELIMITER)
}

/**
 * Append-only in-memory log of applied trade events.
 * Readers get copies, so a snapshot needs no lock.
 */
export class TradeEventLog {
  private readonly rows: TradeLogRow[] = []

  append(row: TradeLogRow): void {
    this.rows.push(row)
  }

  snapshot(): TradeLogRow[] {
    return [...this.rows]
  }

  get size(): number {
    return this.rows.length
  }

  /**
   * Renders the log as CSV with a header line, rows in event order.
   */
  toCsv(): string {
    let content = TRADE_LOG_COLUMNS.join(CSV_DELIMITER) + '\n'
    for (const row of this.rows) {
      content += formatRow(row) + '\n'
    }
    return content
  }

  /**
   * Writes the log to a CSV file, creating parent directories.
   *
   * @returns number of rows written
   */
  async exportCsv(filePath: string): Promise<number> {
    const rows = this.rows.length
    const content = this.toCsv()
    await fs.mkdir(path.dirname(filePath), { recursive: true })
    await fs.writeFile(filePath, content, 'utf8')
    return rows
  }
}
