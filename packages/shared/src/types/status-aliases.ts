import { OrderStatus, TradeEventKind } from './orders'

/**
 * Vendor spellings of each canonical status.
 * Adapters report whatever their brokerage says; the engine resolves it here.
 * A cancel or replace still pending is unconfirmed, so the order stays active.
 */
const STATUS_ALIASES: Readonly<Record<OrderStatus, readonly string[]>> = {
  [OrderStatus.UNSUBMITTED]: ['unsubmitted'],
  [OrderStatus.UNPROCESSED]: ['unprocessed', 'pending_submit', 'pending'],
  [OrderStatus.NEW]: [
    'new',
    'open',
    'working',
    'submitted',
    'accepted',
    'pending_new',
    'accepted_for_bidding',
    'held',
    'pending_cancel',
    'pending_replace',
    'presubmitted',
    'live',
    'active'
  ],
  [OrderStatus.PARTIALLY_FILLED]: [
    'partially_filled',
    'partial_filled',
    'partial_fill',
    'partially filled',
    'partial'
  ],
  [OrderStatus.FILLED]: ['filled', 'fill', 'executed', 'complete', 'completed'],
  [OrderStatus.CANCELED]: [
    'canceled',
    'cancelled',
    'cancel',
    'expired',
    'done_for_day',
    'replaced',
    'inactive'
  ],
  [OrderStatus.ERROR]: ['error', 'rejected', 'failed', 'suspended'],
  [OrderStatus.CASH_SETTLED]: ['cash_settled', 'settled'],
  [OrderStatus.PLACEHOLDER]: ['placeholder']
}

const ALIAS_LOOKUP: ReadonlyMap<string, OrderStatus> = new Map(
  Object.values(OrderStatus).flatMap((status) =>
    STATUS_ALIASES[status].map((alias) => [alias, status] as const)
  )
)

/**
 * Resolves a vendor status string to its canonical status.
 *
 * @returns the canonical status, or undefined for an unknown spelling
 *
 * @example
 * canonicalStatus('Working') // OrderStatus.NEW
 * canonicalStatus('partial_fill') // OrderStatus.PARTIALLY_FILLED
 */
export function canonicalStatus(raw: string): OrderStatus | undefined {
  return ALIAS_LOOKUP.get(raw.trim().toLowerCase())
}

/**
 * True when both spellings resolve to the same canonical status.
 */
export function isEquivalentStatus(a: string, b: string): boolean {
  const left = canonicalStatus(a)
  return left !== undefined && left === canonicalStatus(b)
}

/**
 * The lifecycle event that moves an order into the given status.
 *
 * @returns undefined for states no event leads to (unsubmitted, unprocessed, placeholder)
 */
export function eventKindForStatus(status: OrderStatus): TradeEventKind | undefined {
  switch (status) {
    case OrderStatus.NEW:
      return TradeEventKind.NEW
    case OrderStatus.PARTIALLY_FILLED:
      return TradeEventKind.PARTIALLY_FILLED
    case OrderStatus.FILLED:
      return TradeEventKind.FILLED
    case OrderStatus.CANCELED:
      return TradeEventKind.CANCELED
    case OrderStatus.ERROR:
      return TradeEventKind.ERROR
    case OrderStatus.CASH_SETTLED:
      return TradeEventKind.CASH_SETTLED
    case OrderStatus.UNSUBMITTED:
    case OrderStatus.UNPROCESSED:
    case OrderStatus.PLACEHOLDER:
      return undefined
  }
}
