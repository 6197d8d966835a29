/**
 * Branded string type for ISO 8601 date strings (YYYY-MM-DDTHH:mm:ss.sssZ).
 */
export type IsoDate = string & { readonly __brand: 'IsoDate' }

/**
 * Branded number type for epoch timestamps in milliseconds since 1970-01-01 UTC.
 *
 * @example
 * const timestamp: EpochDate = 1705321845123 as EpochDate
 */
export type EpochDate = number & { readonly __brand: 'EpochDate' }

/** Milliseconds in one day */
export const DAY_MS = 24 * 60 * 60 * 1000

/**
 * Converts a Date object or timestamp to an ISO 8601 formatted date string.
 *
 * @param value - A Date object or numeric timestamp to convert
 * @param precision - Precision for numeric timestamps: 'ms' (default) or 's'
 *
 * @example
 * toIsoDate(1705321845123) // '2024-01-15T12:30:45.123Z'
 */
export function toIsoDate(value: Date): IsoDate
export function toIsoDate(value: number, precision?: 'ms' | 's'): IsoDate
export function toIsoDate(value: Date | number, precision?: 'ms' | 's'): IsoDate {
  if (typeof value === 'number') {
    value = new Date(precision === 's' ? value * 1000 : value)
  }
  return value.toISOString() as IsoDate
}

/**
 * Converts a Date object or timestamp to an epoch timestamp in milliseconds.
 *
 * @example
 * toEpochDate(1705321845, 's') // 1705321845000
 */
export function toEpochDate(value: Date): EpochDate
export function toEpochDate(value: number, precision?: 'ms' | 's'): EpochDate
export function toEpochDate(value: Date | number, precision?: 'ms' | 's'): EpochDate {
  if (typeof value === 'number') {
    return (precision === 's' ? value * 1000 : value) as EpochDate
  }
  return value.getTime() as EpochDate
}

/**
 * Current wall-clock time as an EpochDate.
 */
export function epochDateNow(): EpochDate {
  return Date.now() as EpochDate
}

/**
 * Shifts an epoch timestamp back by a number of days.
 *
 * @example
 * daysBefore(toEpochDate(new Date('2024-01-15T00:00:00Z')), 2) // 2024-01-13T00:00:00Z
 */
export function daysBefore(value: EpochDate, days: number): EpochDate {
  return (value - days * DAY_MS) as EpochDate
}

/**
 * Whole-and-fractional days elapsed between two timestamps.
 */
export function ageInDays(then: EpochDate, now: EpochDate): number {
  return (now - then) / DAY_MS
}
