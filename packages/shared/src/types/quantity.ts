import Decimal from 'decimal.js'

/**
 * Fixed-precision number used for every quantity and price in the engine.
 * Adapters convert vendor numbers with {@link toDecimal} at the boundary.
 */
export type Quantity = Decimal

export const ZERO: Quantity = new Decimal(0)

/**
 * Converts a vendor value (number, numeric string or Decimal) into a Decimal.
 *
 * @throws Error if the value is not a finite number
 */
export function toDecimal(value: Decimal.Value): Quantity {
  const result = new Decimal(value)
  if (!result.isFinite()) {
    throw new Error(`Expected a finite number, received ${String(value)}`)
  }
  return result
}

/**
 * Like {@link toDecimal} but passes undefined and null through.
 */
export function toOptionalDecimal(value: Decimal.Value | null | undefined): Quantity | undefined {
  return value === undefined || value === null ? undefined : toDecimal(value)
}

export { Decimal }
