import type { Quantity } from './quantity'
import { toDecimal } from './quantity'

/** Instrument classes the engine distinguishes */
export type AssetType = 'stock' | 'option' | 'future' | 'forex' | 'crypto' | 'index'

/** Option right */
export type OptionRight = 'CALL' | 'PUT'

/**
 * Tradable instrument reference.
 * Two assets are the same instrument when their {@link assetKey} values match.
 */
export interface Asset {
  /** Ticker or currency code (e.g. 'AAPL', 'BTC', 'USD') */
  readonly symbol: string
  readonly assetType: AssetType
  /** Expiration date (YYYY-MM-DD) for options and futures */
  readonly expiration?: string
  readonly strike?: Quantity
  readonly right?: OptionRight
  /** Contract multiplier, 1 for cash instruments */
  readonly multiplier: number
}

/**
 * Creates an asset, defaulting to a stock with multiplier 1.
 *
 * @example
 * createAsset('SPY', { assetType: 'option', expiration: '2024-06-21', strike: 500, right: 'CALL', multiplier: 100 })
 */
export function createAsset(
  symbol: string,
  options: {
    assetType?: AssetType
    expiration?: string
    strike?: number | string
    right?: OptionRight
    multiplier?: number
  } = {}
): Asset {
  if (!symbol) {
    throw new Error('Asset symbol is required')
  }
  return {
    symbol: symbol.toUpperCase(),
    assetType: options.assetType ?? 'stock',
    expiration: options.expiration,
    strike: options.strike === undefined ? undefined : toDecimal(options.strike),
    right: options.right,
    multiplier: options.multiplier ?? 1
  }
}

/**
 * Stable identity string for an asset, used as a map and lookup key.
 *
 * @example
 * assetKey(createAsset('aapl')) // 'stock:AAPL'
 */
export function assetKey(asset: Asset): string {
  const parts: string[] = [asset.assetType, asset.symbol]
  if (asset.expiration) parts.push(asset.expiration)
  if (asset.strike) parts.push(asset.strike.toString())
  if (asset.right) parts.push(asset.right)
  return parts.join(':')
}

export function isSameAsset(a: Asset, b: Asset): boolean {
  return assetKey(a) === assetKey(b)
}

/**
 * Human-readable descriptor used in the trade log.
 *
 * @example
 * describeAsset(spyCall) // 'SPY 2024-06-21 500 CALL'
 */
export function describeAsset(asset: Asset): string {
  if (asset.assetType !== 'option' && asset.assetType !== 'future') {
    return asset.symbol
  }
  return [asset.symbol, asset.expiration, asset.strike?.toString(), asset.right]
    .filter((part): part is string => Boolean(part))
    .join(' ')
}
