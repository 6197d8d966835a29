import assert from 'node:assert/strict'
import { beforeEach, describe, it } from 'node:test'
import {
  assignOrderIdentifier,
  createAsset,
  createOrder,
  createPosition,
  OrderStatus,
  toDecimal,
  toEpochDate,
  TradeEventKind,
  type Order,
  type OrderParams
} from '@brokerkit/shared'
import type { TradeEvent } from '@brokerkit/types'
import { ContractViolationError } from '../errors'
import { SubscriberBus } from '../events/subscriber-bus'
import { SimulatedTimeSource } from '../events/time-source'
import { OrderRegistry } from '../registry/order-registry'
import { TradeEventLog } from '../trade-log/trade-event-log'
import { NoopLogger } from '../utils/logger'
import { TradeEventStateMachine } from './trade-event-state-machine'

const AAPL = createAsset('AAPL')
const BTC = createAsset('BTC', { assetType: 'crypto' })
const USD = createAsset('USD', { assetType: 'forex' })

describe('TradeEventStateMachine', () => {
  let registry: OrderRegistry
  let tradeLog: TradeEventLog
  let clock: SimulatedTimeSource
  let stateMachine: TradeEventStateMachine
  let events: TradeEvent[]

  function trackedOrder(params: Partial<OrderParams> = {}, identifier = 'b-1'): Order {
    const order = createOrder({ strategy: 'momentum', asset: AAPL, quantity: 10, side: 'buy', limitPrice: 101.5, ...params })
    order.status = OrderStatus.UNPROCESSED
    registry.fileIfUntracked(order, 'unprocessed')
    assignOrderIdentifier(order, identifier)
    return order
  }

  function fill(
    order: Order,
    price: string | number,
    quantity: string | number,
    kind: TradeEventKind = TradeEventKind.FILLED
  ): boolean {
    return stateMachine.processEvent(order, kind, {
      price: toDecimal(price),
      filledQuantity: toDecimal(quantity)
    })
  }

  beforeEach(() => {
    registry = new OrderRegistry()
    tradeLog = new TradeEventLog()
    clock = new SimulatedTimeSource(toEpochDate(new Date('2024-01-15T14:30:00.000Z')))
    const logger = new NoopLogger()
    const bus = new SubscriberBus(logger)
    events = []
    bus.register({ name: 'momentum', onTradeEvent: (event) => events.push(event) })
    stateMachine = new TradeEventStateMachine(registry, bus, tradeLog, clock, { logger })
  })

  it('should take a limit order from new to filled and open a position', () => {
    const order = trackedOrder()

    assert.equal(stateMachine.processEvent(order, TradeEventKind.NEW), true)
    assert.equal(order.status, OrderStatus.NEW)
    assert.equal(registry.collectionOf(order), 'new')

    assert.equal(fill(order, '101.5', 10), true)
    assert.equal(order.status, OrderStatus.FILLED)
    assert.equal(registry.collectionOf(order), 'filled')
    assert.equal(registry.collection('new').size, 0)

    const position = registry.getPosition('momentum', AAPL)
    assert.equal(position?.quantity.toString(), '10')
    assert.equal(position?.avgFillPrice?.toString(), '101.5')
    assert.deepEqual(
      events.map((event) => event.kind),
      ['new', 'fill']
    )
  })

  it('should deliver fill payloads with position, price, quantity and multiplier', () => {
    const order = trackedOrder()
    stateMachine.processEvent(order, TradeEventKind.FILLED, {
      price: toDecimal('101.5'),
      filledQuantity: toDecimal(10),
      multiplier: 100
    })

    const event = events[0]
    assert.ok(event && event.kind === TradeEventKind.FILLED)
    assert.equal(event.payload.order, order)
    assert.equal(event.payload.position, registry.getPosition('momentum', AAPL))
    assert.equal(event.payload.price.toString(), '101.5')
    assert.equal(event.payload.quantity.toString(), '10')
    assert.equal(event.payload.multiplier, 100)
  })

  it('should ignore a re-delivered terminal event', () => {
    const order = trackedOrder()
    fill(order, 100, 10)

    assert.equal(fill(order, 100, 10), false)
    assert.equal(registry.getPosition('momentum', AAPL)?.quantity.toString(), '10')
    assert.equal(order.filledQuantity.toString(), '10')
    assert.equal(events.length, 1)
    assert.equal(tradeLog.size, 1)
  })

  it('should resolve freshly parsed copies to the tracked order', () => {
    const order = trackedOrder()
    const copy = createOrder({ strategy: 'momentum', asset: AAPL, quantity: 10, side: 'buy', identifier: 'b-1' })

    stateMachine.processEvent(copy, TradeEventKind.NEW)

    assert.equal(order.status, OrderStatus.NEW)
    assert.equal(registry.collectionOf(order), 'new')
    assert.equal(registry.getOrders().length, 1)
  })

  it('should reject fills without price or quantity', () => {
    const order = trackedOrder()

    assert.throws(
      () => stateMachine.processEvent(order, TradeEventKind.FILLED, { filledQuantity: toDecimal(10) }),
      ContractViolationError
    )
    assert.throws(
      () => stateMachine.processEvent(order, TradeEventKind.PARTIALLY_FILLED, { price: toDecimal(10) }),
      ContractViolationError
    )
    assert.equal(order.status, OrderStatus.UNPROCESSED)
  })

  it('should reject negative fill quantities', () => {
    const order = trackedOrder()

    assert.throws(() => fill(order, 100, -1), /filledQuantity must not be negative/)
  })

  it('should settle OCO fills at the known leg price', () => {
    const order = trackedOrder({ orderClass: 'oco', limitPrice: 99 })

    assert.equal(stateMachine.processEvent(order, TradeEventKind.FILLED), true)
    assert.equal(order.avgFillPrice?.toString(), '99')
    assert.equal(order.filledQuantity.toString(), '10')
  })

  it('should cancel only active orders', () => {
    const active = trackedOrder({}, 'b-1')
    const done = trackedOrder({}, 'b-2')
    fill(done, 100, 10)

    assert.equal(stateMachine.processEvent(active, TradeEventKind.CANCELED), true)
    assert.equal(stateMachine.processEvent(active, TradeEventKind.CANCELED), false)
    assert.equal(stateMachine.processEvent(done, TradeEventKind.CANCELED), false)
    assert.equal(done.status, OrderStatus.FILLED)
    assert.equal(registry.collectionOf(active), 'canceled')
  })

  it('should average partial fills', () => {
    const order = trackedOrder()
    fill(order, 100, 4, TradeEventKind.PARTIALLY_FILLED)

    assert.equal(order.status, OrderStatus.PARTIALLY_FILLED)
    assert.equal(registry.collectionOf(order), 'partiallyFilled')

    fill(order, 110, 6)

    assert.equal(order.filledQuantity.toString(), '10')
    assert.equal(order.avgFillPrice?.toString(), '106')
    assert.equal(order.fills.length, 2)
    const position = registry.getPosition('momentum', AAPL)
    assert.equal(position?.quantity.toString(), '10')
    assert.equal(position?.avgFillPrice?.toString(), '106')
  })

  it('should remove a position whose quantity reaches zero', () => {
    registry.putPosition(createPosition('momentum', AAPL, 10, { avgFillPrice: 100 }))
    const sell = trackedOrder({ side: 'sell' })

    fill(sell, 105, 10)

    assert.equal(registry.getPosition('momentum', AAPL), undefined)
    const event = events[0]
    assert.ok(event && event.kind === TradeEventKind.FILLED)
    assert.equal(event.payload.position, undefined)
  })

  it('should keep the entry price when reducing a position', () => {
    registry.putPosition(createPosition('momentum', AAPL, 10, { avgFillPrice: 100 }))
    const sell = trackedOrder({ side: 'sell', quantity: 4 })

    fill(sell, 120, 4)

    const position = registry.getPosition('momentum', AAPL)
    assert.equal(position?.quantity.toString(), '6')
    assert.equal(position?.avgFillPrice?.toString(), '100')
  })

  it('should move the quote position by the notional of a currency trade', () => {
    registry.pin('USD')
    registry.putPosition(createPosition('momentum', USD, 60000))
    const buy = trackedOrder({ asset: BTC, quote: USD, quantity: 2, limitPrice: 30000 })

    fill(buy, 30000, 2)

    assert.equal(registry.getPosition('momentum', BTC)?.quantity.toString(), '2')
    assert.equal(registry.getPosition('momentum', USD)?.quantity.toString(), '0')
  })

  it('should credit the quote position on a currency sale', () => {
    registry.putPosition(createPosition('momentum', BTC, 1))
    const sell = trackedOrder({ asset: BTC, quote: USD, quantity: 1, side: 'sell', limitPrice: 30000 })

    fill(sell, 30000, 1)

    assert.equal(registry.getPosition('momentum', BTC), undefined)
    assert.equal(registry.getPosition('momentum', USD)?.quantity.toString(), '30000')
  })

  it('should file cash-settled orders without touching the position quantity', () => {
    const position = createPosition('momentum', AAPL, 10)
    registry.putPosition(position)
    const order = trackedOrder({ side: 'sell' })
    stateMachine.processEvent(order, TradeEventKind.NEW)

    stateMachine.processEvent(order, TradeEventKind.CASH_SETTLED, {
      price: toDecimal(0),
      filledQuantity: toDecimal(10)
    })

    assert.equal(order.status, OrderStatus.CASH_SETTLED)
    assert.equal(registry.collectionOf(order), 'filled')
    assert.equal(position.quantity.toString(), '10')
    assert.deepEqual(position.orders, [order])
  })

  it('should attach the error message to errored orders', () => {
    const order = trackedOrder()

    stateMachine.processEvent(order, TradeEventKind.ERROR, { error: 'insufficient buying power' })

    assert.equal(order.status, OrderStatus.ERROR)
    assert.equal(order.error, 'insufficient buying power')
    assert.equal(registry.collectionOf(order), 'error')
    const event = events[0]
    assert.ok(event && event.kind === TradeEventKind.ERROR)
    assert.equal(event.payload.error, 'insufficient buying power')
  })

  it('should never fill a placeholder', () => {
    const parent = trackedOrder({ orderClass: 'oco' })
    parent.status = OrderStatus.PLACEHOLDER
    registry.moveOrder(parent, 'placeholder')

    assert.equal(fill(parent, 100, 10), false)
    assert.equal(stateMachine.processEvent(parent, TradeEventKind.CANCELED), true)
  })

  it('should replay held events in arrival order', () => {
    const order = trackedOrder()
    stateMachine.holdEvents()

    assert.equal(stateMachine.processEvent(order, TradeEventKind.NEW), false)
    assert.equal(fill(order, 100, 10), false)
    assert.equal(stateMachine.heldCount, 2)
    assert.equal(order.status, OrderStatus.UNPROCESSED)

    assert.equal(stateMachine.releaseHeldEvents(), 2)
    assert.equal(stateMachine.isHolding(), false)
    assert.equal(order.status, OrderStatus.FILLED)
    assert.deepEqual(
      events.map((event) => event.kind),
      ['new', 'fill']
    )
  })

  it('should ignore re-delivered events for orders retention evicted', () => {
    const order = trackedOrder()
    fill(order, '101.5', 10)
    registry.collection('filled').removeItems(new Set([order]))
    registry.markEvicted([order])

    const replay = createOrder({ strategy: 'momentum', asset: AAPL, quantity: 10, side: 'buy', identifier: 'b-1' })

    assert.equal(stateMachine.processEvent(replay, TradeEventKind.NEW), false)
    assert.equal(fill(replay, '101.5', 10), false)
    assert.equal(events.length, 1)
    assert.equal(registry.getPosition('momentum', AAPL)?.quantity.toString(), '10')
  })

  it('should write one trade-log row per applied event', () => {
    const order = trackedOrder()
    stateMachine.processEvent(order, TradeEventKind.NEW)
    clock.advance(60_000)
    fill(order, '101.5', 10)

    const rows = tradeLog.snapshot()
    assert.equal(rows.length, 2)
    assert.deepEqual(
      rows.map((row) => [row.status, row.price?.toString(), row.filledQuantity?.toString()]),
      [
        ['new', undefined, undefined],
        ['filled', '101.5', '10']
      ]
    )
    assert.equal(rows[1]?.time, toEpochDate(new Date('2024-01-15T14:31:00.000Z')))
    assert.equal(rows[1]?.asset, 'AAPL')
  })
})
