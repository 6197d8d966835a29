import assert from 'node:assert/strict'
import { afterEach, beforeEach, describe, it } from 'node:test'
import { createAsset, createOrder, OrderStatus, type Order, type OrderParams } from '@brokerkit/shared'
import type { TradeEvent } from '@brokerkit/types'
import { EngineStateError } from '../errors'
import { SubscriberBus } from '../events/subscriber-bus'
import { SimulatedTimeSource } from '../events/time-source'
import { OrderRegistry } from '../registry/order-registry'
import { FakeBrokerAdapter } from '../testing/fake-broker-adapter'
import { TradeEventLog } from '../trade-log/trade-event-log'
import { NoopLogger } from '../utils/logger'
import { SubmissionPipeline } from './submission-pipeline'
import { TradeEventStateMachine } from './trade-event-state-machine'

const AAPL = createAsset('AAPL')

function makeOrder(params: Partial<OrderParams> = {}): Order {
  return createOrder({ strategy: 'momentum', asset: AAPL, quantity: 10, side: 'buy', limitPrice: 100, ...params })
}

describe('SubmissionPipeline', () => {
  let adapter: FakeBrokerAdapter
  let registry: OrderRegistry
  let pipeline: SubmissionPipeline
  let events: TradeEvent[]
  let processedItems: number

  beforeEach(() => {
    adapter = new FakeBrokerAdapter()
    registry = new OrderRegistry()
    const logger = new NoopLogger()
    const bus = new SubscriberBus(logger)
    events = []
    bus.register({ name: 'momentum', onTradeEvent: (event) => events.push(event) })
    const stateMachine = new TradeEventStateMachine(registry, bus, new TradeEventLog(), new SimulatedTimeSource(), {
      logger
    })
    processedItems = 0
    pipeline = new SubmissionPipeline(adapter, registry, stateMachine, {
      maxWorkers: 2,
      onItemProcessed: () => {
        processedItems++
      },
      logger
    })
    pipeline.start()
  })

  afterEach(async () => {
    await pipeline.stop()
  })

  it('should file transmitted orders as unprocessed', async () => {
    const order = makeOrder()

    const placed = await pipeline.submit(order)

    assert.equal(placed, order)
    assert.equal(placed.identifier, 'b-1')
    assert.equal(placed.status, OrderStatus.UNPROCESSED)
    assert.equal(registry.collectionOf(placed), 'unprocessed')
    assert.equal(processedItems, 1)
  })

  it('should place single orders in submission order', async () => {
    const first = makeOrder()
    const second = makeOrder()
    adapter.submitDelay = (order) => (order === first ? 20 : 0)
    const completed: string[] = []

    await Promise.all([
      pipeline.submit(first).then(() => completed.push('first')),
      pipeline.submit(second).then(() => completed.push('second'))
    ])

    assert.deepEqual(adapter.submitted, [first, second])
    assert.deepEqual(completed, ['first', 'second'])
    assert.equal(first.identifier, 'b-1')
    assert.equal(second.identifier, 'b-2')
  })

  it('should turn an adapter failure into an errored order', async () => {
    adapter.shouldFailSubmit = true

    const placed = await pipeline.submit(makeOrder())

    assert.equal(placed.status, OrderStatus.ERROR)
    assert.equal(placed.error, 'Mock submission failed')
    assert.equal(registry.collectionOf(placed), 'error')
    assert.deepEqual(
      events.map((event) => event.kind),
      ['error']
    )
  })

  it('should turn a brokerage rejection into an errored order', async () => {
    adapter.rejectWith = 'insufficient buying power'

    const placed = await pipeline.submit(makeOrder())

    assert.equal(placed.status, OrderStatus.ERROR)
    assert.equal(placed.error, 'insufficient buying power')
    assert.equal(placed.identifier, undefined)
  })

  it('should file an OCO parent as a placeholder and its legs as unprocessed', async () => {
    const takeProfit = makeOrder({ side: 'sell', limitPrice: 110 })
    const stopLoss = makeOrder({ side: 'sell', stopPrice: 95, limitPrice: undefined })
    const parent = makeOrder({ side: 'sell', orderClass: 'oco', childOrders: [takeProfit, stopLoss] })

    await pipeline.submit(parent)

    assert.equal(parent.status, OrderStatus.PLACEHOLDER)
    assert.equal(registry.collectionOf(parent), 'placeholder')
    assert.deepEqual(registry.collection('unprocessed').list(), [takeProfit, stopLoss])
    assert.equal(takeProfit.identifier, 'b-2')
    assert.equal(stopLoss.parentIdentifier, 'b-1')
  })

  it('should file a bracket parent alongside its legs', async () => {
    const takeProfit = makeOrder({ side: 'sell', limitPrice: 110 })
    const parent = makeOrder({ childOrders: [takeProfit] })

    await pipeline.submit(parent)

    assert.equal(parent.orderClass, 'bracket')
    assert.deepEqual(registry.collection('unprocessed').list(), [parent, takeProfit])
  })

  it('should place a batch concurrently and return results in input order', async () => {
    const orders = [makeOrder(), makeOrder(), makeOrder()]
    adapter.submitDelay = (order) => (order === orders[0] ? 30 : 5)

    const placed = await pipeline.submitMany(orders)

    assert.deepEqual(placed, orders)
    assert.deepEqual(
      placed.map((order) => order.identifier),
      ['b-3', 'b-1', 'b-2']
    )
    assert.equal(registry.collection('unprocessed').size, 3)
    assert.equal(processedItems, 1)
  })

  it('should drain queued orders on stop', async () => {
    const order = makeOrder()
    adapter.submitDelay = () => 10
    const pending = pipeline.submit(order)

    await pipeline.stop()

    assert.equal(registry.collectionOf(order), 'unprocessed')
    assert.equal(await pending, order)
  })

  it('should refuse orders once stopped', async () => {
    await pipeline.stop()

    await assert.rejects(pipeline.submit(makeOrder()), EngineStateError)
    assert.equal(adapter.submitted.length, 0)
  })
})
