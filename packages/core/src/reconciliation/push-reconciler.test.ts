import assert from 'node:assert/strict'
import { setTimeout as sleep } from 'node:timers/promises'
import { beforeEach, describe, it, mock } from 'node:test'
import {
  createAsset,
  createOrder,
  OrderStatus,
  toDecimal,
  TradeEventKind,
  type Order
} from '@brokerkit/shared'
import type { TradeEvent } from '@brokerkit/types'
import { ReconciliationError } from '../errors'
import { SubscriberBus } from '../events/subscriber-bus'
import { SimulatedTimeSource } from '../events/time-source'
import { TradeEventStateMachine } from '../orders/trade-event-state-machine'
import { OrderRegistry } from '../registry/order-registry'
import { FakePushStream } from '../testing/fake-push-stream'
import { TradeEventLog } from '../trade-log/trade-event-log'
import { NoopLogger } from '../utils/logger'
import { PushReconciler, resolveEventKind } from './push-reconciler'

const AAPL = createAsset('AAPL')

function makeOrder(identifier: string): Order {
  return createOrder({ strategy: 'momentum', asset: AAPL, quantity: 10, side: 'buy', identifier })
}

describe('resolveEventKind', () => {
  it('should accept canonical kinds and vendor spellings', () => {
    assert.equal(resolveEventKind(TradeEventKind.FILLED), TradeEventKind.FILLED)
    assert.equal(resolveEventKind('partial_fill'), TradeEventKind.PARTIALLY_FILLED)
    assert.equal(resolveEventKind('Cancelled'), TradeEventKind.CANCELED)
    assert.equal(resolveEventKind('pending_new'), TradeEventKind.NEW)
    assert.equal(resolveEventKind('rejected'), TradeEventKind.ERROR)
  })

  it('should not resolve statuses no event leads to', () => {
    assert.equal(resolveEventKind('placeholder'), undefined)
    assert.equal(resolveEventKind('bogus'), undefined)
  })
})

describe('PushReconciler', () => {
  let stream: FakePushStream
  let registry: OrderRegistry
  let stateMachine: TradeEventStateMachine
  let logger: NoopLogger
  let events: TradeEvent[]
  let push: PushReconciler

  beforeEach(() => {
    stream = new FakePushStream()
    registry = new OrderRegistry()
    logger = new NoopLogger()
    events = []
    const bus = new SubscriberBus(logger)
    bus.register({ name: 'momentum', onTradeEvent: (event) => events.push(event) })
    stateMachine = new TradeEventStateMachine(registry, bus, new TradeEventLog(), new SimulatedTimeSource(), {
      logger
    })
    push = new PushReconciler(stream, stateMachine, { logger })
  })

  it('should not start until the stream is established', async () => {
    let started = false
    const starting = push.start().then(() => {
      started = true
    })

    await sleep(5)
    assert.equal(started, false)
    assert.equal(stream.runCalls, 1)

    stream.establish()
    await starting
    assert.equal(started, true)
    assert.equal(push.isRunning(), true)
    await push.stop()
  })

  it('should start at once when backtesting', async () => {
    push = new PushReconciler(stream, stateMachine, { backtesting: true, logger })

    await push.start()

    assert.equal(push.isRunning(), true)
    await push.stop()
  })

  it('should fail to start when the stream ends first', async () => {
    const rejected = assert.rejects(push.start(), ReconciliationError)

    await stream.close()

    await rejected
    assert.equal(push.isRunning(), false)
  })

  it('should apply pushed events to the tracked order', async () => {
    stream.autoEstablish = true
    await push.start()
    const tracked = makeOrder('b-1')
    stateMachine.processEvent(tracked, TradeEventKind.NEW)

    stream.emit(makeOrder('b-1'), 'Filled', { price: toDecimal('101.5'), filledQuantity: toDecimal(10) })

    assert.equal(registry.findOrder('b-1'), tracked)
    assert.equal(tracked.status, OrderStatus.FILLED)
    assert.equal(registry.getPosition('momentum', AAPL)?.quantity.toString(), '10')
    assert.deepEqual(
      events.map((event) => event.kind),
      [TradeEventKind.NEW, TradeEventKind.FILLED]
    )
    await push.stop()
  })

  it('should ignore events it cannot resolve', async () => {
    const warn = mock.method(logger, 'warn')

    assert.equal(push.handleEvent(makeOrder('b-2'), 'bogus'), false)
    assert.equal(warn.mock.callCount(), 1)
    assert.equal(registry.findOrder('b-2'), undefined)
  })

  it('should close the stream on stop', async () => {
    stream.autoEstablish = true
    await push.start()

    await push.stop()

    assert.equal(stream.closed, true)
    assert.equal(push.isRunning(), false)
  })
})
