import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { OrderStatus, TradeEventKind } from './orders'
import { canonicalStatus, eventKindForStatus, isEquivalentStatus } from './status-aliases'

describe('Status aliases', () => {
  it('should map vendor spellings onto canonical states', () => {
    assert.equal(canonicalStatus('open'), OrderStatus.NEW)
    assert.equal(canonicalStatus('Working'), OrderStatus.NEW)
    assert.equal(canonicalStatus(' submitted '), OrderStatus.NEW)
    assert.equal(canonicalStatus('partial_fill'), OrderStatus.PARTIALLY_FILLED)
    assert.equal(canonicalStatus('cancelled'), OrderStatus.CANCELED)
    assert.equal(canonicalStatus('expired'), OrderStatus.CANCELED)
    assert.equal(canonicalStatus('rejected'), OrderStatus.ERROR)
    assert.equal(canonicalStatus('fill'), OrderStatus.FILLED)
  })

  it('should keep unconfirmed cancels and replaces active', () => {
    assert.equal(canonicalStatus('pending_cancel'), OrderStatus.NEW)
    assert.equal(canonicalStatus('pending_replace'), OrderStatus.NEW)
    assert.equal(canonicalStatus('held'), OrderStatus.NEW)
    assert.equal(canonicalStatus('replaced'), OrderStatus.CANCELED)
  })

  it('should return undefined for unknown spellings', () => {
    assert.equal(canonicalStatus('teleported'), undefined)
  })

  it('should compare statuses through their canonical form', () => {
    assert.ok(isEquivalentStatus('cancelled', 'canceled'))
    assert.ok(!isEquivalentStatus('open', 'filled'))
    assert.ok(!isEquivalentStatus('teleported', 'teleported'))
  })

  it('should name the event that leads into each reachable state', () => {
    assert.equal(eventKindForStatus(OrderStatus.FILLED), TradeEventKind.FILLED)
    assert.equal(eventKindForStatus(OrderStatus.PARTIALLY_FILLED), TradeEventKind.PARTIALLY_FILLED)
    assert.equal(eventKindForStatus(OrderStatus.UNPROCESSED), undefined)
  })
})
