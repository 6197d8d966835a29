import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { ageInDays, DAY_MS, daysBefore, type EpochDate, toEpochDate, toIsoDate } from './dates'

describe('Date utility functions', () => {
  describe('toIsoDate', () => {
    it('should convert Date object to IsoDate', () => {
      const date = new Date('2024-01-15T12:30:45.123Z')
      assert.equal(toIsoDate(date), '2024-01-15T12:30:45.123Z')
    })

    it('should convert seconds to IsoDate when precision is "s"', () => {
      const seconds = Math.floor(new Date('2024-01-15T12:30:45.000Z').getTime() / 1000)
      assert.equal(toIsoDate(seconds, 's'), '2024-01-15T12:30:45.000Z')
    })
  })

  describe('toEpochDate', () => {
    it('should pass milliseconds through', () => {
      assert.equal(toEpochDate(1705321845123), 1705321845123)
    })

    it('should scale seconds to milliseconds', () => {
      assert.equal(toEpochDate(1705321845, 's'), 1705321845000)
    })
  })

  describe('day arithmetic', () => {
    it('should shift a timestamp back by whole days', () => {
      const now = toEpochDate(new Date('2024-01-15T00:00:00.000Z'))
      assert.equal(toIsoDate(daysBefore(now, 2)), '2024-01-13T00:00:00.000Z')
    })

    it('should measure age in fractional days', () => {
      const then = 0 as EpochDate
      const now = (DAY_MS * 1.5) as EpochDate
      assert.equal(ageInDays(then, now), 1.5)
    })
  })
})
