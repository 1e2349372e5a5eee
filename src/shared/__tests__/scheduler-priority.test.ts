import { describe, it, expect } from 'vitest'
import {
  UrgencyRank,
  advancePastBlocked,
  calculateSlack,
  calculateUrgencyScore,
  compareUrgency,
  estimateCompletionTime,
  findNextBlock,
  isCriticalDeadline,
  isDeadlineFeasible,
} from '../scheduler-priority'
import { DeadlineKind } from '../enums'
import { createMockBlock } from '@/test/factories'

const HOUR = 3_600_000
const MINUTE = 60_000
const at = (time: string): number => new Date(`2025-01-15T${time}:00Z`).getTime()

const blocks = [
  createMockBlock('2025-01-15T10:00:00Z', '2025-01-15T10:30:00Z'),
  createMockBlock('2025-01-15T10:30:00Z', '2025-01-15T11:00:00Z'),
  createMockBlock('2025-01-15T13:00:00Z', '2025-01-15T14:00:00Z'),
]

describe('scheduler-priority', () => {
  describe('advancePastBlocked', () => {
    it('should leave a free cursor where it is', () => {
      expect(advancePastBlocked(at('09:00'), blocks)).toBe(at('09:00'))
    })

    it('should move through back-to-back blocks', () => {
      expect(advancePastBlocked(at('10:00'), blocks)).toBe(at('11:00'))
    })

    it('should treat a cursor at a block end as free', () => {
      expect(advancePastBlocked(at('14:00'), blocks)).toBe(at('14:00'))
    })
  })

  describe('findNextBlock', () => {
    it('should return the first block starting after the cursor', () => {
      expect(findNextBlock(at('11:00'), blocks)?.start.toISOString()).toBe('2025-01-15T13:00:00.000Z')
    })

    it('should return undefined past the last block', () => {
      expect(findNextBlock(at('15:00'), blocks)).toBeUndefined()
    })
  })

  describe('estimateCompletionTime', () => {
    it('should add the work directly when no block intervenes', () => {
      expect(estimateCompletionTime(at('11:00'), 2 * HOUR, blocks)).toBe(at('13:00'))
    })

    it('should skip every block on the way', () => {
      // 1h before 10:00, 2h from 11:00 to 13:00, last 1h after 14:00
      expect(estimateCompletionTime(at('09:00'), 4 * HOUR, blocks)).toBe(at('15:00'))
    })

    it('should return the cursor for no remaining work', () => {
      expect(estimateCompletionTime(at('10:15'), 0, blocks)).toBe(at('10:15'))
    })
  })

  describe('calculateSlack', () => {
    it('should measure against blocked-aware completion', () => {
      const slack = calculateSlack(new Date('2025-01-15T12:00:00Z'), at('09:00'), 2 * HOUR, blocks)
      // Completion lands at 12:00
      expect(slack).toBe(0)
    })
  })

  describe('calculateUrgencyScore', () => {
    it('should rank undeadlined work last, by remaining duration', () => {
      expect(calculateUrgencyScore({ remainingMs: HOUR }, at('09:00'), [])).toEqual({ rank: UrgencyRank.NoDeadline, value: HOUR })
    })

    it('should use the slack for a user deadline', () => {
      const score = calculateUrgencyScore(
        { remainingMs: HOUR, deadline: { at: new Date('2025-01-15T12:00:00Z'), kind: DeadlineKind.User } },
        at('09:00'),
        [],
      )
      expect(score).toEqual({ rank: UrgencyRank.OpenDeadline, value: 2 * HOUR })
    })

    it('should halve positive slack for an external deadline', () => {
      const score = calculateUrgencyScore(
        { remainingMs: HOUR, deadline: { at: new Date('2025-01-15T12:00:00Z'), kind: DeadlineKind.External } },
        at('09:00'),
        [],
      )
      expect(score).toEqual({ rank: UrgencyRank.OpenDeadline, value: HOUR })
    })

    it('should double negative slack for an external deadline', () => {
      const score = calculateUrgencyScore(
        { remainingMs: 2 * HOUR, deadline: { at: new Date('2025-01-15T10:00:00Z'), kind: DeadlineKind.External } },
        at('09:00'),
        [],
      )
      expect(score).toEqual({ rank: UrgencyRank.OpenDeadline, value: -2 * HOUR })
    })

    it('should score a passed deadline below any reachable one', () => {
      const score = calculateUrgencyScore(
        { remainingMs: HOUR, deadline: { at: new Date('2025-01-15T08:30:00Z'), kind: DeadlineKind.User } },
        at('09:00'),
        [],
      )
      expect(score).toEqual({ rank: UrgencyRank.PassedDeadline, value: -30 * MINUTE })

      const hopeless = calculateUrgencyScore(
        { remainingMs: 1e9 * HOUR, deadline: { at: new Date('2025-01-15T10:00:00Z'), kind: DeadlineKind.External } },
        at('09:00'),
        [],
      )
      expect(compareUrgency(score, hopeless)).toBeLessThan(0)
    })

    it('should always rank undeadlined work after work with a future deadline', () => {
      const undeadlined = calculateUrgencyScore({ remainingMs: MINUTE }, at('09:00'), blocks)
      const farDeadline = calculateUrgencyScore(
        { remainingMs: 10 * HOUR, deadline: { at: new Date('2030-01-01T00:00:00Z'), kind: DeadlineKind.User } },
        at('09:00'),
        blocks,
      )
      expect(compareUrgency(farDeadline, undeadlined)).toBeLessThan(0)
    })

    it('should rank a deadline tens of millennia away before undeadlined work', () => {
      const undeadlined = calculateUrgencyScore({ remainingMs: MINUTE }, at('09:00'), [])
      const remote = calculateUrgencyScore(
        { remainingMs: HOUR, deadline: { at: new Date(8.64e15), kind: DeadlineKind.User } },
        at('09:00'),
        [],
      )

      expect(remote.value).toBeGreaterThan(1e15)
      expect(compareUrgency(remote, undeadlined)).toBeLessThan(0)
    })
  })

  describe('isCriticalDeadline', () => {
    it('should always treat external deadlines as critical', () => {
      const candidate = { remainingMs: HOUR, deadline: { at: new Date('2025-02-01T00:00:00Z'), kind: DeadlineKind.External } }
      expect(isCriticalDeadline(candidate, at('09:00'), [])).toBe(true)
    })

    it('should treat a user deadline as critical once slack is below the remaining work', () => {
      const candidate = { remainingMs: HOUR, deadline: { at: new Date('2025-01-15T11:30:00Z'), kind: DeadlineKind.User } }
      // From 10:00: finishes 11:00, 30m slack < 1h
      expect(isCriticalDeadline(candidate, at('10:00'), [])).toBe(true)
      // From 09:00: finishes 10:00, 90m slack
      expect(isCriticalDeadline(candidate, at('09:00'), [])).toBe(false)
    })

    it('should never treat undeadlined work as critical', () => {
      expect(isCriticalDeadline({ remainingMs: HOUR }, at('09:00'), [])).toBe(false)
    })
  })

  describe('isDeadlineFeasible', () => {
    it('should account for blocked time', () => {
      const candidate = { remainingMs: HOUR, deadline: { at: new Date('2025-01-15T10:30:00Z'), kind: DeadlineKind.User } }
      expect(isDeadlineFeasible(candidate, at('09:30'), [])).toBe(true)
      expect(isDeadlineFeasible(candidate, at('09:30'), blocks)).toBe(false)
    })
  })
})
