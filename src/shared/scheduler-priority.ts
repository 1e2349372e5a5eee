/**
 * Urgency calculation utilities for the PlacementEngine
 *
 * This module handles:
 * - Walking a cursor past blocked time
 * - Estimating when remaining work would finish if started now
 * - Slack-based urgency scores (lower = more urgent)
 * - Critical-deadline detection for the safety check
 *
 * All instants are epoch milliseconds. Blocks must be sorted by start.
 */

import { DeadlineKind } from './enums'
import { EffectiveDeadline, TimeBlock } from './types'

/** Urgency buckets, compared before the score inside them */
export enum UrgencyRank {
  PassedDeadline = 0,
  OpenDeadline = 1,
  NoDeadline = 2,
}

export interface UrgencyScore {
  rank: UrgencyRank
  /** Lower = more urgent within the rank */
  value: number
}

/**
 * Move the cursor out of any blocked interval containing it. Overlapping
 * and back-to-back blocks are crossed in one pass.
 */
export function advancePastBlocked(cursor: number, blocks: readonly TimeBlock[]): number {
  let position = cursor

  for (const block of blocks) {
    if (block.start.getTime() > position) break
    if (block.end.getTime() > position) {
      position = block.end.getTime()
    }
  }

  return position
}

/**
 * First block starting strictly after the cursor. Call with a cursor that
 * has already been advanced past blocked time.
 */
export function findNextBlock(cursor: number, blocks: readonly TimeBlock[]): TimeBlock | undefined {
  return blocks.find(block => block.start.getTime() > cursor)
}

/**
 * Instant at which `remainingMs` of work completes when started at `cursor`,
 * skipping blocked time along the way.
 */
export function estimateCompletionTime(
  cursor: number,
  remainingMs: number,
  blocks: readonly TimeBlock[],
): number {
  if (remainingMs <= 0) return cursor

  let position = cursor
  let remaining = remainingMs

  for (;;) {
    position = advancePastBlocked(position, blocks)
    const next = findNextBlock(position, blocks)

    if (!next || position + remaining <= next.start.getTime()) {
      return position + remaining
    }

    remaining -= next.start.getTime() - position
    position = next.start.getTime()
  }
}

/**
 * Time left over between finishing the work and the deadline. Negative when
 * the work cannot finish in time.
 */
export function calculateSlack(
  deadline: Date,
  cursor: number,
  remainingMs: number,
  blocks: readonly TimeBlock[],
): number {
  return deadline.getTime() - estimateCompletionTime(cursor, remainingMs, blocks)
}

export interface UrgencyCandidate {
  remainingMs: number
  deadline?: EffectiveDeadline
}

/**
 * Urgency score for a candidate at the current cursor (lower = more urgent).
 *
 * - no deadline: ranked last, by remaining work
 * - deadline already passed: ranked first, longest overdue first
 * - otherwise the slack; external deadlines count double (positive slack is
 *   halved, negative slack doubled)
 */
export function calculateUrgencyScore(
  candidate: UrgencyCandidate,
  cursor: number,
  blocks: readonly TimeBlock[],
): UrgencyScore {
  const { deadline, remainingMs } = candidate

  if (!deadline) {
    return { rank: UrgencyRank.NoDeadline, value: remainingMs }
  }

  const deadlineMs = deadline.at.getTime()
  if (deadlineMs <= cursor) {
    return { rank: UrgencyRank.PassedDeadline, value: deadlineMs - cursor }
  }

  const slack = calculateSlack(deadline.at, cursor, remainingMs, blocks)

  if (deadline.kind === DeadlineKind.External) {
    return { rank: UrgencyRank.OpenDeadline, value: slack > 0 ? slack / 2 : slack * 2 }
  }

  return { rank: UrgencyRank.OpenDeadline, value: slack }
}

export function compareUrgency(a: UrgencyScore, b: UrgencyScore): number {
  return a.rank - b.rank || a.value - b.value
}

/**
 * A deadline the engine will not knowingly give up: always when external;
 * a user deadline only once its slack from `from` is smaller than the work
 * still needed.
 */
export function isCriticalDeadline(
  candidate: UrgencyCandidate,
  from: number,
  blocks: readonly TimeBlock[],
): boolean {
  const { deadline, remainingMs } = candidate
  if (!deadline) return false
  if (deadline.kind === DeadlineKind.External) return true

  return calculateSlack(deadline.at, from, remainingMs, blocks) < remainingMs
}

/**
 * Whether the remaining work can still finish by the deadline when started at `from`.
 */
export function isDeadlineFeasible(
  candidate: UrgencyCandidate,
  from: number,
  blocks: readonly TimeBlock[],
): boolean {
  if (!candidate.deadline) return true
  return estimateCompletionTime(from, candidate.remainingMs, blocks) <= candidate.deadline.at.getTime()
}
