/**
 * Centralized enums for the application
 * Use these instead of hardcoded strings so switches stay exhaustive.
 */

// Kinds of reserved time that cannot host work
export enum TimeBlockKind {
  Sleep = 'sleep',
  Break = 'break',
  Meeting = 'meeting',
  Blocked = 'blocked',
}

// The two deadline kinds a task may carry
export enum DeadlineKind {
  User = 'user',
  External = 'external',
}

// Baseline priority buckets used by the prioritizer
export enum PriorityTier {
  HardDeadline = 'hard-deadline',
  SoftDeadline = 'soft-deadline',
  NoDeadline = 'no-deadline',
  Completed = 'completed',
}

// Entries of a rendered day timeline
export enum TimelineEntryType {
  Task = 'task',
  Blocked = 'blocked',
  Empty = 'empty',
}

// Where multi-day views attach conflict messages
export enum ConflictAttribution {
  FirstDay = 'first-day',
  CompletionDay = 'completion-day',
}

export const TIME_BLOCK_KINDS: readonly TimeBlockKind[] = Object.values(TimeBlockKind)

export function isTimeBlockKind(value: unknown): value is TimeBlockKind {
  return typeof value === 'string' && TIME_BLOCK_KINDS.some(kind => kind === value)
}
