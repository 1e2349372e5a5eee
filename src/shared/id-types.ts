/**
 * Branded (Nominal) ID Types
 *
 * Branded types are plain strings at runtime, but TypeScript treats them
 * as distinct types so a ProjectId cannot be passed where a TaskId is expected.
 */

import { createHash } from 'node:crypto'

// =============================================================================
// Brand Helper Type
// =============================================================================

/**
 * Creates a branded/nominal type by intersecting with a phantom brand property.
 * The brand property doesn't exist at runtime, only in the type system.
 */
export type Brand<K, T> = K & { readonly __brand: T }

// =============================================================================
// Task ID Type
// =============================================================================

/**
 * Opaque task identifier. Tasks parsed from documents get a generated
 * one of the form "task_{random8chars}".
 */
export type TaskId = Brand<string, 'TaskId'>

/**
 * Factory function to create a TaskId from a string.
 *
 * @throws Error if id is empty
 */
export function TaskId(id: string): TaskId {
  if (!id || typeof id !== 'string') {
    throw new Error('Invalid TaskId: must be a non-empty string')
  }
  return id as TaskId
}

export function isTaskId(id: unknown): id is TaskId {
  return typeof id === 'string' && id.length > 0
}

export function generateTaskId(): TaskId {
  const random = Math.random().toString(36).slice(2, 10).padEnd(8, '0')
  return TaskId(`task_${random}`)
}

/**
 * Same shape as generateTaskId, but derived from the given parts so a
 * document re-read later yields the same ids.
 */
export function stableTaskId(...parts: string[]): TaskId {
  const digest = createHash('sha256').update(parts.join('\u0000')).digest('hex')
  return TaskId(`task_${digest.slice(0, 8)}`)
}

// =============================================================================
// Project ID Type
// =============================================================================

/**
 * Stable project identifier, usually the normalized project name.
 */
export type ProjectId = Brand<string, 'ProjectId'>

export function ProjectId(id: string): ProjectId {
  if (!id || typeof id !== 'string') {
    throw new Error('Invalid ProjectId: must be a non-empty string')
  }
  return id as ProjectId
}
