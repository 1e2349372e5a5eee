import { describe, it, expect, afterEach, vi } from 'vitest'
import { Writable } from 'node:stream'
import { ConsoleTransport, MemoryTransport, formatPrefix } from '../transport'
import { LogLevel, LogScope } from '../../types'
import type { LogEntry } from '../../types'

function createEntry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    timestamp: new Date('2025-01-15T10:30:00.123Z'),
    level: LogLevel.INFO,
    context: { scope: LogScope.Scheduler, tag: 'placement-run' },
    message: 'Placement complete',
    ...overrides,
  }
}

class Collector extends Writable {
  public chunks: string[] = []

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk.toString())
    callback()
  }
}

describe('formatPrefix', () => {
  it('should include time, level, scope and tag', () => {
    expect(formatPrefix(createEntry())).toBe('[10:30:00.123] [INFO] [Scheduler] [placement-run]')
  })

  it('should append the aggregate count', () => {
    expect(formatPrefix(createEntry({ aggregateCount: 3 })))
      .toBe('[10:30:00.123] [INFO] [Scheduler] [placement-run] (×3)')
  })

  it('should omit a missing tag', () => {
    expect(formatPrefix(createEntry({ level: LogLevel.ERROR, context: { scope: LogScope.Cli } })))
      .toBe('[10:30:00.123] [ERROR] [Cli]')
  })
})

describe('ConsoleTransport', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('should write one line with data as JSON', () => {
    const stream = new Collector()
    const transport = new ConsoleTransport(stream)

    transport.write(createEntry({ data: { segmentCount: 2 } }))

    expect(stream.chunks).toEqual([
      '[10:30:00.123] [INFO] [Scheduler] [placement-run] Placement complete {"segmentCount":2}\n',
    ])
  })

  it('should suppress rapid duplicates', () => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date('2025-01-15T10:30:00Z'))
    const stream = new Collector()
    const transport = new ConsoleTransport(stream)

    transport.write(createEntry())
    transport.write(createEntry())
    vi.advanceTimersByTime(60)
    transport.write(createEntry())

    expect(stream.chunks).toHaveLength(2)
  })

  it('should keep rapid repeats whose data differs', () => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date('2025-01-15T10:30:00Z'))
    const stream = new Collector()
    const transport = new ConsoleTransport(stream)

    transport.write(createEntry({ message: 'Selected task', data: { taskId: 'task_a' } }))
    transport.write(createEntry({ message: 'Selected task', data: { taskId: 'task_b' } }))

    expect(stream.chunks).toHaveLength(2)
  })

  it('should not write when disabled', () => {
    const stream = new Collector()
    const transport = new ConsoleTransport(stream)
    transport.disable()

    transport.write(createEntry())

    expect(stream.chunks).toEqual([])
  })
})

describe('MemoryTransport', () => {
  it('should keep only the newest entries', () => {
    const transport = new MemoryTransport(2)

    transport.write(createEntry({ message: 'first' }))
    transport.write(createEntry({ message: 'second' }))
    transport.write(createEntry({ message: 'third' }))

    expect(transport.getEntries().map(entry => entry.message)).toEqual(['second', 'third'])
  })

  it('should filter by level and clear', () => {
    const transport = new MemoryTransport()

    transport.write(createEntry({ level: LogLevel.ERROR, message: 'broken' }))
    transport.write(createEntry({ level: LogLevel.DEBUG, message: 'detail' }))

    expect(transport.getEntries(LogLevel.WARN).map(entry => entry.message)).toEqual(['broken'])

    transport.clear()
    expect(transport.getEntries()).toEqual([])
  })
})
