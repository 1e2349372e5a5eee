import { describe, it, expect } from 'vitest'
import { TIME_BLOCK_KINDS, TimeBlockKind, isTimeBlockKind } from '../enums'

describe('enums', () => {
  it('should list every block kind', () => {
    expect(TIME_BLOCK_KINDS).toEqual(['sleep', 'break', 'meeting', 'blocked'])
  })

  it('should recognise block kinds', () => {
    expect(isTimeBlockKind('meeting')).toBe(true)
    expect(isTimeBlockKind(TimeBlockKind.Sleep)).toBe(true)
    expect(isTimeBlockKind('Meeting')).toBe(false)
    expect(isTimeBlockKind(undefined)).toBe(false)
  })
})
