import { describe, it, expect, vi, afterEach } from 'vitest'
import { BoardConfig } from '@/board/config'
import { defaultConfigValues } from '@/board/variables'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('BoardConfig', () => {
  it('starts from the default values', () => {
    const config = new BoardConfig()
    expect(config.atlasSpacing).toBe(15)
    expect(config.atlasIndexBase).toBe(0)
    expect(config.outOfRangePolicy).toBe('discard')
    expect(config.pickColorTolerance).toBe(defaultConfigValues.pickColorTolerance)
  })

  it('merges user values', () => {
    const config = new BoardConfig()
    config.init({ atlasIndexBase: 1, outOfRangePolicy: 'sentinel', maxFill: 30 })
    expect(config.atlasIndexBase).toBe(1)
    expect(config.outOfRangePolicy).toBe('sentinel')
    expect(config.maxFill).toBe(30)
    expect(config.atlasSpacing).toBe(15)
  })

  it('keeps the previous value of an invalid spacing or fill level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const config = new BoardConfig()
    config.init({ atlasSpacing: 0, maxFill: -1 })
    expect(config.atlasSpacing).toBe(15)
    expect(config.maxFill).toBe(15)
    expect(warn).toHaveBeenCalledTimes(2)
  })

  it('warns when the atlas spacing is too small for the fill range', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const config = new BoardConfig()
    config.init({ maxFill: 100 })
    expect(config.maxFill).toBe(100)
    expect(warn).toHaveBeenCalledTimes(1)

    config.init({ atlasSpacing: 21 })
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('sets and clears callbacks', () => {
    const onCellClick = vi.fn()
    const config = new BoardConfig()
    config.init({ onCellClick })
    expect(config.onCellClick).toBe(onCellClick)
    config.init({ onCellClick: undefined })
    expect(config.onCellClick).toBeUndefined()
  })
})
