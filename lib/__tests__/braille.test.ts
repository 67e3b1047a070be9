import { describe, it, expect } from 'vitest'
import { encodeBlock } from '@/lib/render/braille'

describe('encodeBlock', () => {
  it('should return a blank braille character for an empty block', () => {
    expect(encodeBlock(0, 0, new Map())).toEqual({ char: String.fromCharCode(0x2800), shade: -1 })
  })

  it('should set dots and keep the youngest shade', () => {
    const shades = new Map([
      ['0,0', 3],
      ['1,3', 1],
    ])
    // dot1 (0x01) + dot8 (0x80)
    expect(encodeBlock(0, 0, shades)).toEqual({ char: String.fromCharCode(0x2881), shade: 1 })
  })

  it('should read the block at its offset', () => {
    const shades = new Map([['2,4', 0]])
    expect(encodeBlock(2, 4, shades).char).toBe(String.fromCharCode(0x2801))
    expect(encodeBlock(0, 0, shades).shade).toBe(-1)
  })
})
