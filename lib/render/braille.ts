/**
 * Braille encoding of 2x4 cell blocks for terminal rendering.
 *
 * Braille dot layout per terminal character cell (2 columns x 4 rows):
 *
 *   [dot1][dot4]     (0,0) (1,0)
 *   [dot2][dot5]     (0,1) (1,1)
 *   [dot3][dot6]     (0,2) (1,2)
 *   [dot7][dot8]     (0,3) (1,3)
 *
 * Unicode: 0x2800 + bit pattern
 */

import type { ShadeGrid } from './viewport.js'

const DOT_BITS: number[][] = [
  // [x][y] -> bit value
  [0x01, 0x02, 0x04, 0x40], // x=0: dots 1,2,3,7
  [0x08, 0x10, 0x20, 0x80], // x=1: dots 4,5,6,8
]

export interface BrailleCell {
  char: string
  /** Youngest shade in the block, or -1 when the block is empty. */
  shade: number
}

/** Encode the 2x4 block whose top-left cell is (col, row). */
export function encodeBlock(col: number, row: number, shades: ShadeGrid): BrailleCell {
  let code = 0x2800
  let shade = -1

  for (let dx = 0; dx < 2; dx++) {
    for (let dy = 0; dy < 4; dy++) {
      const s = shades.get(`${col + dx},${row + dy}`)
      if (s === undefined) continue
      code |= DOT_BITS[dx][dy]
      if (shade === -1 || s < shade) shade = s
    }
  }

  return { char: String.fromCharCode(code), shade }
}
