/**
 * encoding.ts
 * Numeric encodings for categorical inputs; pure functions only.
 */

export type Bit = 0 | 1

export function flagToBit(flag: boolean): Bit {
  return flag ? 1 : 0
}
