export interface KeyTransition {
  key: string
  pressed: boolean
}

export interface KeyBit {
  key: string
  bit: number
}

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, i) => from + i)
}

/**
 * Every named key with its bit in the key-state mask, in the order
 * transitions are reported: G keys, then M keys, then L keys.
 *
 * G19-G22 sit above the LIGHT bit (27), which is never reported.
 */
export const KEY_BITS: readonly KeyBit[] = [
  ...range(0, 17).map((bit) => ({ key: `G${bit + 1}`, bit })),
  ...range(28, 31).map((bit) => ({ key: `G${bit - 9}`, bit })),
  ...range(18, 20).map((bit) => ({ key: `M${bit - 17}`, bit })),
  { key: 'MR', bit: 21 },
  ...range(22, 26).map((bit) => ({ key: `L${bit - 21}`, bit })),
]

export const LIGHT_KEY_BIT = 27

const BIT_BY_KEY = new Map(KEY_BITS.map(({ key, bit }) => [key, bit]))

/**
 * Mask with only the given key's bit set, or `undefined` for unknown names
 */
export function keyMask(key: string): number | undefined {
  const bit = BIT_BY_KEY.get(key)
  return bit === undefined ? undefined : (1 << bit) >>> 0
}

/**
 * One transition per key whose bit differs between the two snapshots
 */
export function decodeKeyTransitions(previous: number, next: number): KeyTransition[] {
  const changed = (previous ^ next) >>> 0
  if (changed === 0) return []

  const transitions: KeyTransition[] = []
  for (const { key, bit } of KEY_BITS) {
    if ((changed >>> bit) & 1) {
      transitions.push({ key, pressed: ((next >>> bit) & 1) === 1 })
    }
  }
  return transitions
}
