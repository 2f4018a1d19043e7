/** Returns a float in [0, 1). Same contract as `Math.random`. */
export type RandomSource = () => number

export interface DelayRange {
  minMs: number
  maxMs: number
}

export const uniformDelay = (range: DelayRange, random: RandomSource = Math.random): number =>
  Math.round(range.minMs + random() * (range.maxMs - range.minMs))

export const pickOne = <T>(items: readonly T[], random: RandomSource = Math.random): T => {
  if (items.length === 0) {
    throw new Error("Cannot pick from an empty list")
  }
  const index = Math.min(items.length - 1, Math.floor(random() * items.length))
  return items[index]
}
