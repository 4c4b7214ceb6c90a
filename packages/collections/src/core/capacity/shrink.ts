/**
 * Halve `current` once fewer than a quarter of its slots are in use,
 * never going below `minCapacity`.
 */
export function quarterShrink(minCapacity: number, current: number, size: number): number {
  if (size >= current / 4) return current

  return Math.max(minCapacity, Math.floor(current / 2))
}
