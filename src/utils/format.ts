// src/utils/format.ts

/** Fixed-decimals formatting used for every metric value on screen. */
export function formatValue(value: number, digits = 3): string {
  return value.toFixed(digits)
}
