/**
 * Pure arithmetic helpers shared by the simulation systems.
 *
 * Effect is for orchestration, not arithmetic: these stay plain functions.
 *
 * @since 0.1.0
 * @internal
 */

/**
 * @since 0.1.0
 * @internal
 */
export const clamp = (value: number, lo: number, hi: number): number => Math.max(lo, Math.min(hi, value))

/**
 * Clamp a gauge into 0..100.
 *
 * @since 0.1.0
 * @internal
 */
export const clampLevel = (value: number): number => clamp(value, 0, 100)

/**
 * Round a money amount to cents.
 *
 * @since 0.1.0
 * @internal
 */
export const roundCurrency = (amount: number): number => Math.round(amount * 100) / 100

/**
 * Arithmetic mean, or `fallback` for an empty list.
 *
 * @since 0.1.0
 * @internal
 */
export const mean = (values: ReadonlyArray<number>, fallback: number): number =>
  values.length === 0 ? fallback : values.reduce((sum, value) => sum + value, 0) / values.length

/**
 * Format a money amount as `$1,234.50`.
 *
 * @since 0.1.0
 * @internal
 */
export const formatMoney = (amount: number): string => {
  const sign = amount < 0 ? "-" : ""
  const [whole = "0", cents = "00"] = Math.abs(amount).toFixed(2).split(".")
  return `${sign}$${whole.replace(/\B(?=(\d{3})+(?!\d))/g, ",")}.${cents}`
}
