/**
 * packages/core/src/layout/spacing-scale.ts — Named spacing scale.
 *
 * Why: Provides semantic spacing tokens for consistent layouts.
 * Values are in points on a 4pt rhythm.
 *
 * Scale:
 *   - none: 0
 *   - xs: 2 - hairline gaps (icon + label)
 *   - sm: 4 - compact chips
 *   - md: 8 - default flow spacing
 *   - lg: 16 - toolbar groups
 *   - xl: 24 - sections
 *   - 2xl: 32 - page gutters
 */

/**
 * Named spacing scale keys.
 */
export type SpacingKey = "none" | "xs" | "sm" | "md" | "lg" | "xl" | "2xl";

export const SPACING_SCALE: Readonly<Record<SpacingKey, number>> = Object.freeze({
  none: 0,
  xs: 2,
  sm: 4,
  md: 8,
  lg: 16,
  xl: 24,
  "2xl": 32,
});

/**
 * Spacing values: either a number or a scale key.
 */
export type SpacingValue = number | SpacingKey;

export function isSpacingKey(value: unknown): value is SpacingKey {
  return (
    value === "none" ||
    value === "xs" ||
    value === "sm" ||
    value === "md" ||
    value === "lg" ||
    value === "xl" ||
    value === "2xl"
  );
}

/**
 * Resolve a spacing value to a number.
 *
 * @example
 * ```typescript
 * resolveSpacingValue("md")  // 8
 * resolveSpacingValue(5)     // 5
 * resolveSpacingValue(undefined)  // 0
 * ```
 */
export function resolveSpacingValue(value: SpacingValue | undefined): number {
  return resolveSpacingWithDefault(value, 0);
}

/**
 * Resolve spacing with a default fallback for `undefined`.
 */
export function resolveSpacingWithDefault(
  value: SpacingValue | undefined,
  fallback: number,
): number {
  if (value === undefined) return fallback;
  if (typeof value === "number") return value;
  if (isSpacingKey(value)) return SPACING_SCALE[value];
  return fallback;
}
