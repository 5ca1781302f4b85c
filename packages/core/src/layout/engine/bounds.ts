import type { Rect } from "../types.js";

export function clampNonNegative(n: number): number {
  return n < 0 ? 0 : n;
}

/** Resolve an optional width limit for overflow comparisons. */
export function resolveWidthLimit(maxW: number | null): number {
  return maxW === null ? Number.POSITIVE_INFINITY : maxW;
}

export function rectMidX(rect: Rect): number {
  return rect.x + rect.w / 2;
}

export function rectMidY(rect: Rect): number {
  return rect.y + rect.h / 2;
}

export function rectMaxX(rect: Rect): number {
  return rect.x + rect.w;
}
