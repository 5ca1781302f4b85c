/**
 * packages/core/src/layout/kinds/centered.ts — Pinned-center three-section layout.
 *
 * The child at `floor(n / 2)` is placed at its unconstrained size exactly on
 * the container midpoint and never shrinks. Children before it form the left
 * side, children after it the right side. Both sides get the same nominal
 * width, `(bounds.w - centerW) / 2 - spacing`, split evenly across the side's
 * children as their width proposal.
 *
 * Only one spacing unit is reserved per side, while placement puts `spacing`
 * between every pair of side children; with two or more children a side can
 * consume more than its nominal width. `planCentered` reports both numbers.
 */

import { formatAmount, warnLayoutIssue } from "../devWarnings.js";
import { rectMaxX, rectMidX, rectMidY } from "../engine/bounds.js";
import { type MeasureSession, createMeasureSession } from "../engine/intrinsic.js";
import { ok } from "../engine/result.js";
import type { LayoutOptions } from "../engine/types.js";
import {
  type CenteredProps,
  type LayoutChild,
  type Placement,
  type Rect,
  type Size,
  UNCONSTRAINED,
} from "../types.js";
import type { LayoutResult } from "../validateProps.js";
import { validateBounds, validateCenteredProps, validateProposedWidth } from "../validateProps.js";

export type CenteredSidePlan = Readonly<{
  /** Child indices in input order. */
  indices: readonly number[];
  /** Width proposed to each child of the side. */
  proposedW: number;
  /** Actual child widths plus spacing between them. */
  consumedW: number;
}>;

export type CenteredPlan = Readonly<{
  /** `null` only for empty input. */
  centerIndex: number | null;
  /** Nominal width of each side. */
  sideW: number;
  left: CenteredSidePlan;
  right: CenteredSidePlan;
  /** In child order. */
  placements: readonly Placement[];
}>;

const EMPTY_SIDE: CenteredSidePlan = Object.freeze({
  indices: Object.freeze([]),
  proposedW: 0,
  consumedW: 0,
});

const EMPTY_PLAN: CenteredPlan = Object.freeze({
  centerIndex: null,
  sideW: 0,
  left: EMPTY_SIDE,
  right: EMPTY_SIDE,
  placements: Object.freeze([]),
});

/** Index of the pinned child: `floor(count / 2)`. */
export function centerIndexOf(count: number): number {
  return Math.floor(count / 2);
}

function indexRange(start: number, end: number): readonly number[] {
  const out: number[] = [];
  for (let i = start; i < end; i++) out.push(i);
  return Object.freeze(out);
}

function sumWithSpacing(widths: readonly number[], spacing: number): number {
  let total = 0;
  for (let i = 0; i < widths.length; i++) {
    if (i > 0) total += spacing;
    total += widths[i] ?? 0;
  }
  return total;
}

function measureSide(
  indices: readonly number[],
  sideW: number,
  session: MeasureSession,
): LayoutResult<Readonly<{ proposedW: number; sizes: readonly Size[] }>> {
  if (indices.length === 0) return ok({ proposedW: 0, sizes: Object.freeze([]) });
  const proposedW = sideW / indices.length;
  const sizes: Size[] = [];
  for (const index of indices) {
    const res = session.measure(index, { w: proposedW, h: null });
    if (!res.ok) return res;
    sizes.push(res.value);
  }
  return ok({ proposedW, sizes });
}

/**
 * Compute the centered layout for `bounds` together with the per-side
 * bookkeeping. Empty input yields an empty plan.
 */
export function planCentered(
  children: readonly LayoutChild[],
  bounds: Rect,
  props: CenteredProps = {},
  opts: LayoutOptions = {},
): LayoutResult<CenteredPlan> {
  const propsRes = validateCenteredProps(props);
  if (!propsRes.ok) return propsRes;
  const boundsRes = validateBounds("centered", bounds);
  if (!boundsRes.ok) return boundsRes;
  const rect = boundsRes.value;
  const { spacing } = propsRes.value;

  const count = children.length;
  if (count === 0) return ok(EMPTY_PLAN);

  const session = createMeasureSession(children);
  const centerIndex = centerIndexOf(count);
  const centerRes = session.measure(centerIndex, UNCONSTRAINED);
  if (!centerRes.ok) return centerRes;
  const center = centerRes.value;

  const midX = rectMidX(rect);
  const midY = rectMidY(rect);
  const sideW = (rect.w - center.w) / 2 - spacing;

  if (sideW < 0 && count > 1) {
    warnLayoutIssue(
      opts.warnings,
      `centered:centerTooWide:${formatAmount(center.w)}>${formatAmount(rect.w)}:${formatAmount(spacing)}`,
      `centered child #${String(centerIndex)} is ${formatAmount(center.w)} wide and leaves no room for side children in ${formatAmount(rect.w)} (spacing ${formatAmount(spacing)}).`,
    );
  }

  const placed = new Array<Placement | undefined>(count).fill(undefined);
  placed[centerIndex] = {
    index: centerIndex,
    rect: { x: midX - center.w / 2, y: midY - center.h / 2, w: center.w, h: center.h },
  };

  const leftIndices = indexRange(0, centerIndex);
  const leftRes = measureSide(leftIndices, sideW, session);
  if (!leftRes.ok) return leftRes;
  let x = rect.x;
  for (let i = 0; i < leftIndices.length; i++) {
    const index = leftIndices[i] ?? 0;
    const size = leftRes.value.sizes[i];
    if (!size) continue;
    placed[index] = { index, rect: { x, y: midY - size.h / 2, w: size.w, h: size.h } };
    x += size.w + spacing;
  }

  const rightIndices = indexRange(centerIndex + 1, count);
  const rightRes = measureSide(rightIndices, sideW, session);
  if (!rightRes.ok) return rightRes;
  x = rectMaxX(rect);
  for (let i = rightIndices.length - 1; i >= 0; i--) {
    const index = rightIndices[i] ?? 0;
    const size = rightRes.value.sizes[i];
    if (!size) continue;
    x -= size.w;
    placed[index] = { index, rect: { x, y: midY - size.h / 2, w: size.w, h: size.h } };
    x -= spacing;
  }

  const left: CenteredSidePlan = {
    indices: leftIndices,
    proposedW: leftRes.value.proposedW,
    consumedW: sumWithSpacing(
      leftRes.value.sizes.map((s) => s.w),
      spacing,
    ),
  };
  const right: CenteredSidePlan = {
    indices: rightIndices,
    proposedW: rightRes.value.proposedW,
    consumedW: sumWithSpacing(
      rightRes.value.sizes.map((s) => s.w),
      spacing,
    ),
  };

  for (const [name, side] of [
    ["left", left],
    ["right", right],
  ] as const) {
    if (side.indices.length === 0 || side.consumedW <= sideW) continue;
    warnLayoutIssue(
      opts.warnings,
      `centered:${name}Overflow:${String(side.indices.length)}:${formatAmount(side.consumedW)}>${formatAmount(sideW)}`,
      `centered ${name} side (${String(side.indices.length)} children) consumes ${formatAmount(side.consumedW)} of its nominal ${formatAmount(sideW)} and may overlap the center.`,
    );
  }

  const placements: Placement[] = [];
  for (const p of placed) {
    if (p) placements.push(p);
  }

  return ok({ centerIndex, sideW, left, right, placements: Object.freeze(placements) });
}

/**
 * Total size for the proposed width.
 *
 * Height is the tallest unconstrained child. Width is the proposed width when
 * constrained; unconstrained, it is the narrowest width that keeps the center
 * on the midpoint with both sides at their natural widths.
 */
export function measureCentered(
  children: readonly LayoutChild[],
  maxW: number | null,
  props: CenteredProps = {},
  opts: LayoutOptions = {},
): LayoutResult<Size> {
  const propsRes = validateCenteredProps(props);
  if (!propsRes.ok) return propsRes;
  const widthRes = validateProposedWidth("centered", maxW);
  if (!widthRes.ok) return widthRes;
  const { spacing } = propsRes.value;

  const count = children.length;
  if (count === 0) return ok({ w: 0, h: 0 });

  const session = createMeasureSession(children);
  const widths: number[] = [];
  let maxH = 0;
  for (let i = 0; i < count; i++) {
    const res = session.measure(i, UNCONSTRAINED);
    if (!res.ok) return res;
    widths.push(res.value.w);
    if (res.value.h > maxH) maxH = res.value.h;
  }

  const centerIndex = centerIndexOf(count);
  const centerW = widths[centerIndex] ?? 0;
  let naturalW = centerW;
  if (count > 1) {
    const leftNatural = sumWithSpacing(widths.slice(0, centerIndex), spacing);
    const rightNatural = sumWithSpacing(widths.slice(centerIndex + 1), spacing);
    naturalW = centerW + 2 * (Math.max(leftNatural, rightNatural) + spacing);
  }

  const proposedW = widthRes.value;
  if (proposedW === null) return ok({ w: naturalW, h: maxH });

  if (naturalW > proposedW) {
    warnLayoutIssue(
      opts.warnings,
      `centered:narrowProposal:${String(count)}:${formatAmount(naturalW)}>${formatAmount(proposedW)}`,
      `centered content needs ${formatAmount(naturalW)} at natural size but was offered ${formatAmount(proposedW)}; side children will be proposed less than they want.`,
    );
  }
  return ok({ w: proposedW, h: maxH });
}

/**
 * Place children inside `bounds`. Empty input yields no placements.
 */
export function layoutCentered(
  children: readonly LayoutChild[],
  bounds: Rect,
  props: CenteredProps = {},
  opts: LayoutOptions = {},
): LayoutResult<readonly Placement[]> {
  const planRes = planCentered(children, bounds, props, opts);
  if (!planRes.ok) return planRes;
  return ok(planRes.value.placements);
}
