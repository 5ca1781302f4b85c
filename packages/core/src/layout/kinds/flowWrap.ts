/**
 * packages/core/src/layout/kinds/flowWrap.ts — Wrapping row layout.
 *
 * Children are packed left to right at their unconstrained size and wrap to a
 * new row when the next child would overflow the width. Each row is as tall
 * as its tallest child.
 *
 * Row rules, applied per child in order:
 *   - A child joins the current row if it fits, if the row is empty, or if
 *     the row is the last one `maxRows` permits (that row absorbs overflow).
 *   - Otherwise the row closes and the child starts the next one.
 *   - `breakAfter` closes the row after its child, except on the last
 *     permitted row.
 *
 * A child wider than the container is never split or rejected; it gets a row
 * of its own and overflows.
 */

import { formatAmount, warnLayoutIssue } from "../devWarnings.js";
import { resolveWidthLimit } from "../engine/bounds.js";
import { type MeasureSession, createMeasureSession } from "../engine/intrinsic.js";
import { ok } from "../engine/result.js";
import type { LayoutOptions } from "../engine/types.js";
import {
  type FlowWrapProps,
  type LayoutChild,
  type Placement,
  type Rect,
  type RowAlign,
  type Size,
  UNCONSTRAINED,
} from "../types.js";
import type { LayoutResult, ValidatedFlowWrapProps } from "../validateProps.js";
import { validateBounds, validateFlowWrapProps, validateProposedWidth } from "../validateProps.js";

/** One visual line: member indices in input order, summed width, max height. */
export type FlowRow = Readonly<{ indices: readonly number[]; w: number; h: number }>;

type FlowRowPlan = Readonly<{ rows: readonly FlowRow[]; sizes: readonly Size[] }>;

function planFlowRows(
  children: readonly LayoutChild[],
  maxW: number | null,
  props: ValidatedFlowWrapProps,
  session: MeasureSession,
): LayoutResult<FlowRowPlan> {
  const limit = resolveWidthLimit(maxW);
  const { horizontalSpacing, maxRows } = props;

  const rows: FlowRow[] = [];
  const sizes: Size[] = [];
  let current: number[] = [];
  let currentW = 0;
  let currentH = 0;

  const onLastPermittedRow = (): boolean => maxRows !== null && rows.length >= maxRows - 1;
  const closeRow = (): void => {
    rows.push(Object.freeze({ indices: Object.freeze(current), w: currentW, h: currentH }));
    current = [];
    currentW = 0;
    currentH = 0;
  };

  for (let i = 0; i < children.length; i++) {
    const sizeRes = session.measure(i, UNCONSTRAINED);
    if (!sizeRes.ok) return sizeRes;
    const size = sizeRes.value;
    sizes.push(size);

    const required = current.length === 0 ? size.w : currentW + horizontalSpacing + size.w;
    if (required <= limit || current.length === 0 || onLastPermittedRow()) {
      current.push(i);
      currentW = required;
      if (size.h > currentH) currentH = size.h;
    } else {
      closeRow();
      current.push(i);
      currentW = size.w;
      currentH = size.h;
    }

    if (children[i]?.breakAfter === true && !onLastPermittedRow()) {
      closeRow();
    }
  }

  if (current.length > 0) closeRow();

  return ok({ rows: Object.freeze(rows), sizes: Object.freeze(sizes) });
}

function warnOverflowingRows(
  rows: readonly FlowRow[],
  maxW: number | null,
  props: ValidatedFlowWrapProps,
  opts: LayoutOptions,
): void {
  if (!opts.warnings || maxW === null) return;
  for (let r = 0; r < rows.length; r++) {
    const row = rows[r];
    if (!row || row.w <= maxW) continue;
    if (row.indices.length === 1) {
      const index = row.indices[0] ?? -1;
      warnLayoutIssue(
        opts.warnings,
        `flowWrap:oversizedChild:${String(index)}:${formatAmount(row.w)}>${formatAmount(maxW)}`,
        `flowWrap child #${String(index)} is ${formatAmount(row.w)} wide and overflows the available width ${formatAmount(maxW)}.`,
      );
    } else {
      warnLayoutIssue(
        opts.warnings,
        `flowWrap:rowCap:${String(props.maxRows)}:${String(r)}:${formatAmount(row.w)}>${formatAmount(maxW)}`,
        `flowWrap row ${String(r + 1)} of maxRows=${String(props.maxRows)} absorbs overflow: ${formatAmount(row.w)} wide in ${formatAmount(maxW)}.`,
      );
    }
  }
}

function resolveRows(
  children: readonly LayoutChild[],
  maxW: number | null,
  props: ValidatedFlowWrapProps,
): LayoutResult<FlowRowPlan> {
  return planFlowRows(children, maxW, props, createMeasureSession(children));
}

/**
 * Partition children into rows against `maxW` (`null` or `Infinity` never
 * wraps; only forced breaks start rows).
 */
export function computeFlowRows(
  children: readonly LayoutChild[],
  maxW: number | null,
  props: FlowWrapProps = {},
): LayoutResult<readonly FlowRow[]> {
  const propsRes = validateFlowWrapProps(props);
  if (!propsRes.ok) return propsRes;
  const widthRes = validateProposedWidth("flowWrap", maxW);
  if (!widthRes.ok) return widthRes;

  const planRes = resolveRows(children, widthRes.value, propsRes.value);
  if (!planRes.ok) return planRes;
  return ok(planRes.value.rows);
}

/**
 * Total size for the proposed width.
 *
 * Width is the proposed width when constrained, otherwise the widest row.
 * Height is the row heights plus `verticalSpacing` between rows.
 */
export function measureFlowWrap(
  children: readonly LayoutChild[],
  maxW: number | null,
  props: FlowWrapProps = {},
  opts: LayoutOptions = {},
): LayoutResult<Size> {
  const propsRes = validateFlowWrapProps(props);
  if (!propsRes.ok) return propsRes;
  const widthRes = validateProposedWidth("flowWrap", maxW);
  if (!widthRes.ok) return widthRes;
  const width = widthRes.value;

  const planRes = resolveRows(children, width, propsRes.value);
  if (!planRes.ok) return planRes;
  const { rows } = planRes.value;
  warnOverflowingRows(rows, width, propsRes.value, opts);

  let totalH = 0;
  let widestRow = 0;
  for (let r = 0; r < rows.length; r++) {
    const row = rows[r];
    if (!row) continue;
    if (r > 0) totalH += propsRes.value.verticalSpacing;
    totalH += row.h;
    if (row.w > widestRow) widestRow = row.w;
  }

  return ok({ w: width ?? widestRow, h: totalH });
}

function alignOffset(align: RowAlign, rowH: number, childH: number): number {
  switch (align) {
    case "center":
      return (rowH - childH) / 2;
    case "end":
      return rowH - childH;
    default:
      return 0;
  }
}

/**
 * Place children row by row inside `bounds`, wrapping against `bounds.w`.
 * Placements come back in child order at each child's intrinsic size.
 */
export function layoutFlowWrap(
  children: readonly LayoutChild[],
  bounds: Rect,
  props: FlowWrapProps = {},
  opts: LayoutOptions = {},
): LayoutResult<readonly Placement[]> {
  const propsRes = validateFlowWrapProps(props);
  if (!propsRes.ok) return propsRes;
  const boundsRes = validateBounds("flowWrap", bounds);
  if (!boundsRes.ok) return boundsRes;
  const rect = boundsRes.value;
  const { horizontalSpacing, verticalSpacing, align } = propsRes.value;

  const planRes = resolveRows(children, rect.w, propsRes.value);
  if (!planRes.ok) return planRes;
  const { rows, sizes } = planRes.value;
  warnOverflowingRows(rows, rect.w, propsRes.value, opts);

  const placements: Placement[] = [];
  let y = rect.y;
  for (const row of rows) {
    let x = rect.x;
    for (const index of row.indices) {
      const size = sizes[index];
      if (!size) continue;
      placements.push({
        index,
        rect: { x, y: y + alignOffset(align, row.h, size.h), w: size.w, h: size.h },
      });
      x += size.w + horizontalSpacing;
    }
    y += row.h + verticalSpacing;
  }

  return ok(Object.freeze(placements));
}
