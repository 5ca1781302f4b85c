/**
 * packages/core/src/layout/engine/layoutEngine.ts — Layout kind dispatch.
 *
 * Why: Hosts hold a `BoxLayout` descriptor per container and call one pair of
 * entry points; this routes each call to the kind's measure/layout functions.
 *
 * Invariants:
 *   - Descriptors carry no state; identical inputs give identical outputs
 *   - Props are validated on every call; invalid props produce a fatal result
 *   - Each child is asked for its size at most once per proposal per call
 */

import { layoutCentered, measureCentered } from "../kinds/centered.js";
import { layoutFlowWrap, measureFlowWrap } from "../kinds/flowWrap.js";
import type { BoxLayout, LayoutChild, Placement, Rect, Size } from "../types.js";
import type { LayoutResult } from "../validateProps.js";
import { invalid } from "../validateProps.js";
import type { LayoutOptions } from "./types.js";

function describeKind(layout: unknown): string {
  if (typeof layout !== "object" || layout === null) return String(layout);
  const kind: unknown = (layout as { kind?: unknown }).kind;
  return String(kind);
}

export function measureLayout(
  layout: BoxLayout,
  children: readonly LayoutChild[],
  maxW: number | null,
  opts: LayoutOptions = {},
): LayoutResult<Size> {
  switch (layout.kind) {
    case "flowWrap":
      return measureFlowWrap(children, maxW, layout.props, opts);
    case "centered":
      return measureCentered(children, maxW, layout.props, opts);
    default:
      return invalid(`measure: unknown layout kind "${describeKind(layout)}"`);
  }
}

export function placeLayout(
  layout: BoxLayout,
  children: readonly LayoutChild[],
  bounds: Rect,
  opts: LayoutOptions = {},
): LayoutResult<readonly Placement[]> {
  switch (layout.kind) {
    case "flowWrap":
      return layoutFlowWrap(children, bounds, layout.props, opts);
    case "centered":
      return layoutCentered(children, bounds, layout.props, opts);
    default:
      return invalid(`layout: unknown layout kind "${describeKind(layout)}"`);
  }
}
