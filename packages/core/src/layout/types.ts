/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Defines the geometric types shared by every layout kind and the
 * contract with the host that owns the children. Units are abstract
 * non-negative reals (points); nothing here is rounded to cells.
 */
import type { SpacingValue } from "./spacing-scale.js";

/** Rectangle with position (x,y) and dimensions (w,h). */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Size dimensions (width and height). */
export type Size = Readonly<{ w: number; h: number }>;

/**
 * Size offered to a child or a layout. `null` leaves that dimension
 * unconstrained.
 */
export type SizeProposal = Readonly<{ w: number | null; h: number | null }>;

export const UNCONSTRAINED: SizeProposal = Object.freeze({ w: null, h: null });

/**
 * A layout participant owned by the host.
 *
 * `measure` must be a pure function of the child's content and the proposal
 * for the duration of one layout call.
 */
export interface LayoutChild {
  measure(proposal: SizeProposal): Size;
  /** flowWrap only: close the row after this child. */
  readonly breakAfter?: boolean;
}

/** Rect assigned to the child at `index` of the input sequence. */
export type Placement = Readonly<{ index: number; rect: Rect }>;

/** Vertical position of a child inside its flowWrap row. */
export type RowAlign = "start" | "center" | "end";

export type FlowWrapProps = Readonly<{
  /** Gap between neighbours on a row. Default 8. */
  horizontalSpacing?: SpacingValue;
  /** Gap between rows. Default 8. */
  verticalSpacing?: SpacingValue;
  /** Row cap; the last permitted row absorbs the overflow. */
  maxRows?: number;
  align?: RowAlign;
}>;

export type CenteredProps = Readonly<{
  /** Gap between side children and the reserve beside the center. Default 0. */
  spacing?: SpacingValue;
}>;

/** Stateless descriptor dispatched by `measureLayout` / `placeLayout`. */
export type BoxLayout =
  | Readonly<{ kind: "flowWrap"; props: FlowWrapProps }>
  | Readonly<{ kind: "centered"; props: CenteredProps }>;

export type BoxLayoutKind = BoxLayout["kind"];
