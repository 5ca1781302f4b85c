/**
 * @boxflow/core
 *
 * Pure box-layout algorithms: a wrapping flow row and a pinned-center
 * three-section row. Hosts supply children that can report an intrinsic size
 * and receive one rect per child back.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Types
// =============================================================================

export {
  UNCONSTRAINED,
  type BoxLayout,
  type BoxLayoutKind,
  type CenteredProps,
  type FlowWrapProps,
  type LayoutChild,
  type Placement,
  type Rect,
  type RowAlign,
  type Size,
  type SizeProposal,
} from "./layout/types.js";

export type { LayoutOptions } from "./layout/engine/types.js";

// =============================================================================
// Entry points
// =============================================================================

export { layouts } from "./layout/layouts.js";
export { measureLayout, placeLayout } from "./layout/engine/layoutEngine.js";
export {
  type FlowRow,
  computeFlowRows,
  layoutFlowWrap,
  measureFlowWrap,
} from "./layout/kinds/flowWrap.js";
export {
  type CenteredPlan,
  type CenteredSidePlan,
  centerIndexOf,
  layoutCentered,
  measureCentered,
  planCentered,
} from "./layout/kinds/centered.js";

// =============================================================================
// Props, spacing, diagnostics
// =============================================================================

export {
  DEFAULT_CENTERED_SPACING,
  DEFAULT_FLOW_WRAP_SPACING,
  type LayoutFatal,
  type LayoutFatalCode,
  type LayoutResult,
  type ValidatedCenteredProps,
  type ValidatedFlowWrapProps,
  validateBounds,
  validateCenteredProps,
  validateFlowWrapProps,
  validateProposedWidth,
} from "./layout/validateProps.js";

export {
  SPACING_SCALE,
  type SpacingKey,
  type SpacingValue,
  isSpacingKey,
  resolveSpacingValue,
  resolveSpacingWithDefault,
} from "./layout/spacing-scale.js";

export {
  type LayoutWarnings,
  type LayoutWarningsOptions,
  createLayoutWarnings,
} from "./layout/devWarnings.js";
