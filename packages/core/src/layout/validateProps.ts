/**
 * packages/core/src/layout/validateProps.ts — Layout props and constraint validation.
 *
 * Why: Validates layout props before any child is measured, applying defaults
 * and normalizing values. Returns structured fatal errors for invalid input
 * rather than throwing, so callers get a deterministic error report.
 *
 * Validation rules:
 *   - Spacing props accept a finite number >= 0 OR a spacing key ("sm", "md", ...)
 *   - Numeric strings are accepted and parsed ("12" -> 12)
 *   - maxRows must be an integer >= 1 when present
 *   - Enum props are trimmed and lower-cased before matching (align)
 *   - Proposed widths are null (unconstrained), Infinity, or finite >= 0
 *   - Bounds need a finite origin and a finite, non-negative size
 */

import { SPACING_SCALE, isSpacingKey } from "./spacing-scale.js";
import type { CenteredProps, FlowWrapProps, Rect, RowAlign } from "./types.js";

export type LayoutFatalCode =
  | "BOXFLOW_INVALID_PROPS"
  | "BOXFLOW_INVALID_CONSTRAINT"
  | "BOXFLOW_INVALID_MEASURE";

export type LayoutFatal = Readonly<{ code: LayoutFatalCode; detail: string }>;

/**
 * Layout operation result: success with value, or failure with fatal error.
 * Used throughout the layout system to propagate validation failures upward.
 */
export type LayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: LayoutFatal }>;

/* --- Validated Props Types (with defaults applied and types guaranteed) --- */

export type ValidatedFlowWrapProps = Readonly<{
  horizontalSpacing: number;
  verticalSpacing: number;
  /** `null` means no cap. */
  maxRows: number | null;
  align: RowAlign;
}>;

export type ValidatedCenteredProps = Readonly<{ spacing: number }>;

type FlowWrapPropBag = Readonly<{
  horizontalSpacing?: unknown;
  verticalSpacing?: unknown;
  maxRows?: unknown;
  align?: unknown;
}>;

type CenteredPropBag = Readonly<{ spacing?: unknown }>;

export const DEFAULT_FLOW_WRAP_SPACING = 8;
export const DEFAULT_CENTERED_SPACING = 0;

export function invalid(
  detail: string,
  code: LayoutFatalCode = "BOXFLOW_INVALID_PROPS",
): LayoutResult<never> {
  return { ok: false, fatal: { code, detail } };
}

function describeReceivedType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function invalidProp(
  kind: string,
  name: string,
  expected: string,
  received: unknown,
): LayoutResult<never> {
  return invalid(
    `Invalid prop "${name}" on <${kind}>: expected ${expected}, ` +
      `got ${describeReceivedType(received)} (${String(received)})`,
  );
}

function isPropBag(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeStringToken(value: unknown): unknown {
  if (typeof value !== "string") return value;
  return value.trim().toLowerCase();
}

function parseFiniteNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.length === 0) return undefined;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function requireSpacingNonNegative(
  kind: string,
  name: string,
  v: unknown,
  def: number,
): LayoutResult<number> {
  if (v === undefined) return { ok: true, value: def };
  const normalized = normalizeStringToken(v);
  if (isSpacingKey(normalized)) {
    return { ok: true, value: SPACING_SCALE[normalized] };
  }
  const n = parseFiniteNumber(v);
  if (n === undefined || n < 0) {
    return invalidProp(kind, name, "a finite number >= 0 or a spacing key", v);
  }
  return { ok: true, value: n };
}

function requireOptionalPositiveInt(
  kind: string,
  name: string,
  v: unknown,
): LayoutResult<number | null> {
  if (v === undefined || v === null) return { ok: true, value: null };
  const n = parseFiniteNumber(v);
  if (n === undefined || !Number.isInteger(n) || n < 1) {
    return invalidProp(kind, name, "an integer >= 1", v);
  }
  return { ok: true, value: n };
}

function requireRowAlign(kind: string, v: unknown): LayoutResult<RowAlign> {
  const value = v === undefined ? "start" : normalizeStringToken(v);
  if (value === "start" || value === "center" || value === "end") {
    return { ok: true, value };
  }
  return invalid(`${kind}.align must be one of "start" | "center" | "end"`);
}

export function validateFlowWrapProps(
  props: FlowWrapProps | unknown,
): LayoutResult<ValidatedFlowWrapProps> {
  if (props !== undefined && props !== null && !isPropBag(props)) {
    return invalidProp("flowWrap", "props", "an object", props);
  }
  const p: FlowWrapPropBag = isPropBag(props) ? props : {};

  const hRes = requireSpacingNonNegative(
    "flowWrap",
    "horizontalSpacing",
    p.horizontalSpacing,
    DEFAULT_FLOW_WRAP_SPACING,
  );
  if (!hRes.ok) return hRes;
  const vRes = requireSpacingNonNegative(
    "flowWrap",
    "verticalSpacing",
    p.verticalSpacing,
    DEFAULT_FLOW_WRAP_SPACING,
  );
  if (!vRes.ok) return vRes;
  const maxRowsRes = requireOptionalPositiveInt("flowWrap", "maxRows", p.maxRows);
  if (!maxRowsRes.ok) return maxRowsRes;
  const alignRes = requireRowAlign("flowWrap", p.align);
  if (!alignRes.ok) return alignRes;

  return {
    ok: true,
    value: {
      horizontalSpacing: hRes.value,
      verticalSpacing: vRes.value,
      maxRows: maxRowsRes.value,
      align: alignRes.value,
    },
  };
}

export function validateCenteredProps(
  props: CenteredProps | unknown,
): LayoutResult<ValidatedCenteredProps> {
  if (props !== undefined && props !== null && !isPropBag(props)) {
    return invalidProp("centered", "props", "an object", props);
  }
  const p: CenteredPropBag = isPropBag(props) ? props : {};

  const spacingRes = requireSpacingNonNegative(
    "centered",
    "spacing",
    p.spacing,
    DEFAULT_CENTERED_SPACING,
  );
  if (!spacingRes.ok) return spacingRes;
  return { ok: true, value: { spacing: spacingRes.value } };
}

/**
 * Normalize a proposed width: `null` and `Infinity` both mean unconstrained
 * and come back as `null`.
 */
export function validateProposedWidth(kind: string, maxW: unknown): LayoutResult<number | null> {
  if (maxW === null || maxW === undefined || maxW === Number.POSITIVE_INFINITY) {
    return { ok: true, value: null };
  }
  if (typeof maxW !== "number" || !Number.isFinite(maxW) || maxW < 0) {
    return invalid(
      `${kind}: proposed width must be null, Infinity, or a finite number >= 0 (got ${String(maxW)})`,
      "BOXFLOW_INVALID_CONSTRAINT",
    );
  }
  return { ok: true, value: maxW };
}

export function validateBounds(kind: string, bounds: unknown): LayoutResult<Rect> {
  if (!isPropBag(bounds)) {
    return invalid(`${kind}: bounds must be a rect`, "BOXFLOW_INVALID_CONSTRAINT");
  }
  const { x, y, w, h } = bounds;
  if (
    typeof x !== "number" ||
    typeof y !== "number" ||
    typeof w !== "number" ||
    typeof h !== "number" ||
    !Number.isFinite(x) ||
    !Number.isFinite(y) ||
    !Number.isFinite(w) ||
    !Number.isFinite(h) ||
    w < 0 ||
    h < 0
  ) {
    return invalid(
      `${kind}: bounds must have a finite origin and a finite size >= 0 ` +
        `(got x=${String(x)} y=${String(y)} w=${String(w)} h=${String(h)})`,
      "BOXFLOW_INVALID_CONSTRAINT",
    );
  }
  return { ok: true, value: { x, y, w, h } };
}
