import type { LayoutChild, Size, SizeProposal } from "../types.js";
import type { LayoutResult } from "../validateProps.js";
import { invalid } from "../validateProps.js";
import { clampNonNegative } from "./bounds.js";
import { ok } from "./result.js";

/**
 * Memoised access to the host's intrinsic sizes for one layout call.
 *
 * A child is asked at most once per distinct proposal; the session is
 * dropped when the call returns, so nothing is cached across calls.
 */
export type MeasureSession = Readonly<{
  measure: (index: number, proposal: SizeProposal) => LayoutResult<Size>;
}>;

function proposalKey(proposal: SizeProposal): string {
  const w = proposal.w === null ? "u" : String(proposal.w);
  const h = proposal.h === null ? "u" : String(proposal.h);
  return `${w}x${h}`;
}

function isValidSize(size: unknown): size is Size {
  if (typeof size !== "object" || size === null) return false;
  const { w, h } = size as { w?: unknown; h?: unknown };
  return (
    typeof w === "number" &&
    typeof h === "number" &&
    Number.isFinite(w) &&
    Number.isFinite(h) &&
    w >= 0 &&
    h >= 0
  );
}

function describeSize(size: unknown): string {
  if (typeof size !== "object" || size === null) return String(size);
  const { w, h } = size as { w?: unknown; h?: unknown };
  return `${String(w)}x${String(h)}`;
}

export function createMeasureSession(children: readonly LayoutChild[]): MeasureSession {
  const cache = new Map<number, Map<string, Size>>();

  return Object.freeze({
    measure(index: number, proposal: SizeProposal): LayoutResult<Size> {
      const child = children[index];
      if (!child) {
        return invalid(`measure: no child at index ${String(index)}`, "BOXFLOW_INVALID_MEASURE");
      }

      // Hosts never see negative proposals.
      const normalized: SizeProposal = {
        w: proposal.w === null ? null : clampNonNegative(proposal.w),
        h: proposal.h === null ? null : clampNonNegative(proposal.h),
      };
      const key = proposalKey(normalized);

      let byProposal = cache.get(index);
      const hit = byProposal?.get(key);
      if (hit) return ok(hit);

      const size: unknown = child.measure(normalized);
      if (!isValidSize(size)) {
        return invalid(
          `child #${String(index)} measured to ${describeSize(size)}: expected finite sizes >= 0`,
          "BOXFLOW_INVALID_MEASURE",
        );
      }

      const frozen: Size = Object.freeze({ w: size.w, h: size.h });
      if (!byProposal) {
        byProposal = new Map<string, Size>();
        cache.set(index, byProposal);
      }
      byProposal.set(key, frozen);
      return ok(frozen);
    },
  });
}
