import type { BoxLayout, CenteredProps, FlowWrapProps } from "./types.js";

/**
 * Descriptor factories.
 *
 * @example
 * ```typescript
 * const tags = layouts.flowWrap({ horizontalSpacing: "sm", maxRows: 2 });
 * const res = placeLayout(tags, children, { x: 0, y: 0, w: 320, h: 80 });
 * ```
 */
export const layouts = Object.freeze({
  flowWrap(props: FlowWrapProps = {}): BoxLayout {
    return Object.freeze({ kind: "flowWrap", props: Object.freeze({ ...props }) });
  },
  centered(props: CenteredProps = {}): BoxLayout {
    return Object.freeze({ kind: "centered", props: Object.freeze({ ...props }) });
  },
});
