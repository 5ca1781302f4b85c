import type { LayoutWarnings } from "../devWarnings.js";

/** Per-call options shared by every measure/layout entry point. */
export type LayoutOptions = Readonly<{
  /** Dev-mode warning sink; see `createLayoutWarnings`. */
  warnings?: LayoutWarnings;
}>;
