/**
 * Dev-mode layout warnings.
 *
 * The context is owned by the caller and outlives single layout calls so that
 * each distinct issue is reported once. Layout results never depend on it.
 */

export type LayoutWarnings = Readonly<{
  devMode: boolean;
  warnedLayoutIssues: Set<string>;
  warn: (message: string) => void;
}>;

export type LayoutWarningsOptions = Readonly<{
  devMode?: boolean;
  warn?: (message: string) => void;
}>;

function warnConsole(message: string): void {
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

export function createLayoutWarnings(opts: LayoutWarningsOptions = {}): LayoutWarnings {
  return {
    devMode: opts.devMode ?? true,
    warnedLayoutIssues: new Set<string>(),
    warn: opts.warn ?? warnConsole,
  };
}

export function warnLayoutIssue(
  ctx: LayoutWarnings | undefined,
  key: string,
  detail: string,
): void {
  if (!ctx || !ctx.devMode) return;
  if (ctx.warnedLayoutIssues.has(key)) return;
  ctx.warnedLayoutIssues.add(key);
  ctx.warn(`[boxflow][layout] ${detail}`);
}

/** Human-readable number for warning text: integers as-is, others to 2 decimals. */
export function formatAmount(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(2);
}
