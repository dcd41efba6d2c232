/**
 * packages/core/src/ring/devWarnings.ts — One-shot development warnings.
 */

export type RingWarnArea = "animator" | "progress" | "state";

export type WarnRingIssueContext = Readonly<{
  devMode: boolean;
  warnedIssues: Set<string>;
  warn: (message: string) => void;
}>;

/** Emit `[arcflow][area] detail` once per `key`, only in dev mode. */
export function warnRingIssue(
  ctx: WarnRingIssueContext,
  area: RingWarnArea,
  key: string,
  detail: string,
): void {
  if (!ctx.devMode) return;
  if (ctx.warnedIssues.has(key)) return;
  ctx.warnedIssues.add(key);
  ctx.warn(`[arcflow][${area}] ${detail}`);
}

export function defaultWarn(message: string): void {
  console.warn(message);
}
