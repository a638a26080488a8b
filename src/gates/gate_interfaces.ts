export const GATE_SAFETY = "safety" as const;

export type ForbiddenPattern<V extends string = string> = {
  pattern: RegExp;
  violation: V;
};

export type PatternScanResult<V extends string = string> =
  | { ok: true }
  | { ok: false; violation: V; pattern: string };
