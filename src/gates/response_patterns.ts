import type { ForbiddenPattern, PatternScanResult } from "./gate_interfaces";

export type ResponseViolation =
  | "confirmed_cancellation"
  | "confirmed_pause"
  | "confirmed_refund"
  | "confirmed_damage_resolution";

// Replies must never claim an irreversible account action was performed.
export const UNSAFE_RESPONSE_PATTERNS: ReadonlyArray<ForbiddenPattern<ResponseViolation>> = [
  { pattern: /(cancelled|canceled) your subscription/i, violation: "confirmed_cancellation" },
  { pattern: /subscription (has been|is now) (cancelled|canceled)/i, violation: "confirmed_cancellation" },
  { pattern: /(paused|suspended) your subscription/i, violation: "confirmed_pause" },
  { pattern: /subscription (has been|is now) (paused|suspended)/i, violation: "confirmed_pause" },
  { pattern: /(processed|issued|approved) (a |your )?(refund|reimbursement)/i, violation: "confirmed_refund" },
  { pattern: /refund (has been|is now|was) (processed|issued|approved)/i, violation: "confirmed_refund" },
];

export const QA_UNSAFE_RESPONSE_PATTERNS: ReadonlyArray<ForbiddenPattern<ResponseViolation>> = [
  ...UNSAFE_RESPONSE_PATTERNS,
  {
    pattern: /(approved|issued|arranged|shipped) (a |your )?(replacement|reshipment|store credit)/i,
    violation: "confirmed_damage_resolution",
  },
  {
    pattern: /(replacement|reshipment|store credit) (has been|is now|was) (approved|issued|arranged|shipped|sent)/i,
    violation: "confirmed_damage_resolution",
  },
];

export function fastSafetyCheck(
  response: string,
  patterns: ReadonlyArray<ForbiddenPattern<ResponseViolation>> = UNSAFE_RESPONSE_PATTERNS
): PatternScanResult<ResponseViolation> {
  for (const { pattern, violation } of patterns) {
    if (pattern.test(response)) {
      return { ok: false, violation, pattern: pattern.source };
    }
  }
  return { ok: true };
}
