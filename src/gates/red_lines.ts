export type RedLineTrigger =
  | "death_threat"
  | "legal_threat"
  | "bank_dispute"
  | "self_harm"
  | "violence_threat";

export type RedLineResult =
  | { isFlagged: false }
  | { isFlagged: true; trigger: RedLineTrigger; summary: string };

const RED_LINE_PATTERNS: Array<{ trigger: RedLineTrigger; pattern: RegExp; summary: string }> = [
  {
    trigger: "death_threat",
    pattern: /\b(kill|murder|die|death threat)\b/i,
    summary: "Threat of violence against a person",
  },
  {
    trigger: "legal_threat",
    pattern: /\b(sue|lawsuit|lawyer|legal action|court)\b/i,
    summary: "Legal action signal",
  },
  {
    trigger: "bank_dispute",
    pattern: /\b(bank dispute|chargeback|dispute the charge)\b/i,
    summary: "Payment dispute signal",
  },
  {
    trigger: "self_harm",
    pattern: /\b(suicide|end my life|harm myself)\b/i,
    summary: "Self-harm signal",
  },
  {
    trigger: "violence_threat",
    pattern: /\b(bomb|weapon|attack)\b/i,
    summary: "Violence signal",
  },
];

/**
 * Red-line scan run before any model call.
 *
 * First match wins; ordering of RED_LINE_PATTERNS is the priority order.
 * Never throws.
 */
export function checkRedLines(message: string): RedLineResult {
  for (const { trigger, pattern, summary } of RED_LINE_PATTERNS) {
    if (pattern.test(message)) {
      return { isFlagged: true, trigger, summary };
    }
  }
  return { isFlagged: false };
}
