import { createHash } from "node:crypto";

import type { Category } from "../contracts/pipeline";

type OpenerGroup =
  | "shipping"
  | "payment"
  | "subscription"
  | "damage"
  | "retention"
  | "gratitude"
  | "general";

const OPENERS: Record<OpenerGroup, readonly string[]> = {
  shipping: [
    "I'd be happy to help you with your shipment!",
    "Let me look into your delivery for you.",
    "I know how much it matters to get your package on time.",
  ],
  payment: [
    "I'd be happy to help with your payment question.",
    "Let me look into your billing details.",
    "Thanks for asking about your payment.",
  ],
  subscription: [
    "I'd be happy to help with your subscription.",
    "Let me help you with that change.",
    "I can take care of your subscription request.",
  ],
  damage: [
    "I'm sorry to hear about the issue with your package.",
    "I apologize for the trouble, let me help sort this out.",
    "I'm sorry that happened. Let me help make it right.",
  ],
  retention: [
    "I'm sorry to hear you're thinking about leaving us.",
    "I appreciate you reaching out before making a decision.",
    "Thank you for letting us know. I'd love the chance to help.",
  ],
  gratitude: [
    "What a lovely message, thank you so much!",
    "That truly means a lot to our team!",
    "Thank you for your kind words!",
  ],
  general: [
    "Thank you for reaching out to us.",
    "I'd be happy to help you with that.",
    "Thank you for contacting our support team.",
  ],
};

const CATEGORY_GROUP: Record<Category, OpenerGroup> = {
  shipping_or_delivery_question: "shipping",
  payment_question: "payment",
  frequency_change_request: "subscription",
  skip_or_pause_request: "subscription",
  recipient_or_address_change: "subscription",
  customization_request: "subscription",
  damaged_or_leaking_item_report: "damage",
  retention_primary_request: "retention",
  retention_repeated_request: "retention",
  gratitude: "gratitude",
};

const CLOSERS: readonly string[] = [
  "If you have any other questions, please don't hesitate to reach out.",
  "Please let me know if there's anything else I can help with.",
  "Feel free to contact us again if you need further assistance.",
  "Don't hesitate to reach out if you need anything else.",
  "I'm here if you need any further help.",
  "Please let me know if you have any other questions or concerns.",
  "We're always here to help, just reach out anytime.",
  "Is there anything else I can assist you with today?",
];

export const SIGN_OFF = "Warm regards,<br>The Support Team";

const SYSTEM_PHRASES = [
  "connecting you with a support agent",
  "connect you with a human",
  "having trouble processing",
  "let me connect you",
];

const NON_COMMITTAL = "review the best way to resolve this";
export const FIELD_LEAK_FALLBACK = "please provide more information";

const REMEDY = String.raw`(?:arrange|send|ship|issue|process)(?:\s+you)?\s+(?:a|an|your)?\s*(?:free\s+)?(?:reshipment|replacement|refund)\b`;
const COMMITMENT_WITH_SUBJECT = new RegExp(String.raw`\b(?:we|i)(?:\s+will|'ll)\s+` + REMEDY, "gi");
const COMMITMENT_BARE = new RegExp(String.raw`\bwill\s+` + REMEDY, "gi");

const FIELD_LEAK_PATTERNS: readonly RegExp[] = [
  /\{\{\s*[\w.]+\s*\}\}/g,
  /\[[A-Z][A-Z0-9]*(?:_[A-Z0-9]+)+\]/g,
  /\b(?:subscription_id|customer_email|tracking_number|order_id|next_charge_date)\b/g,
];

export type AssembleInput = {
  rawReply: string;
  customerName: string;
  category: Category;
  sessionId: string;
};

export function isSystemResponse(text: string): boolean {
  const lower = text.toLowerCase();
  return SYSTEM_PHRASES.some((phrase) => lower.includes(phrase));
}

// Same session always lands on the same opener/closer.
export function stableIndex(sessionId: string, modulo: number): number {
  const hex = createHash("md5").update(sessionId, "utf8").digest("hex");
  return Number(BigInt(`0x${hex}`) % BigInt(modulo));
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function stripExistingGreeting(text: string, customerName: string): string {
  // The name must end where a word ends: "Anna" does not match "Hi Annabelle".
  const named = new RegExp(
    `^(?:Dear|Hi|Hello|Hey)\\s+${escapeRegExp(customerName)}(?![\\p{L}'-])[,!]?\\s*`,
    "iu"
  );
  const generic = /^(?:(?:Dear (?:Customer|Client)|Hi there)[,!]?|(?:Hello|Hi|Hey)[,!])\s*/i;
  return text.trim().replace(named, "").replace(generic, "").trim();
}

function keepCase(match: string, replacement: string): string {
  const first = match.charAt(0);
  if (first !== first.toUpperCase() || first === first.toLowerCase()) return replacement;
  return replacement.charAt(0).toUpperCase() + replacement.slice(1);
}

/**
 * Rewrites specific-remedy promises into a neutral review statement and masks
 * internal field names. Applying it twice gives the same text as applying it once.
 */
export function sanitizeReplyBody(body: string): string {
  let out = body.replace(COMMITMENT_WITH_SUBJECT, (match) => keepCase(match, `our team will ${NON_COMMITTAL}`));
  out = out.replace(COMMITMENT_BARE, `will ${NON_COMMITTAL}`);
  for (const pattern of FIELD_LEAK_PATTERNS) {
    out = out.replace(pattern, FIELD_LEAK_FALLBACK);
  }
  return out;
}

export function assembleResponse(input: AssembleInput): string {
  if (isSystemResponse(input.rawReply)) return input.rawReply;

  const openers = OPENERS[CATEGORY_GROUP[input.category]];
  const opener = openers[stableIndex(input.sessionId, openers.length)];
  const closer = CLOSERS[stableIndex(input.sessionId, CLOSERS.length)];
  const body = sanitizeReplyBody(stripExistingGreeting(input.rawReply, input.customerName));

  return [
    `<div>Dear ${input.customerName},</div>`,
    `<div>${opener}</div>`,
    `<div>${body}</div>`,
    `<div>${closer}</div>`,
    `<div>${SIGN_OFF}</div>`,
  ].join("\n");
}
