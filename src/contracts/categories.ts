import type { Category } from "./pipeline";

export type SpecialistKey = "billing" | "shipping" | "retention" | "quality";

export type CategoryConfig = {
  model: string;
  reasoningEffort: "low" | "medium" | "high" | null;
  // 1 = auto-send allowed today; higher phases stay in review.
  autoSendPhase: number;
  specialist: SpecialistKey;
};

export const CATEGORY_CONFIG: Record<Category, CategoryConfig> = {
  shipping_or_delivery_question: {
    model: "gpt-5.1",
    reasoningEffort: null,
    autoSendPhase: 2,
    specialist: "shipping",
  },
  payment_question: {
    model: "gpt-5.1",
    reasoningEffort: "medium",
    autoSendPhase: 3,
    specialist: "billing",
  },
  frequency_change_request: {
    model: "gpt-5.1",
    reasoningEffort: null,
    autoSendPhase: 2,
    specialist: "billing",
  },
  skip_or_pause_request: {
    model: "gpt-5.1",
    reasoningEffort: null,
    autoSendPhase: 2,
    specialist: "billing",
  },
  recipient_or_address_change: {
    model: "gpt-5.1",
    reasoningEffort: null,
    autoSendPhase: 2,
    specialist: "shipping",
  },
  customization_request: {
    model: "gpt-5.1",
    reasoningEffort: null,
    autoSendPhase: 2,
    specialist: "quality",
  },
  damaged_or_leaking_item_report: {
    model: "gpt-5.1",
    reasoningEffort: null,
    autoSendPhase: 3,
    specialist: "quality",
  },
  gratitude: {
    model: "gpt-5.1",
    reasoningEffort: null,
    autoSendPhase: 1,
    specialist: "quality",
  },
  retention_primary_request: {
    model: "gpt-5.1",
    reasoningEffort: "medium",
    autoSendPhase: 4,
    specialist: "retention",
  },
  retention_repeated_request: {
    model: "gpt-5.1",
    reasoningEffort: "medium",
    autoSendPhase: 4,
    specialist: "retention",
  },
};

export const RETENTION_CATEGORIES = new Set<Category>([
  "retention_primary_request",
  "retention_repeated_request",
]);

export const SPECIALIST_ROLES: Record<SpecialistKey, string> = {
  billing:
    "You are the Billing Specialist. You handle payments, subscription frequency changes, skips and pauses.",
  shipping:
    "You are the Shipping Specialist. You handle delivery tracking, address changes and box contents questions.",
  retention:
    "You are the Retention Specialist. Understand why the customer wants to cancel and offer alternatives " +
    "(pause, skip, frequency change) while respecting their right to cancel through the self-service page. " +
    "Never confirm a cancellation yourself; point to the cancellation link.",
  quality:
    "You are the Quality Specialist. You handle damage reports, customization requests and appreciation messages. " +
    "Collect evidence for damage claims but never promise a replacement, credit or refund without human approval.",
};
