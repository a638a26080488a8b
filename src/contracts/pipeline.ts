import { z } from "zod";

export const CATEGORIES = [
  "shipping_or_delivery_question",
  "payment_question",
  "frequency_change_request",
  "skip_or_pause_request",
  "recipient_or_address_change",
  "customization_request",
  "damaged_or_leaking_item_report",
  "gratitude",
  "retention_primary_request",
  "retention_repeated_request",
] as const;

export const Category = z.enum(CATEGORIES);
export type Category = z.infer<typeof Category>;

// Unknown messages fall back here rather than escalating.
export const DEFAULT_CATEGORY: Category = "shipping_or_delivery_question";

// Only the safety-flag path reports this; it is never a classifier output.
export type ResultCategory = Category | "unknown";

export const Urgency = z.enum(["low", "medium", "high", "critical"]);
export type Urgency = z.infer<typeof Urgency>;

export const Confidence = z.enum(["high", "medium", "low"]);
export type Confidence = z.infer<typeof Confidence>;

export type Decision = "send" | "draft" | "escalate" | "refine";
export type TerminalDecision = Exclude<Decision, "refine">;

export const CheckSchema = z.object({
  name: z.string().min(1),
  passed: z.boolean(),
  score: z.number().min(0).max(1),
  detail: z.string().default(""),
});
export type Check = z.infer<typeof CheckSchema>;

export const ContactInfo = z.object({
  email: z.string().min(1).optional(),
  name: z.string().min(1).optional(),
});
export type ContactInfo = z.infer<typeof ContactInfo>;

export const ChatRequest = z.object({
  message: z.string().min(1).max(20_000),
  session_id: z.string().min(1).optional(),
  conversation_id: z.string().min(1).optional(),
  contact: ContactInfo.optional(),
  metadata: z
    .object({
      channel: z.string().min(1).optional(),
    })
    .passthrough()
    .optional(),
  team_mode: z.boolean().optional(),
});
export type ChatRequest = z.infer<typeof ChatRequest>;

export type PipelineInput = {
  message: string;
  sessionId?: string;
  conversationId?: string;
  contact?: ContactInfo;
  channel?: string;
  teamMode?: boolean;
};

export type PipelineMetadata = {
  processing_time_ms: number;
  model_used?: string;
  reasoning_effort?: string | null;
  is_outstanding?: boolean;
  outstanding_trigger?: string | null;
  secondary_category?: Category | null;
  urgency?: Urgency;
  customer_name?: string;
  eval_checks?: Check[];
  override_reason?: string | null;
  team_mode?: boolean;
  specialist?: string | null;
  attempts?: number;
  escalation_reason?: string;
  classifier_fallback?: string;
  error?: string;
};

export type PipelineResult = {
  response: string;
  session_id: string;
  category: ResultCategory;
  decision: TerminalDecision;
  confidence: Confidence;
  metadata: PipelineMetadata;
};
