import type { Category } from "../contracts/pipeline";
import type {
  Classifier,
  GenerationRequest,
  JudgeRequest,
  ModelChoice,
  NameExtractor,
  OutstandingDetector,
  OutstandingResult,
  RawClassification,
  ReplyGenerator,
  SemanticJudge,
} from "../control-plane/collaborators";
import { cleanName, DEFAULT_CUSTOMER_NAME, firstNameFromContact } from "./customer_name";

export const FAKE_MODEL = "fake";

// First match wins, so the more specific intents come first.
const KEYWORD_CATEGORIES: Array<{ pattern: RegExp; category: Category }> = [
  { pattern: /\b(cancel|unsubscribe|stop my subscription)\b/i, category: "retention_primary_request" },
  { pattern: /\b(damaged|broken|leak(?:ing|ed)?|crushed)\b/i, category: "damaged_or_leaking_item_report" },
  { pattern: /\b(skip|pause)\b/i, category: "skip_or_pause_request" },
  { pattern: /\b(every (?:two|three|other) months?|frequency)\b/i, category: "frequency_change_request" },
  { pattern: /\b(address|recipient|moved)\b/i, category: "recipient_or_address_change" },
  { pattern: /\b(charge[ds]?|payment|billing|invoice|card)\b/i, category: "payment_question" },
  { pattern: /\b(allerg\w*|customi[sz]e|prefer(?:ence)?s?)\b/i, category: "customization_request" },
  { pattern: /\b(thank you|thanks|love (?:it|the box))\b/i, category: "gratitude" },
];

const EMAIL = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/;

const CANNED_REPLIES: Record<Category, string> = {
  shipping_or_delivery_question:
    "Your box is on its way. You can follow it with the tracking link in your shipping confirmation email.",
  payment_question: "I've passed your billing question to our team and they will review the charge with you.",
  frequency_change_request: "I can help with that. Our team will review the new delivery frequency you asked for.",
  skip_or_pause_request: "I've noted your request and our team will review it before your next charge.",
  recipient_or_address_change: "Thanks for the new details. Our team will review the address change before the next shipment.",
  customization_request: "Thanks for sharing your preferences. Our team will review what we can adjust for your next box.",
  damaged_or_leaking_item_report:
    "I'm sorry your item arrived damaged. Could you send us a photo of the item and the packaging?",
  gratitude: "It means a lot to hear that. We're so glad you're enjoying your boxes!",
  retention_primary_request:
    "You can manage your subscription on the cancellation page. If a pause or a different frequency would suit you better, just let us know.",
  retention_repeated_request:
    "You can complete your request on the cancellation page at any time.",
};

/** Keyword classifier used when no model provider is configured. */
export class FakeClassifier implements Classifier {
  async classify(message: string): Promise<RawClassification> {
    const hit = KEYWORD_CATEGORIES.find(({ pattern }) => pattern.test(message));
    const email = message.match(EMAIL);
    return {
      primary: hit ? hit.category : "shipping_or_delivery_question",
      secondary: null,
      urgency: /\b(urgent|asap|immediately)\b/i.test(message) ? "high" : "medium",
      email: email ? email[0] : null,
    };
  }
}

export class FakeNameExtractor implements NameExtractor {
  async extract(message: string, knownName?: string | null): Promise<string> {
    const fromContact = firstNameFromContact(knownName);
    if (fromContact) return fromContact;

    const intro = message.match(/\b(?:my name is|this is)\s+([A-Za-zÀ-ÿ'-]+)/i);
    if (intro) return cleanName(intro[1]) ?? DEFAULT_CUSTOMER_NAME;

    const lines = message.trim().split(/\n+/);
    const lastLine = lines[lines.length - 1].trim();
    const signature = lastLine.match(/^(?:best|thanks|regards|cheers)?,?\s*([A-Za-zÀ-ÿ'-]+)$/i);
    if (lines.length > 1 && signature) return cleanName(signature[1]) ?? DEFAULT_CUSTOMER_NAME;

    return DEFAULT_CUSTOMER_NAME;
  }
}

export class FakeOutstandingDetector implements OutstandingDetector {
  async detect(message: string, _category: Category): Promise<OutstandingResult> {
    if (/\b(third time|again and again|still (?:have not|haven't)|no one (?:has )?replied)\b/i.test(message)) {
      return { isOutstanding: true, trigger: "repeated_unresolved_contact", confidence: "high" };
    }
    return { isOutstanding: false, trigger: "none", confidence: "high" };
  }
}

export class FakeReplyGenerator implements ReplyGenerator {
  modelFor(_category: Category, _teamMode: boolean): ModelChoice {
    return { model: FAKE_MODEL, reasoningEffort: null };
  }

  toolsFor(_category: Category): string[] {
    return [];
  }

  async generate(request: GenerationRequest): Promise<string> {
    return CANNED_REPLIES[request.category];
  }
}

/** Approves every reply; the pattern tier still runs in front of it. */
export class FakeSemanticJudge implements SemanticJudge {
  async judge(_request: JudgeRequest): Promise<string> {
    return JSON.stringify({
      decision: "send",
      confidence: "high",
      checks: ["safety", "tone", "accuracy", "completeness"].map((name) => ({
        name,
        passed: true,
        score: 1,
        detail: "",
      })),
      feedback: null,
      override_reason: null,
    });
  }
}
