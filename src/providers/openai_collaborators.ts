import { z } from "zod";

import { CATEGORY_CONFIG, SPECIALIST_ROLES } from "../contracts/categories";
import { CATEGORIES, Confidence, type Category } from "../contracts/pipeline";
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
import { silentLogger, type PipelineLogger } from "../logger";
import { cleanName, DEFAULT_CUSTOMER_NAME, firstNameFromContact } from "./customer_name";
import { openAIResponse, ProviderError, type JsonSchema, type OpenAITransport } from "./openai_model";
import { selectModel, type ModelOverrides, type ModelRole } from "./provider_config";

export type OpenAICollaboratorOptions = {
  transport: OpenAITransport;
  overrides?: ModelOverrides;
  log?: PipelineLogger;
};

const CLASSIFIER_INSTRUCTIONS = [
  "Classify the customer support message into exactly one primary category and optionally one secondary category.",
  `Categories: ${CATEGORIES.join(", ")}.`,
  "Urgency is one of low, medium, high, critical.",
  "If the message contains the customer's email address, return it in 'email'; otherwise null.",
].join("\n");

const NAME_INSTRUCTIONS = [
  "Extract the customer's FIRST NAME from the message.",
  "Look for a signature ('Best, Sarah'), a self-introduction ('My name is David') or a sign-off ('Regards, Michael').",
  `If no name is found, return '${DEFAULT_CUSTOMER_NAME}'. Return only the first name.`,
].join("\n");

const OUTSTANDING_INSTRUCTIONS = [
  "Decide whether this customer request is an OUTSTANDING case that needs special handling or human review:",
  "repeated unresolved complaints, threats to leave after a bad experience, high-value damage, or anything unusual.",
  "Return is_outstanding, a short snake_case trigger ('none' when not outstanding) and your confidence.",
].join("\n");

const SUPPORT_RULES = [
  "You write replies for a subscription box customer support team.",
  "Write only the body of the reply: no greeting line and no sign-off.",
  "NEVER confirm a subscription cancellation; always point the customer to the self-service cancellation page.",
  "NEVER confirm a pause or a refund; say the team will review the request.",
  "NEVER promise a replacement, reshipment or store credit; damage claims need human approval.",
  "Never include internal field names or template placeholders.",
  "You cannot look up orders, tracking, payments or account details. Never state a tracking number, delivery date,",
  "amount or account detail the customer did not give you; say the team will check and follow up instead.",
].join("\n");

const ClassifierOutput = z.object({
  primary: z.string(),
  secondary: z.string().nullable(),
  urgency: z.string().nullable(),
  email: z.string().nullable(),
});

const NameOutput = z.object({ first_name: z.string() });

const OutstandingOutput = z.object({
  is_outstanding: z.boolean(),
  trigger: z.string(),
  confidence: Confidence,
});

const CLASSIFIER_SCHEMA: JsonSchema = {
  type: "object",
  required: ["primary", "secondary", "urgency", "email"],
  properties: {
    primary: { type: "string", enum: [...CATEGORIES] },
    secondary: { type: ["string", "null"], enum: [...CATEGORIES, null] },
    urgency: { type: ["string", "null"], enum: ["low", "medium", "high", "critical", null] },
    email: { type: ["string", "null"] },
  },
};

const NAME_SCHEMA: JsonSchema = {
  type: "object",
  required: ["first_name"],
  properties: { first_name: { type: "string" } },
};

const OUTSTANDING_SCHEMA: JsonSchema = {
  type: "object",
  required: ["is_outstanding", "trigger", "confidence"],
  properties: {
    is_outstanding: { type: "boolean" },
    trigger: { type: "string" },
    confidence: { type: "string", enum: ["high", "medium", "low"] },
  },
};

const JUDGE_SCHEMA: JsonSchema = {
  type: "object",
  required: ["decision", "confidence", "checks", "feedback", "override_reason"],
  properties: {
    decision: { type: "string", enum: ["send", "draft", "escalate", "refine"] },
    confidence: { type: "string", enum: ["high", "medium", "low"] },
    checks: {
      type: "array",
      items: {
        type: "object",
        required: ["name", "passed", "score", "detail"],
        properties: {
          name: { type: "string" },
          passed: { type: "boolean" },
          score: { type: "number" },
          detail: { type: "string" },
        },
      },
    },
    feedback: { type: ["string", "null"] },
    override_reason: { type: ["string", "null"] },
  },
};

function parseStructured<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): T {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ProviderError(`${label}: output is not JSON`, { statusCode: 502, retryable: true });
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new ProviderError(`${label}: output failed validation`, { statusCode: 502, retryable: true });
  }
  return parsed.data;
}

abstract class OpenAICollaborator {
  protected readonly transport: OpenAITransport;
  protected readonly overrides: ModelOverrides;
  protected readonly log: PipelineLogger;

  constructor(opts: OpenAICollaboratorOptions) {
    this.transport = opts.log ? { ...opts.transport, log: opts.log } : opts.transport;
    this.overrides = opts.overrides ?? {};
    this.log = opts.log ?? silentLogger;
  }

  protected model(role: ModelRole, category?: Category): ModelChoice {
    const selection = selectModel({ role, category, overrides: this.overrides });
    return { model: selection.model, reasoningEffort: selection.reasoningEffort };
  }
}

export class OpenAIClassifier extends OpenAICollaborator implements Classifier {
  async classify(message: string): Promise<RawClassification> {
    const raw = await openAIResponse(this.transport, {
      model: this.model("classifier").model,
      instructions: CLASSIFIER_INSTRUCTIONS,
      input: message,
      schema: { name: "classification", schema: CLASSIFIER_SCHEMA },
    });
    const out = parseStructured(raw, ClassifierOutput, "classifier");
    this.log.info({ evt: "classifier.complete", primary: out.primary, urgency: out.urgency }, "classifier.complete");
    return out;
  }
}

export class OpenAINameExtractor extends OpenAICollaborator implements NameExtractor {
  async extract(message: string, knownName?: string | null): Promise<string> {
    const fromContact = firstNameFromContact(knownName);
    if (fromContact) return fromContact;

    const raw = await openAIResponse(this.transport, {
      model: this.model("name_extractor").model,
      instructions: NAME_INSTRUCTIONS,
      input: message,
      schema: { name: "customer_name", schema: NAME_SCHEMA },
    });
    const name = cleanName(parseStructured(raw, NameOutput, "name_extractor").first_name);
    return name ?? DEFAULT_CUSTOMER_NAME;
  }
}

export class OpenAIOutstandingDetector extends OpenAICollaborator implements OutstandingDetector {
  async detect(message: string, category: Category): Promise<OutstandingResult> {
    const raw = await openAIResponse(this.transport, {
      model: this.model("outstanding").model,
      instructions: OUTSTANDING_INSTRUCTIONS,
      input: `CATEGORY: ${category}\n\nCUSTOMER MESSAGE:\n${message}`,
      schema: { name: "outstanding", schema: OUTSTANDING_SCHEMA },
    });
    const out = parseStructured(raw, OutstandingOutput, "outstanding");
    return { isOutstanding: out.is_outstanding, trigger: out.trigger, confidence: out.confidence };
  }
}

export class OpenAIReplyGenerator extends OpenAICollaborator implements ReplyGenerator {
  modelFor(category: Category, _teamMode: boolean): ModelChoice {
    return this.model("generator", category);
  }

  // TODO: expose get_subscription as a function tool backed by SupportStore.profile.
  toolsFor(_category: Category): string[] {
    return [];
  }

  async generate(request: GenerationRequest): Promise<string> {
    const config = CATEGORY_CONFIG[request.category];
    const choice = this.modelFor(request.category, request.teamMode);
    const role = request.teamMode ? `${SPECIALIST_ROLES[config.specialist]}\n\n` : "";

    return openAIResponse(this.transport, {
      model: choice.model,
      reasoningEffort: choice.reasoningEffort,
      instructions: `${role}${SUPPORT_RULES}\n\nCATEGORY: ${request.category}`,
      input: request.input,
    });
  }
}

export class OpenAISemanticJudge extends OpenAICollaborator implements SemanticJudge {
  async judge(request: JudgeRequest): Promise<string> {
    return openAIResponse(this.transport, {
      model: this.model("judge").model,
      instructions: request.instructions,
      input: request.prompt,
      schema: { name: request.judgeName, schema: JUDGE_SCHEMA },
    });
  }
}
