import { randomUUID } from "node:crypto";

import { CATEGORY_CONFIG, RETENTION_CATEGORIES } from "../contracts/categories";
import {
  CATEGORIES,
  DEFAULT_CATEGORY,
  Urgency,
  type Category,
  type Confidence,
  type ContactInfo,
  type Decision,
  type PipelineInput,
  type PipelineMetadata,
  type PipelineResult,
  type TerminalDecision,
} from "../contracts/pipeline";
import { EvaluationGate, type Attempt, type EvaluationResult, type ResponseEvaluator } from "../gates/eval_gate";
import { QAEvaluationGate } from "../gates/qa_gate";
import { checkRedLines } from "../gates/red_lines";
import { errorMessage, silentLogger, type PipelineLogger } from "../logger";
import { injectCancelLink } from "./cancel_link";
import type {
  Classification,
  Classifier,
  ContextProvider,
  HistoryTurn,
  LinkGenerator,
  NameExtractor,
  OutstandingDetector,
  OutstandingResult,
  PersistenceStore,
  ReplyGenerator,
  SemanticJudge,
} from "./collaborators";
import { appendQaFeedback, buildGenerationInput } from "./generation_input";
import { assembleResponse } from "./response_assembler";

export const SAFETY_DEFLECTION_REPLY = "I'm connecting you with a support agent who can better assist you.";
export const GENERATION_FAILURE_REPLY =
  "I apologize, but I'm having trouble processing your request. Let me connect you with a support agent.";
export const UNKNOWN_CUSTOMER_NAME = "Client";
export const DEFAULT_CHANNEL = "widget";

export type OrchestratorDeps = {
  classifier: Classifier;
  nameExtractor: NameExtractor;
  context: ContextProvider;
  generator: ReplyGenerator;
  outstanding: OutstandingDetector;
  links: LinkGenerator;
  judge: SemanticJudge;
  store: PersistenceStore;
  log?: PipelineLogger;
  // Gates default to ones built on `judge`.
  evalGate?: ResponseEvaluator;
  qaGate?: ResponseEvaluator;
  teamModeDefault?: boolean;
  historyMaxTurns?: number;
  historyTurnMaxChars?: number;
  now?: () => number;
  newSessionId?: () => string;
  newTurnId?: () => string;
};

type ClassifiedMessage = Classification & { fallback: string | null };

type RequestContext = {
  message: string;
  sessionId: string;
  conversationId: string | null;
  channel: string;
  contact: ContactInfo | null;
  teamMode: boolean;
  startedAt: number;
  classification: ClassifiedMessage;
  customerName: string;
  customerEmail: string | null;
  generationInput: string;
  reply: string;
  outstanding: OutstandingResult;
  evaluation: EvaluationResult;
  attempt: Attempt;
};

type AttemptBase = Omit<RequestContext, "generationInput" | "reply" | "outstanding" | "evaluation" | "attempt">;

type AttemptOutcome = { ok: true; ctx: RequestContext } | { ok: false; result: PipelineResult };

type GenerationOutcome =
  | { ok: true; reply: string; outstanding: OutstandingResult }
  | { ok: false; error: string };

function defaultSessionId(): string {
  return `sess_${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}

function isCategory(value: unknown): value is Category {
  return typeof value === "string" && CATEGORIES.some((category) => category === value);
}

// `refine` never leaves the orchestrator.
function toTerminal(decision: Decision): TerminalDecision {
  return decision === "refine" ? "draft" : decision;
}

/**
 * Runs one inbound customer message through safety, classification, generation,
 * assembly, evaluation and persistence, and returns exactly one terminal decision.
 * `process` never rejects.
 */
export class PipelineOrchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly log: PipelineLogger;
  private readonly evalGate: ResponseEvaluator;
  private readonly qaGate: ResponseEvaluator;
  private readonly now: () => number;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.log = deps.log ?? silentLogger;
    this.evalGate = deps.evalGate ?? new EvaluationGate({ judge: deps.judge, log: this.log });
    this.qaGate = deps.qaGate ?? new QAEvaluationGate({ judge: deps.judge, log: this.log });
    this.now = deps.now ?? Date.now;
  }

  async process(input: PipelineInput): Promise<PipelineResult> {
    const startedAt = this.now();
    const sessionId = input.sessionId ?? (this.deps.newSessionId ?? defaultSessionId)();
    const teamMode = input.teamMode ?? this.deps.teamModeDefault ?? false;

    this.log.info({ evt: "pipeline.start", sessionId, teamMode }, "pipeline.start");

    try {
      return await this.run(input, sessionId, teamMode, startedAt);
    } catch (error) {
      const message = errorMessage(error);
      this.log.error({ evt: "pipeline.failed", sessionId, error: message }, "pipeline.failed");
      return {
        response: GENERATION_FAILURE_REPLY,
        session_id: sessionId,
        category: "unknown",
        decision: "escalate",
        confidence: "low",
        metadata: { processing_time_ms: this.now() - startedAt, error: message },
      };
    }
  }

  private async run(
    input: PipelineInput,
    sessionId: string,
    teamMode: boolean,
    startedAt: number
  ): Promise<PipelineResult> {
    // Stage 1: red lines. Nothing else runs for a flagged message.
    const redLine = checkRedLines(input.message);
    if (redLine.isFlagged) {
      this.log.warn({ evt: "pipeline.red_line", sessionId, trigger: redLine.trigger }, "pipeline.red_line");
      return {
        response: SAFETY_DEFLECTION_REPLY,
        session_id: sessionId,
        category: "unknown",
        decision: "escalate",
        confidence: "high",
        metadata: {
          escalation_reason: redLine.trigger,
          processing_time_ms: this.now() - startedAt,
        },
      };
    }

    // Stage 2: both branches resolve; failures become defaults.
    const [classification, customerName] = await Promise.all([
      this.classify(input.message, sessionId),
      this.extractName(input.message, input.contact?.name ?? null, sessionId),
    ]);

    // Stage 3
    const customerEmail = input.contact?.email ?? classification.email;
    const history = await this.loadHistory(sessionId);
    const generationInput = buildGenerationInput({
      customerName,
      customerEmail,
      history,
      message: input.message,
      maxTurns: this.deps.historyMaxTurns,
      maxTurnChars: this.deps.historyTurnMaxChars,
    });

    const partial: AttemptBase = {
      message: input.message,
      sessionId,
      conversationId: input.conversationId ?? null,
      channel: input.channel ?? DEFAULT_CHANNEL,
      contact: input.contact ?? null,
      teamMode,
      startedAt,
      classification,
      customerName,
      customerEmail,
    };

    // Stages 4-6. Team mode may retry once with the QA feedback appended.
    let outcome = await this.attempt(partial, generationInput, 1, null);
    if (outcome.ok && teamMode && outcome.ctx.evaluation.decision === "refine") {
      const feedback = outcome.ctx.evaluation.feedback;
      this.log.info({ evt: "pipeline.qa_retry", sessionId, feedback }, "pipeline.qa_retry");
      outcome = await this.attempt(partial, appendQaFeedback(generationInput, feedback), 2, feedback);
    }
    if (!outcome.ok) return outcome.result;
    const { ctx } = outcome;

    const decision = toTerminal(ctx.evaluation.decision);
    if (decision !== "send") {
      this.log.warn(
        {
          evt: "pipeline.not_sent",
          sessionId,
          decision,
          confidence: ctx.evaluation.confidence,
          overrideReason: ctx.evaluation.overrideReason,
          attempt: ctx.attempt,
        },
        "pipeline.not_sent"
      );
    }

    const processingTimeMs = this.now() - startedAt;
    const result = this.buildResult(ctx, decision, processingTimeMs);

    // Stage 7
    await this.persist(ctx, decision, processingTimeMs);

    this.log.info(
      { evt: "pipeline.complete", sessionId, category: result.category, decision, processingTimeMs },
      "pipeline.complete"
    );
    return result;
  }

  private async attempt(
    partial: AttemptBase,
    generationInput: string,
    attempt: Attempt,
    previousFeedback: string | null
  ): Promise<AttemptOutcome> {
    const { classification, customerEmail, customerName, sessionId, teamMode, message } = partial;
    const category = classification.primary;

    const generated = await this.generate(generationInput, category, customerEmail, teamMode, message);
    if (!generated.ok) {
      this.log.error(
        { evt: "pipeline.generation_failed", sessionId, category, attempt, error: generated.error },
        "pipeline.generation_failed"
      );
      return {
        ok: false,
        result: {
          response: GENERATION_FAILURE_REPLY,
          session_id: sessionId,
          category,
          decision: "escalate",
          confidence: "low",
          metadata: { processing_time_ms: this.now() - partial.startedAt, error: generated.error },
        },
      };
    }

    const reply = await this.postProcess(generated.reply, category, customerEmail, customerName, sessionId);
    const gate = teamMode ? this.qaGate : this.evalGate;
    const evaluation = await gate.evaluate({
      customerMessage: message,
      reply,
      category,
      isOutstanding: generated.outstanding.isOutstanding,
      toolsAvailable: this.deps.generator.toolsFor(category),
      attempt,
      previousFeedback,
    });

    return {
      ok: true,
      ctx: { ...partial, generationInput, reply, outstanding: generated.outstanding, evaluation, attempt },
    };
  }

  private async classify(message: string, sessionId: string): Promise<ClassifiedMessage> {
    try {
      const raw = await this.deps.classifier.classify(message);
      const primaryKnown = isCategory(raw.primary);
      if (!primaryKnown) {
        this.log.warn(
          { evt: "pipeline.classifier_out_of_range", sessionId, primary: raw.primary },
          "pipeline.classifier_out_of_range"
        );
      }
      const primary: Category = isCategory(raw.primary) ? raw.primary : DEFAULT_CATEGORY;
      const secondary = isCategory(raw.secondary) && raw.secondary !== primary ? raw.secondary : null;
      const urgency = Urgency.safeParse(raw.urgency);
      return {
        primary,
        secondary,
        urgency: urgency.success ? urgency.data : "medium",
        email: raw.email ? raw.email : null,
        fallback: primaryKnown ? null : "out_of_range",
      };
    } catch (error) {
      this.log.error({ evt: "pipeline.classifier_failed", sessionId, error: errorMessage(error) }, "pipeline.classifier_failed");
      return { primary: DEFAULT_CATEGORY, secondary: null, urgency: "medium", email: null, fallback: "classifier_error" };
    }
  }

  private async extractName(message: string, knownName: string | null, sessionId: string): Promise<string> {
    try {
      const name = (await this.deps.nameExtractor.extract(message, knownName)).trim();
      return name || UNKNOWN_CUSTOMER_NAME;
    } catch (error) {
      this.log.warn({ evt: "pipeline.name_extract_failed", sessionId, error: errorMessage(error) }, "pipeline.name_extract_failed");
      return UNKNOWN_CUSTOMER_NAME;
    }
  }

  private async loadHistory(sessionId: string): Promise<HistoryTurn[]> {
    try {
      return await this.deps.context.history(sessionId);
    } catch (error) {
      this.log.warn({ evt: "pipeline.history_failed", sessionId, error: errorMessage(error) }, "pipeline.history_failed");
      return [];
    }
  }

  private async detectOutstanding(message: string, category: Category): Promise<OutstandingResult> {
    try {
      return await this.deps.outstanding.detect(message, category);
    } catch (error) {
      this.log.warn({ evt: "pipeline.outstanding_failed", error: errorMessage(error) }, "pipeline.outstanding_failed");
      return { isOutstanding: false, trigger: "detection_error", confidence: "low" };
    }
  }

  private async generate(
    generationInput: string,
    category: Category,
    email: string | null,
    teamMode: boolean,
    message: string
  ): Promise<GenerationOutcome> {
    try {
      const [reply, outstanding] = await Promise.all([
        this.deps.generator.generate({ category, email, input: generationInput, teamMode }),
        this.detectOutstanding(message, category),
      ]);
      return { ok: true, reply, outstanding };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }

  private async postProcess(
    rawReply: string,
    category: Category,
    email: string | null,
    customerName: string,
    sessionId: string
  ): Promise<string> {
    let reply = rawReply;
    if (RETENTION_CATEGORIES.has(category) && email) {
      const url = await this.cancelLinkFor(email, sessionId);
      if (url) reply = injectCancelLink(reply, url);
    }
    return assembleResponse({ rawReply: reply, customerName, category, sessionId });
  }

  private async cancelLinkFor(email: string, sessionId: string): Promise<string | null> {
    let subscriptionRef = "pending";
    try {
      const profile = await this.deps.context.profile(email);
      if (profile?.subscriptionId) subscriptionRef = profile.subscriptionId;
    } catch (error) {
      this.log.warn({ evt: "pipeline.profile_failed", sessionId, error: errorMessage(error) }, "pipeline.profile_failed");
    }

    try {
      return await this.deps.links.cancelLink(subscriptionRef, email);
    } catch (error) {
      this.log.error({ evt: "pipeline.cancel_link_failed", sessionId, error: errorMessage(error) }, "pipeline.cancel_link_failed");
      return null;
    }
  }

  private buildResult(ctx: RequestContext, decision: TerminalDecision, processingTimeMs: number): PipelineResult {
    const category = ctx.classification.primary;
    const choice = this.deps.generator.modelFor(category, ctx.teamMode);
    const confidence: Confidence = ctx.evaluation.confidence;

    const metadata: PipelineMetadata = {
      processing_time_ms: processingTimeMs,
      model_used: choice.model,
      reasoning_effort: choice.reasoningEffort,
      is_outstanding: ctx.outstanding.isOutstanding,
      outstanding_trigger: ctx.outstanding.trigger,
      secondary_category: ctx.classification.secondary,
      urgency: ctx.classification.urgency,
      customer_name: ctx.customerName,
      eval_checks: ctx.evaluation.checks,
      override_reason: ctx.evaluation.overrideReason,
    };
    if (ctx.teamMode) {
      metadata.team_mode = true;
      metadata.specialist = CATEGORY_CONFIG[category].specialist;
      metadata.attempts = ctx.attempt;
    }
    if (ctx.classification.fallback) {
      metadata.classifier_fallback = ctx.classification.fallback;
    }

    return {
      response: ctx.reply,
      session_id: ctx.sessionId,
      category,
      decision,
      confidence,
      metadata,
    };
  }

  private async persist(ctx: RequestContext, decision: TerminalDecision, processingTimeMs: number): Promise<void> {
    const { store } = this.deps;
    const category = ctx.classification.primary;
    const config = CATEGORY_CONFIG[category];
    const choice = this.deps.generator.modelFor(category, ctx.teamMode);
    const turnId = (this.deps.newTurnId ?? randomUUID)();

    // Every other row references the session.
    try {
      await store.saveSession({
        sessionId: ctx.sessionId,
        conversationId: ctx.conversationId,
        channel: ctx.channel,
        customerEmail: ctx.customerEmail,
        customerName: ctx.customerName,
        primaryCategory: category,
        secondaryCategory: ctx.classification.secondary,
        urgency: ctx.classification.urgency,
        status: "active",
        evalDecision: decision,
        firstResponseTimeMs: processingTimeMs,
      });
    } catch (error) {
      this.log.error(
        { evt: "pipeline.persist_failed", sessionId: ctx.sessionId, write: "session", error: errorMessage(error) },
        "pipeline.persist_failed"
      );
    }

    const writes: Array<{ name: string; run: () => Promise<void> }> = [
      {
        name: "outstanding",
        run: () =>
          store.updateOutstanding({
            sessionId: ctx.sessionId,
            isOutstanding: ctx.outstanding.isOutstanding,
            outstandingTrigger: ctx.outstanding.trigger,
            evalDecision: decision,
          }),
      },
      {
        name: "user_message",
        run: () =>
          store.saveMessage({
            sessionId: ctx.sessionId,
            turnId,
            role: "user",
            content: ctx.message,
            modelUsed: null,
            reasoningEffort: null,
            processingTimeMs: null,
          }),
      },
      {
        name: "assistant_message",
        run: () =>
          store.saveMessage({
            sessionId: ctx.sessionId,
            turnId,
            role: "assistant",
            content: ctx.reply,
            modelUsed: choice.model,
            reasoningEffort: choice.reasoningEffort,
            processingTimeMs,
          }),
      },
      {
        name: "eval_result",
        run: () =>
          store.saveEvalResult({
            sessionId: ctx.sessionId,
            turnId,
            category,
            secondaryCategory: ctx.classification.secondary,
            decision,
            overrideReason: ctx.evaluation.overrideReason,
            confidence: ctx.evaluation.confidence,
            checks: ctx.evaluation.checks,
            isOutstanding: ctx.outstanding.isOutstanding,
            outstandingTrigger: ctx.outstanding.trigger,
            autoSendEnabled: config.autoSendPhase === 1,
            attempts: ctx.attempt,
          }),
      },
    ];

    const settled = await Promise.allSettled(writes.map(async (write) => write.run()));
    settled.forEach((outcome, index) => {
      if (outcome.status === "rejected") {
        this.log.error(
          {
            evt: "pipeline.persist_failed",
            sessionId: ctx.sessionId,
            write: writes[index].name,
            error: errorMessage(outcome.reason),
          },
          "pipeline.persist_failed"
        );
      }
    });
  }
}
