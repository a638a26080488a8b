import type { Category, Check, Confidence, Decision } from "../contracts/pipeline";
import type { SemanticJudge } from "../control-plane/collaborators";
import { errorMessage, silentLogger, type PipelineLogger } from "../logger";
import { GATE_SAFETY, type ForbiddenPattern } from "./gate_interfaces";
import { parseJudgeOutput, type JudgeVerdict } from "./judge_output";
import {
  fastSafetyCheck,
  UNSAFE_RESPONSE_PATTERNS,
  type ResponseViolation,
} from "./response_patterns";

export type Attempt = 1 | 2;

export type EvaluationInput = {
  customerMessage: string;
  reply: string;
  category: Category;
  isOutstanding: boolean;
  toolsAvailable: string[];
  attempt?: Attempt;
  previousFeedback?: string | null;
};

export type EvaluationTier = "pattern" | "judge" | "fallback";

export type EvaluationResult = {
  decision: Decision;
  confidence: Confidence;
  checks: Check[];
  overrideReason: string | null;
  feedback: string | null;
  tier: EvaluationTier;
};

export interface ResponseEvaluator {
  evaluate(input: EvaluationInput): Promise<EvaluationResult>;
}

export const OUTSTANDING_OVERRIDE_REASON =
  "Outstanding case with non-high confidence forced to draft";

const EVAL_GATE_INSTRUCTIONS = [
  "You are the Eval Gate: the final quality check before an AI reply is sent to a customer.",
  "",
  "Evaluate the reply on four dimensions and return one check per dimension",
  "named safety, tone, accuracy and completeness, each with a score from 0.0 to 1.0.",
  "",
  "1. SAFETY (most critical):",
  "   - NEVER confirms a subscription cancellation (must point to the cancellation page)",
  "   - NEVER confirms a pause directly (must redirect or get human confirmation)",
  "   - NEVER confirms refund processing (requires human approval)",
  "   - No sensitive data exposure",
  "   - If ANY safety rule is violated the decision MUST be 'draft' or 'escalate'",
  "2. TONE: professional, empathetic and warm; not robotic, casual or dismissive.",
  "3. ACCURACY: tracking numbers, dates, amounts or account details that are neither in the customer message",
  "   nor from a listed tool are invented; score accuracy below 0.7.",
  "4. COMPLETENESS: answers the actual question and gives actionable next steps.",
  "",
  "DECISION RULES:",
  "- 'send': all checks score >= 0.7 and safety >= 0.9",
  "- 'draft': any check below 0.7 or safety below 0.9",
  "- 'escalate': critical safety violation or the customer needs a human",
  "",
  'Respond with JSON only: {"decision", "confidence": "high"|"medium"|"low", "checks": [...], "override_reason"}.',
].join("\n");

/**
 * Two-tier gate run before any unsupervised send.
 *
 * Tier 1 is a pattern scan that never calls out and always wins; tier 2 asks the
 * semantic judge. Judge failures degrade to draft/low, never to send.
 */
export class EvaluationGate implements ResponseEvaluator {
  protected readonly judge: SemanticJudge;
  protected readonly log: PipelineLogger;

  constructor(deps: { judge: SemanticJudge; log?: PipelineLogger }) {
    this.judge = deps.judge;
    this.log = deps.log ?? silentLogger;
  }

  protected get judgeName(): "eval_gate" | "qa_gate" {
    return "eval_gate";
  }

  protected get errorLabel(): string {
    return "Eval gate error";
  }

  protected patterns(): ReadonlyArray<ForbiddenPattern<ResponseViolation>> {
    return UNSAFE_RESPONSE_PATTERNS;
  }

  protected instructions(): string {
    return EVAL_GATE_INSTRUCTIONS;
  }

  protected allowedDecisions(_input: EvaluationInput): ReadonlyArray<Decision> {
    return ["send", "draft", "escalate"];
  }

  protected buildPrompt(input: EvaluationInput): string {
    const outstandingNote = input.isOutstanding
      ? "\n**OUTSTANDING CASE: be extra strict. When in doubt, 'draft'.**\n"
      : "";
    const toolsNote = input.toolsAvailable.length > 0
      ? `\nTOOLS AVAILABLE TO AGENT: ${input.toolsAvailable.join(", ")}\n` +
        "Data in the reply that matches tool output (tracking numbers, dates, subscription details, " +
        "claim IDs) should be considered accurate.\n"
      : "";
    return (
      `CATEGORY: ${input.category}\n` +
      `OUTSTANDING: ${input.isOutstanding ? "True" : "False"}${outstandingNote}\n` +
      `${toolsNote}\n` +
      `CUSTOMER MESSAGE:\n${input.customerMessage}\n\n` +
      `AI RESPONSE TO EVALUATE:\n${input.reply}`
    );
  }

  protected applyPostConditions(verdict: JudgeVerdict, input: EvaluationInput): JudgeVerdict {
    if (input.isOutstanding && verdict.decision === "send" && verdict.confidence !== "high") {
      return { ...verdict, decision: "draft", overrideReason: OUTSTANDING_OVERRIDE_REASON };
    }
    return verdict;
  }

  async evaluate(input: EvaluationInput): Promise<EvaluationResult> {
    const scan = fastSafetyCheck(input.reply, this.patterns());
    if (!scan.ok) {
      this.log.warn(
        { evt: `${this.judgeName}.fast_fail`, violation: scan.violation, category: input.category },
        `${this.judgeName}.fast_fail`
      );
      return {
        decision: "draft",
        confidence: "high",
        checks: [
          {
            name: GATE_SAFETY,
            passed: false,
            score: 0,
            detail: `Regex safety violation: ${scan.violation}`,
          },
        ],
        overrideReason: `Fast-fail regex: ${scan.violation}`,
        feedback: null,
        tier: "pattern",
      };
    }

    let raw: string;
    try {
      raw = await this.judge.judge({
        judgeName: this.judgeName,
        instructions: this.instructions(),
        prompt: this.buildPrompt(input),
      });
    } catch (error) {
      const message = errorMessage(error);
      this.log.error({ evt: `${this.judgeName}.failed`, error: message }, `${this.judgeName}.failed`);
      return fallbackResult(`${this.errorLabel}: ${message}`);
    }

    const parsed = parseJudgeOutput(raw, { allowedDecisions: this.allowedDecisions(input) });
    if (!parsed.ok) {
      this.log.warn(
        {
          evt: `${this.judgeName}.unexpected_output`,
          reason: parsed.reason,
          issues: parsed.issues.slice(0, 3),
          rawLength: raw.length,
        },
        `${this.judgeName}.unexpected_output`
      );
      return fallbackResult("Parse error");
    }

    const verdict = this.applyPostConditions(parsed.verdict, input);
    this.log.info(
      {
        evt: `${this.judgeName}.complete`,
        decision: verdict.decision,
        confidence: verdict.confidence,
        attempt: input.attempt ?? 1,
        checksPassed: verdict.checks.filter((check) => check.passed).length,
        checksTotal: verdict.checks.length,
      },
      `${this.judgeName}.complete`
    );

    return {
      decision: verdict.decision,
      confidence: verdict.confidence,
      checks: verdict.checks,
      overrideReason: verdict.overrideReason,
      feedback: verdict.feedback,
      tier: "judge",
    };
  }
}

function fallbackResult(overrideReason: string): EvaluationResult {
  return {
    decision: "draft",
    confidence: "low",
    checks: [],
    overrideReason,
    feedback: null,
    tier: "fallback",
  };
}
