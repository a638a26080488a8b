import type { Decision } from "../contracts/pipeline";
import { EvaluationGate, type EvaluationInput } from "./eval_gate";
import type { ForbiddenPattern } from "./gate_interfaces";
import type { JudgeVerdict } from "./judge_output";
import { QA_UNSAFE_RESPONSE_PATTERNS, type ResponseViolation } from "./response_patterns";

export const REFINE_ON_RETRY_OVERRIDE_REASON = "Refine not allowed on retry — forced to draft";

const QA_GATE_INSTRUCTIONS = [
  "You are the QA Agent reviewing a specialist's reply before it reaches the customer.",
  "",
  "Return one check per dimension (safety, tone, accuracy, completeness), each scored 0.0 to 1.0.",
  "",
  "SAFETY RULES:",
  "- Never confirm a cancellation, pause or refund; those need the self-service page or a human.",
  "- Never promise a replacement, reshipment or store credit; damage claims need human approval.",
  "- No internal field names, placeholders or sensitive data in the reply.",
  "",
  "DECISIONS:",
  "- 'send': safe, accurate and complete; safety >= 0.9 and every other check >= 0.7",
  "- 'refine': fixable problems in tone, accuracy or completeness; put concrete instructions in 'feedback'",
  "- 'draft': needs a human to review before sending",
  "- 'escalate': critical safety issue or the customer needs a human now",
  "",
  "'refine' is only valid on the first attempt. On a retry decide between send, draft and escalate.",
  "",
  'Respond with JSON only: {"decision", "confidence", "checks": [...], "feedback", "override_reason"}.',
].join("\n");

/**
 * Team-mode gate. Adds damage-resolution phrasings to the pattern tier and lets the
 * judge ask for one revision with feedback.
 */
export class QAEvaluationGate extends EvaluationGate {
  protected override get judgeName(): "eval_gate" | "qa_gate" {
    return "qa_gate";
  }

  protected override get errorLabel(): string {
    return "QA agent error";
  }

  protected override patterns(): ReadonlyArray<ForbiddenPattern<ResponseViolation>> {
    return QA_UNSAFE_RESPONSE_PATTERNS;
  }

  protected override instructions(): string {
    return QA_GATE_INSTRUCTIONS;
  }

  // A refine on attempt 2 still parses; the post-condition below turns it into a draft.
  protected override allowedDecisions(_input: EvaluationInput): ReadonlyArray<Decision> {
    return ["send", "draft", "escalate", "refine"];
  }

  protected override buildPrompt(input: EvaluationInput): string {
    const attempt = input.attempt ?? 1;
    let prompt = super.buildPrompt(input) + `\n\nATTEMPT: ${attempt} of 2`;
    if (attempt > 1 && input.previousFeedback) {
      prompt += `\n\nPREVIOUS QA FEEDBACK:\n${input.previousFeedback}`;
    }
    return prompt;
  }

  protected override applyPostConditions(verdict: JudgeVerdict, input: EvaluationInput): JudgeVerdict {
    if ((input.attempt ?? 1) > 1 && verdict.decision === "refine") {
      return { ...verdict, decision: "draft", overrideReason: REFINE_ON_RETRY_OVERRIDE_REASON };
    }
    return super.applyPostConditions(verdict, input);
  }
}
