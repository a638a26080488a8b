import { z } from "zod";

import { CheckSchema, Confidence, type Check, type Decision } from "../contracts/pipeline";
import { GATE_SAFETY } from "./gate_interfaces";

export type JudgeVerdict = {
  decision: Decision;
  confidence: Confidence;
  checks: Check[];
  feedback: string | null;
  overrideReason: string | null;
};

export type JudgeIssue = { path: string; code: string; message: string };

export type JudgeParseResult =
  | { ok: true; verdict: JudgeVerdict }
  | { ok: false; reason: "invalid_json" | "schema_invalid"; issues: JudgeIssue[] };

export const REQUIRED_CHECKS = [GATE_SAFETY, "tone", "accuracy", "completeness"] as const;

// A verdict without its confidence or any of the four checks is not a verdict.
const JudgeOutputSchema = z.object({
  decision: z.enum(["send", "draft", "escalate", "refine"]),
  confidence: Confidence,
  checks: z.array(CheckSchema).superRefine((checks, ctx) => {
    const names = new Set(checks.map((check) => check.name.trim().toLowerCase()));
    for (const required of REQUIRED_CHECKS) {
      if (!names.has(required)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `missing '${required}' check` });
      }
    }
  }),
  feedback: z.string().nullish(),
  override_reason: z.string().nullish(),
});

function summarizeZodIssues(issues: z.ZodIssue[]): JudgeIssue[] {
  return issues.slice(0, 10).map((issue) => ({
    path: issue.path
      .map((segment) => (typeof segment === "number" ? `[${segment}]` : String(segment)))
      .join("."),
    code: issue.code,
    message: issue.message,
  }));
}

// Models sometimes wrap structured output in a markdown fence.
function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced ? fenced[1] : trimmed;
}

export function parseJudgeOutput(
  raw: string,
  opts: { allowedDecisions: ReadonlyArray<Decision> }
): JudgeParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(raw));
  } catch (error) {
    return {
      ok: false,
      reason: "invalid_json",
      issues: [{ path: "", code: "invalid_json", message: String(error).slice(0, 200) }],
    };
  }

  const result = JudgeOutputSchema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, reason: "schema_invalid", issues: summarizeZodIssues(result.error.issues) };
  }

  const { decision, confidence, checks, feedback, override_reason } = result.data;
  if (!opts.allowedDecisions.includes(decision)) {
    return {
      ok: false,
      reason: "schema_invalid",
      issues: [
        {
          path: "decision",
          code: "invalid_enum_value",
          message: `decision '${decision}' not allowed here`,
        },
      ],
    };
  }

  return {
    ok: true,
    verdict: {
      decision,
      confidence,
      checks,
      feedback: feedback ?? null,
      overrideReason: override_reason ?? null,
    },
  };
}
