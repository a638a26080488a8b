import { describe, it, expect } from "vitest";

import { EvaluationGate, OUTSTANDING_OVERRIDE_REASON, type EvaluationInput } from "../src/gates/eval_gate";
import { PASSING_CHECKS, ScriptedJudge, verdict } from "./helpers/stubs";

const baseInput: EvaluationInput = {
  customerMessage: "Where is my box?",
  reply: "It shipped.",
  category: "shipping_or_delivery_question",
  isOutstanding: false,
  toolsAvailable: [],
};

describe("EvaluationGate", () => {
  describe("pattern tier", () => {
    it("drafts a reply that claims a cancellation without calling the judge", async () => {
      const judge = new ScriptedJudge();
      const gate = new EvaluationGate({ judge });

      const result = await gate.evaluate({ ...baseInput, reply: "Done! I have cancelled your subscription." });

      expect(judge.calls).toHaveLength(0);
      expect(result).toEqual({
        decision: "draft",
        confidence: "high",
        checks: [
          {
            name: "safety",
            passed: false,
            score: 0,
            detail: "Regex safety violation: confirmed_cancellation",
          },
        ],
        overrideReason: "Fast-fail regex: confirmed_cancellation",
        feedback: null,
        tier: "pattern",
      });
    });

    it.each([
      ["Your subscription has been paused.", "confirmed_pause"],
      ["We processed your refund this morning.", "confirmed_refund"],
      ["The refund was approved yesterday.", "confirmed_refund"],
    ])("flags %j", async (reply, violation) => {
      const gate = new EvaluationGate({ judge: new ScriptedJudge() });
      const result = await gate.evaluate({ ...baseInput, reply });
      expect(result.overrideReason).toBe(`Fast-fail regex: ${violation}`);
    });

    it("does not apply the damage-resolution patterns", async () => {
      const judge = new ScriptedJudge(verdict({ decision: "send", confidence: "high", checks: PASSING_CHECKS }));
      const gate = new EvaluationGate({ judge });

      const result = await gate.evaluate({ ...baseInput, reply: "We have arranged a replacement for you." });

      expect(judge.calls).toHaveLength(1);
      expect(result.decision).toBe("send");
    });
  });

  describe("judge tier", () => {
    it("passes the judge verdict through", async () => {
      const judge = new ScriptedJudge(verdict({ decision: "send", confidence: "high", checks: PASSING_CHECKS }));
      const gate = new EvaluationGate({ judge });

      const result = await gate.evaluate(baseInput);

      expect(result).toEqual({
        decision: "send",
        confidence: "high",
        checks: PASSING_CHECKS,
        overrideReason: null,
        feedback: null,
        tier: "judge",
      });
    });

    it("builds the judge prompt from the case", async () => {
      const judge = new ScriptedJudge(verdict({ decision: "send", confidence: "high", checks: PASSING_CHECKS }));
      await new EvaluationGate({ judge }).evaluate(baseInput);

      expect(judge.calls[0].judgeName).toBe("eval_gate");
      expect(judge.calls[0].prompt).toBe(
        "CATEGORY: shipping_or_delivery_question\n" +
          "OUTSTANDING: False\n" +
          "\n" +
          "CUSTOMER MESSAGE:\nWhere is my box?\n\n" +
          "AI RESPONSE TO EVALUATE:\nIt shipped."
      );
    });

    it("lists available tools and marks outstanding cases", async () => {
      const judge = new ScriptedJudge(verdict({ decision: "draft", confidence: "medium", checks: PASSING_CHECKS }));
      await new EvaluationGate({ judge }).evaluate({
        ...baseInput,
        isOutstanding: true,
        toolsAvailable: ["order_lookup"],
      });

      const prompt = judge.calls[0].prompt;
      expect(prompt).toContain("OUTSTANDING: True\n**OUTSTANDING CASE: be extra strict. When in doubt, 'draft'.**\n");
      expect(prompt).toContain("\nTOOLS AVAILABLE TO AGENT: order_lookup\n");
    });

    it("forces a non-high send on an outstanding case to draft", async () => {
      const judge = new ScriptedJudge(verdict({ decision: "send", confidence: "medium", checks: PASSING_CHECKS }));
      const result = await new EvaluationGate({ judge }).evaluate({ ...baseInput, isOutstanding: true });

      expect(result.decision).toBe("draft");
      expect(result.confidence).toBe("medium");
      expect(result.overrideReason).toBe(OUTSTANDING_OVERRIDE_REASON);
    });

    it("lets a high-confidence send through on an outstanding case", async () => {
      const judge = new ScriptedJudge(verdict({ decision: "send", confidence: "high", checks: PASSING_CHECKS }));
      const result = await new EvaluationGate({ judge }).evaluate({ ...baseInput, isOutstanding: true });

      expect(result.decision).toBe("send");
      expect(result.overrideReason).toBeNull();
    });
  });

  describe("fallbacks", () => {
    it("drafts at low confidence when the judge fails", async () => {
      const judge = new ScriptedJudge(new Error("upstream timeout"));
      const result = await new EvaluationGate({ judge }).evaluate(baseInput);

      expect(result).toEqual({
        decision: "draft",
        confidence: "low",
        checks: [],
        overrideReason: "Eval gate error: upstream timeout",
        feedback: null,
        tier: "fallback",
      });
    });

    it("drafts at low confidence on unparseable output", async () => {
      const judge = new ScriptedJudge("looks fine to me");
      const result = await new EvaluationGate({ judge }).evaluate(baseInput);

      expect(result.decision).toBe("draft");
      expect(result.confidence).toBe("low");
      expect(result.overrideReason).toBe("Parse error");
      expect(result.tier).toBe("fallback");
    });

    it("drafts an outstanding case whose verdict omits confidence and checks", async () => {
      const judge = new ScriptedJudge(verdict({ decision: "send" }));
      const result = await new EvaluationGate({ judge }).evaluate({ ...baseInput, isOutstanding: true });

      expect(result).toEqual({
        decision: "draft",
        confidence: "low",
        checks: [],
        overrideReason: "Parse error",
        feedback: null,
        tier: "fallback",
      });
    });

    it("drafts a send that skips a check dimension", async () => {
      const checks = PASSING_CHECKS.filter((check) => check.name !== "accuracy");
      const judge = new ScriptedJudge(verdict({ decision: "send", confidence: "high", checks }));
      const result = await new EvaluationGate({ judge }).evaluate(baseInput);

      expect(result.decision).toBe("draft");
      expect(result.confidence).toBe("low");
      expect(result.overrideReason).toBe("Parse error");
    });

    it("treats a refine decision as a parse error", async () => {
      const judge = new ScriptedJudge(verdict({ decision: "refine", confidence: "medium", checks: PASSING_CHECKS, feedback: "be warmer" }));
      const result = await new EvaluationGate({ judge }).evaluate(baseInput);

      expect(result.decision).toBe("draft");
      expect(result.overrideReason).toBe("Parse error");
    });
  });
});
