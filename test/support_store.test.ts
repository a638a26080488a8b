import { describe, it, expect, beforeEach, afterEach } from "vitest";

import type { EvalRecord, MessageRecord, SessionRecord } from "../src/control-plane/collaborators";
import { MemorySupportStore, type SupportStore } from "../src/store/support_store";
import { SqliteSupportStore } from "../src/store/sqlite_support_store";

const session = (overrides: Partial<SessionRecord> = {}): SessionRecord => ({
  sessionId: "sess_1",
  conversationId: "42",
  channel: "widget",
  customerEmail: "sarah@example.com",
  customerName: "Sarah",
  primaryCategory: "shipping_or_delivery_question",
  secondaryCategory: null,
  urgency: "medium",
  status: "active",
  evalDecision: "send",
  firstResponseTimeMs: 120,
  ...overrides,
});

const message = (overrides: Partial<MessageRecord> = {}): MessageRecord => ({
  sessionId: "sess_1",
  turnId: "turn_1",
  role: "user",
  content: "Where is my box?",
  modelUsed: null,
  reasoningEffort: null,
  processingTimeMs: null,
  ...overrides,
});

const evaluation = (overrides: Partial<EvalRecord> = {}): EvalRecord => ({
  sessionId: "sess_1",
  turnId: "turn_1",
  category: "shipping_or_delivery_question",
  secondaryCategory: null,
  decision: "send",
  overrideReason: null,
  confidence: "high",
  checks: [{ name: "safety", passed: true, score: 1, detail: "" }],
  isOutstanding: false,
  outstandingTrigger: "none",
  autoSendEnabled: false,
  attempts: 1,
  ...overrides,
});

// Same contract against both stores.
function testSupportStore(storeName: string, createStore: () => SupportStore & { close?: () => void }) {
  describe(`SupportStore (${storeName})`, () => {
    let store: SupportStore & { close?: () => void };

    beforeEach(() => {
      store = createStore();
    });

    afterEach(() => {
      store.close?.();
    });

    it("round-trips a session with outstanding defaults", async () => {
      await store.saveSession(session());

      expect(await store.getSession("sess_1")).toMatchObject({
        ...session(),
        isOutstanding: false,
        outstandingTrigger: null,
      });
      expect(await store.getSession("missing")).toBeNull();
    });

    it("upserts a session without touching its identity fields", async () => {
      await store.saveSession(session());
      await store.saveSession(
        session({ channel: "email", primaryCategory: "payment_question", evalDecision: "draft", firstResponseTimeMs: 80 })
      );

      expect(await store.getSession("sess_1")).toMatchObject({
        channel: "widget",
        primaryCategory: "payment_question",
        evalDecision: "draft",
        firstResponseTimeMs: 80,
      });
    });

    it("updates the outstanding flag on an existing session", async () => {
      await store.saveSession(session());
      await store.updateOutstanding({
        sessionId: "sess_1",
        isOutstanding: true,
        outstandingTrigger: "repeated_unresolved_contact",
        evalDecision: "draft",
      });

      expect(await store.getSession("sess_1")).toMatchObject({
        isOutstanding: true,
        outstandingTrigger: "repeated_unresolved_contact",
        evalDecision: "draft",
      });
    });

    it("ignores an outstanding update for an unknown session", async () => {
      await store.updateOutstanding({
        sessionId: "ghost",
        isOutstanding: true,
        outstandingTrigger: "x",
        evalDecision: "draft",
      });
      expect(await store.getSession("ghost")).toBeNull();
    });

    it("rejects turns for an unknown session", async () => {
      await expect(store.saveMessage(message({ sessionId: "ghost" }))).rejects.toThrow();
      await expect(store.saveEvalResult(evaluation({ sessionId: "ghost" }))).rejects.toThrow();
    });

    it("keeps one row per turn and role", async () => {
      await store.saveSession(session());
      await store.saveMessage(message());
      await store.saveMessage(message({ role: "assistant", content: "On its way.", modelUsed: "gpt-5.1", processingTimeMs: 95 }));
      await store.saveMessage(message({ content: "Where is my box??" }));

      const messages = await store.getMessages("sess_1");
      expect(messages.map((m) => [m.role, m.content, m.modelUsed, m.processingTimeMs])).toEqual([
        ["user", "Where is my box??", null, null],
        ["assistant", "On its way.", "gpt-5.1", 95],
      ]);
    });

    it("serves history oldest first", async () => {
      await store.saveSession(session());
      await store.saveMessage(message());
      await store.saveMessage(message({ role: "assistant", content: "On its way." }));
      await store.saveMessage(message({ turnId: "turn_2", content: "Thanks!" }));

      const history = await store.history("sess_1");
      expect(history.map((turn) => [turn.role, turn.content])).toEqual([
        ["user", "Where is my box?"],
        ["assistant", "On its way."],
        ["user", "Thanks!"],
      ]);
      expect(typeof history[0].timestamp).toBe("string");
    });

    it("stores evaluation checks and flags", async () => {
      await store.saveSession(session());
      await store.saveEvalResult(evaluation({ isOutstanding: true, autoSendEnabled: true, attempts: 2 }));
      await store.saveEvalResult(evaluation({ decision: "draft", overrideReason: "Parse error", checks: [] }));

      const evals = await store.getEvalResults("sess_1");
      expect(evals).toHaveLength(1);
      expect(evals[0]).toMatchObject({
        decision: "draft",
        overrideReason: "Parse error",
        checks: [],
        isOutstanding: false,
        attempts: 1,
      });
    });

    it("looks profiles up by email regardless of case", async () => {
      await store.upsertProfile({ email: "Sarah@Example.com", name: "Sarah", subscriptionId: "sub_1" });
      await store.upsertProfile({ email: "sarah@example.com", name: "Sarah", subscriptionId: "sub_2" });

      expect(await store.profile("SARAH@example.com")).toMatchObject({ name: "Sarah", subscriptionId: "sub_2" });
      expect(await store.profile("nobody@example.com")).toBeNull();
    });
  });
}

testSupportStore("Memory", () => new MemorySupportStore());
testSupportStore("SQLite", () => new SqliteSupportStore(":memory:"));
