import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { FastifyInstance } from "fastify";

import { buildApp } from "../src/app";
import type { PipelineResult } from "../src/contracts/pipeline";
import { ChatwootWebhookPayload } from "../src/contracts/webhook";
import { WebhookDedupCache } from "../src/control-plane/dedup_cache";
import { PipelineOrchestrator } from "../src/control-plane/orchestrator";
import { silentLogger } from "../src/logger";
import {
  FakeClassifier,
  FakeNameExtractor,
  FakeOutstandingDetector,
  FakeReplyGenerator,
  FakeSemanticJudge,
} from "../src/providers/fake_model";
import { admitWebhook, dispatchDecision, stripHtml } from "../src/routes/webhook";
import { MemorySupportStore } from "../src/store/support_store";
import { RecordingLinks, RecordingMessenger } from "./helpers/stubs";

const incoming = (overrides: Record<string, unknown> = {}) => ({
  event: "message_created",
  id: 101,
  content: "Where is my box?",
  message_type: "incoming",
  private: false,
  sender: { id: 5, name: "Sarah Jones", email: "sarah@example.com" },
  conversation: { id: 42, channel: "Channel::WebWidget" },
  ...overrides,
});

describe("Chatwoot webhook", () => {
  let app: FastifyInstance;
  let messenger: RecordingMessenger;
  let orchestrator: PipelineOrchestrator;
  let clock: number;

  beforeEach(async () => {
    const store = new MemorySupportStore();
    orchestrator = new PipelineOrchestrator({
      classifier: new FakeClassifier(),
      nameExtractor: new FakeNameExtractor(),
      context: store,
      generator: new FakeReplyGenerator(),
      outstanding: new FakeOutstandingDetector(),
      links: new RecordingLinks(),
      judge: new FakeSemanticJudge(),
      store,
    });
    messenger = new RecordingMessenger();
    clock = 0;
    app = buildApp({
      orchestrator,
      store,
      dedup: new WebhookDedupCache({ ttlMs: 300_000, now: () => clock }),
      messenger,
      provider: "fake",
      teamMode: false,
      escalationAssigneeId: 7,
    });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it("processes an event once and reports the repeat as a duplicate", async () => {
    const run = vi.spyOn(orchestrator, "process");

    const first = await app.inject({ method: "POST", url: "/v1/webhook/chatwoot", payload: incoming() });
    clock += 500;
    const second = await app.inject({ method: "POST", url: "/v1/webhook/chatwoot", payload: incoming() });

    expect(first.statusCode).toBe(200);
    expect(first.json()).toEqual({ status: "processed", decision: "send" });
    expect(second.json()).toEqual({ status: "duplicate", message_id: 101 });
    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0][0]).toEqual({
      message: "Where is my box?",
      sessionId: "cw_42",
      conversationId: "42",
      contact: { email: "sarah@example.com", name: "Sarah Jones" },
      channel: "Channel::WebWidget",
    });
  });

  it("posts an approved reply publicly as plain text", async () => {
    await app.inject({ method: "POST", url: "/v1/webhook/chatwoot", payload: incoming() });

    expect(messenger.calls).toEqual([
      {
        op: "message",
        conversationId: 42,
        isPrivate: false,
        content:
          "Dear Sarah,\n\n" +
          "I know how much it matters to get your package on time.\n\n" +
          "Your box is on its way. You can follow it with the tracking link in your shipping confirmation email.\n\n" +
          "Feel free to contact us again if you need further assistance.\n\n" +
          "Warm regards,\nThe Support Team",
      },
    ]);
  });

  it("escalates a red-line message with a private note, labels and an assignee", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/webhook/chatwoot",
      payload: incoming({ content: "My lawyer will be in touch." }),
    });

    expect(res.json()).toEqual({ status: "processed", decision: "escalate" });
    expect(messenger.calls).toEqual([
      {
        op: "message",
        conversationId: 42,
        isPrivate: true,
        content:
          "**AI Escalation**\n\nCategory: unknown\nReason: legal_threat\n\n---\n\n" +
          "AI draft:\nI'm connecting you with a support agent who can better assist you.",
      },
      { op: "status", conversationId: 42, status: "open" },
      { op: "labels", conversationId: 42, labels: ["ai_escalation", "unknown", "high_priority"] },
      { op: "assign", conversationId: 42, agentId: 7 },
    ]);
  });

  it("acknowledges ignored events without running the pipeline", async () => {
    const run = vi.spyOn(orchestrator, "process");

    const outgoing = await app.inject({
      method: "POST",
      url: "/v1/webhook/chatwoot",
      payload: incoming({ message_type: "outgoing" }),
    });
    const status = await app.inject({
      method: "POST",
      url: "/v1/webhook/chatwoot",
      payload: { event: "conversation_status_changed" },
    });

    expect(outgoing.json()).toEqual({ status: "ignored", reason: "not incoming message" });
    expect(status.json()).toEqual({ status: "ignored", reason: "event=conversation_status_changed" });
    expect(run).not.toHaveBeenCalled();
    expect(messenger.calls).toEqual([]);
  });

  it("rejects a payload without an event", async () => {
    const res = await app.inject({ method: "POST", url: "/v1/webhook/chatwoot", payload: { id: 1 } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("invalid_request");
  });
});

describe("admitWebhook", () => {
  const admit = (overrides: Record<string, unknown>, dedup = new WebhookDedupCache()) =>
    admitWebhook(ChatwootWebhookPayload.parse(incoming(overrides)), dedup);

  it.each([
    [{ content: "   " }, "empty content"],
    [{ content: null }, "empty content"],
    [{ private: true }, "private note"],
    [{ message_type: "template" }, "not incoming message"],
  ])("ignores %j", (overrides, reason) => {
    expect(admit(overrides)).toEqual({ admit: false, ack: { status: "ignored", reason } });
  });

  it("does not remember ignored events", () => {
    const dedup = new WebhookDedupCache();
    admit({ private: true }, dedup);
    expect(dedup.size).toBe(0);
  });

  it("reports a missing conversation", () => {
    expect(admit({ conversation: null })).toEqual({
      admit: false,
      ack: { status: "error", reason: "no conversation_id" },
    });
  });

  it("trims content and defaults the channel", () => {
    expect(admit({ content: "  hello  ", conversation: { id: 9 } })).toEqual({
      admit: true,
      messageId: 101,
      conversationId: 9,
      content: "hello",
      channel: "web",
    });
  });
});

describe("dispatchDecision", () => {
  const result = (overrides: Partial<PipelineResult>): PipelineResult => ({
    response: "<div>Dear Sarah,</div>\n<div>We're on it.</div>",
    session_id: "cw_42",
    category: "payment_question",
    decision: "send",
    confidence: "medium",
    metadata: { processing_time_ms: 3 },
    ...overrides,
  });

  it("leaves a draft as a private note for review", async () => {
    const messenger = new RecordingMessenger();
    await dispatchDecision(messenger, 42, result({ decision: "draft" }), { channel: "web", log: silentLogger });

    expect(messenger.calls).toEqual([
      {
        op: "message",
        conversationId: 42,
        isPrivate: true,
        content:
          "**AI Draft (needs review)**\n\nCategory: payment_question\nConfidence: medium\n\n---\n\nDear Sarah,\n\nWe're on it.",
      },
      { op: "status", conversationId: 42, status: "open" },
      { op: "labels", conversationId: 42, labels: ["ai_draft", "payment_question"] },
    ]);
  });

  it("keeps HTML for email conversations", async () => {
    const messenger = new RecordingMessenger();
    await dispatchDecision(messenger, 42, result({}), { channel: "email", log: silentLogger });
    expect(messenger.calls).toEqual([
      {
        op: "message",
        conversationId: 42,
        isPrivate: false,
        content: "<div>Dear Sarah,</div>\n<div>We're on it.</div>",
      },
    ]);
  });

  it("skips the assignment without a configured agent", async () => {
    const messenger = new RecordingMessenger();
    await dispatchDecision(messenger, 42, result({ decision: "escalate" }), { channel: "web", log: silentLogger });
    expect(messenger.calls.map((call) => call.op)).toEqual(["message", "status", "labels"]);
    expect(messenger.calls[0]).toMatchObject({ content: expect.stringContaining("Reason: eval_gate") });
  });

  it("logs rather than throws when the helpdesk call fails", async () => {
    const messenger = new RecordingMessenger();
    vi.spyOn(messenger, "sendMessage").mockRejectedValue(new Error("502 from helpdesk"));
    const errors: Array<Record<string, unknown>> = [];
    const log = { ...silentLogger, error: (obj: Record<string, unknown>) => void errors.push(obj) };

    await dispatchDecision(messenger, 42, result({}), { channel: "web", log });

    expect(errors).toEqual([
      { evt: "webhook.dispatch_failed", conversationId: 42, decision: "send", error: "502 from helpdesk" },
    ]);
  });
});

describe("stripHtml", () => {
  it("turns block tags into line breaks", () => {
    expect(stripHtml("<div>One</div>\n<div>Two<br>Three</div>")).toBe("One\n\nTwo\nThree");
  });
});
