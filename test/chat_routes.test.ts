import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";

import { buildApp } from "../src/app";
import { WebhookDedupCache } from "../src/control-plane/dedup_cache";
import { PipelineOrchestrator } from "../src/control-plane/orchestrator";
import {
  FakeClassifier,
  FakeNameExtractor,
  FakeOutstandingDetector,
  FakeReplyGenerator,
  FakeSemanticJudge,
} from "../src/providers/fake_model";
import { MemorySupportStore } from "../src/store/support_store";
import { RecordingLinks, RecordingMessenger } from "./helpers/stubs";

describe("Chat routes", () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    const store = new MemorySupportStore();
    const orchestrator = new PipelineOrchestrator({
      classifier: new FakeClassifier(),
      nameExtractor: new FakeNameExtractor(),
      context: store,
      generator: new FakeReplyGenerator(),
      outstanding: new FakeOutstandingDetector(),
      links: new RecordingLinks(),
      judge: new FakeSemanticJudge(),
      store,
    });
    app = buildApp({
      orchestrator,
      store,
      dedup: new WebhookDedupCache(),
      messenger: new RecordingMessenger(),
      provider: "fake",
      teamMode: false,
    });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it("answers a chat message with the pipeline result", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/chat",
      payload: { message: "Where is my box?", session_id: "sess_a", contact: { name: "Sarah Jones" } },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.session_id).toBe("sess_a");
    expect(body.decision).toBe("send");
    expect(body.category).toBe("shipping_or_delivery_question");
    expect(body.response.split("\n")[0]).toBe("<div>Dear Sarah,</div>");
    expect(body.metadata.customer_name).toBe("Sarah");
  });

  it("escalates a red-line message", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/chat",
      payload: { message: "I'm going to file a chargeback" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      category: "unknown",
      decision: "escalate",
      confidence: "high",
      metadata: { escalation_reason: "bank_dispute" },
    });
  });

  it("rejects an empty message", async () => {
    const res = await app.inject({ method: "POST", url: "/v1/chat", payload: { message: "" } });

    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.error).toBe("invalid_request");
    expect(Object.keys(body.details.fieldErrors)).toEqual(["message"]);
  });

  it("returns a stored session with its turns and evaluations", async () => {
    await app.inject({ method: "POST", url: "/v1/chat", payload: { message: "Where is my box?", session_id: "sess_s" } });

    const res = await app.inject({ method: "GET", url: "/v1/sessions/sess_s" });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.session.sessionId).toBe("sess_s");
    expect(body.session.channel).toBe("widget");
    expect(body.messages.map((m: { role: string }) => m.role)).toEqual(["user", "assistant"]);
    expect(body.evaluations).toHaveLength(1);
  });

  it("returns 404 for an unknown session", async () => {
    const res = await app.inject({ method: "GET", url: "/v1/sessions/nope" });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "not_found" });
  });

  it("reports health", async () => {
    const res = await app.inject({ method: "GET", url: "/healthz" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, service: "support-reply-gate", provider: "fake", teamMode: false });
  });
});
