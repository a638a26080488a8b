import { describe, it, expect } from "vitest";
import {
  FakeClassifier,
  FakeNameExtractor,
  FakeOutstandingDetector,
  FakeReplyGenerator,
} from "../src/providers/fake_model";
import { fastSafetyCheck, QA_UNSAFE_RESPONSE_PATTERNS } from "../src/gates/response_patterns";
import { CATEGORIES } from "../src/contracts/pipeline";

describe("FakeClassifier", () => {
  const classifier = new FakeClassifier();

  it.each([
    ["Please cancel my subscription", "retention_primary_request"],
    ["The jar was broken when it arrived", "damaged_or_leaking_item_report"],
    ["Can I skip next month?", "skip_or_pause_request"],
    ["Could it come every other month instead?", "frequency_change_request"],
    ["I moved last week", "recipient_or_address_change"],
    ["Why was my card charged twice?", "payment_question"],
    ["My son has a nut allergy", "customization_request"],
    ["Thanks, the box was great", "gratitude"],
    ["Where is my order?", "shipping_or_delivery_question"],
  ])("classifies %j as %s", async (message, category) => {
    expect((await classifier.classify(message)).primary).toBe(category);
  });

  it("picks up an email address and urgency", async () => {
    expect(await classifier.classify("Urgent: where is my box? me@example.com")).toEqual({
      primary: "shipping_or_delivery_question",
      secondary: null,
      urgency: "high",
      email: "me@example.com",
    });
  });
});

describe("FakeNameExtractor", () => {
  const extractor = new FakeNameExtractor();

  it("prefers the contact's first name", async () => {
    expect(await extractor.extract("my name is Bob", "anna maria lopez")).toBe("Anna");
  });

  it("reads a self-introduction", async () => {
    expect(await extractor.extract("Hello, my name is LUCY and my box is late")).toBe("Lucy");
  });

  it("reads a signature line", async () => {
    expect(await extractor.extract("Where is my box?\n\nThanks,\nTom")).toBe("Tom");
  });

  it("falls back to the generic name", async () => {
    expect(await extractor.extract("Where is my box?")).toBe("Client");
  });
});

describe("FakeOutstandingDetector", () => {
  it("flags repeated contact", async () => {
    const detector = new FakeOutstandingDetector();
    expect(await detector.detect("This is the third time I'm writing", "shipping_or_delivery_question")).toEqual({
      isOutstanding: true,
      trigger: "repeated_unresolved_contact",
      confidence: "high",
    });
    expect((await detector.detect("Where is my box?", "shipping_or_delivery_question")).isOutstanding).toBe(false);
  });
});

describe("FakeReplyGenerator", () => {
  it("never produces a reply the QA patterns would stop", async () => {
    const generator = new FakeReplyGenerator();
    for (const category of CATEGORIES) {
      const reply = await generator.generate({ category, email: null, input: "", teamMode: false });
      expect(fastSafetyCheck(reply, QA_UNSAFE_RESPONSE_PATTERNS)).toEqual({ ok: true });
    }
  });

  it("points retention replies at the cancellation page", async () => {
    const generator = new FakeReplyGenerator();
    const reply = await generator.generate({ category: "retention_repeated_request", email: null, input: "", teamMode: true });
    expect(reply).toContain("cancellation page");
  });
});
