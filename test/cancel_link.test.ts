import { createDecipheriv, createHash } from "node:crypto";
import { describe, it, expect } from "vitest";

import { AesCancelLinkGenerator, injectCancelLink } from "../src/control-plane/cancel_link";

const BASE_URL = "https://shop.example.com/pay/subscriptions/cancel";

function decryptToken(token: string, password: string): unknown {
  const raw = Buffer.from(token, "base64url");
  const key = createHash("sha256").update(password, "utf8").digest();
  const decipher = createDecipheriv("aes-256-gcm", key, raw.subarray(0, 12));
  decipher.setAuthTag(raw.subarray(raw.length - 16));
  const plain = Buffer.concat([decipher.update(raw.subarray(12, raw.length - 16)), decipher.final()]);
  return JSON.parse(plain.toString("utf8"));
}

describe("AesCancelLinkGenerator", () => {
  it("encrypts the subscription and email into the al parameter", async () => {
    const links = new AesCancelLinkGenerator({ password: "test-secret", baseUrl: BASE_URL });
    const link = await links.cancelLink("sub_123", "sarah@example.com");

    expect(link).not.toBeNull();
    const url = new URL(link ?? "");
    expect(`${url.origin}${url.pathname}`).toBe(BASE_URL);
    const token = url.searchParams.get("al") ?? "";
    expect(token).toMatch(/^[A-Za-z0-9_-]+$/);
    expect(decryptToken(token, "test-secret")).toEqual({ subscription_id: "sub_123", email: "sarah@example.com" });
  });

  it("uses a fresh nonce per link", async () => {
    const links = new AesCancelLinkGenerator({ password: "test-secret", baseUrl: BASE_URL });
    const a = await links.cancelLink("pending", "a@example.com");
    const b = await links.cancelLink("pending", "a@example.com");
    expect(a).not.toBe(b);
  });

  it("returns null without a password", async () => {
    const links = new AesCancelLinkGenerator({ password: null, baseUrl: BASE_URL });
    expect(await links.cancelLink("sub_123", "sarah@example.com")).toBeNull();
  });
});

describe("injectCancelLink", () => {
  const url = "https://shop.example.com/cancel?al=abc";

  it("replaces every placeholder form", () => {
    expect(injectCancelLink("Go to [CANCEL_LINK] or {{cancel_link}} or {cancel_link}.", url)).toBe(
      `Go to ${url} or ${url} or ${url}.`
    );
  });

  it("links the first cancellation page mention when there is no placeholder", () => {
    expect(injectCancelLink("Visit our Cancellation Page. The cancel page is quick.", url)).toBe(
      `Visit our <a href="${url}">cancellation page</a>. The cancel page is quick.`
    );
  });

  it("leaves a reply with no hook unchanged", () => {
    expect(injectCancelLink("We'd love to keep you.", url)).toBe("We'd love to keep you.");
  });
});
