import { createCipheriv, createHash, randomBytes } from "node:crypto";

import { errorMessage, silentLogger, type PipelineLogger } from "../logger";
import type { LinkGenerator } from "./collaborators";

const PLACEHOLDERS = ["[CANCEL_LINK]", "{{cancel_link}}", "{cancel_link}"];
const CANCEL_PHRASE = /(cancellation page|cancel page|cancellation link|cancel link)/i;

/**
 * Splices a cancellation URL into a generated reply. Explicit placeholders win;
 * otherwise the first mention of the cancellation page becomes a link.
 */
export function injectCancelLink(reply: string, url: string): string {
  let out = reply;
  for (const placeholder of PLACEHOLDERS) {
    out = out.split(placeholder).join(url);
  }
  if (out.includes(url)) return out;
  return out.replace(CANCEL_PHRASE, `<a href="${url}">cancellation page</a>`);
}

export type CancelLinkOptions = {
  password: string | null;
  baseUrl: string;
  log?: PipelineLogger;
};

/**
 * Token = base64url(nonce || ciphertext || tag) under AES-256-GCM with
 * key = sha256(password). Payload is `{"subscription_id", "email"}`.
 */
export class AesCancelLinkGenerator implements LinkGenerator {
  private readonly password: string | null;
  private readonly baseUrl: string;
  private readonly log: PipelineLogger;

  constructor(opts: CancelLinkOptions) {
    this.password = opts.password;
    this.baseUrl = opts.baseUrl;
    this.log = opts.log ?? silentLogger;
  }

  async cancelLink(subscriptionRef: string, email: string): Promise<string | null> {
    if (!this.password) {
      this.log.error({ evt: "cancel_link.password_missing" }, "cancel_link.password_missing");
      return null;
    }

    try {
      const key = createHash("sha256").update(this.password, "utf8").digest();
      const nonce = randomBytes(12);
      const cipher = createCipheriv("aes-256-gcm", key, nonce);
      const payload = JSON.stringify({ subscription_id: subscriptionRef, email });
      const ciphertext = Buffer.concat([cipher.update(payload, "utf8"), cipher.final()]);
      const token = Buffer.concat([nonce, ciphertext, cipher.getAuthTag()]).toString("base64url");

      this.log.info({ evt: "cancel_link.generated", subscriptionRef }, "cancel_link.generated");
      return `${this.baseUrl}?al=${token}`;
    } catch (error) {
      this.log.error({ evt: "cancel_link.failed", error: errorMessage(error) }, "cancel_link.failed");
      return null;
    }
  }
}
