import type { FastifyInstance } from "fastify";

import { ChatwootWebhookPayload, type WebhookAck } from "../contracts/webhook";
import type { PipelineResult } from "../contracts/pipeline";
import type { OutboundMessenger } from "../control-plane/collaborators";
import type { WebhookDedupCache } from "../control-plane/dedup_cache";
import type { PipelineOrchestrator } from "../control-plane/orchestrator";
import { errorMessage, type PipelineLogger } from "../logger";

export type WebhookRouteOptions = {
  orchestrator: PipelineOrchestrator;
  dedup: WebhookDedupCache;
  messenger: OutboundMessenger;
  escalationAssigneeId?: number | null;
};

type Admission =
  | { admit: true; messageId: number | null; conversationId: number; content: string; channel: string }
  | { admit: false; ack: WebhookAck };

export function stripHtml(text: string): string {
  return text
    .replace(/<br\s*\/?>|<\/div>|<\/p>|<\/li>/gi, "\n")
    .replace(/<[^>]+>/g, "")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Filters a Chatwoot event down to a customer message the pipeline should answer.
 * The dedup cache is consulted last so ignored events never occupy it.
 */
export function admitWebhook(payload: ChatwootWebhookPayload, dedup: WebhookDedupCache): Admission {
  if (payload.event !== "message_created") {
    return { admit: false, ack: { status: "ignored", reason: `event=${payload.event}` } };
  }
  if (payload.message_type !== "incoming") {
    return { admit: false, ack: { status: "ignored", reason: "not incoming message" } };
  }
  const content = payload.content?.trim() ?? "";
  if (!content) {
    return { admit: false, ack: { status: "ignored", reason: "empty content" } };
  }
  if (payload.private) {
    return { admit: false, ack: { status: "ignored", reason: "private note" } };
  }
  const messageId = payload.id ?? null;
  if (messageId !== null && dedup.seen(messageId)) {
    return { admit: false, ack: { status: "duplicate", message_id: messageId } };
  }
  const conversationId = payload.conversation?.id;
  if (!conversationId) {
    return { admit: false, ack: { status: "error", reason: "no conversation_id" } };
  }
  return {
    admit: true,
    messageId,
    conversationId,
    content,
    channel: payload.conversation?.channel ?? "web",
  };
}

export async function dispatchDecision(
  messenger: OutboundMessenger,
  conversationId: number,
  result: PipelineResult,
  opts: { channel: string; escalationAssigneeId?: number | null; log: PipelineLogger }
): Promise<void> {
  // Email renders HTML; the chat widget shows raw text.
  const text = opts.channel === "email" ? result.response : stripHtml(result.response);

  try {
    switch (result.decision) {
      case "send":
        await messenger.sendMessage(conversationId, text, false);
        break;
      case "draft":
        await messenger.sendMessage(
          conversationId,
          `**AI Draft (needs review)**\n\nCategory: ${result.category}\nConfidence: ${result.confidence}\n\n---\n\n${text}`,
          true
        );
        await messenger.setStatus(conversationId, "open");
        await messenger.addLabels(conversationId, ["ai_draft", result.category]);
        break;
      case "escalate": {
        const reason = result.metadata.escalation_reason ?? "eval_gate";
        await messenger.sendMessage(
          conversationId,
          `**AI Escalation**\n\nCategory: ${result.category}\nReason: ${reason}\n\n---\n\nAI draft:\n${text}`,
          true
        );
        await messenger.setStatus(conversationId, "open");
        await messenger.addLabels(conversationId, ["ai_escalation", result.category, "high_priority"]);
        if (opts.escalationAssigneeId) {
          await messenger.assign(conversationId, opts.escalationAssigneeId);
        }
        break;
      }
    }
  } catch (error) {
    opts.log.error(
      { evt: "webhook.dispatch_failed", conversationId, decision: result.decision, error: errorMessage(error) },
      "webhook.dispatch_failed"
    );
  }
}

export async function webhookRoutes(app: FastifyInstance, opts: WebhookRouteOptions) {
  app.post("/webhook/chatwoot", async (req, reply) => {
    const parsed = ChatwootWebhookPayload.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    const admission = admitWebhook(parsed.data, opts.dedup);
    if (!admission.admit) {
      if (admission.ack.status === "duplicate") {
        req.log.info({ evt: "webhook.duplicate", messageId: admission.ack.message_id }, "webhook.duplicate");
      }
      return reply.send(admission.ack);
    }

    const { conversationId, messageId, content, channel } = admission;
    const sender = parsed.data.sender;
    const email = sender?.email || undefined;
    const name = sender?.name || undefined;
    req.log.info({ evt: "webhook.processing", conversationId, messageId }, "webhook.processing");

    const result = await opts.orchestrator.process({
      message: content,
      sessionId: `cw_${conversationId}`,
      conversationId: String(conversationId),
      contact: email || name ? { email, name } : undefined,
      channel,
    });

    await dispatchDecision(opts.messenger, conversationId, result, {
      channel,
      escalationAssigneeId: opts.escalationAssigneeId,
      log: req.log,
    });

    const ack: WebhookAck = { status: "processed", decision: result.decision };
    return reply.send(ack);
  });
}
