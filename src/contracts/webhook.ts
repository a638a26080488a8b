import { z } from "zod";

export const ChatwootSender = z
  .object({
    id: z.number().int().nullish(),
    name: z.string().nullish(),
    email: z.string().nullish(),
    type: z.string().nullish(),
  })
  .passthrough();

export const ChatwootConversation = z
  .object({
    id: z.number().int(),
    inbox_id: z.number().int().nullish(),
    status: z.string().nullish(),
    channel: z.string().nullish(),
  })
  .passthrough();

export const ChatwootWebhookPayload = z
  .object({
    event: z.string().min(1),
    id: z.number().int().nullish(),
    content: z.string().nullish(),
    message_type: z.string().nullish(),
    private: z.boolean().default(false),
    sender: ChatwootSender.nullish(),
    conversation: ChatwootConversation.nullish(),
  })
  .passthrough();

export type ChatwootWebhookPayload = z.infer<typeof ChatwootWebhookPayload>;

export type WebhookAck =
  | { status: "ignored"; reason: string }
  | { status: "duplicate"; message_id: number }
  | { status: "error"; reason: string }
  | { status: "processed"; decision: string };
