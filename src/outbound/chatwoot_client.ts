import type { ChatwootSettings } from "../config";
import type { ConversationStatus, OutboundMessenger } from "../control-plane/collaborators";
import { silentLogger, type PipelineLogger } from "../logger";

export class OutboundError extends Error {
  statusCode: number;
  path: string;

  constructor(message: string, args: { statusCode: number; path: string }) {
    super(message);
    this.name = "OutboundError";
    this.statusCode = args.statusCode;
    this.path = args.path;
  }
}

export type ChatwootClientOptions = Pick<ChatwootSettings, "url" | "apiToken" | "accountId"> & {
  fetchImpl?: typeof fetch;
  log?: PipelineLogger;
};

/** Account-scoped Chatwoot REST client for replies, notes and triage. */
export class ChatwootClient implements OutboundMessenger {
  private readonly baseUrl: string;
  private readonly apiToken: string;
  private readonly fetchImpl: typeof fetch;
  private readonly log: PipelineLogger;

  constructor(opts: ChatwootClientOptions) {
    this.baseUrl = `${opts.url}/api/v1/accounts/${opts.accountId}`;
    this.apiToken = opts.apiToken;
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.log = opts.log ?? silentLogger;
  }

  private async post(path: string, body: Record<string, unknown>): Promise<void> {
    const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        api_access_token: this.apiToken,
      },
      body: JSON.stringify(body),
    });
    if (!res.ok) {
      const bodySnippet = (await res.text()).slice(0, 300);
      this.log.error({ evt: "chatwoot.request_failed", path, statusCode: res.status, bodySnippet }, "chatwoot.request_failed");
      throw new OutboundError(`Chatwoot error ${res.status} on ${path}`, { statusCode: res.status, path });
    }
  }

  async sendMessage(conversationId: number, content: string, isPrivate: boolean): Promise<void> {
    await this.post(`/conversations/${conversationId}/messages`, {
      content,
      message_type: "outgoing",
      private: isPrivate,
    });
    this.log.info({ evt: "chatwoot.message_sent", conversationId, private: isPrivate }, "chatwoot.message_sent");
  }

  async setStatus(conversationId: number, status: ConversationStatus): Promise<void> {
    await this.post(`/conversations/${conversationId}/toggle_status`, { status });
  }

  async addLabels(conversationId: number, labels: string[]): Promise<void> {
    await this.post(`/conversations/${conversationId}/labels`, { labels });
  }

  async assign(conversationId: number, agentId: number): Promise<void> {
    await this.post(`/conversations/${conversationId}/assignments`, { assignee_id: agentId });
  }
}

/** Used when Chatwoot is not configured: dispatches are logged and dropped. */
export class LoggingMessenger implements OutboundMessenger {
  constructor(private readonly log: PipelineLogger = silentLogger) {}

  async sendMessage(conversationId: number, content: string, isPrivate: boolean): Promise<void> {
    this.log.info(
      { evt: "outbound.disabled", action: "send_message", conversationId, private: isPrivate, chars: content.length },
      "outbound.disabled"
    );
  }

  async setStatus(conversationId: number, status: ConversationStatus): Promise<void> {
    this.log.info({ evt: "outbound.disabled", action: "set_status", conversationId, status }, "outbound.disabled");
  }

  async addLabels(conversationId: number, labels: string[]): Promise<void> {
    this.log.info({ evt: "outbound.disabled", action: "add_labels", conversationId, labels }, "outbound.disabled");
  }

  async assign(conversationId: number, agentId: number): Promise<void> {
    this.log.info({ evt: "outbound.disabled", action: "assign", conversationId, agentId }, "outbound.disabled");
  }
}
