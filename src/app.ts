import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";

import type { OutboundMessenger } from "./control-plane/collaborators";
import type { WebhookDedupCache } from "./control-plane/dedup_cache";
import type { PipelineOrchestrator } from "./control-plane/orchestrator";
import { chatRoutes } from "./routes/chat";
import { healthRoutes } from "./routes/healthz";
import { webhookRoutes } from "./routes/webhook";
import type { SupportStore } from "./store/support_store";

export type AppDeps = {
  orchestrator: PipelineOrchestrator;
  store: SupportStore;
  dedup: WebhookDedupCache;
  messenger: OutboundMessenger;
  provider: string;
  teamMode: boolean;
  escalationAssigneeId?: number | null;
  // Fastify's own pino instance; `false` for tests.
  logger?: boolean | { level: string };
};

export function buildApp(deps: AppDeps): FastifyInstance {
  const app = Fastify({ logger: deps.logger ?? false });

  // Webhooks come server-to-server; CORS only matters for the chat endpoint.
  app.register(cors, { origin: true });

  app.register(healthRoutes, { provider: deps.provider, teamMode: deps.teamMode });
  app.register(chatRoutes, { prefix: "/v1", orchestrator: deps.orchestrator, store: deps.store });
  app.register(webhookRoutes, {
    prefix: "/v1",
    orchestrator: deps.orchestrator,
    dedup: deps.dedup,
    messenger: deps.messenger,
    escalationAssigneeId: deps.escalationAssigneeId,
  });

  return app;
}
