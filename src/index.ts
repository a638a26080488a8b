import { buildApp } from "./app";
import { loadSettings, type Settings } from "./config";
import { AesCancelLinkGenerator } from "./control-plane/cancel_link";
import type { OutboundMessenger } from "./control-plane/collaborators";
import { WebhookDedupCache } from "./control-plane/dedup_cache";
import { PipelineOrchestrator, type OrchestratorDeps } from "./control-plane/orchestrator";
import { createLogger, errorMessage, resolveLogLevel, type PipelineLogger } from "./logger";
import { ChatwootClient, LoggingMessenger } from "./outbound/chatwoot_client";
import {
  FakeClassifier,
  FakeNameExtractor,
  FakeOutstandingDetector,
  FakeReplyGenerator,
  FakeSemanticJudge,
} from "./providers/fake_model";
import {
  OpenAIClassifier,
  OpenAINameExtractor,
  OpenAIOutstandingDetector,
  OpenAIReplyGenerator,
  OpenAISemanticJudge,
} from "./providers/openai_collaborators";
import { SqliteSupportStore } from "./store/sqlite_support_store";

type ModelCollaborators = Pick<OrchestratorDeps, "classifier" | "nameExtractor" | "outstanding" | "generator" | "judge">;

function modelCollaborators(settings: Settings, log: PipelineLogger): ModelCollaborators {
  const apiKey = settings.openai.apiKey;
  if (settings.provider === "openai" && apiKey) {
    const opts = {
      transport: { apiKey, baseUrl: settings.openai.baseUrl },
      overrides: settings.modelOverrides,
      log,
    };
    return {
      classifier: new OpenAIClassifier(opts),
      nameExtractor: new OpenAINameExtractor(opts),
      outstanding: new OpenAIOutstandingDetector(opts),
      generator: new OpenAIReplyGenerator(opts),
      judge: new OpenAISemanticJudge(opts),
    };
  }
  return {
    classifier: new FakeClassifier(),
    nameExtractor: new FakeNameExtractor(),
    outstanding: new FakeOutstandingDetector(),
    generator: new FakeReplyGenerator(),
    judge: new FakeSemanticJudge(),
  };
}

const log = createLogger();

async function main() {
  const settings = loadSettings();
  const store = new SqliteSupportStore(settings.dbPath, log);

  const orchestrator = new PipelineOrchestrator({
    ...modelCollaborators(settings, log),
    context: store,
    store,
    links: new AesCancelLinkGenerator({ ...settings.cancelLink, log }),
    log,
    teamModeDefault: settings.teamModeEnabled,
    historyMaxTurns: settings.historyMaxTurns,
    historyTurnMaxChars: settings.historyTurnMaxChars,
  });

  const messenger: OutboundMessenger = settings.chatwoot
    ? new ChatwootClient({ ...settings.chatwoot, log })
    : new LoggingMessenger(log);

  const app = buildApp({
    orchestrator,
    store,
    dedup: new WebhookDedupCache({ ttlMs: settings.dedupTtlMs }),
    messenger,
    provider: settings.provider,
    teamMode: settings.teamModeEnabled,
    escalationAssigneeId: settings.chatwoot?.escalationAssigneeId ?? null,
    logger: { level: resolveLogLevel() },
  });

  const shutdown = async (signal: string) => {
    log.info({ evt: "server.shutdown", signal }, "server.shutdown");
    await app.close();
    store.close();
    process.exit(0);
  };
  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      log.error({ evt: "server.shutdown_failed", error: errorMessage(error) }, "server.shutdown_failed");
      process.exit(1);
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  await app.listen({ port: settings.port, host: settings.host });
  log.info({ evt: "server.started", port: settings.port, provider: settings.provider }, "server.started");
}

main().catch((err) => {
  log.error({ evt: "server.start_failed", error: errorMessage(err) }, "server.start_failed");
  process.exit(1);
});
