import { config as loadEnv } from "dotenv";
import { z } from "zod";

import { modelOverridesFromEnv, type ModelOverrides } from "./providers/provider_config";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

const Flag = z
  .enum(["0", "1", "true", "false"])
  .default("0")
  .transform((value) => value === "1" || value === "true");

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(3333),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.string().optional(),
  LLM_PROVIDER: z.enum(["fake", "openai"]).default("fake"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  TEAM_MODE_ENABLED: Flag,
  SUPPORT_DB_PATH: z.string().min(1).default("./data/support.db"),
  CANCEL_LINK_PASSWORD: z.string().optional(),
  CANCEL_LINK_BASE_URL: z.string().url().default("https://shop.example.com/pay/subscriptions/cancel"),
  CHATWOOT_URL: z.string().url().optional(),
  CHATWOOT_API_TOKEN: z.string().optional(),
  CHATWOOT_ACCOUNT_ID: z.coerce.number().int().positive().optional(),
  CHATWOOT_ESCALATION_ASSIGNEE_ID: z.coerce.number().int().positive().optional(),
  WEBHOOK_DEDUP_TTL_SECONDS: z.coerce.number().positive().default(300),
  HISTORY_MAX_TURNS: z.coerce.number().int().nonnegative().default(10),
  HISTORY_TURN_MAX_CHARS: z.coerce.number().int().positive().default(500),
});

export type ChatwootSettings = {
  url: string;
  apiToken: string;
  accountId: number;
  escalationAssigneeId: number | null;
};

export type Settings = {
  port: number;
  host: string;
  provider: "fake" | "openai";
  openai: { apiKey: string | null; baseUrl: string };
  modelOverrides: ModelOverrides;
  teamModeEnabled: boolean;
  dbPath: string;
  cancelLink: { password: string | null; baseUrl: string };
  // Null unless url, token and account are all set.
  chatwoot: ChatwootSettings | null;
  dedupTtlMs: number;
  historyMaxTurns: number;
  historyTurnMaxChars: number;
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// `KEY=` in a .env file means unset.
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === "string" && value.trim() !== "") out[key] = value;
  }
  return out;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const cleaned = withoutBlanks(env);
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    );
  }
  const e = parsed.data;

  if (e.LLM_PROVIDER === "openai" && !e.OPENAI_API_KEY) {
    throw new ConfigError(["OPENAI_API_KEY: required when LLM_PROVIDER=openai"]);
  }

  const chatwoot =
    e.CHATWOOT_URL && e.CHATWOOT_API_TOKEN && e.CHATWOOT_ACCOUNT_ID
      ? {
          url: e.CHATWOOT_URL.replace(/\/+$/, ""),
          apiToken: e.CHATWOOT_API_TOKEN,
          accountId: e.CHATWOOT_ACCOUNT_ID,
          escalationAssigneeId: e.CHATWOOT_ESCALATION_ASSIGNEE_ID ?? null,
        }
      : null;

  // The fake judge approves everything, so canned replies would reach real customers.
  if (e.NODE_ENV === "production" && e.LLM_PROVIDER === "fake" && chatwoot) {
    throw new ConfigError(["LLM_PROVIDER: fake cannot post to Chatwoot in production; use openai"]);
  }

  return {
    port: e.PORT,
    host: e.HOST,
    provider: e.LLM_PROVIDER,
    openai: { apiKey: e.OPENAI_API_KEY ?? null, baseUrl: e.OPENAI_BASE_URL.replace(/\/+$/, "") },
    modelOverrides: modelOverridesFromEnv(cleaned),
    teamModeEnabled: e.TEAM_MODE_ENABLED,
    dbPath: e.SUPPORT_DB_PATH,
    cancelLink: { password: e.CANCEL_LINK_PASSWORD ?? null, baseUrl: e.CANCEL_LINK_BASE_URL },
    chatwoot,
    dedupTtlMs: e.WEBHOOK_DEDUP_TTL_SECONDS * 1000,
    historyMaxTurns: e.HISTORY_MAX_TURNS,
    historyTurnMaxChars: e.HISTORY_TURN_MAX_CHARS,
  };
}
