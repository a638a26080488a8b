import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";

import { Category, CheckSchema, Confidence, Urgency } from "../contracts/pipeline";
import type {
  CustomerProfile,
  EvalRecord,
  HistoryTurn,
  MessageRecord,
  OutstandingUpdate,
  SessionRecord,
} from "../control-plane/collaborators";
import { silentLogger, type PipelineLogger } from "../logger";
import {
  toHistory,
  type StoredEvalResult,
  type StoredMessage,
  type StoredSession,
  type SupportStore,
} from "./support_store";

const TerminalDecisionSchema = z.enum(["send", "draft", "escalate"]);
const Flag = z.number().int().transform((value) => value === 1);

const SessionRow = z.object({
  session_id: z.string(),
  conversation_id: z.string().nullable(),
  channel: z.string(),
  customer_email: z.string().nullable(),
  customer_name: z.string(),
  primary_category: Category,
  secondary_category: Category.nullable(),
  urgency: Urgency,
  status: z.literal("active"),
  eval_decision: TerminalDecisionSchema,
  first_response_time_ms: z.number(),
  is_outstanding: Flag,
  outstanding_trigger: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

const MessageRow = z.object({
  session_id: z.string(),
  turn_id: z.string(),
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  model_used: z.string().nullable(),
  reasoning_effort: z.string().nullable(),
  processing_time_ms: z.number().nullable(),
  created_at: z.string(),
});

const EvalRow = z.object({
  session_id: z.string(),
  turn_id: z.string(),
  category: Category,
  secondary_category: Category.nullable(),
  decision: TerminalDecisionSchema,
  override_reason: z.string().nullable(),
  confidence: Confidence,
  checks_json: z.string(),
  is_outstanding: Flag,
  outstanding_trigger: z.string().nullable(),
  auto_send_enabled: Flag,
  attempts: z.number().int(),
  created_at: z.string(),
});

const ProfileRow = z.object({
  email: z.string(),
  name: z.string().nullable(),
  subscription_id: z.string().nullable(),
});

const ChecksJson = z.array(CheckSchema);

function parseChecks(raw: string): StoredEvalResult["checks"] {
  const parsed = ChecksJson.safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data : [];
}

export class SqliteSupportStore implements SupportStore {
  private db: Database.Database;
  private log: PipelineLogger;

  constructor(dbPath: string = "./data/support.db", log: PipelineLogger = silentLogger) {
    this.log = log;
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.initSchema();
    this.log.info({ evt: "store.opened", dbPath }, "store.opened");
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chat_sessions (
        session_id TEXT PRIMARY KEY,
        conversation_id TEXT,
        channel TEXT NOT NULL,
        customer_email TEXT,
        customer_name TEXT NOT NULL,
        primary_category TEXT NOT NULL,
        secondary_category TEXT,
        urgency TEXT NOT NULL,
        status TEXT NOT NULL,
        eval_decision TEXT NOT NULL,
        first_response_time_ms INTEGER NOT NULL,
        is_outstanding INTEGER NOT NULL DEFAULT 0,
        outstanding_trigger TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS chat_messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL REFERENCES chat_sessions(session_id) ON DELETE CASCADE,
        turn_id TEXT NOT NULL,
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
        content TEXT NOT NULL,
        model_used TEXT,
        reasoning_effort TEXT,
        processing_time_ms INTEGER,
        created_at TEXT NOT NULL,
        UNIQUE (session_id, turn_id, role)
      );

      CREATE INDEX IF NOT EXISTS idx_chat_messages_session
        ON chat_messages(session_id, id);

      CREATE TABLE IF NOT EXISTS eval_results (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL REFERENCES chat_sessions(session_id) ON DELETE CASCADE,
        turn_id TEXT NOT NULL,
        category TEXT NOT NULL,
        secondary_category TEXT,
        decision TEXT NOT NULL,
        override_reason TEXT,
        confidence TEXT NOT NULL,
        checks_json TEXT NOT NULL,
        is_outstanding INTEGER NOT NULL,
        outstanding_trigger TEXT,
        auto_send_enabled INTEGER NOT NULL,
        attempts INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        UNIQUE (session_id, turn_id)
      );

      CREATE TABLE IF NOT EXISTS customer_profiles (
        email TEXT PRIMARY KEY COLLATE NOCASE,
        name TEXT,
        subscription_id TEXT,
        updated_at TEXT NOT NULL
      );
    `);
  }

  async saveSession(record: SessionRecord): Promise<void> {
    const now = new Date().toISOString();
    this.db.prepare(`
      INSERT INTO chat_sessions (
        session_id, conversation_id, channel, customer_email, customer_name,
        primary_category, secondary_category, urgency, status, eval_decision,
        first_response_time_ms, created_at, updated_at
      ) VALUES (
        @sessionId, @conversationId, @channel, @customerEmail, @customerName,
        @primaryCategory, @secondaryCategory, @urgency, @status, @evalDecision,
        @firstResponseTimeMs, @now, @now
      )
      ON CONFLICT(session_id) DO UPDATE SET
        primary_category = excluded.primary_category,
        secondary_category = excluded.secondary_category,
        urgency = excluded.urgency,
        eval_decision = excluded.eval_decision,
        first_response_time_ms = excluded.first_response_time_ms,
        updated_at = excluded.updated_at
    `).run({ ...record, now });
  }

  async saveMessage(record: MessageRecord): Promise<void> {
    this.db.prepare(`
      INSERT INTO chat_messages (
        session_id, turn_id, role, content, model_used, reasoning_effort,
        processing_time_ms, created_at
      ) VALUES (
        @sessionId, @turnId, @role, @content, @modelUsed, @reasoningEffort,
        @processingTimeMs, @createdAt
      )
      ON CONFLICT(session_id, turn_id, role) DO UPDATE SET
        content = excluded.content,
        model_used = excluded.model_used,
        reasoning_effort = excluded.reasoning_effort,
        processing_time_ms = excluded.processing_time_ms
    `).run({ ...record, createdAt: new Date().toISOString() });
  }

  async saveEvalResult(record: EvalRecord): Promise<void> {
    this.db.prepare(`
      INSERT INTO eval_results (
        session_id, turn_id, category, secondary_category, decision, override_reason,
        confidence, checks_json, is_outstanding, outstanding_trigger, auto_send_enabled,
        attempts, created_at
      ) VALUES (
        @sessionId, @turnId, @category, @secondaryCategory, @decision, @overrideReason,
        @confidence, @checksJson, @isOutstanding, @outstandingTrigger, @autoSendEnabled,
        @attempts, @createdAt
      )
      ON CONFLICT(session_id, turn_id) DO UPDATE SET
        decision = excluded.decision,
        override_reason = excluded.override_reason,
        confidence = excluded.confidence,
        checks_json = excluded.checks_json,
        is_outstanding = excluded.is_outstanding,
        outstanding_trigger = excluded.outstanding_trigger,
        attempts = excluded.attempts
    `).run({
      sessionId: record.sessionId,
      turnId: record.turnId,
      category: record.category,
      secondaryCategory: record.secondaryCategory,
      decision: record.decision,
      overrideReason: record.overrideReason,
      confidence: record.confidence,
      checksJson: JSON.stringify(record.checks),
      isOutstanding: record.isOutstanding ? 1 : 0,
      outstandingTrigger: record.outstandingTrigger,
      autoSendEnabled: record.autoSendEnabled ? 1 : 0,
      attempts: record.attempts,
      createdAt: new Date().toISOString(),
    });
  }

  async updateOutstanding(update: OutstandingUpdate): Promise<void> {
    const result = this.db.prepare(`
      UPDATE chat_sessions
      SET is_outstanding = ?, outstanding_trigger = ?, eval_decision = ?, updated_at = ?
      WHERE session_id = ?
    `).run(
      update.isOutstanding ? 1 : 0,
      update.outstandingTrigger,
      update.evalDecision,
      new Date().toISOString(),
      update.sessionId
    );
    if (result.changes === 0) {
      this.log.warn({ evt: "store.outstanding_no_session", sessionId: update.sessionId }, "store.outstanding_no_session");
    }
  }

  async upsertProfile(profile: CustomerProfile): Promise<void> {
    this.db.prepare(`
      INSERT INTO customer_profiles (email, name, subscription_id, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(email) DO UPDATE SET
        name = excluded.name,
        subscription_id = excluded.subscription_id,
        updated_at = excluded.updated_at
    `).run(profile.email, profile.name, profile.subscriptionId, new Date().toISOString());
  }

  async profile(email: string): Promise<CustomerProfile | null> {
    const row = this.db
      .prepare("SELECT email, name, subscription_id FROM customer_profiles WHERE email = ?")
      .get(email);
    if (row === undefined) return null;
    const parsed = ProfileRow.parse(row);
    return { email: parsed.email, name: parsed.name, subscriptionId: parsed.subscription_id };
  }

  async history(sessionId: string): Promise<HistoryTurn[]> {
    return toHistory(await this.getMessages(sessionId));
  }

  async getSession(sessionId: string): Promise<StoredSession | null> {
    const row = this.db.prepare("SELECT * FROM chat_sessions WHERE session_id = ?").get(sessionId);
    if (row === undefined) return null;
    const r = SessionRow.parse(row);
    return {
      sessionId: r.session_id,
      conversationId: r.conversation_id,
      channel: r.channel,
      customerEmail: r.customer_email,
      customerName: r.customer_name,
      primaryCategory: r.primary_category,
      secondaryCategory: r.secondary_category,
      urgency: r.urgency,
      status: r.status,
      evalDecision: r.eval_decision,
      firstResponseTimeMs: r.first_response_time_ms,
      isOutstanding: r.is_outstanding,
      outstandingTrigger: r.outstanding_trigger,
      createdAt: r.created_at,
      updatedAt: r.updated_at,
    };
  }

  async getMessages(sessionId: string): Promise<StoredMessage[]> {
    const rows = this.db
      .prepare("SELECT * FROM chat_messages WHERE session_id = ? ORDER BY id ASC")
      .all(sessionId);
    return rows.map((row) => {
      const r = MessageRow.parse(row);
      return {
        sessionId: r.session_id,
        turnId: r.turn_id,
        role: r.role,
        content: r.content,
        modelUsed: r.model_used,
        reasoningEffort: r.reasoning_effort,
        processingTimeMs: r.processing_time_ms,
        createdAt: r.created_at,
      };
    });
  }

  async getEvalResults(sessionId: string): Promise<StoredEvalResult[]> {
    const rows = this.db
      .prepare("SELECT * FROM eval_results WHERE session_id = ? ORDER BY id ASC")
      .all(sessionId);
    return rows.map((row) => {
      const r = EvalRow.parse(row);
      return {
        sessionId: r.session_id,
        turnId: r.turn_id,
        category: r.category,
        secondaryCategory: r.secondary_category,
        decision: r.decision,
        overrideReason: r.override_reason,
        confidence: r.confidence,
        checks: parseChecks(r.checks_json),
        isOutstanding: r.is_outstanding,
        outstandingTrigger: r.outstanding_trigger,
        autoSendEnabled: r.auto_send_enabled,
        attempts: r.attempts,
        createdAt: r.created_at,
      };
    });
  }

  close(): void {
    this.db.close();
  }
}
