import type {
  ContextProvider,
  CustomerProfile,
  EvalRecord,
  HistoryTurn,
  MessageRecord,
  OutstandingUpdate,
  PersistenceStore,
  SessionRecord,
} from "../control-plane/collaborators";

export type StoredSession = SessionRecord & {
  isOutstanding: boolean;
  outstandingTrigger: string | null;
  createdAt: string;
  updatedAt: string;
};

export type StoredMessage = MessageRecord & { createdAt: string };

export type StoredEvalResult = EvalRecord & { createdAt: string };

export interface SupportStore extends PersistenceStore, ContextProvider {
  upsertProfile(profile: CustomerProfile): Promise<void>;
  getSession(sessionId: string): Promise<StoredSession | null>;
  getMessages(sessionId: string): Promise<StoredMessage[]>;
  getEvalResults(sessionId: string): Promise<StoredEvalResult[]>;
}

export class UnknownSessionError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Unknown session: ${sessionId}`);
    this.name = "UnknownSessionError";
    this.sessionId = sessionId;
  }
}

export function toHistory(messages: StoredMessage[]): HistoryTurn[] {
  return messages.map((message) => ({
    role: message.role,
    content: message.content,
    timestamp: message.createdAt,
  }));
}

const messageKey = (m: { sessionId: string; turnId: string; role: string }) =>
  `${m.sessionId}:${m.turnId}:${m.role}`;
const evalKey = (e: { sessionId: string; turnId: string }) => `${e.sessionId}:${e.turnId}`;

/**
 * Map-backed store with the same upsert keys and session reference checks as
 * the SQLite store.
 */
export class MemorySupportStore implements SupportStore {
  private sessions = new Map<string, StoredSession>();
  private messages = new Map<string, StoredMessage>();
  private evals = new Map<string, StoredEvalResult>();
  private profiles = new Map<string, CustomerProfile>();

  private requireSession(sessionId: string): void {
    if (!this.sessions.has(sessionId)) throw new UnknownSessionError(sessionId);
  }

  async saveSession(record: SessionRecord): Promise<void> {
    const now = new Date().toISOString();
    const existing = this.sessions.get(record.sessionId);
    if (!existing) {
      this.sessions.set(record.sessionId, {
        ...record,
        isOutstanding: false,
        outstandingTrigger: null,
        createdAt: now,
        updatedAt: now,
      });
      return;
    }
    this.sessions.set(record.sessionId, {
      ...existing,
      primaryCategory: record.primaryCategory,
      secondaryCategory: record.secondaryCategory,
      urgency: record.urgency,
      evalDecision: record.evalDecision,
      firstResponseTimeMs: record.firstResponseTimeMs,
      updatedAt: now,
    });
  }

  async saveMessage(record: MessageRecord): Promise<void> {
    this.requireSession(record.sessionId);
    const key = messageKey(record);
    const existing = this.messages.get(key);
    this.messages.set(key, { ...record, createdAt: existing?.createdAt ?? new Date().toISOString() });
  }

  async saveEvalResult(record: EvalRecord): Promise<void> {
    this.requireSession(record.sessionId);
    const key = evalKey(record);
    const existing = this.evals.get(key);
    this.evals.set(key, { ...record, createdAt: existing?.createdAt ?? new Date().toISOString() });
  }

  async updateOutstanding(update: OutstandingUpdate): Promise<void> {
    const existing = this.sessions.get(update.sessionId);
    if (!existing) return;
    this.sessions.set(update.sessionId, {
      ...existing,
      isOutstanding: update.isOutstanding,
      outstandingTrigger: update.outstandingTrigger,
      evalDecision: update.evalDecision,
      updatedAt: new Date().toISOString(),
    });
  }

  async upsertProfile(profile: CustomerProfile): Promise<void> {
    this.profiles.set(profile.email.toLowerCase(), { ...profile });
  }

  async profile(email: string): Promise<CustomerProfile | null> {
    return this.profiles.get(email.toLowerCase()) ?? null;
  }

  async history(sessionId: string): Promise<HistoryTurn[]> {
    return toHistory(await this.getMessages(sessionId));
  }

  async getSession(sessionId: string): Promise<StoredSession | null> {
    return this.sessions.get(sessionId) ?? null;
  }

  // Map iteration order is insertion order, which matches the SQLite rowid order.
  async getMessages(sessionId: string): Promise<StoredMessage[]> {
    return Array.from(this.messages.values()).filter((m) => m.sessionId === sessionId);
  }

  async getEvalResults(sessionId: string): Promise<StoredEvalResult[]> {
    return Array.from(this.evals.values()).filter((e) => e.sessionId === sessionId);
  }
}
