import type { Category, Check, Confidence, TerminalDecision, Urgency } from "../contracts/pipeline";

export type Classification = {
  primary: Category;
  secondary: Category | null;
  urgency: Urgency;
  email: string | null;
};

// Raw classifier output; `primary` is untrusted until checked against CATEGORIES.
export type RawClassification = {
  primary: string;
  secondary?: string | null;
  urgency?: string | null;
  email?: string | null;
};

export interface Classifier {
  classify(message: string): Promise<RawClassification>;
}

export interface NameExtractor {
  extract(message: string, knownName?: string | null): Promise<string>;
}

export type HistoryTurn = {
  role: "user" | "assistant";
  content: string;
  timestamp: string;
};

export type CustomerProfile = {
  email: string;
  name: string | null;
  subscriptionId: string | null;
};

export interface ContextProvider {
  /** Ordered oldest first (most recent last). */
  history(sessionId: string): Promise<HistoryTurn[]>;
  profile(email: string): Promise<CustomerProfile | null>;
}

export type GenerationRequest = {
  category: Category;
  email: string | null;
  input: string;
  teamMode: boolean;
};

export type ModelChoice = {
  model: string;
  reasoningEffort: string | null;
};

export interface ReplyGenerator {
  generate(request: GenerationRequest): Promise<string>;
  /** Model the generator would use for this category; reported in result metadata. */
  modelFor(category: Category, teamMode: boolean): ModelChoice;
  /** Tools actually wired into generation; the gate only trusts reply data that came from these. */
  toolsFor(category: Category): string[];
}

export type OutstandingResult = {
  isOutstanding: boolean;
  trigger: string;
  confidence: Confidence;
};

export interface OutstandingDetector {
  detect(message: string, category: Category): Promise<OutstandingResult>;
}

export interface LinkGenerator {
  cancelLink(subscriptionRef: string, email: string): Promise<string | null>;
}

export type JudgeRequest = {
  judgeName: "eval_gate" | "qa_gate";
  instructions: string;
  prompt: string;
};

/** Returns the judge's raw text; the gate owns parsing. */
export interface SemanticJudge {
  judge(request: JudgeRequest): Promise<string>;
}

export type SessionRecord = {
  sessionId: string;
  conversationId: string | null;
  channel: string;
  customerEmail: string | null;
  customerName: string;
  primaryCategory: Category;
  secondaryCategory: Category | null;
  urgency: Urgency;
  status: "active";
  evalDecision: TerminalDecision;
  firstResponseTimeMs: number;
};

export type MessageRecord = {
  sessionId: string;
  turnId: string;
  role: "user" | "assistant";
  content: string;
  modelUsed: string | null;
  reasoningEffort: string | null;
  processingTimeMs: number | null;
};

export type EvalRecord = {
  sessionId: string;
  turnId: string;
  category: Category;
  secondaryCategory: Category | null;
  decision: TerminalDecision;
  overrideReason: string | null;
  confidence: Confidence;
  checks: Check[];
  isOutstanding: boolean;
  outstandingTrigger: string | null;
  autoSendEnabled: boolean;
  attempts: number;
};

export type OutstandingUpdate = {
  sessionId: string;
  isOutstanding: boolean;
  outstandingTrigger: string | null;
  evalDecision: TerminalDecision;
};

export interface PersistenceStore {
  saveSession(record: SessionRecord): Promise<void>;
  saveMessage(record: MessageRecord): Promise<void>;
  saveEvalResult(record: EvalRecord): Promise<void>;
  updateOutstanding(update: OutstandingUpdate): Promise<void>;
}

export type ConversationStatus = "open" | "pending" | "resolved" | "snoozed";

export interface OutboundMessenger {
  sendMessage(conversationId: number, content: string, isPrivate: boolean): Promise<void>;
  setStatus(conversationId: number, status: ConversationStatus): Promise<void>;
  addLabels(conversationId: number, labels: string[]): Promise<void>;
  assign(conversationId: number, agentId: number): Promise<void>;
}
