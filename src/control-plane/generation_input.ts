import type { HistoryTurn } from "./collaborators";

export const DEFAULT_HISTORY_MAX_TURNS = 10;
export const DEFAULT_HISTORY_TURN_MAX_CHARS = 500;

export type GenerationInputParts = {
  customerName: string;
  customerEmail: string | null;
  history: HistoryTurn[];
  message: string;
  maxTurns?: number;
  maxTurnChars?: number;
};

function clip(content: string, maxChars: number): string {
  return content.length > maxChars ? `${content.slice(0, maxChars)}...` : content;
}

export function buildGenerationInput(parts: GenerationInputParts): string {
  const maxTurns = parts.maxTurns ?? DEFAULT_HISTORY_MAX_TURNS;
  const maxChars = parts.maxTurnChars ?? DEFAULT_HISTORY_TURN_MAX_CHARS;

  const lines = [`[Customer Name: ${parts.customerName}]`];
  if (parts.customerEmail) {
    lines.push(`[Customer Email: ${parts.customerEmail}]`);
  }

  const window = maxTurns > 0 ? parts.history.slice(-maxTurns) : [];
  if (window.length > 0) {
    lines.push("", "[Conversation History]");
    for (const turn of window) {
      const speaker = turn.role === "user" ? "Customer" : "Agent";
      lines.push(`${speaker}: ${clip(turn.content, maxChars)}`);
    }
    lines.push("[End History]");
  }

  lines.push("", parts.message);
  return lines.join("\n");
}

export function appendQaFeedback(input: string, feedback: string | null): string {
  return `${input}\n\n[QA FEEDBACK — please revise your response]\n${feedback ?? ""}\n[End QA Feedback]`;
}
