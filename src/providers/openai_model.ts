import { z } from "zod";

import type { PipelineLogger } from "../logger";

export class ProviderError extends Error {
  statusCode: number;
  retryable: boolean;
  errorType?: string;
  errorCode?: string;
  retryAfterMs?: number;

  constructor(
    message: string,
    args: {
      statusCode?: number;
      retryable?: boolean;
      errorType?: string;
      errorCode?: string;
      retryAfterMs?: number;
    } = {}
  ) {
    super(message);
    this.name = "ProviderError";
    this.statusCode = args.statusCode ?? 502;
    this.retryable = args.retryable ?? true;
    this.errorType = args.errorType;
    this.errorCode = args.errorCode;
    this.retryAfterMs = args.retryAfterMs;
  }
}

export type JsonSchema = { [key: string]: unknown };

export type OpenAITransport = {
  apiKey: string;
  baseUrl: string;
  fetchImpl?: typeof fetch;
  log?: PipelineLogger;
};

export type OpenAIRequest = {
  model: string;
  instructions: string;
  input: string;
  reasoningEffort?: string | null;
  // Omit for free text.
  schema?: { name: string; schema: JsonSchema };
  maxOutputTokens?: number;
};

const ErrorBody = z.object({
  error: z
    .object({
      type: z.string().nullish(),
      code: z.string().nullish(),
      message: z.string().nullish(),
    })
    .nullish(),
});

const ResponseBody = z.object({
  output: z
    .array(
      z.object({
        content: z.array(z.object({ text: z.string().optional() }).passthrough()).nullish(),
      }).passthrough()
    )
    .nullish(),
  output_text: z.string().nullish(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Strict structured output requires additionalProperties=false on every object.
export function sanitizeJsonSchema(schema: unknown): unknown {
  if (Array.isArray(schema)) return schema.map(sanitizeJsonSchema);
  if (!isRecord(schema)) return schema;

  const copy: Record<string, unknown> = { ...schema };
  if (copy.type === "object" && copy.additionalProperties === undefined) {
    copy.additionalProperties = false;
  }
  if (isRecord(copy.properties)) {
    const nextProps: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(copy.properties)) {
      nextProps[key] = sanitizeJsonSchema(value);
    }
    copy.properties = nextProps;
  }
  for (const key of ["items", "anyOf", "oneOf", "allOf"]) {
    if (copy[key] !== undefined) copy[key] = sanitizeJsonSchema(copy[key]);
  }
  return copy;
}

export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (!Number.isNaN(seconds)) return Math.max(0, Math.floor(seconds * 1000));
  const retryDate = Date.parse(header);
  if (!Number.isNaN(retryDate)) return Math.max(0, retryDate - now);
  return undefined;
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export function extractOutputText(data: unknown): string | null {
  const parsed = ResponseBody.safeParse(data);
  if (!parsed.success) return null;
  for (const item of parsed.data.output ?? []) {
    for (const part of item.content ?? []) {
      if (typeof part.text === "string" && part.text) return part.text;
    }
  }
  return parsed.data.output_text || null;
}

/**
 * One Responses API call. Returns the first text output; errors surface as
 * ProviderError with the upstream status and retry hints.
 */
export async function openAIResponse(transport: OpenAITransport, request: OpenAIRequest): Promise<string> {
  const fetchImpl = transport.fetchImpl ?? fetch;

  const body: Record<string, unknown> = {
    model: request.model,
    store: false,
    stream: false,
    instructions: request.instructions,
    input: request.input,
  };
  if (request.schema) {
    body.text = {
      format: {
        type: "json_schema",
        name: request.schema.name,
        strict: true,
        schema: sanitizeJsonSchema(request.schema.schema),
      },
    };
  }
  if (request.reasoningEffort) {
    body.reasoning = { effort: request.reasoningEffort };
  }
  if (typeof request.maxOutputTokens === "number") {
    body.max_output_tokens = request.maxOutputTokens;
  }

  const res = await fetchImpl(`${transport.baseUrl}/responses`, {
    method: "POST",
    headers: {
      "content-type": "application/json",
      authorization: `Bearer ${transport.apiKey}`,
    },
    body: JSON.stringify(body),
  });

  if (!res.ok) {
    const text = await res.text();
    const parsed = ErrorBody.safeParse(safeJson(text));
    const upstream = parsed.success ? parsed.data.error : null;
    const errorType = upstream?.type ?? undefined;
    const errorCode = upstream?.code ?? undefined;
    const requestId = res.headers.get("x-request-id") ?? undefined;
    const bodySnippet = (upstream?.message ?? text).slice(0, 500);
    const isInvalidRequest = errorType === "invalid_request_error";
    const isInvalidSchema = isInvalidRequest && errorCode === "invalid_json_schema";

    transport.log?.error(
      { evt: "openai.request_failed", statusCode: res.status, requestId, bodySnippet, errorType, errorCode },
      "openai.request_failed"
    );
    throw new ProviderError(`OpenAI error ${res.status}: ${bodySnippet}`, {
      statusCode: res.status,
      retryable: !isInvalidRequest,
      errorType,
      errorCode,
      retryAfterMs: isInvalidSchema ? undefined : parseRetryAfter(res.headers.get("retry-after")),
    });
  }

  const content = extractOutputText(await res.json());
  if (!content) {
    throw new ProviderError("OpenAI response missing content", { statusCode: 502, retryable: true });
  }
  return content;
}
