import { z } from "zod";
import type { EvidencePayload } from "./types.js";

export type OracleFailureReason =
  | "not_configured"
  | "timeout"
  | "network"
  | "server_error"
  | "rate_limited"
  | "auth"
  | "bad_request"
  | "bad_response";

export interface OracleUnavailable {
  kind: "oracle_unavailable";
  reason: OracleFailureReason;
  status: number | null;
  attempts: number;
  message: string;
}

export type OracleResult =
  | { ok: true; answer: string; model: string; attempts: number }
  | { ok: false; error: OracleUnavailable };

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type OracleClientOptions = Readonly<{
  endpoint: string;
  api_key: string | null;
  model: string;
  timeout_ms: number;
  retries: number;
  max_tokens: number;
  fetch_impl: FetchLike;
}>;

export const SYSTEM_PROMPT =
  "You are an expert security engineer reviewing deployment readiness for a CI/CD pipeline. Be thorough but practical in your analysis.";

export const ANSWER_FORMAT = `DECISION CRITERIA:
1. BLOCK deployment if there are ANY critical issues (secrets, credentials)
2. BLOCK deployment if there are high-severity issues that pose immediate security risks
3. APPROVE WITH WARNINGS if only medium/low severity issues exist
4. APPROVE if no significant issues are found

Provide your analysis in this EXACT format:

DECISION: [SAFE_TO_DEPLOY or BLOCK_DEPLOYMENT]

RISK LEVEL: [NONE, LOW, MEDIUM, HIGH, CRITICAL]

REASONING:
[2-3 sentences explaining your decision based on the findings]

RECOMMENDATIONS:
[One recommendation per line]
`;

const ChatCompletionResponse = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string()
        })
      })
    )
    .min(1)
});

type AttemptOutcome =
  | { ok: true; answer: string; model: string }
  | { ok: false; reason: OracleFailureReason; status: number | null; message: string; transient: boolean };

export function createOracleClient(args: {
  endpoint: string;
  api_key?: string | null;
  model: string;
  timeout_ms: number;
  retries?: number;
  max_tokens?: number;
  fetch_impl?: FetchLike;
}): OracleClientOptions {
  return Object.freeze({
    endpoint: args.endpoint,
    api_key: args.api_key?.trim() || null,
    model: args.model,
    timeout_ms: args.timeout_ms,
    retries: Math.max(0, args.retries ?? 1),
    max_tokens: args.max_tokens ?? 500,
    fetch_impl: args.fetch_impl ?? ((input: string, init: RequestInit) => fetch(input, init))
  });
}

export function buildChatRequest(client: OracleClientOptions, evidence: EvidencePayload): Record<string, unknown> {
  return {
    model: client.model,
    messages: [
      { role: "system", content: SYSTEM_PROMPT },
      {
        role: "user",
        content: `Analyze the following security scan results and make a deployment decision.\n\n${evidence.text}\n${ANSWER_FORMAT}`
      }
    ],
    temperature: 0,
    max_tokens: client.max_tokens,
    stream: false
  };
}

export async function requestOracleAnswer(client: OracleClientOptions, evidence: EvidencePayload): Promise<OracleResult> {
  if (!client.api_key) {
    return {
      ok: false,
      error: { kind: "oracle_unavailable", reason: "not_configured", status: null, attempts: 0, message: "oracle API key is not configured" }
    };
  }

  const body = JSON.stringify(buildChatRequest(client, evidence));
  const maxAttempts = 1 + client.retries;
  let attempts = 0;
  let last: AttemptOutcome | null = null;

  while (attempts < maxAttempts) {
    attempts += 1;
    last = await attemptOnce(client, body);
    if (last.ok) {
      console.log(`Oracle answered model=${last.model} attempts=${attempts} run_id=${evidence.metadata.run_id}`);
      return { ok: true, answer: last.answer, model: last.model, attempts };
    }
    console.warn(`Oracle attempt ${attempts}/${maxAttempts} failed reason=${last.reason}: ${last.message}`);
    if (!last.transient) break;
  }

  const failure: OracleUnavailable = {
    kind: "oracle_unavailable",
    reason: last && !last.ok ? last.reason : "network",
    status: last && !last.ok ? last.status : null,
    attempts,
    message: last && !last.ok ? last.message : "no attempt was made"
  };
  return { ok: false, error: failure };
}

async function attemptOnce(client: OracleClientOptions, body: string): Promise<AttemptOutcome> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    Authorization: `Bearer ${client.api_key}`
  };

  let res: Response;
  let payload: unknown;
  try {
    const signal = AbortSignal.timeout(client.timeout_ms);
    res = await client.fetch_impl(client.endpoint, { method: "POST", headers, body, signal });
    if (!res.ok) {
      const detail = (await res.text()).slice(0, 500);
      return classifyHttpFailure(res.status, detail);
    }
    payload = await res.json();
  } catch (e: unknown) {
    if (isTimeout(e)) {
      return { ok: false, reason: "timeout", status: null, message: `no answer within ${client.timeout_ms}ms`, transient: true };
    }
    if (e instanceof SyntaxError) {
      return { ok: false, reason: "bad_response", status: null, message: `response is not JSON: ${e.message}`, transient: false };
    }
    return { ok: false, reason: "network", status: null, message: errorMessage(e), transient: true };
  }

  const parsed = ChatCompletionResponse.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, reason: "bad_response", status: res.status, message: parsed.error.message, transient: false };
  }
  return { ok: true, answer: parsed.data.choices[0].message.content, model: parsed.data.model ?? client.model };
}

function classifyHttpFailure(status: number, detail: string): AttemptOutcome {
  const message = `HTTP ${status}${detail ? `: ${detail}` : ""}`;
  if (status === 401 || status === 403) return { ok: false, reason: "auth", status, message, transient: false };
  if (status === 429) return { ok: false, reason: "rate_limited", status, message, transient: true };
  if (status === 408 || status >= 500) return { ok: false, reason: "server_error", status, message, transient: true };
  return { ok: false, reason: "bad_request", status, message, transient: false };
}

function isTimeout(e: unknown): boolean {
  if (typeof e !== "object" || e === null || !("name" in e)) return false;
  return e.name === "TimeoutError" || e.name === "AbortError";
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
