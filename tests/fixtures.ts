import path from "node:path";
import type { EngineSettings } from "../src/lib/engine.js";
import { DEFAULT_EVIDENCE_LIMITS, type EvidenceLimits } from "../src/lib/evidence.js";
import { createOracleClient, type FetchLike } from "../src/lib/oracle.js";
import { loadSeverityMapFromFile, type SeverityMap } from "../src/lib/severity.js";
import type { Finding, RunMetadata, Severity, Tool } from "../src/lib/types.js";

export const SEVERITY_MAP_FILE = path.join(process.cwd(), "policy", "severity-map.default.json");

export const METADATA: RunMetadata = {
  run_id: "run-1",
  branch: "main",
  commit: "abc123",
  repository: "acme/shop"
};

export function loadDefaultSeverityMap(): SeverityMap {
  return loadSeverityMapFromFile(SEVERITY_MAP_FILE);
}

export function makeFinding(args: { tool: Tool; severity: Severity; ordinal?: number; message?: string; rule_id?: string }): Finding {
  const ordinal = args.ordinal ?? 0;
  return {
    finding_id: `${args.tool}:${ordinal}`,
    tool: args.tool,
    severity: args.severity,
    native_severity: null,
    rule_id: args.rule_id ?? `${args.tool}-rule-${ordinal}`,
    location: { path: "src/app.ts", line: ordinal + 1 },
    message: args.message ?? `${args.severity} issue ${ordinal}`,
    raw_payload: {},
    ordinal
  };
}

export function testSettings(
  overrides: {
    api_key?: string | null;
    fetch_impl?: FetchLike;
    retries?: number;
    timeout_ms?: number;
    high_block_threshold?: number;
    evidence?: Partial<EvidenceLimits>;
  } = {}
): EngineSettings {
  return {
    severity_map: loadDefaultSeverityMap(),
    evidence: { ...DEFAULT_EVIDENCE_LIMITS, ...overrides.evidence },
    fallback: { high_block_threshold: overrides.high_block_threshold ?? 0 },
    oracle: createOracleClient({
      endpoint: "http://oracle.test/v1/chat/completions",
      api_key: overrides.api_key === undefined ? null : overrides.api_key,
      model: "test-model",
      timeout_ms: overrides.timeout_ms ?? 1000,
      retries: overrides.retries ?? 1,
      fetch_impl: overrides.fetch_impl ?? failingFetch()
    })
  };
}

export function chatResponse(content: string, status = 200): Response {
  return new Response(JSON.stringify({ model: "test-model", choices: [{ message: { role: "assistant", content } }] }), {
    status,
    headers: { "content-type": "application/json" }
  });
}

// Never answers; rejects once the request signal aborts.
export function hangingFetch(): FetchLike {
  return (_url, init) =>
    new Promise<Response>((_resolve, reject) => {
      const signal = init.signal;
      if (!signal) return;
      signal.addEventListener("abort", () => reject(signal.reason), { once: true });
    });
}

export function failingFetch(): FetchLike {
  return async () => {
    throw new Error("tests must not reach the network");
  };
}

export function gitleaksFinding(index: number): Record<string, unknown> {
  return {
    RuleID: "generic-api-key",
    Description: "Generic API Key",
    File: `config/app${index}.env`,
    StartLine: 12,
    Secret: "test-secret",
    Match: "API_KEY=test-secret"
  };
}

export function semgrepResult(severity: string, index: number): Record<string, unknown> {
  return {
    check_id: `javascript.lang.security.rule-${index}`,
    path: `src/module${index}.js`,
    start: { line: index + 1, col: 1 },
    extra: { severity, message: `Semgrep ${severity.toLowerCase()} ${index}` }
  };
}
