import { describe, expect, test } from "vitest";
import { aggregateFindings } from "../src/lib/aggregate.js";
import { buildSummary, renderMarkdown, type RenderInput } from "../src/lib/report.js";
import { METADATA, makeFinding } from "./fixtures.js";

function input(overrides: Partial<RenderInput> = {}): RenderInput {
  const report = aggregateFindings({
    findings: [
      makeFinding({ tool: "secret_scanner", severity: "critical", rule_id: "aws-key", message: "password = hunter2hunter2" }),
      makeFinding({ tool: "static_analyzer", severity: "medium", ordinal: 1 })
    ],
    tools_run: ["secret_scanner", "static_analyzer"],
    warnings: [{ kind: "data_quality_warning", tool: "policy_engine", reason: "schema_mismatch", detail: "Expected array\nreceived object" }]
  });
  return {
    verdict: {
      decision: "BLOCK_DEPLOYMENT",
      risk_level: "critical",
      reasoning: "A credential was committed.",
      recommendations: ["Rotate it"],
      source: "fallback_rules"
    },
    report,
    metadata: METADATA,
    evidence_sha256: "0".repeat(64),
    oracle_model: null,
    fallback_reason: "oracle unavailable: timeout after 2 attempt(s)",
    consistency_warning: null,
    generated_at: "2026-01-02T03:04:05.000Z",
    ...overrides
  };
}

describe("decision report", () => {
  test("renders the verdict header", () => {
    const lines = renderMarkdown(input()).split("\n");
    expect(lines.slice(0, 9)).toEqual([
      "# Deploy Guardrail Report",
      "",
      "## Decision: BLOCK DEPLOYMENT",
      "",
      "**Risk Level:** CRITICAL  ",
      "**Decided By:** fallback rules (oracle unavailable: timeout after 2 attempt(s))  ",
      "**Run:** run-1 (acme/shop@main, commit abc123)  ",
      "**Generated:** 2026-01-02T03:04:05.000Z  ",
      `**Evidence SHA-256:** \`${"0".repeat(64)}\``
    ]);
  });

  test("renders counts, warnings and prioritized findings", () => {
    const lines = renderMarkdown(input()).split("\n");
    expect(lines).toContain("| Critical | 1 |");
    expect(lines).toContain("| Medium | 1 |");
    expect(lines).toContain("| **Total** | **2** |");
    expect(lines).toContain("**Tools Run:** secret_scanner, static_analyzer");
    expect(lines).toContain("| secret_scanner | 1 | 0 | 0 | 0 | 0 |");
    expect(lines).toContain("| static_analyzer | 0 | 0 | 1 | 0 | 0 |");
    expect(lines).toContain("| policy_engine | 0 | 0 | 0 | 0 | 0 |");
    expect(lines).toContain("- **policy_engine** schema mismatch: Expected array");
    expect(lines).toContain("### Critical (showing 1 of 1)");
    expect(lines).toContain("- **[secret_scanner]** `aws-key` at `src/app.ts:1`: password = [REDACTED]");
    expect(lines).toContain("- Rotate it");
    expect(lines[lines.length - 2]).toBe("**Deployment blocked.** Address the identified issues and push again.");
  });

  test("an oracle verdict names the model and an approval says so", () => {
    const md = renderMarkdown(
      input({
        verdict: { decision: "SAFE_TO_DEPLOY", risk_level: "low", reasoning: "", recommendations: [], source: "oracle_reasoning" },
        oracle_model: "test-model",
        fallback_reason: null,
        consistency_warning: "decision SAFE_TO_DEPLOY was given with risk level low"
      })
    );
    const lines = md.split("\n");
    expect(lines).toContain("**Decided By:** oracle reasoning (model test-model)  ");
    expect(lines).toContain("> Note: decision SAFE_TO_DEPLOY was given with risk level low");
    expect(lines).toContain("_No reasoning provided._");
    expect(lines).toContain("_None._");
    expect(md.endsWith("**Deployment approved.**\n")).toBe(true);
  });

  test("the summary carries counts by tool and severity", () => {
    const summary = buildSummary(input());
    expect(summary).toEqual({
      run_id: "run-1",
      decision: "BLOCK_DEPLOYMENT",
      risk_level: "critical",
      source: "fallback_rules",
      counts: {
        policy_engine: { critical: 0, high: 0, medium: 0, low: 0, info: 0 },
        secret_scanner: { critical: 1, high: 0, medium: 0, low: 0, info: 0 },
        static_analyzer: { critical: 0, high: 0, medium: 1, low: 0, info: 0 }
      },
      severity_totals: { critical: 1, high: 0, medium: 1, low: 0, info: 0 },
      total_findings: 2,
      tools_run: ["secret_scanner", "static_analyzer"],
      data_quality_warnings: [{ tool: "policy_engine", reason: "schema_mismatch" }],
      evidence_sha256: "0".repeat(64),
      generated_at: "2026-01-02T03:04:05.000Z"
    });
  });
});
