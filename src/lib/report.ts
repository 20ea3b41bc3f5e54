import fs from "node:fs";
import path from "node:path";
import { formatLocation } from "./evidence.js";
import { redactText } from "./redact.js";
import {
  SEVERITIES,
  TOOLS,
  type AggregatedReport,
  type Decision,
  type RiskLevel,
  type RunMetadata,
  type SeverityCounts,
  type Tool,
  type Verdict,
  type VerdictSource
} from "./types.js";

export const REPORT_FILENAME = "guardrail-report.md";
export const SUMMARY_FILENAME = "guardrail-summary.json";

export class RenderError extends Error {
  readonly code = "RENDER_FAILED";
  readonly target: string;

  constructor(message: string, target: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RenderError";
    this.target = target;
  }
}

export interface RenderInput {
  verdict: Verdict;
  report: AggregatedReport;
  metadata: RunMetadata;
  evidence_sha256: string;
  oracle_model: string | null;
  fallback_reason: string | null;
  consistency_warning: string | null;
  generated_at: string;
}

export type RunSummary = {
  run_id: string;
  decision: Decision;
  risk_level: RiskLevel;
  source: VerdictSource;
  counts: Record<Tool, SeverityCounts>;
  severity_totals: SeverityCounts;
  total_findings: number;
  tools_run: Tool[];
  data_quality_warnings: Array<{ tool: Tool; reason: string }>;
  evidence_sha256: string;
  generated_at: string;
};

export type WrittenReport = {
  report_file: string;
  summary_file: string;
};

export function buildSummary(input: RenderInput): RunSummary {
  return {
    run_id: input.metadata.run_id,
    decision: input.verdict.decision,
    risk_level: input.verdict.risk_level,
    source: input.verdict.source,
    counts: input.report.counts,
    severity_totals: input.report.severity_totals,
    total_findings: input.report.total_findings,
    tools_run: input.report.tools_run,
    data_quality_warnings: input.report.data_quality_warnings.map((w) => ({ tool: w.tool, reason: w.reason })),
    evidence_sha256: input.evidence_sha256,
    generated_at: input.generated_at
  };
}

export function renderMarkdown(input: RenderInput): string {
  const { verdict, report, metadata } = input;
  const out: string[] = [];

  out.push("# Deploy Guardrail Report", "");
  out.push(`## Decision: ${verdict.decision.replace(/_/g, " ")}`, "");
  out.push(`**Risk Level:** ${verdict.risk_level.toUpperCase()}  `);
  out.push(`**Decided By:** ${describeSource(input)}  `);
  out.push(`**Run:** ${metadata.run_id} (${metadata.repository}@${metadata.branch}, commit ${metadata.commit})  `);
  out.push(`**Generated:** ${input.generated_at}  `);
  out.push(`**Evidence SHA-256:** \`${input.evidence_sha256}\``);
  if (input.consistency_warning) {
    out.push("", `> Note: ${input.consistency_warning}`);
  }

  out.push("", "## Reasoning", "", verdict.reasoning || "_No reasoning provided._");
  out.push("", "## Recommendations", "");
  if (verdict.recommendations.length === 0) out.push("_None._");
  for (const r of verdict.recommendations) out.push(`- ${r}`);

  out.push("", "## Security Scan Summary", "", "| Severity | Count |", "|----------|-------|");
  for (const s of SEVERITIES) out.push(`| ${capitalize(s)} | ${report.severity_totals[s]} |`);
  out.push(`| **Total** | **${report.total_findings}** |`);
  out.push("", `**Tools Run:** ${report.tools_run.length > 0 ? report.tools_run.join(", ") : "none"}`);

  out.push("", "## Findings by Tool", "", `| Tool | ${SEVERITIES.map(capitalize).join(" | ")} |`, `|------|${SEVERITIES.map(() => "---").join("|")}|`);
  for (const tool of TOOLS) {
    out.push(`| ${tool} | ${SEVERITIES.map((s) => report.counts[tool][s]).join(" | ")} |`);
  }

  if (report.data_quality_warnings.length > 0) {
    out.push("", "## Data Quality Warnings", "");
    for (const w of report.data_quality_warnings) {
      out.push(`- **${w.tool}** ${w.reason.replace(/_/g, " ")}: ${firstLine(w.detail)}`);
    }
  }

  out.push("", "## Prioritized Findings");
  let anyShown = false;
  for (const s of SEVERITIES) {
    const tier = report.prioritized[s];
    if (tier.length === 0) continue;
    anyShown = true;
    out.push("", `### ${capitalize(s)} (showing ${tier.length} of ${report.severity_totals[s]})`, "");
    for (const f of tier) {
      out.push(`- **[${f.tool}]** \`${f.rule_id}\` at \`${formatLocation(f)}\`: ${redactText(firstLine(f.message))}`);
    }
  }
  if (!anyShown) out.push("", "_No findings._");

  out.push("", "---", "");
  if (verdict.decision === "SAFE_TO_DEPLOY") {
    out.push("**Deployment approved.**");
  } else {
    out.push("**Deployment blocked.** Address the identified issues and push again.");
  }
  return out.join("\n") + "\n";
}

export function writeReport(args: { dir: string; input: RenderInput; github_output?: string | null }): WrittenReport {
  const reportFile = path.join(args.dir, REPORT_FILENAME);
  const summaryFile = path.join(args.dir, SUMMARY_FILENAME);

  writeOrThrow(args.dir, () => fs.mkdirSync(args.dir, { recursive: true }));
  writeOrThrow(reportFile, () => fs.writeFileSync(reportFile, renderMarkdown(args.input), "utf8"));
  writeOrThrow(summaryFile, () => fs.writeFileSync(summaryFile, JSON.stringify(buildSummary(args.input), null, 2) + "\n", "utf8"));

  if (args.github_output) {
    const target = args.github_output;
    const lines = [
      `decision=${args.input.verdict.decision}`,
      `risk_level=${args.input.verdict.risk_level.toUpperCase()}`,
      `source=${args.input.verdict.source}`,
      `report_file=${reportFile}`
    ];
    writeOrThrow(target, () => fs.appendFileSync(target, lines.join("\n") + "\n", "utf8"));
  }

  console.log(`Report written report_file=${reportFile} summary_file=${summaryFile}`);
  return { report_file: reportFile, summary_file: summaryFile };
}

function writeOrThrow(target: string, op: () => void): void {
  try {
    op();
  } catch (e: unknown) {
    throw new RenderError(`failed to write ${target}: ${e instanceof Error ? e.message : String(e)}`, target, { cause: e });
  }
}

function describeSource(input: RenderInput): string {
  if (input.verdict.source === "oracle_reasoning") {
    return `oracle reasoning${input.oracle_model ? ` (model ${input.oracle_model})` : ""}`;
  }
  return `fallback rules${input.fallback_reason ? ` (${input.fallback_reason})` : ""}`;
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

function firstLine(s: string): string {
  return s.split(/\r?\n/)[0].trim();
}
