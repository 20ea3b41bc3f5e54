import { canonicalSha256 } from "./canonicalJson.js";
import { redactText } from "./redact.js";
import { SEVERITIES, TOOLS, type AggregatedReport, type EvidencePayload, type Finding, type RunMetadata, type Severity } from "./types.js";

export interface EvidenceLimits {
  max_per_tier: number;
  max_message_chars: number;
  max_total_chars: number;
}

export const DEFAULT_EVIDENCE_LIMITS: EvidenceLimits = {
  max_per_tier: 5,
  max_message_chars: 240,
  max_total_chars: 6000
};

export const TRUNCATION_NOTE = "\n[additional findings omitted to fit the evidence size limit]\n";

type Entry = { severity: Severity; line: string };

export function composeEvidence(report: AggregatedReport, metadata: RunMetadata, limits: EvidenceLimits = DEFAULT_EVIDENCE_LIMITS): EvidencePayload {
  const maxTotal = Math.max(0, limits.max_total_chars);
  const header = renderHeader(report, metadata);

  const entries: Entry[] = [];
  for (const severity of SEVERITIES) {
    const tier = report.prioritized[severity].slice(0, Math.max(0, limits.max_per_tier));
    for (const f of tier) entries.push({ severity, line: renderFinding(f, limits.max_message_chars) });
  }

  let kept = entries;
  let text = header + renderFindings(report, kept);
  let truncated = false;
  if (text.length > maxTotal) {
    truncated = true;
    kept = [...entries];
    // Lowest tiers go first.
    while (kept.length > 0 && (header + renderFindings(report, kept) + TRUNCATION_NOTE).length > maxTotal) {
      kept.pop();
    }
    text = (header + renderFindings(report, kept) + TRUNCATION_NOTE).slice(0, maxTotal);
  }

  const shown: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
  for (const e of kept) shown[e.severity] += 1;

  return {
    metadata: { ...metadata },
    text,
    shown,
    truncated,
    sha256: canonicalSha256({ metadata, text })
  };
}

export function truncateMessage(message: string, maxChars: number): string {
  const cleaned = redactText(message).replace(/\s+/g, " ").trim();
  if (cleaned.length <= maxChars) return cleaned;
  if (maxChars <= 3) return cleaned.slice(0, Math.max(0, maxChars));
  return cleaned.slice(0, maxChars - 3) + "...";
}

export function formatLocation(f: Finding): string {
  return f.location.line === null ? f.location.path : `${f.location.path}:${f.location.line}`;
}

function renderHeader(report: AggregatedReport, metadata: RunMetadata): string {
  const t = report.severity_totals;
  const lines = [
    "DEPLOYMENT CONTEXT:",
    `- Run: ${metadata.run_id}`,
    `- Branch: ${metadata.branch}`,
    `- Commit: ${metadata.commit}`,
    `- Repository: ${metadata.repository}`,
    "",
    "SECURITY SCAN SUMMARY:",
    `- Tools Run: ${report.tools_run.length > 0 ? report.tools_run.join(", ") : "none"}`,
    `- Total Issues: ${report.total_findings}`,
    `- Critical: ${t.critical}`,
    `- High: ${t.high}`,
    `- Medium: ${t.medium}`,
    `- Low: ${t.low}`,
    `- Info: ${t.info}`
  ];
  for (const tool of TOOLS) {
    const c = report.counts[tool];
    lines.push(`- ${tool}: ${SEVERITIES.map((s) => `${s}=${c[s]}`).join(" ")}`);
  }
  for (const w of report.data_quality_warnings) {
    lines.push(`- Data quality warning: ${w.tool} artifact ${w.reason.replace(/_/g, " ")}, its findings are missing`);
  }
  return lines.join("\n") + "\n";
}

function renderFindings(report: AggregatedReport, entries: Entry[]): string {
  if (entries.length === 0) return "\nDETAILED FINDINGS: none shown\n";
  let out = "\nDETAILED FINDINGS:\n";
  for (const severity of SEVERITIES) {
    const tier = entries.filter((e) => e.severity === severity);
    if (tier.length === 0) continue;
    out += `\n${severity.toUpperCase()} (showing ${tier.length} of ${report.severity_totals[severity]}):\n`;
    for (const e of tier) out += e.line + "\n";
  }
  return out;
}

function renderFinding(f: Finding, maxMessageChars: number): string {
  return `- [${f.tool}] ${f.rule_id} at ${formatLocation(f)}: ${truncateMessage(f.message, maxMessageChars)}`;
}
