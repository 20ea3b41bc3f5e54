import {
  SEVERITIES,
  TOOLS,
  emptySeverityCounts,
  severityRank,
  type AggregatedReport,
  type DataQualityWarning,
  type Finding,
  type Severity,
  type SeverityCounts,
  type Tool
} from "./types.js";

export const DEFAULT_MAX_PER_TIER = 5;

export function compareFindings(a: Finding, b: Finding): number {
  const bySeverity = severityRank(a.severity) - severityRank(b.severity);
  if (bySeverity !== 0) return bySeverity;
  if (a.tool !== b.tool) return a.tool < b.tool ? -1 : 1;
  return a.ordinal - b.ordinal;
}

export function aggregateFindings(args: {
  findings: readonly Finding[];
  tools_run?: readonly Tool[];
  warnings?: readonly DataQualityWarning[];
  max_per_tier?: number;
}): AggregatedReport {
  const maxPerTier = Math.max(0, args.max_per_tier ?? DEFAULT_MAX_PER_TIER);

  const counts: Record<Tool, SeverityCounts> = {
    policy_engine: emptySeverityCounts(),
    secret_scanner: emptySeverityCounts(),
    static_analyzer: emptySeverityCounts()
  };
  const severityTotals = emptySeverityCounts();

  for (const f of args.findings) {
    counts[f.tool][f.severity] += 1;
    severityTotals[f.severity] += 1;
  }

  const ordered = [...args.findings].sort(compareFindings);
  const tier = (severity: Severity) => ordered.filter((f) => f.severity === severity).slice(0, maxPerTier);
  const prioritized: Record<Severity, Finding[]> = {
    critical: tier("critical"),
    high: tier("high"),
    medium: tier("medium"),
    low: tier("low"),
    info: tier("info")
  };

  let total = 0;
  for (const tool of TOOLS) {
    for (const severity of SEVERITIES) total += counts[tool][severity];
  }

  return deepFreeze({
    counts,
    severity_totals: severityTotals,
    prioritized,
    total_findings: total,
    tools_run: TOOLS.filter((t) => args.tools_run?.includes(t) ?? false),
    data_quality_warnings: [...(args.warnings ?? [])]
  });
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}
