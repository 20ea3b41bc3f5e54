import type { AggregatedReport, RiskLevel, Tool, Verdict } from "./types.js";

export interface FallbackOptions {
  high_block_threshold: number;
}

export const DEFAULT_FALLBACK_OPTIONS: FallbackOptions = { high_block_threshold: 0 };

const TOOL_RECOMMENDATIONS: Record<Tool, string> = {
  secret_scanner: "Remove committed secrets, rotate the exposed credentials and load them from a secret manager.",
  static_analyzer: "Fix the flagged code patterns or document why each finding is a false positive.",
  policy_engine: "Bring the infrastructure definitions in line with the failing policies before deploying."
};

// Rule-based decision used whenever the oracle path fails. Never touches the network.
export function fallbackDecision(report: AggregatedReport, options: FallbackOptions = DEFAULT_FALLBACK_OPTIONS): Verdict {
  const t = report.severity_totals;
  const threshold = Number.isFinite(options.high_block_threshold) ? Math.max(0, options.high_block_threshold) : 0;

  if (t.critical > 0) {
    return verdict(report, "BLOCK_DEPLOYMENT", "critical", `Found ${t.critical} critical security issue(s), such as exposed secrets or credentials.`);
  }
  if (t.high > threshold) {
    return verdict(
      report,
      "BLOCK_DEPLOYMENT",
      "high",
      `Found ${t.high} high-severity security issue(s), above the tolerated count of ${threshold}.`
    );
  }
  if (t.medium > 0) {
    return verdict(
      report,
      "SAFE_TO_DEPLOY",
      "medium",
      `No critical issues and no high-severity issues above the threshold; ${t.medium} medium-severity issue(s) should be reviewed. Approved with warnings.`
    );
  }
  const minor = t.low + t.info;
  if (minor > 0) {
    return verdict(report, "SAFE_TO_DEPLOY", "low", `Only ${minor} low or informational finding(s) present. Deployment approved.`);
  }
  return verdict(report, "SAFE_TO_DEPLOY", "none", "No security findings reported. Deployment approved.");
}

function verdict(report: AggregatedReport, decision: Verdict["decision"], risk: RiskLevel, reasoning: string): Verdict {
  const recommendations: string[] = [];
  for (const tool of report.tools_run) {
    const c = report.counts[tool];
    if (c.critical + c.high + c.medium > 0) recommendations.push(TOOL_RECOMMENDATIONS[tool]);
  }
  for (const w of report.data_quality_warnings) {
    recommendations.push(`Re-run the ${w.tool.replace(/_/g, " ")}: its report could not be used (${w.reason.replace(/_/g, " ")}).`);
  }
  if (recommendations.length === 0 && decision === "BLOCK_DEPLOYMENT") {
    recommendations.push("Review and fix the identified issues before the next deployment.");
  }
  return {
    decision,
    risk_level: risk,
    reasoning,
    recommendations,
    source: "fallback_rules"
  };
}
