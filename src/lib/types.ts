export const TOOLS = ["policy_engine", "secret_scanner", "static_analyzer"] as const;
export type Tool = (typeof TOOLS)[number];

export const SEVERITIES = ["critical", "high", "medium", "low", "info"] as const;
export type Severity = (typeof SEVERITIES)[number];

export const RISK_LEVELS = ["none", "low", "medium", "high", "critical"] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export type Decision = "SAFE_TO_DEPLOY" | "BLOCK_DEPLOYMENT";
export type VerdictSource = "oracle_reasoning" | "fallback_rules";

export interface FindingLocation {
  path: string;
  line: number | null;
}

export interface Finding {
  finding_id: string;
  tool: Tool;
  severity: Severity;
  native_severity: string | null;
  rule_id: string;
  location: FindingLocation;
  message: string;
  raw_payload: unknown;
  ordinal: number;
}

export type SeverityCounts = Record<Severity, number>;

export interface DataQualityWarning {
  kind: "data_quality_warning";
  tool: Tool;
  reason: "unreadable" | "invalid_json" | "schema_mismatch";
  detail: string;
}

export interface AggregatedReport {
  counts: Record<Tool, SeverityCounts>;
  severity_totals: SeverityCounts;
  prioritized: Record<Severity, Finding[]>;
  total_findings: number;
  tools_run: Tool[];
  data_quality_warnings: DataQualityWarning[];
}

export interface RunMetadata {
  run_id: string;
  branch: string;
  commit: string;
  repository: string;
}

export interface EvidencePayload {
  metadata: RunMetadata;
  text: string;
  shown: Record<Severity, number>;
  truncated: boolean;
  sha256: string;
}

export interface Verdict {
  decision: Decision;
  risk_level: RiskLevel;
  reasoning: string;
  recommendations: string[];
  source: VerdictSource;
}

export function emptySeverityCounts(): SeverityCounts {
  return { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
}

export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}
