import { v4 as uuidv4 } from "uuid";
import { aggregateFindings } from "./aggregate.js";
import { composeEvidence, type EvidenceLimits } from "./evidence.js";
import { fallbackDecision, type FallbackOptions } from "./fallback.js";
import { ingestArtifacts, type ArtifactSet } from "./ingest.js";
import { requestOracleAnswer, type OracleClientOptions, type OracleResult, type OracleUnavailable } from "./oracle.js";
import { writeReport, type WrittenReport } from "./report.js";
import type { SeverityMap } from "./severity.js";
import type { AggregatedReport, DataQualityWarning, Decision, EvidencePayload, RiskLevel, RunMetadata, Verdict } from "./types.js";
import { parseOracleAnswer, type VerdictParseError } from "./verdictParser.js";

export type RunState =
  | "collected"
  | "aggregated"
  | "oracle_attempted"
  | "oracle_succeeded"
  | "oracle_failed"
  | "fallback_applied"
  | "decided"
  | "reported";

export const EXIT_CODES = {
  safe_to_deploy: 0,
  block_deployment: 1,
  engine_failure: 2
} as const;

export type EngineSettings = Readonly<{
  severity_map: SeverityMap;
  evidence: EvidenceLimits;
  fallback: FallbackOptions;
  oracle: OracleClientOptions;
}>;

export interface DecisionOutcome {
  verdict: Verdict;
  report: AggregatedReport;
  evidence: EvidencePayload;
  metadata: RunMetadata;
  oracle_model: string | null;
  oracle_failure: OracleUnavailable | null;
  parse_failure: VerdictParseError | null;
  consistency_warning: string | null;
  transitions: RunState[];
}

export function resolveRunMetadata(partial: Partial<RunMetadata>): RunMetadata {
  return {
    run_id: partial.run_id || uuidv4(),
    branch: partial.branch || "main",
    commit: partial.commit || "unknown",
    repository: partial.repository || "unknown"
  };
}

export function exitCodeFor(decision: Decision): number {
  return decision === "SAFE_TO_DEPLOY" ? EXIT_CODES.safe_to_deploy : EXIT_CODES.block_deployment;
}

export function checkConsistency(decision: Decision, risk: RiskLevel): string | null {
  if (decision === "BLOCK_DEPLOYMENT" && (risk === "none" || risk === "low")) {
    return `decision ${decision} was given with risk level ${risk}`;
  }
  if (decision === "SAFE_TO_DEPLOY" && (risk === "high" || risk === "critical")) {
    return `decision ${decision} was given with risk level ${risk}`;
  }
  return null;
}

export async function decide(args: {
  settings: EngineSettings;
  artifacts: ArtifactSet;
  metadata: RunMetadata;
  extra_warnings?: DataQualityWarning[];
}): Promise<DecisionOutcome> {
  const { settings, metadata } = args;
  const transitions: RunState[] = ["collected"];

  const ingested = ingestArtifacts(args.artifacts, settings.severity_map);
  const report = aggregateFindings({
    findings: ingested.findings,
    tools_run: ingested.tools_run,
    warnings: [...(args.extra_warnings ?? []), ...ingested.warnings],
    max_per_tier: settings.evidence.max_per_tier
  });
  transitions.push("aggregated");
  console.log(
    `Aggregated run_id=${metadata.run_id} total=${report.total_findings} critical=${report.severity_totals.critical} high=${report.severity_totals.high} medium=${report.severity_totals.medium}`
  );

  const evidence = composeEvidence(report, metadata, settings.evidence);

  transitions.push("oracle_attempted");
  const oracle = await callOracle(settings.oracle, evidence);

  let verdict: Verdict | null = null;
  let parseFailure: VerdictParseError | null = null;
  if (oracle.ok) {
    const parsed = parseOracleAnswer(oracle.answer);
    if (parsed.ok) {
      let risk = parsed.verdict.risk_level;
      if (risk === null) {
        risk = fallbackDecision(report, settings.fallback).risk_level;
        console.warn(`Oracle gave no usable risk level run_id=${metadata.run_id}, using rule-based risk level ${risk}`);
      }
      verdict = {
        decision: parsed.verdict.decision,
        risk_level: risk,
        reasoning: parsed.verdict.reasoning,
        recommendations: parsed.verdict.recommendations,
        source: "oracle_reasoning"
      };
      transitions.push("oracle_succeeded");
    } else {
      parseFailure = parsed.error;
      console.warn(`Oracle answer could not be parsed run_id=${metadata.run_id} reason=${parsed.error.reason}: ${parsed.error.detail}`);
    }
  }

  if (!verdict) {
    transitions.push("oracle_failed");
    verdict = fallbackDecision(report, settings.fallback);
    transitions.push("fallback_applied");
    console.log(`Fallback rules applied run_id=${metadata.run_id} decision=${verdict.decision} risk_level=${verdict.risk_level}`);
  }
  transitions.push("decided");

  const consistencyWarning = checkConsistency(verdict.decision, verdict.risk_level);
  if (consistencyWarning) {
    console.warn(`Inconsistent verdict run_id=${metadata.run_id}: ${consistencyWarning}`);
  }

  return {
    verdict,
    report,
    evidence,
    metadata,
    oracle_model: oracle.ok ? oracle.model : null,
    oracle_failure: oracle.ok ? null : oracle.error,
    parse_failure: parseFailure,
    consistency_warning: consistencyWarning,
    transitions
  };
}

export async function runGuardrail(args: {
  settings: EngineSettings;
  artifacts: ArtifactSet;
  metadata: RunMetadata;
  report_dir: string;
  github_output?: string | null;
  extra_warnings?: DataQualityWarning[];
  now?: Date;
}): Promise<{ outcome: DecisionOutcome; written: WrittenReport }> {
  const outcome = await decide(args);
  const written = writeReport({
    dir: args.report_dir,
    github_output: args.github_output,
    input: {
      verdict: outcome.verdict,
      report: outcome.report,
      metadata: outcome.metadata,
      evidence_sha256: outcome.evidence.sha256,
      oracle_model: outcome.oracle_model,
      fallback_reason: describeFallbackReason(outcome),
      consistency_warning: outcome.consistency_warning,
      generated_at: (args.now ?? new Date()).toISOString()
    }
  });
  outcome.transitions.push("reported");
  return { outcome, written };
}

export function describeFallbackReason(outcome: DecisionOutcome): string | null {
  if (outcome.verdict.source !== "fallback_rules") return null;
  if (outcome.oracle_failure) {
    const f = outcome.oracle_failure;
    return `oracle unavailable: ${f.reason.replace(/_/g, " ")} after ${f.attempts} attempt(s)`;
  }
  if (outcome.parse_failure) {
    return `oracle answer unusable: ${outcome.parse_failure.reason.replace(/_/g, " ")}`;
  }
  return null;
}

async function callOracle(client: OracleClientOptions, evidence: EvidencePayload): Promise<OracleResult> {
  try {
    return await requestOracleAnswer(client, evidence);
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    console.error(`Oracle client crashed run_id=${evidence.metadata.run_id}: ${message}`);
    return { ok: false, error: { kind: "oracle_unavailable", reason: "network", status: null, attempts: 1, message } };
  }
}
