import fs from "node:fs";
import path from "node:path";
import { ingestPolicyEngineReport } from "../ingestors/policyEngine.js";
import { ingestSecretScannerReport } from "../ingestors/secretScanner.js";
import { ingestStaticAnalyzerReport } from "../ingestors/staticAnalyzer.js";
import type { IngestorResult } from "../ingestors/types.js";
import { classifySeverity, type SeverityMap } from "./severity.js";
import { TOOLS, type DataQualityWarning, type Finding, type Tool } from "./types.js";

// A string is raw file contents; any other value is an already-parsed document.
export type ArtifactSet = Partial<Record<Tool, unknown>>;

export type IngestOutput = {
  findings: Finding[];
  tools_run: Tool[];
  warnings: DataQualityWarning[];
};

export const ARTIFACT_FILENAMES: Record<Tool, string> = {
  secret_scanner: "gitleaks-report.json",
  static_analyzer: "semgrep-report.json",
  policy_engine: "opa-report.json"
};

const INGESTORS: Record<Tool, (doc: unknown) => IngestorResult> = {
  secret_scanner: ingestSecretScannerReport,
  static_analyzer: ingestStaticAnalyzerReport,
  policy_engine: ingestPolicyEngineReport
};

const EMPTY_DOCUMENTS: Record<Tool, unknown> = {
  secret_scanner: [],
  static_analyzer: { results: [] },
  policy_engine: []
};

export function ingestArtifacts(artifacts: ArtifactSet, severityMap: SeverityMap): IngestOutput {
  const findings: Finding[] = [];
  const toolsRun: Tool[] = [];
  const warnings: DataQualityWarning[] = [];

  for (const tool of TOOLS) {
    const raw = artifacts[tool];
    if (raw === undefined || raw === null) continue;

    const doc = decodeDocument(tool, raw);
    if (!doc.ok) {
      warnings.push(doc.warning);
      continue;
    }

    const result = INGESTORS[tool](doc.value);
    if (!result.ok) {
      warnings.push({ kind: "data_quality_warning", tool, reason: "schema_mismatch", detail: result.detail });
      continue;
    }

    toolsRun.push(tool);
    result.findings.forEach((native, index) => {
      findings.push(
        Object.freeze({
          finding_id: `${tool}:${index}`,
          tool,
          severity: classifySeverity(severityMap, tool, native.native_severity),
          native_severity: native.native_severity,
          rule_id: native.rule_id,
          location: Object.freeze({ ...native.location }),
          message: native.message,
          raw_payload: native.raw_payload,
          ordinal: index
        })
      );
    });
  }

  for (const w of warnings) {
    console.warn(`Data quality warning tool=${w.tool} reason=${w.reason}: ${w.detail.split("\n")[0]}`);
  }

  return { findings, tools_run: toolsRun, warnings };
}

export function loadArtifactsFromDir(resultsDir: string): { artifacts: ArtifactSet; warnings: DataQualityWarning[] } {
  const artifacts: ArtifactSet = {};
  const warnings: DataQualityWarning[] = [];

  for (const tool of TOOLS) {
    const file = path.join(resultsDir, ARTIFACT_FILENAMES[tool]);
    if (!fs.existsSync(file)) continue;
    try {
      artifacts[tool] = fs.readFileSync(file, "utf8");
    } catch (e: unknown) {
      warnings.push({
        kind: "data_quality_warning",
        tool,
        reason: "unreadable",
        detail: `${file}: ${e instanceof Error ? e.message : String(e)}`
      });
    }
  }

  return { artifacts, warnings };
}

function decodeDocument(tool: Tool, raw: unknown): { ok: true; value: unknown } | { ok: false; warning: DataQualityWarning } {
  if (typeof raw !== "string") return { ok: true, value: raw };
  const trimmed = raw.trim();
  // Scanners write an empty file when they have nothing to report.
  if (trimmed.length === 0) return { ok: true, value: EMPTY_DOCUMENTS[tool] };
  try {
    return { ok: true, value: JSON.parse(trimmed) };
  } catch (e: unknown) {
    return {
      ok: false,
      warning: {
        kind: "data_quality_warning",
        tool,
        reason: "invalid_json",
        detail: e instanceof Error ? e.message : String(e)
      }
    };
  }
}
