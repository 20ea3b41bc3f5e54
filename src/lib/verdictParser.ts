import { RISK_LEVELS, type Decision, type RiskLevel } from "./types.js";

export type SectionName = "decision" | "risk_level" | "reasoning" | "recommendations";

export interface ParsedVerdict {
  decision: Decision;
  risk_level: RiskLevel | null;
  reasoning: string;
  recommendations: string[];
}

export interface VerdictParseError {
  kind: "verdict_parse_error";
  reason: "empty_answer" | "missing_decision" | "unrecognized_decision";
  detail: string;
}

export type VerdictParseResult = { ok: true; verdict: ParsedVerdict } | { ok: false; error: VerdictParseError };

const HEADER_RE = /^[#*_\s>]*(decision|risk[ _-]?level|reasoning|recommendations)[*_\s]*:[*_\s]*(.*)$/i;

// Matched whole; anything else is unrecognized and goes to the fallback rules.
const DECISION_SYNONYMS = new Map<string, Decision>([
  ["BLOCK_DEPLOYMENT", "BLOCK_DEPLOYMENT"],
  ["BLOCK", "BLOCK_DEPLOYMENT"],
  ["BLOCKED", "BLOCK_DEPLOYMENT"],
  ["DENY", "BLOCK_DEPLOYMENT"],
  ["REJECT", "BLOCK_DEPLOYMENT"],
  ["SAFE_TO_DEPLOY", "SAFE_TO_DEPLOY"],
  ["SAFE", "SAFE_TO_DEPLOY"],
  ["APPROVE", "SAFE_TO_DEPLOY"],
  ["APPROVED", "SAFE_TO_DEPLOY"],
  ["ALLOW", "SAFE_TO_DEPLOY"],
  ["PASS", "SAFE_TO_DEPLOY"]
]);

const APPROVAL_QUALIFIERS = ["WITH_WARNINGS", "WITH_WARNING"];

export function splitSections(text: string): Partial<Record<SectionName, string[]>> {
  const sections: Partial<Record<SectionName, string[]>> = {};
  let current: string[] | null = null;

  for (const line of text.split(/\r?\n/)) {
    const m = HEADER_RE.exec(line);
    if (m) {
      const name = sectionName(m[1]);
      if (sections[name]) {
        // Repeated header: keep the first section, drop the repeat.
        current = null;
        continue;
      }
      current = [];
      sections[name] = current;
      if (m[2].trim()) current.push(m[2]);
      continue;
    }
    if (current) current.push(line);
  }
  return sections;
}

export function normalizeDecision(value: string): Decision | null {
  const key = value
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
  const exact = DECISION_SYNONYMS.get(key);
  if (exact) return exact;
  // "APPROVE WITH WARNINGS"
  for (const qualifier of APPROVAL_QUALIFIERS) {
    if (!key.endsWith(`_${qualifier}`)) continue;
    const base = DECISION_SYNONYMS.get(key.slice(0, -(qualifier.length + 1)));
    if (base === "SAFE_TO_DEPLOY") return base;
  }
  return null;
}

export function normalizeRiskLevel(value: string): RiskLevel | null {
  const key = value
    .trim()
    .replace(/^[\s"'`[(*_]+|[\s"'`\])*_.!]+$/g, "")
    .trim()
    .toLowerCase();
  const firstWord = key.split(/[^a-z]+/)[0];
  return RISK_LEVELS.find((r) => r === key) ?? RISK_LEVELS.find((r) => r === firstWord) ?? null;
}

export function parseOracleAnswer(answer: string): VerdictParseResult {
  if (!answer.trim()) {
    return { ok: false, error: { kind: "verdict_parse_error", reason: "empty_answer", detail: "oracle answer is empty" } };
  }

  const sections = splitSections(answer);

  const decisionText = firstNonEmpty(sections.decision);
  if (decisionText === null) {
    return { ok: false, error: { kind: "verdict_parse_error", reason: "missing_decision", detail: "no DECISION section found" } };
  }
  const decision = normalizeDecision(decisionText);
  if (!decision) {
    return {
      ok: false,
      error: { kind: "verdict_parse_error", reason: "unrecognized_decision", detail: `unrecognized decision "${decisionText.trim()}"` }
    };
  }

  const riskText = firstNonEmpty(sections.risk_level);
  const riskLevel = riskText === null ? null : normalizeRiskLevel(riskText);
  if (riskText !== null && riskLevel === null) {
    console.warn(`Oracle risk level "${riskText.trim()}" not recognized, treating it as absent`);
  }

  return {
    ok: true,
    verdict: {
      decision,
      risk_level: riskLevel,
      reasoning: (sections.reasoning ?? []).join("\n").trim(),
      recommendations: (sections.recommendations ?? []).map(stripListMarker).filter((l) => l.length > 0)
    }
  };
}

function sectionName(label: string): SectionName {
  const l = label.toLowerCase();
  if (l.startsWith("risk")) return "risk_level";
  if (l === "decision") return "decision";
  if (l === "reasoning") return "reasoning";
  return "recommendations";
}

function firstNonEmpty(lines: string[] | undefined): string | null {
  for (const line of lines ?? []) {
    if (line.trim()) return line;
  }
  return null;
}

function stripListMarker(line: string): string {
  return line
    .trim()
    .replace(/^([-*•+]|\d+[.)])\s+/, "")
    .trim();
}
