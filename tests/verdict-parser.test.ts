import { describe, expect, test } from "vitest";
import type { Decision, RiskLevel } from "../src/lib/types.js";
import { normalizeDecision, parseOracleAnswer } from "../src/lib/verdictParser.js";

function answerOf(v: { decision: string; risk: string; reasoning: string; recommendations: string[] }): string {
  return [
    `DECISION: ${v.decision}`,
    "",
    "REASONING:",
    v.reasoning,
    "",
    "RECOMMENDATIONS:",
    ...v.recommendations.map((r) => `- ${r}`),
    "",
    `RISK LEVEL: ${v.risk}`
  ].join("\n");
}

describe("verdict parser", () => {
  test("recovers the values of a well-formed answer", () => {
    const cases: Array<{ decision: Decision; risk: RiskLevel; reasoning: string; recommendations: string[] }> = [
      {
        decision: "BLOCK_DEPLOYMENT",
        risk: "critical",
        reasoning: "A private key was committed.\nIt grants production access.",
        recommendations: ["Rotate the key", "Purge it from history", "Add a pre-commit hook"]
      },
      { decision: "SAFE_TO_DEPLOY", risk: "none", reasoning: "Nothing was found.", recommendations: [] }
    ];

    for (const c of cases) {
      const parsed = parseOracleAnswer(answerOf({ ...c, risk: c.risk.toUpperCase() }));
      expect(parsed).toEqual({
        ok: true,
        verdict: { decision: c.decision, risk_level: c.risk, reasoning: c.reasoning, recommendations: c.recommendations }
      });
    }
  });

  test("sections in any order and recommendations stop at the next header", () => {
    const parsed = parseOracleAnswer(
      [
        "DECISION: BLOCK_DEPLOYMENT",
        "",
        "RISK LEVEL: HIGH",
        "",
        "REASONING:",
        "Two policy violations expose the storage bucket.",
        "The change should not ship as is.",
        "",
        "RECOMMENDATIONS:",
        "- Make the bucket private",
        "* Add encryption at rest",
        "3. Re-run the policy checks"
      ].join("\n")
    );
    expect(parsed).toEqual({
      ok: true,
      verdict: {
        decision: "BLOCK_DEPLOYMENT",
        risk_level: "high",
        reasoning: "Two policy violations expose the storage bucket.\nThe change should not ship as is.",
        recommendations: ["Make the bucket private", "Add encryption at rest", "Re-run the policy checks"]
      }
    });
  });

  test("headers are matched case-insensitively and through markdown emphasis", () => {
    const parsed = parseOracleAnswer("**Decision:** approve\n**Risk Level:** low\n### Reasoning:\nOnly lint noise.");
    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.verdict.decision).toBe("SAFE_TO_DEPLOY");
    expect(parsed.verdict.risk_level).toBe("low");
    expect(parsed.verdict.reasoning).toBe("Only lint noise.");
    expect(parsed.verdict.recommendations).toEqual([]);
  });

  test("decision value may sit on the line after its header", () => {
    const parsed = parseOracleAnswer("DECISION:\n[BLOCK_DEPLOYMENT]\nRISK_LEVEL: critical");
    expect(parsed.ok && parsed.verdict.decision).toBe("BLOCK_DEPLOYMENT");
    expect(parsed.ok && parsed.verdict.risk_level).toBe("critical");
  });

  test("decision synonyms", () => {
    expect(normalizeDecision("BLOCK")).toBe("BLOCK_DEPLOYMENT");
    expect(normalizeDecision("block deployment")).toBe("BLOCK_DEPLOYMENT");
    expect(normalizeDecision("Rejected")).toBeNull();
    expect(normalizeDecision("reject")).toBe("BLOCK_DEPLOYMENT");
    expect(normalizeDecision("Safe to deploy.")).toBe("SAFE_TO_DEPLOY");
    expect(normalizeDecision("APPROVE WITH WARNINGS")).toBe("SAFE_TO_DEPLOY");
    expect(normalizeDecision("**APPROVED**")).toBe("SAFE_TO_DEPLOY");
    expect(normalizeDecision("NOT SAFE")).toBeNull();
  });

  test("a decision is only recognized when it is unambiguous", () => {
    for (const value of [
      "SAFE_TO_DEPLOY or BLOCK_DEPLOYMENT",
      "[SAFE_TO_DEPLOY or BLOCK_DEPLOYMENT]",
      "Safe to deploy? No, block it",
      "Safe to deploy: NO",
      "PASS - blocking recommended",
      "BLOCK_DEPLOYMENT not needed",
      "Block with warnings",
      "Not approved"
    ]) {
      expect(normalizeDecision(value)).toBeNull();
      const parsed = parseOracleAnswer(`DECISION: ${value}\nRISK LEVEL: CRITICAL`);
      expect(parsed.ok).toBe(false);
      expect(!parsed.ok && parsed.error.reason).toBe("unrecognized_decision");
    }
  });

  test("approval may carry a warnings qualifier", () => {
    expect(normalizeDecision("Approved with warnings")).toBe("SAFE_TO_DEPLOY");
    expect(normalizeDecision("SAFE_TO_DEPLOY (with warning)")).toBe("SAFE_TO_DEPLOY");
  });

  test("a missing decision is a parse error", () => {
    expect(parseOracleAnswer("RISK LEVEL: LOW\nREASONING:\nLooks fine.")).toEqual({
      ok: false,
      error: { kind: "verdict_parse_error", reason: "missing_decision", detail: "no DECISION section found" }
    });
  });

  test("an unrecognized decision is a parse error", () => {
    expect(parseOracleAnswer("DECISION: MAYBE\nRISK LEVEL: LOW")).toEqual({
      ok: false,
      error: { kind: "verdict_parse_error", reason: "unrecognized_decision", detail: 'unrecognized decision "MAYBE"' }
    });
  });

  test("an empty answer is a parse error", () => {
    const parsed = parseOracleAnswer("  \n ");
    expect(parsed.ok).toBe(false);
    expect(!parsed.ok && parsed.error.reason).toBe("empty_answer");
  });

  test("an unknown risk level is treated as absent", () => {
    const parsed = parseOracleAnswer("DECISION: SAFE_TO_DEPLOY\nRISK LEVEL: SEVERE");
    expect(parsed.ok).toBe(true);
    expect(parsed.ok && parsed.verdict.risk_level).toBeNull();
  });

  test("the first occurrence of a section wins", () => {
    const parsed = parseOracleAnswer("DECISION: BLOCK\nREASONING:\nFirst.\nDECISION: APPROVE\nStill after repeat.");
    expect(parsed.ok && parsed.verdict.decision).toBe("BLOCK_DEPLOYMENT");
    expect(parsed.ok && parsed.verdict.reasoning).toBe("First.");
  });

  test("a criteria heading is not mistaken for the decision", () => {
    const parsed = parseOracleAnswer("DECISION CRITERIA: strict\nDECISION: SAFE_TO_DEPLOY");
    expect(parsed.ok && parsed.verdict.decision).toBe("SAFE_TO_DEPLOY");
  });
});
