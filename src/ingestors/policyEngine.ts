import { z } from "zod";
import type { IngestorResult, NativeFinding } from "./types.js";

const ConftestMessage = z
  .object({
    msg: z.string().optional(),
    metadata: z
      .object({
        rule: z.string().optional(),
        query: z.string().optional()
      })
      .passthrough()
      .optional()
  })
  .passthrough();

const ConftestResult = z
  .object({
    filename: z.string().optional(),
    failures: z.array(ConftestMessage).nullish(),
    warnings: z.array(ConftestMessage).nullish()
  })
  .passthrough();

const ConftestReport = z.array(ConftestResult);

export function ingestPolicyEngineReport(doc: unknown): IngestorResult {
  const parsed = ConftestReport.safeParse(doc);
  if (!parsed.success) return { ok: false, detail: parsed.error.message };

  const findings: NativeFinding[] = [];
  for (const result of parsed.data) {
    const path = result.filename || "infrastructure";
    for (const failure of result.failures ?? []) {
      findings.push({
        rule_id: failure.metadata?.rule || failure.metadata?.query || "policy-deny",
        native_severity: "deny",
        location: { path, line: null },
        message: failure.msg || "Policy violation detected",
        raw_payload: failure
      });
    }
    for (const warning of result.warnings ?? []) {
      findings.push({
        rule_id: warning.metadata?.rule || warning.metadata?.query || "policy-warn",
        native_severity: "warn",
        location: { path, line: null },
        message: warning.msg || "Policy warning",
        raw_payload: warning
      });
    }
  }
  return { ok: true, findings };
}
