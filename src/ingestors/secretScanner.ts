import { z } from "zod";
import type { IngestorResult, NativeFinding } from "./types.js";

const GitleaksFinding = z
  .object({
    RuleID: z.string().optional(),
    Description: z.string().optional(),
    File: z.string().optional(),
    StartLine: z.number().int().optional()
  })
  .passthrough();

const GitleaksReport = z.array(GitleaksFinding);

// The matched secret is only kept in raw_payload, never in the message.
export function ingestSecretScannerReport(doc: unknown): IngestorResult {
  const parsed = GitleaksReport.safeParse(doc);
  if (!parsed.success) return { ok: false, detail: parsed.error.message };

  const findings: NativeFinding[] = parsed.data.map((item) => ({
    rule_id: item.RuleID || "unknown",
    native_severity: null,
    location: { path: item.File || "unknown", line: item.StartLine ?? null },
    message: item.Description || "Secret detected",
    raw_payload: item
  }));
  return { ok: true, findings };
}
