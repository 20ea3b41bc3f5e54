import { z } from "zod";
import type { IngestorResult, NativeFinding } from "./types.js";

const SemgrepResult = z
  .object({
    check_id: z.string().optional(),
    path: z.string().optional(),
    start: z.object({ line: z.number().int().optional() }).passthrough().optional(),
    extra: z
      .object({
        severity: z.string().optional(),
        message: z.string().optional()
      })
      .passthrough()
      .optional()
  })
  .passthrough();

const SemgrepReport = z
  .object({
    results: z.array(SemgrepResult).default([])
  })
  .passthrough();

export function ingestStaticAnalyzerReport(doc: unknown): IngestorResult {
  const parsed = SemgrepReport.safeParse(doc);
  if (!parsed.success) return { ok: false, detail: parsed.error.message };

  const findings: NativeFinding[] = parsed.data.results.map((r) => ({
    rule_id: r.check_id || "unknown",
    native_severity: r.extra?.severity ?? null,
    location: { path: r.path || "unknown", line: r.start?.line ?? null },
    message: r.extra?.message || "Security issue detected",
    raw_payload: r
  }));
  return { ok: true, findings };
}
