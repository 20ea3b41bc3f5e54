import path from "node:path";
import type { Router } from "express";
import express from "express";
import { z } from "zod";
import type { AppConfig } from "../config.js";
import { decide, describeFallbackReason, resolveRunMetadata, type EngineSettings } from "../lib/engine.js";
import { buildSummary, renderMarkdown, writeReport, RenderError, type RenderInput } from "../lib/report.js";

const MetadataInput = z
  .object({
    branch: z.string().min(1).optional(),
    commit: z.string().min(1).optional(),
    repository: z.string().min(1).optional()
  })
  .strict();

const DecisionCreateRequest = z
  .object({
    artifacts: z
      .object({
        secret_scanner: z.unknown().optional(),
        static_analyzer: z.unknown().optional(),
        policy_engine: z.unknown().optional()
      })
      .strict(),
    metadata: MetadataInput.optional()
  })
  .strict();

export function buildDecisionRouter(args: { config: AppConfig; settings: EngineSettings }): Router {
  const { config, settings } = args;
  const router = express.Router();
  const reportRoot = config.REPORT_DIR ?? "./reports";

  router.post("/decisions", async (req, res) => {
    const parsed = DecisionCreateRequest.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: { error_code: "BAD_REQUEST", message: parsed.error.message } });
    }

    // run_id is always server-assigned; it names the report directory.
    const metadata = resolveRunMetadata({ ...parsed.data.metadata, run_id: undefined });
    const outcome = await decide({ settings, artifacts: parsed.data.artifacts, metadata });

    const input: RenderInput = {
      verdict: outcome.verdict,
      report: outcome.report,
      metadata,
      evidence_sha256: outcome.evidence.sha256,
      oracle_model: outcome.oracle_model,
      fallback_reason: describeFallbackReason(outcome),
      consistency_warning: outcome.consistency_warning,
      generated_at: new Date().toISOString()
    };

    try {
      writeReport({ dir: path.join(reportRoot, metadata.run_id), input });
    } catch (e: unknown) {
      if (e instanceof RenderError) {
        console.error(`Decision report write failed run_id=${metadata.run_id}: ${e.message}`);
        return res.status(500).json({ error: { error_code: e.code, message: "decision report could not be written" } });
      }
      console.error(`Decision failed run_id=${metadata.run_id}: ${e instanceof Error ? e.message : String(e)}`);
      return res.status(500).json({ error: { error_code: "INTERNAL_ERROR", message: "decision could not be completed" } });
    }
    outcome.transitions.push("reported");

    return res.status(200).json({
      run_id: metadata.run_id,
      verdict: outcome.verdict,
      summary: buildSummary(input),
      report_markdown: renderMarkdown(input),
      data_quality_warnings: outcome.report.data_quality_warnings
    });
  });

  return router;
}
