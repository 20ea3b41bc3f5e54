import { buildEngineSettings, loadConfig, type AppConfig } from "../config.js";
import { EXIT_CODES, exitCodeFor, resolveRunMetadata, runGuardrail } from "../lib/engine.js";
import type { FetchLike } from "../lib/oracle.js";
import { loadArtifactsFromDir } from "../lib/ingest.js";
import { RenderError } from "../lib/report.js";

export async function runCli(args: { argv: string[]; env: NodeJS.ProcessEnv; fetch_impl?: FetchLike }): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig(args.env);
  } catch (e: unknown) {
    console.error(e instanceof Error ? e.message : String(e));
    return EXIT_CODES.engine_failure;
  }

  const resultsDir = args.argv[0] || config.RESULTS_DIR;
  const reportDir = config.REPORT_DIR ?? resultsDir;

  try {
    const settings = buildEngineSettings(config, args.fetch_impl);
    if (!settings.oracle.api_key) {
      console.warn("ORACLE_API_KEY is not set, decisions will come from the fallback rules");
    }

    console.log(`Loading scan results from ${resultsDir}`);
    const loaded = loadArtifactsFromDir(resultsDir);
    const { outcome, written } = await runGuardrail({
      settings,
      artifacts: loaded.artifacts,
      extra_warnings: loaded.warnings,
      metadata: resolveRunMetadata(config.RUN_METADATA),
      report_dir: reportDir,
      github_output: config.GITHUB_OUTPUT
    });

    const v = outcome.verdict;
    console.log(
      `DECISION=${v.decision} RISK_LEVEL=${v.risk_level.toUpperCase()} SOURCE=${v.source} ISSUES=${outcome.report.total_findings} REPORT=${written.report_file}`
    );
    return exitCodeFor(v.decision);
  } catch (e: unknown) {
    if (e instanceof RenderError) {
      console.error(`Could not write the decision report (${e.code}) target=${e.target}: ${e.message}`);
    } else {
      console.error(`Guardrail run failed: ${e instanceof Error ? e.message : String(e)}`);
    }
    return EXIT_CODES.engine_failure;
  }
}
