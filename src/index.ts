import fs from "node:fs";
import { buildEngineSettings, loadConfig } from "./config.js";
import { cleanupExpiredReports } from "./lib/retention.js";
import { buildApp } from "./app.js";

const RETENTION_CLEANUP_INTERVAL_MS = 10 * 60 * 1000;

const config = loadConfig(process.env);
const reportDir = config.REPORT_DIR ?? "./reports";
fs.mkdirSync(reportDir, { recursive: true });

function runRetentionCleanup(): void {
  try {
    const cleanup = cleanupExpiredReports({
      report_dir: reportDir,
      report_retention_hours: config.REPORT_RETENTION_HOURS
    });
    if (cleanup.removed > 0 || cleanup.skipped_outside_root > 0) {
      console.log(
        `Report cleanup checked=${cleanup.checked} removed=${cleanup.removed} skipped_outside_root=${cleanup.skipped_outside_root}`
      );
    }
  } catch (e: unknown) {
    console.warn(`Report cleanup failed: ${e instanceof Error ? e.message : String(e)}`);
  }
}

runRetentionCleanup();
setInterval(runRetentionCleanup, RETENTION_CLEANUP_INTERVAL_MS).unref();

const settings = buildEngineSettings(config);
if (!settings.oracle.api_key) {
  console.warn("ORACLE_API_KEY is not set, decisions will come from the fallback rules");
}

const app = buildApp({ config, settings });
app.listen(config.PORT, () => {
  console.log(`Deploy guardrail API listening on ${config.BASE_URL}`);
});
