import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { EngineSettings } from "./lib/engine.js";
import { createOracleClient, type FetchLike } from "./lib/oracle.js";
import { loadSeverityMapFromFile } from "./lib/severity.js";
import type { RunMetadata } from "./lib/types.js";

const BooleanFromEnv = z.preprocess((value) => {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true" || normalized === "1" || normalized === "yes" || normalized === "on") return true;
    if (normalized === "false" || normalized === "0" || normalized === "no" || normalized === "off") return false;
  }
  return value;
}, z.boolean());

const OptionalString = z.preprocess((value) => (typeof value === "string" && value.trim() === "" ? undefined : value), z.string().optional());

function resolveDefaultVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }
  try {
    const thisFile = fileURLToPath(import.meta.url);
    const packageJsonPath = path.resolve(path.dirname(thisFile), "../package.json");
    const raw = fs.readFileSync(packageJsonPath, "utf8");
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
    return "dev";
  } catch {
    return "dev";
  }
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  BASE_URL: z.string().url().default("http://localhost:8080"),
  TRUST_PROXY: BooleanFromEnv.default(false),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(120),
  HTTP_JSON_BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),

  ORACLE_ENDPOINT: z.string().url().default("https://api.openai.com/v1/chat/completions"),
  ORACLE_API_KEY: OptionalString,
  OPENAI_API_KEY: OptionalString,
  ORACLE_MODEL: z.string().min(1).default("gpt-4o-mini"),
  ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  ORACLE_RETRIES: z.coerce.number().int().nonnegative().default(1),
  ORACLE_MAX_TOKENS: z.coerce.number().int().positive().default(500),

  SEVERITY_MAP_FILE: z.string().default("./policy/severity-map.default.json"),
  EVIDENCE_MAX_PER_TIER: z.coerce.number().int().nonnegative().default(5),
  EVIDENCE_MAX_MESSAGE_CHARS: z.coerce.number().int().positive().default(240),
  EVIDENCE_MAX_TOTAL_CHARS: z.coerce.number().int().positive().default(6000),
  FALLBACK_HIGH_BLOCK_THRESHOLD: z.coerce.number().int().nonnegative().default(0),

  RESULTS_DIR: z.string().default("./scan-results"),
  REPORT_DIR: OptionalString,
  REPORT_RETENTION_HOURS: z.coerce.number().positive().default(24),
  GITHUB_OUTPUT: OptionalString,

  RUN_ID: OptionalString,
  RUN_BRANCH: OptionalString,
  RUN_COMMIT: OptionalString,
  RUN_REPOSITORY: OptionalString,
  GITHUB_RUN_ID: OptionalString,
  GITHUB_REF_NAME: OptionalString,
  GITHUB_SHA: OptionalString,
  GITHUB_REPOSITORY: OptionalString,

  VERSION: z.string().default(resolveDefaultVersion())
});

type ParsedEnv = z.infer<typeof EnvSchema>;

export type AppConfig = Omit<
  ParsedEnv,
  "OPENAI_API_KEY" | "RUN_ID" | "RUN_BRANCH" | "RUN_COMMIT" | "RUN_REPOSITORY" | "GITHUB_RUN_ID" | "GITHUB_REF_NAME" | "GITHUB_SHA" | "GITHUB_REPOSITORY"
> & {
  RUN_METADATA: Partial<RunMetadata>;
};

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }

  const {
    OPENAI_API_KEY,
    RUN_ID,
    RUN_BRANCH,
    RUN_COMMIT,
    RUN_REPOSITORY,
    GITHUB_RUN_ID,
    GITHUB_REF_NAME,
    GITHUB_SHA,
    GITHUB_REPOSITORY,
    ...rest
  } = parsed.data;

  return {
    ...rest,
    ORACLE_API_KEY: rest.ORACLE_API_KEY ?? OPENAI_API_KEY,
    RUN_METADATA: {
      run_id: RUN_ID ?? GITHUB_RUN_ID,
      branch: RUN_BRANCH ?? GITHUB_REF_NAME,
      commit: RUN_COMMIT ?? GITHUB_SHA,
      repository: RUN_REPOSITORY ?? GITHUB_REPOSITORY
    }
  };
}

export function buildEngineSettings(config: AppConfig, fetchImpl?: FetchLike): EngineSettings {
  return Object.freeze({
    severity_map: loadSeverityMapFromFile(config.SEVERITY_MAP_FILE),
    evidence: Object.freeze({
      max_per_tier: config.EVIDENCE_MAX_PER_TIER,
      max_message_chars: config.EVIDENCE_MAX_MESSAGE_CHARS,
      max_total_chars: config.EVIDENCE_MAX_TOTAL_CHARS
    }),
    fallback: Object.freeze({ high_block_threshold: config.FALLBACK_HIGH_BLOCK_THRESHOLD }),
    oracle: createOracleClient({
      endpoint: config.ORACLE_ENDPOINT,
      api_key: config.ORACLE_API_KEY,
      model: config.ORACLE_MODEL,
      timeout_ms: config.ORACLE_TIMEOUT_MS,
      retries: config.ORACLE_RETRIES,
      max_tokens: config.ORACLE_MAX_TOKENS,
      fetch_impl: fetchImpl
    })
  });
}
