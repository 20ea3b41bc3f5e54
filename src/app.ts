import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import express from "express";
import helmet from "helmet";
import cors from "cors";
import rateLimit from "express-rate-limit";
import swaggerUi from "swagger-ui-express";
import YAML from "yaml";
import type { AppConfig } from "./config.js";
import type { EngineSettings } from "./lib/engine.js";
import { buildDecisionRouter } from "./api/decisions.js";
import { buildMetaRouter } from "./api/meta.js";

const OPENAPI_FILE = "openapi/deploy-guardrail.openapi.yaml";

export function loadOpenApiDocument(): Record<string, unknown> {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  // src/ when run from sources, dist/src/ once built
  const candidates = [path.join(moduleDir, "..", OPENAPI_FILE), path.join(moduleDir, "..", "..", OPENAPI_FILE)];
  const file = candidates.find((c) => fs.existsSync(c)) ?? candidates[0];
  const doc: unknown = YAML.parse(fs.readFileSync(file, "utf8"));
  if (typeof doc !== "object" || doc === null || Array.isArray(doc)) {
    throw new Error(`Invalid OpenAPI document: ${file}`);
  }
  return Object.fromEntries(Object.entries(doc));
}

export function buildApp(args: { config: AppConfig; settings: EngineSettings }) {
  const { config, settings } = args;
  const app = express();
  const bodyLimitBytes = config.HTTP_JSON_BODY_LIMIT_BYTES ?? 10 * 1024 * 1024;
  const rateLimitWindowMs = config.RATE_LIMIT_WINDOW_MS ?? 60_000;
  const rateLimitMax = config.RATE_LIMIT_MAX ?? 120;

  if (config.TRUST_PROXY ?? false) {
    app.set("trust proxy", 1);
  }

  app.use(helmet());
  app.use(cors());
  app.use(
    rateLimit({
      windowMs: rateLimitWindowMs,
      max: rateLimitMax,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (_req, res) =>
        res.status(429).json({
          error: {
            error_code: "RATE_LIMITED",
            message: "too many requests"
          }
        })
    })
  );
  app.use(express.json({ limit: bodyLimitBytes }));

  const openapiObj = loadOpenApiDocument();
  app.get("/openapi.json", (_req, res) => res.json(openapiObj));
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(openapiObj));

  app.use("/v1", buildDecisionRouter({ config, settings }));
  app.use("/v1", buildMetaRouter({ config, severity_map: settings.severity_map }));

  app.get("/healthz", (_req, res) => res.json({ ok: true }));

  return app;
}
