import type { Router } from "express";
import express from "express";
import type { AppConfig } from "../config.js";
import type { SeverityMap } from "../lib/severity.js";

export function buildMetaRouter(args: { config: AppConfig; severity_map: SeverityMap }): Router {
  const { config, severity_map } = args;
  const router = express.Router();

  router.get("/severity-map", (_req, res) => {
    return res.status(200).json(severity_map);
  });

  router.get("/version", (_req, res) => {
    return res.status(200).json({
      version: config.VERSION ?? "dev",
      severity_map_version: severity_map.map_version,
      oracle_model: config.ORACLE_MODEL,
      oracle_configured: Boolean(config.ORACLE_API_KEY)
    });
  });

  return router;
}
