import fs from "node:fs";
import { z } from "zod";
import { SEVERITIES, TOOLS, type Severity, type Tool } from "./types.js";

const SeveritySchema = z.enum(SEVERITIES);

const ToolMappingSchema = z.object({
  default: SeveritySchema,
  labels: z.record(z.string(), SeveritySchema).default({})
});

const SeverityMapSchema = z.object({
  map_version: z.string(),
  tools: z.object({
    secret_scanner: ToolMappingSchema,
    static_analyzer: ToolMappingSchema,
    policy_engine: ToolMappingSchema
  })
});

export type SeverityMap = z.infer<typeof SeverityMapSchema>;

export function parseSeverityMap(input: unknown): SeverityMap {
  const parsed = SeverityMapSchema.safeParse(input);
  if (!parsed.success) throw new Error(`Invalid severity map: ${parsed.error.message}`);

  // Labels are matched case-insensitively.
  const tools = parsed.data.tools;
  for (const tool of TOOLS) {
    tools[tool].labels = Object.fromEntries(
      Object.entries(tools[tool].labels).map(([label, severity]): [string, Severity] => [label.trim().toLowerCase(), severity])
    );
  }
  return parsed.data;
}

export function loadSeverityMapFromFile(mapFile: string): SeverityMap {
  const raw = fs.readFileSync(mapFile, "utf8");
  return parseSeverityMap(JSON.parse(raw));
}

export function classifySeverity(map: SeverityMap, tool: Tool, nativeSeverity: string | null): Severity {
  const mapping = map.tools[tool];
  if (nativeSeverity === null) return mapping.default;
  const label = nativeSeverity.trim().toLowerCase();
  return Object.hasOwn(mapping.labels, label) ? mapping.labels[label] : mapping.default;
}
