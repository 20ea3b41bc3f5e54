import type { FindingLocation } from "../lib/types.js";

export type NativeFinding = {
  rule_id: string;
  native_severity: string | null;
  location: FindingLocation;
  message: string;
  raw_payload: unknown;
};

export type IngestorResult =
  | { ok: true; findings: NativeFinding[] }
  | { ok: false; detail: string };
