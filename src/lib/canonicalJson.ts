import { createHash } from "node:crypto";

export function sha256HexUtf8(text: string): string {
  return createHash("sha256").update(Buffer.from(text, "utf8")).digest("hex");
}

export function canonicalJson(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (Array.isArray(value)) {
    return "[" + value.map((v) => canonicalJson(v)).join(",") + "]";
  }
  if (typeof value === "object") {
    const obj = Object.fromEntries(Object.entries(value));
    const keys = Object.keys(obj)
      .filter((k) => obj[k] !== undefined)
      .sort();
    const parts = keys.map((k) => {
      return JSON.stringify(k) + ":" + canonicalJson(obj[k]);
    });
    return "{" + parts.join(",") + "}";
  }
  return JSON.stringify(value);
}

export function canonicalSha256(value: unknown): string {
  return sha256HexUtf8(canonicalJson(value));
}
