const SECRET_PATTERNS: RegExp[] = [
  /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?(-----END [A-Z ]*PRIVATE KEY-----|$)/g,
  /\bAKIA[0-9A-Z]{16}\b/g, // AWS access key id
  /\bxox[abprs]-[A-Za-z0-9-]+/g, // Slack tokens
  /\bgh[pousr]_[A-Za-z0-9]{20,}/g, // GitHub tokens
  /\bgithub_pat_[A-Za-z0-9_]{20,}/g,
  /\bsk-[A-Za-z0-9_-]{16,}/g, // common API key prefix
  /\bAIza[0-9A-Za-z_-]{35}\b/g, // Google API key
  /\beyJ[A-Za-z0-9_-]{8,}\.[A-Za-z0-9_-]{8,}\.[A-Za-z0-9_-]{8,}/g, // JWT
  /\b(api[_-]?key|apikey|secret|token|password|passwd)(\s*[:=]\s*)["']?[^\s"']{8,}/gi
];

export const REDACTED = "[REDACTED]";

export function redactText(input: string): string {
  let out = input;
  for (const re of SECRET_PATTERNS) {
    out = out.replace(re, (match: string, ...groups: unknown[]) => {
      // Keep the key name of key=value assignments.
      const [name, sep] = groups;
      if (typeof name === "string" && typeof sep === "string" && /^[a-z_-]+$/i.test(name)) {
        return `${name}${sep}${REDACTED}`;
      }
      return match.length > 0 ? REDACTED : match;
    });
  }
  return out;
}
