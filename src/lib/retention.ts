import fs from "node:fs";
import path from "node:path";

export type RetentionCleanupResult = {
  checked: number;
  removed: number;
  skipped_outside_root: number;
};

// Removes per-run report directories older than the retention window.
export function cleanupExpiredReports(args: {
  report_dir: string;
  report_retention_hours: number;
  now_ms?: number;
}): RetentionCleanupResult {
  const nowMs = args.now_ms ?? Date.now();
  const cutoff = nowMs - args.report_retention_hours * 60 * 60 * 1000;
  const root = path.resolve(args.report_dir);
  if (!fs.existsSync(root)) return { checked: 0, removed: 0, skipped_outside_root: 0 };

  let checked = 0;
  let removed = 0;
  let skipped = 0;

  const realRoot = fs.realpathSync(root);
  for (const entry of fs.readdirSync(root, { withFileTypes: true })) {
    if (!entry.isDirectory() && !entry.isSymbolicLink()) continue;
    const target = path.join(root, entry.name);
    if (fs.lstatSync(target).mtimeMs >= cutoff) continue;

    checked += 1;
    // Symlinks are judged by where they point.
    const real = resolveReal(target);
    const withinRoot = real !== null && real.startsWith(realRoot + path.sep);
    if (!withinRoot) {
      skipped += 1;
      continue;
    }
    fs.rmSync(target, { recursive: true, force: true });
    removed += 1;
  }

  return {
    checked,
    removed,
    skipped_outside_root: skipped
  };
}

function resolveReal(target: string): string | null {
  try {
    return fs.realpathSync(target);
  } catch {
    return null;
  }
}
