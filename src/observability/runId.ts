import crypto from "node:crypto";

export function createRunId(label?: string, now = new Date()): string {
  const suffix = crypto.randomBytes(3).toString("hex");
  const stamp = now.toISOString().replace(/[:.]/g, "-");
  const slug = label
    ?.toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug ? `run_${slug}_${stamp}_${suffix}` : `run_${stamp}_${suffix}`;
}
