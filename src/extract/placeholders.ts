import type { RecordCandidate } from "./types";

const PLACEHOLDER_TOKENS = new Set(["unknown", "null", "n/a"]);

export function isPlaceholder(value: unknown): boolean {
  if (value === null || value === undefined) {
    return true;
  }
  if (typeof value !== "string") {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === "" || PLACEHOLDER_TOKENS.has(normalized);
}

/** Any field present on the candidate holds an empty or placeholder value. */
export function candidateNeedsRepair(candidate: RecordCandidate): boolean {
  return Object.values(candidate).some((value) => isPlaceholder(value));
}
