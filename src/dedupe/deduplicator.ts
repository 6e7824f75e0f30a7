import type { AdmitResult, CatalogRecord } from "../types";
import { naturalKey, type NaturalKey } from "./naturalKey";

export interface AdmitOptions {
  /** The record completes a previously committed partial record with the same key. */
  complete?: boolean;
}

/**
 * Committed-key set for one run.
 *
 * `admit` is synchronous, so the check and the insert run in the same event-loop turn
 * and concurrent workers can never both be accepted for one key. Keys are never removed.
 */
export class Deduplicator {
  private readonly keys = new Set<NaturalKey>();

  admit(record: CatalogRecord, options: AdmitOptions = {}): AdmitResult {
    const key = naturalKey(record);
    if (!this.keys.has(key)) {
      this.keys.add(key);
      return "accepted";
    }
    return options.complete ? "updated" : "rejected";
  }

  has(record: Pick<CatalogRecord, "prefix" | "number">): boolean {
    return this.keys.has(naturalKey(record));
  }

  get size(): number {
    return this.keys.size;
  }
}
