export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  unitId?: string;
  location?: string;
  listingUrl?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "listings_crawled"
  | "listings_failed"
  | "units_discovered"
  | "units_processed"
  | "units_failed"
  | "records_accepted"
  | "records_updated"
  | "records_rejected"
  | "records_invalid"
  | "extract_attempts"
  | "extract_retries"
  | "extract_exhausted"
  | "repairs_attempted"
  | "repairs_failed"
  | "checkpoints_saved"
  | "checkpoints_failed";

export type MetricTimerName = "listing_fetch_ms" | "render_ms" | "extract_ms" | "checkpoint_ms";
