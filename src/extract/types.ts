import type { ContextUnit } from "../context";
import type { CatalogRecord, SourceUnit } from "../types";

export type CandidateScalar = string | number | boolean | null | undefined;

/** Loosely typed record as produced by a strategy, before validation and normalization. */
export interface RecordCandidate {
  prefix?: CandidateScalar;
  number?: CandidateScalar;
  title?: CandidateScalar;
  description?: CandidateScalar;
  units?: CandidateScalar;
  department?: CandidateScalar;
  institution_id?: CandidateScalar;
  metadata?: unknown;
}

export interface ExtractionRequest {
  unit: SourceUnit;
  content: string;
  contextUnits: ContextUnit[];
  contextRecords: CatalogRecord[];
  overlapRecords: CatalogRecord[];
}

export interface ExtractionStrategy {
  readonly name: string;
  extract(request: ExtractionRequest): Promise<RecordCandidate[]>;
}

export interface ExtractedRecord {
  record: CatalogRecord;
  /** True when the record completes one of the request's overlap records. */
  completes: boolean;
}

export const CANDIDATE_FIELDS = [
  "prefix",
  "number",
  "title",
  "description",
  "units",
  "department",
  "institution_id",
  "metadata",
] as const;

export type CandidateField = (typeof CANDIDATE_FIELDS)[number];
