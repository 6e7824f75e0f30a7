export interface CatalogRecord {
  prefix: string;
  number: string;
  title: string;
  description: string;
  units: string;
  department: string;
  institution_id: number;
  metadata: string;
}

export type SourceUnitKind = "page" | "listing" | "document_page";

export interface SourceUnit {
  id: string;
  ordinal: number;
  location: string;
  kind: SourceUnitKind;
  /** Preloaded content; when absent the worker renders `location`. */
  content?: string;
}

export type CheckpointStatus = "in_progress" | "complete";

export interface RunMetadata {
  sourceId: string;
  totalUnits: number;
  unitsProcessed: number;
  recordCount: number;
  timestamp: string;
  status: CheckpointStatus;
  strategy?: string;
  runId?: string;
}

export interface CheckpointArtifact {
  metadata: RunMetadata;
  records: CatalogRecord[];
}

export type AdmitResult = "accepted" | "updated" | "rejected";
