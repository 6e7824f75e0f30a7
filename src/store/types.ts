import type { CatalogRecord, CheckpointArtifact, RunMetadata } from "../types";

export interface CheckpointStore {
  readonly location: string;
  /** Replaces the artifact with the given snapshot. Resolves `false` instead of throwing on failure. */
  save(records: CatalogRecord[], metadata: RunMetadata): Promise<boolean>;
  load(): Promise<CheckpointArtifact | undefined>;
}

export interface CheckpointFileSystem {
  mkdir(dirPath: string, options: { recursive: true }): Promise<unknown>;
  writeFile(filePath: string, data: string, encoding: "utf-8"): Promise<void>;
  rename(fromPath: string, toPath: string): Promise<void>;
  readFile(filePath: string, encoding: "utf-8"): Promise<string>;
  unlink(filePath: string): Promise<void>;
}
