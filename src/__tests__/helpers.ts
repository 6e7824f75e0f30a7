import { Logger, MetricsRegistry } from "../observability";
import type { CheckpointStore } from "../store";
import type { CatalogRecord, CheckpointArtifact, RunMetadata, SourceUnit } from "../types";

export function quietLogger(component = "test"): Logger {
  return new Logger({ component, runId: "run_test", minLevel: "error" });
}

export function newMetrics(): MetricsRegistry {
  return new MetricsRegistry();
}

export function makeRecord(overrides: Partial<CatalogRecord> = {}): CatalogRecord {
  return {
    prefix: "ACC",
    number: "124",
    title: "Principles of Accounting",
    description: "Introduces the accounting cycle.",
    units: "3",
    department: "Accounting",
    institution_id: 0,
    metadata: "",
    ...overrides,
  };
}

export function makeUnit(ordinal: number, overrides: Partial<SourceUnit> = {}): SourceUnit {
  const location = `https://catalog.test/courses/${ordinal}`;
  return { id: location, ordinal, location, kind: "page", ...overrides };
}

/** Keeps every saved snapshot; `failNext` makes the next saves report failure. */
export class MemoryCheckpointStore implements CheckpointStore {
  readonly location = "memory://checkpoint.json";
  readonly saves: CheckpointArtifact[] = [];
  failNext = 0;
  private artifact: CheckpointArtifact | undefined;

  constructor(initial?: CheckpointArtifact) {
    this.artifact = initial;
  }

  async save(records: CatalogRecord[], metadata: RunMetadata): Promise<boolean> {
    if (this.failNext > 0) {
      this.failNext -= 1;
      return false;
    }
    const artifact: CheckpointArtifact = {
      metadata: { ...metadata, recordCount: records.length },
      records: records.map((record) => ({ ...record })),
    };
    this.saves.push(artifact);
    this.artifact = artifact;
    return true;
  }

  async load(): Promise<CheckpointArtifact | undefined> {
    return this.artifact;
  }

  get last(): CheckpointArtifact | undefined {
    return this.artifact;
  }
}
