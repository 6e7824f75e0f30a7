import fs from "node:fs";
import path from "node:path";
import { errorMessage, type Logger, type MetricsRegistry } from "../observability";
import type { CatalogRecord, CheckpointArtifact, RunMetadata } from "../types";
import { checkpointArtifactSchema } from "./schema";
import type { CheckpointFileSystem, CheckpointStore } from "./types";

interface JsonCheckpointStoreDeps {
  logger: Logger;
  metrics: MetricsRegistry;
  fileSystem?: CheckpointFileSystem;
}

const nodeFileSystem: CheckpointFileSystem = {
  mkdir: (dirPath, options) => fs.promises.mkdir(dirPath, options),
  writeFile: (filePath, data, encoding) => fs.promises.writeFile(filePath, data, encoding),
  rename: (fromPath, toPath) => fs.promises.rename(fromPath, toPath),
  readFile: (filePath, encoding) => fs.promises.readFile(filePath, encoding),
  unlink: (filePath) => fs.promises.unlink(filePath),
};

export function serializeCheckpoint(records: CatalogRecord[], metadata: RunMetadata): string {
  const artifact: CheckpointArtifact = {
    metadata: { ...metadata, recordCount: records.length },
    records,
  };
  return `${JSON.stringify(artifact, null, 2)}\n`;
}

/**
 * Single JSON artifact, fully rewritten on every save. The new content goes to a sibling
 * `.tmp` file that is renamed over the artifact, so a reader only ever sees the previous
 * or the new complete snapshot. Saves are not serialized here; callers hold their own
 * commit lock around `save`.
 */
export class JsonCheckpointStore implements CheckpointStore {
  readonly location: string;
  private readonly tempLocation: string;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly fileSystem: CheckpointFileSystem;

  constructor(location: string, deps: JsonCheckpointStoreDeps) {
    this.location = path.resolve(location);
    this.tempLocation = `${this.location}.tmp`;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.fileSystem = deps.fileSystem ?? nodeFileSystem;
  }

  async save(records: CatalogRecord[], metadata: RunMetadata): Promise<boolean> {
    const content = serializeCheckpoint(records, metadata);

    const stopTimer = this.metrics.startTimer("checkpoint_ms");
    try {
      await this.fileSystem.mkdir(path.dirname(this.location), { recursive: true });
      await this.fileSystem.writeFile(this.tempLocation, content, "utf-8");
      await this.fileSystem.rename(this.tempLocation, this.location);
      const durationMs = stopTimer();
      this.metrics.incrementCounter("checkpoints_saved");
      this.logger.info("checkpoint_saved", {
        path: this.location,
        recordCount: records.length,
        unitsProcessed: metadata.unitsProcessed,
        totalUnits: metadata.totalUnits,
        status: metadata.status,
        durationMs,
      });
      return true;
    } catch (error) {
      stopTimer();
      this.metrics.incrementCounter("checkpoints_failed");
      this.logger.error("checkpoint_save_failed", {
        path: this.location,
        recordCount: records.length,
        error: errorMessage(error),
      });
      await this.fileSystem.unlink(this.tempLocation).catch(() => undefined);
      return false;
    }
  }

  async load(): Promise<CheckpointArtifact | undefined> {
    let raw: string;
    try {
      raw = await this.fileSystem.readFile(this.location, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    const parsed = checkpointArtifactSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`Checkpoint ${this.location} is invalid: ${issue.path.join(".")} ${issue.message}`);
    }
    return parsed.data;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
