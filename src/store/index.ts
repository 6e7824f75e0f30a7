import type { AppConfig } from "../config";
import type { Logger, MetricsRegistry } from "../observability";
import { JsonCheckpointStore } from "./checkpointStore";
import type { CheckpointStore } from "./types";

export function createStore(config: AppConfig, logger: Logger, metrics: MetricsRegistry): CheckpointStore {
  return new JsonCheckpointStore(config.outputPath, { logger, metrics });
}

export * from "./checkpointStore";
export * from "./schema";
export * from "./types";
