import type { ContextSizes } from "../config";
import { ContextWindow } from "../context";
import { Deduplicator } from "../dedupe";
import type { ExtractedRecord, RecordExtractor } from "../extract";
import { errorMessage, type Logger, type MetricsRegistry } from "../observability";
import type { Renderer, RendererFactory } from "../render";
import type { CheckpointStore } from "../store";
import type { CatalogRecord, CheckpointStatus, RunMetadata, SourceUnit } from "../types";
import { Mutex } from "./mutex";
import { ResultSet } from "./resultSet";
import { WorkerPool, type UnitOutcome } from "./workerPool";

export type RunMode = "parallel" | "sequential";

export interface ExtractionRunSettings {
  sourceId: string;
  runId: string;
  /** `sequential` forces a single worker and carries context between units. */
  mode: RunMode;
  workerCount: number;
  checkpointBatchSize: number;
  context: ContextSizes;
  requestDelayMs: number;
  /** Known size of the run; when absent the number of dispatched units is reported. */
  totalUnits?: number;
}

export interface ExtractionRunDeps {
  extractor: RecordExtractor;
  store: CheckpointStore;
  rendererFactory: RendererFactory;
  logger: Logger;
  metrics: MetricsRegistry;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunSummary {
  status: CheckpointStatus;
  totalUnits: number;
  unitsProcessed: number;
  unitsFailed: number;
  recordCount: number;
  accepted: number;
  updated: number;
  rejected: number;
  checkpointSaved: boolean;
}

interface UnitResult {
  content: string;
  extracted: ExtractedRecord[];
}

/**
 * State of one extraction run: the committed-key set, the result list, the context window
 * and the progress counters. Everything that touches the result list or the checkpoint
 * runs under `commitLock`.
 */
export class ExtractionRun {
  private readonly settings: ExtractionRunSettings;
  private readonly deps: ExtractionRunDeps;
  private readonly deduplicator = new Deduplicator();
  private readonly results = new ResultSet();
  private readonly context: ContextWindow;
  private readonly commitLock = new Mutex();
  private readonly pool: WorkerPool<SourceUnit, Renderer>;

  private unitsProcessed = 0;
  private unitsFailed = 0;
  private unitsDispatched = 0;
  private sinceCheckpoint = 0;
  private accepted = 0;
  private updated = 0;
  private rejected = 0;

  constructor(settings: ExtractionRunSettings, deps: ExtractionRunDeps) {
    this.settings = settings;
    this.deps = deps;
    this.context = new ContextWindow(settings.context);
    this.pool = new WorkerPool<SourceUnit, Renderer>({
      concurrency: settings.mode === "sequential" ? 1 : settings.workerCount,
      createResource: () => deps.rendererFactory(),
      releaseResource: (renderer) => renderer.close(),
      logger: deps.logger,
      delayMs: settings.requestDelayMs,
      sleep: deps.sleep,
      describeItem: (unit) => unit.id,
    });
  }

  /** Restores committed records from an earlier checkpoint before `run`. */
  seed(records: CatalogRecord[], unitsProcessed = 0): void {
    for (const record of records) {
      if (this.deduplicator.admit(record) === "accepted") {
        this.results.append(record);
      }
    }
    this.context.recordAccepted(this.results.tail(this.settings.context.records));
    this.unitsProcessed = unitsProcessed;
    this.deps.logger.info("run_seeded", { records: this.results.size, unitsProcessed });
  }

  stop(): void {
    if (!this.pool.isStopped) {
      this.deps.logger.warn("run_stop_requested", { unitsProcessed: this.unitsProcessed });
    }
    this.pool.stop();
  }

  get records(): CatalogRecord[] {
    return this.results.snapshot();
  }

  async run(units: Iterable<SourceUnit> | AsyncIterable<SourceUnit>): Promise<RunSummary> {
    const { logger } = this.deps;
    logger.info("run_start", {
      mode: this.settings.mode,
      workers: this.settings.mode === "sequential" ? 1 : this.settings.workerCount,
      strategy: this.deps.extractor.strategyName,
      totalUnits: this.settings.totalUnits,
    });

    const poolSummary = await this.pool.run(
      units,
      (unit, renderer) => this.processUnit(unit, renderer),
      (outcome) => this.commit(outcome),
    );

    const status: CheckpointStatus = poolSummary.stopped ? "in_progress" : "complete";
    const checkpointSaved = await this.commitLock.runExclusive(() => this.checkpoint(status));

    const summary: RunSummary = {
      status,
      totalUnits: this.totalUnits(),
      unitsProcessed: this.unitsProcessed,
      unitsFailed: this.unitsFailed,
      recordCount: this.results.size,
      accepted: this.accepted,
      updated: this.updated,
      rejected: this.rejected,
      checkpointSaved,
    };
    logger.info("run_complete", { ...summary });
    return summary;
  }

  private async processUnit(unit: SourceUnit, renderer: Renderer): Promise<UnitResult> {
    this.unitsDispatched += 1;
    const content = unit.content ?? (await this.render(unit, renderer));

    const sequential = this.settings.mode === "sequential";
    const slice = sequential ? this.context.snapshot() : ContextWindow.empty();
    const overlapRecords = sequential ? this.results.tail(this.settings.context.overlap) : [];

    const extracted = await this.deps.extractor.extract({
      unit,
      content,
      contextUnits: slice.contextUnits,
      contextRecords: slice.contextRecords,
      overlapRecords,
    });
    return { content, extracted };
  }

  private async render(unit: SourceUnit, renderer: Renderer): Promise<string> {
    const stopTimer = this.deps.metrics.startTimer("render_ms");
    try {
      return await renderer.open(unit.location);
    } finally {
      stopTimer();
    }
  }

  private commit(outcome: UnitOutcome<SourceUnit, UnitResult>): Promise<void> {
    return this.commitLock.runExclusive(async () => {
      const { logger, metrics } = this.deps;
      const unit = outcome.item;
      this.unitsProcessed += 1;
      this.sinceCheckpoint += 1;
      metrics.incrementCounter("units_processed");

      if (!outcome.ok) {
        this.unitsFailed += 1;
        metrics.incrementCounter("units_failed");
        logger.error("unit_failed", { unitId: unit.id, location: unit.location, error: outcome.error });
      } else {
        this.admitAll(unit, outcome.value);
      }

      if (this.sinceCheckpoint >= this.settings.checkpointBatchSize) {
        await this.checkpoint("in_progress");
      }
    });
  }

  private admitAll(unit: SourceUnit, result: UnitResult): void {
    const { logger, metrics } = this.deps;
    const appended: CatalogRecord[] = [];
    const completed: CatalogRecord[] = [];
    let accepted = 0;
    let updated = 0;
    let rejected = 0;

    for (const { record, completes } of result.extracted) {
      switch (this.deduplicator.admit(record, { complete: completes })) {
        case "accepted":
          this.results.append(record);
          appended.push(record);
          accepted += 1;
          break;
        case "updated":
          this.results.replace(record);
          completed.push(record);
          updated += 1;
          break;
        case "rejected":
          rejected += 1;
          logger.debug("record_rejected_duplicate", { unitId: unit.id, prefix: record.prefix, number: record.number });
          break;
      }
    }

    this.accepted += accepted;
    this.updated += updated;
    this.rejected += rejected;
    metrics.incrementCounter("records_accepted", accepted);
    metrics.incrementCounter("records_updated", updated);
    metrics.incrementCounter("records_rejected", rejected);

    if (this.settings.mode === "sequential") {
      this.context.recordUnit(unit, result.content);
      this.context.recordAccepted(appended);
      for (const record of completed) {
        this.context.recordUpdated(record);
      }
    }

    logger.info("unit_complete", {
      unitId: unit.id,
      ordinal: unit.ordinal,
      accepted,
      updated,
      rejected,
      recordCount: this.results.size,
      unitsProcessed: this.unitsProcessed,
      totalUnits: this.totalUnits(),
    });
  }

  /** Caller holds `commitLock`. */
  private async checkpoint(status: CheckpointStatus): Promise<boolean> {
    this.sinceCheckpoint = 0;
    const records = this.results.snapshot();
    const metadata: RunMetadata = {
      sourceId: this.settings.sourceId,
      totalUnits: this.totalUnits(),
      unitsProcessed: this.unitsProcessed,
      recordCount: records.length,
      timestamp: new Date().toISOString(),
      status,
      strategy: this.deps.extractor.strategyName,
      runId: this.settings.runId,
    };
    try {
      return await this.deps.store.save(records, metadata);
    } catch (error) {
      this.deps.logger.error("checkpoint_unexpected_failure", { error: errorMessage(error) });
      return false;
    }
  }

  private totalUnits(): number {
    return this.settings.totalUnits ?? Math.max(this.unitsDispatched, this.unitsProcessed);
  }
}
