import type { AppConfig } from "../config";
import { createPatternPredicate, discoverUnitLocations, Frontier, toPageUnits } from "../crawl";
import { loadDocumentUnits } from "../document";
import { createRecordExtractor, type TextGenerator } from "../extract";
import type { Logger, MetricsRegistry } from "../observability";
import { ExtractionRun, type RunMode, type RunSummary } from "../pipeline";
import { createHttpRendererFactory, StaticRenderer, type RendererFactory } from "../render";
import type { CheckpointStore } from "../store";
import type { CatalogRecord, SourceUnit } from "../types";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: CheckpointStore;
  logger: Logger;
  metrics: MetricsRegistry;
  /** Aborting requests a cooperative stop of the running extraction. */
  signal?: AbortSignal;
  rendererFactory?: RendererFactory;
  generator?: TextGenerator;
}

export interface RunOptions {
  resume: boolean;
  force: boolean;
}

export interface CrawlOptions extends RunOptions {
  dryRun: boolean;
}

interface ResumePoint {
  records: CatalogRecord[];
  unitsProcessed: number;
}

type ResumeDecision = { action: "skip" } | { action: "start"; from?: ResumePoint };

async function decideResume(ctx: CommandContext, options: RunOptions): Promise<ResumeDecision> {
  const existing = await ctx.store.load();
  if (!existing) {
    return { action: "start" };
  }

  const { metadata } = existing;
  if (metadata.status === "complete" && !options.force) {
    ctx.logger.info("checkpoint_already_complete", {
      path: ctx.store.location,
      recordCount: metadata.recordCount,
      hint: "pass --force to run again",
    });
    return { action: "skip" };
  }

  if (options.resume && metadata.status === "in_progress") {
    ctx.logger.info("resume_from_checkpoint", {
      path: ctx.store.location,
      recordCount: existing.records.length,
      unitsProcessed: metadata.unitsProcessed,
    });
    return { action: "start", from: { records: existing.records, unitsProcessed: metadata.unitsProcessed } };
  }

  ctx.logger.warn("checkpoint_overwrite", { path: ctx.store.location, status: metadata.status });
  return { action: "start" };
}

async function createRun(
  ctx: CommandContext,
  mode: RunMode,
  rendererFactory: RendererFactory,
  totalUnits?: number,
): Promise<ExtractionRun> {
  const extractor = await createRecordExtractor({
    config: ctx.config,
    logger: ctx.logger,
    metrics: ctx.metrics,
    generator: ctx.generator,
  });
  const run = new ExtractionRun(
    {
      sourceId: ctx.config.sourceId,
      runId: ctx.runId,
      mode,
      workerCount: ctx.config.workerCount,
      checkpointBatchSize: ctx.config.checkpointBatchSize,
      context: ctx.config.context,
      requestDelayMs: ctx.config.requestDelayMs,
      totalUnits,
    },
    {
      extractor,
      store: ctx.store,
      rendererFactory,
      logger: ctx.logger.child("pipeline"),
      metrics: ctx.metrics,
    },
  );

  if (ctx.signal?.aborted) {
    run.stop();
  }
  ctx.signal?.addEventListener("abort", () => run.stop(), { once: true });
  return run;
}

export async function runCrawl(ctx: CommandContext, options: CrawlOptions): Promise<RunSummary | undefined> {
  const { config, logger, metrics } = ctx;
  const rendererFactory = ctx.rendererFactory ?? createHttpRendererFactory(config);
  logger.info("crawl_start", {
    listingUrl: config.listingUrl,
    mode: options.dryRun ? "dry-run" : "normal",
    maxUnits: config.maxUnits,
  });

  const decision: ResumeDecision = options.dryRun ? { action: "start" } : await decideResume(ctx, options);
  if (decision.action === "skip") {
    return undefined;
  }

  const discoveryRenderer = rendererFactory();
  try {
    const locations = discoverUnitLocations(
      { renderer: discoveryRenderer, frontier: new Frontier(), logger: logger.child("discovery"), metrics },
      {
        listingUrl: config.listingUrl,
        startPage: config.listingStartPage,
        endPage: config.listingEndPage,
        followNextLinks: config.followNextLinks,
        predicate: createPatternPredicate(config.unitLinkPattern),
      },
    );
    const units = toPageUnits(locations, config.maxUnits);

    if (options.dryRun) {
      let discovered = 0;
      for await (const unit of units) {
        discovered += 1;
        logger.info("crawl_dry_run_location", { unitId: unit.id, ordinal: unit.ordinal });
      }
      logger.info("crawl_complete", { mode: "dry-run", discovered });
      return undefined;
    }

    const run = await createRun(ctx, "parallel", rendererFactory);
    if (decision.from) {
      run.seed(decision.from.records);
    }
    const summary = await run.run(units);
    logger.info("crawl_complete", { ...summary });
    return summary;
  } finally {
    await discoveryRenderer.close();
  }
}

export async function runDocument(
  ctx: CommandContext,
  documentPath: string,
  options: RunOptions,
): Promise<RunSummary | undefined> {
  const { config, logger } = ctx;
  logger.info("document_start", { documentPath, strategy: config.strategy, maxUnits: config.maxUnits });

  const decision = await decideResume(ctx, options);
  if (decision.action === "skip") {
    return undefined;
  }

  const pages = await loadDocumentUnits(documentPath);
  const skipBelow = decision.from?.unitsProcessed ?? 0;
  let units: SourceUnit[] = pages.filter((unit) => unit.ordinal >= skipBelow);
  if (config.maxUnits !== undefined) {
    units = units.slice(0, config.maxUnits);
  }
  logger.info("document_loaded", { documentPath, pages: pages.length, scheduled: units.length, skipped: skipBelow });

  const run = await createRun(ctx, "sequential", ctx.rendererFactory ?? (() => new StaticRenderer({})), pages.length);
  if (decision.from) {
    run.seed(decision.from.records, decision.from.unitsProcessed);
  }
  const summary = await run.run(units);
  logger.info("document_complete", { documentPath, ...summary });
  return summary;
}

export async function runStatus(ctx: CommandContext): Promise<void> {
  ctx.logger.info("status_start", { path: ctx.store.location });
  const artifact = await ctx.store.load();
  if (!artifact) {
    ctx.logger.info("status_no_checkpoint", { path: ctx.store.location });
    return;
  }
  ctx.logger.info("status_complete", { path: ctx.store.location, ...artifact.metadata });
}
