import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "../core/errors";
import type { AppConfig, BackoffMode, ConfigOverrides, ExtractStrategyName } from "./types";

const MIN_BACKOFF_MS = 1_000;

const DEFAULT_CONFIG: AppConfig = {
  sourceId: "catalog",
  listingUrl: "https://catalog.example.edu/classes?page={page}",
  listingStartPage: 0,
  listingEndPage: 0,
  followNextLinks: false,
  unitLinkPattern: "/courses?/",
  userAgent: "catalog-extractor/0.1 (+https://github.com/catalog-extractor)",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 20_000,
  requestDelayMs: 100,
  workerCount: 4,
  checkpointBatchSize: 50,
  context: {
    units: 3,
    records: 5,
    overlap: 2,
  },
  strategy: "html",
  maxExtractAttempts: 3,
  retryBackoffMs: 1_000,
  retryBackoffMode: "fixed",
  repairPlaceholders: true,
  aiApiKey: undefined,
  aiBaseUrl: undefined,
  aiModel: "gpt-4o-mini",
  aiTimeoutMs: 60_000,
  institutionId: 0,
  departmentsPath: undefined,
  selectors: {
    item: ".course",
    code: "h3",
    title: ".course-title",
    units: ".course-credits",
    description: ".course-description",
    department: "h1",
    metadata: [
      { label: "Prerequisites", selector: ".course-prerequisites" },
      { label: "Class Hours", selector: ".course-hours" },
      { label: "Semester Offered", selector: ".course-semester" },
      { label: "Course Student Learning Outcomes", selector: ".course-outcomes" },
    ],
  },
  outputPath: "data/checkpoint.json",
  maxUnits: undefined,
  logLevel: "info",
};

const configFileSchema = z
  .object({
    sourceId: z.string(),
    listingUrl: z.string(),
    listingStartPage: z.number().int(),
    listingEndPage: z.number().int(),
    followNextLinks: z.boolean(),
    unitLinkPattern: z.string(),
    userAgent: z.string(),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: z.number(),
    requestDelayMs: z.number(),
    workerCount: z.number().int(),
    checkpointBatchSize: z.number().int(),
    context: z
      .object({
        units: z.number().int(),
        records: z.number().int(),
        overlap: z.number().int(),
      })
      .partial(),
    strategy: z.enum(["html", "text", "ai"]),
    maxExtractAttempts: z.number().int(),
    retryBackoffMs: z.number(),
    retryBackoffMode: z.enum(["fixed", "exponential"]),
    repairPlaceholders: z.boolean(),
    aiApiKey: z.string(),
    aiBaseUrl: z.string(),
    aiModel: z.string(),
    aiTimeoutMs: z.number(),
    institutionId: z.number().int(),
    departmentsPath: z.string(),
    selectors: z
      .object({
        item: z.string(),
        code: z.string(),
        codeAttribute: z.string(),
        title: z.string(),
        units: z.string(),
        description: z.string(),
        department: z.string(),
        metadata: z.array(z.object({ label: z.string(), selector: z.string() })),
      })
      .partial(),
    outputPath: z.string(),
    maxUnits: z.number().int(),
    logLevel: z.string(),
  })
  .partial();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`);
  }

  const parsed = configFileSchema.safeParse(json ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid config file ${absolutePath}: ${issue.path.join(".")} ${issue.message}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toOptionalInt(value: string | undefined, fallback: number | undefined): number | undefined {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toStrategy(value: string | undefined, fallback: ExtractStrategyName): ExtractStrategyName {
  if (value === "html" || value === "text" || value === "ai") {
    return value;
  }
  return fallback;
}

function toBackoffMode(value: string | undefined, fallback: BackoffMode): BackoffMode {
  if (value === "fixed" || value === "exponential") {
    return value;
  }
  return fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    context: {
      ...DEFAULT_CONFIG.context,
      ...(fileConfig.context ?? {}),
    },
    selectors: {
      ...DEFAULT_CONFIG.selectors,
      ...(fileConfig.selectors ?? {}),
    },
  };

  return {
    ...merged,
    sourceId: env.SOURCE_ID ?? merged.sourceId,
    listingUrl: env.LISTING_URL ?? merged.listingUrl,
    listingStartPage: toInt(env.LISTING_START_PAGE, merged.listingStartPage),
    listingEndPage: toInt(env.LISTING_END_PAGE, merged.listingEndPage),
    followNextLinks: toBool(env.FOLLOW_NEXT_LINKS, merged.followNextLinks),
    unitLinkPattern: env.UNIT_LINK_PATTERN ?? merged.unitLinkPattern,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    requestDelayMs: toInt(env.REQUEST_DELAY_MS, merged.requestDelayMs),
    workerCount: toInt(env.WORKER_COUNT, merged.workerCount),
    checkpointBatchSize: toInt(env.CHECKPOINT_BATCH_SIZE, merged.checkpointBatchSize),
    context: {
      units: toInt(env.CONTEXT_UNITS, merged.context.units),
      records: toInt(env.CONTEXT_RECORDS, merged.context.records),
      overlap: toInt(env.OVERLAP_RECORDS, merged.context.overlap),
    },
    strategy: toStrategy(env.EXTRACT_STRATEGY, merged.strategy),
    maxExtractAttempts: toInt(env.MAX_EXTRACT_ATTEMPTS, merged.maxExtractAttempts),
    retryBackoffMs: Math.max(MIN_BACKOFF_MS, toInt(env.RETRY_BACKOFF_MS, merged.retryBackoffMs)),
    retryBackoffMode: toBackoffMode(env.RETRY_BACKOFF_MODE, merged.retryBackoffMode),
    repairPlaceholders: toBool(env.REPAIR_PLACEHOLDERS, merged.repairPlaceholders),
    aiApiKey: env.AI_API_KEY ?? env.OPENAI_API_KEY ?? merged.aiApiKey,
    aiBaseUrl: env.AI_BASE_URL ?? merged.aiBaseUrl,
    aiModel: env.AI_MODEL ?? merged.aiModel,
    aiTimeoutMs: toInt(env.AI_TIMEOUT_MS, merged.aiTimeoutMs),
    institutionId: toInt(env.INSTITUTION_ID, merged.institutionId),
    departmentsPath: env.DEPARTMENTS_PATH ?? merged.departmentsPath,
    outputPath: env.OUTPUT_PATH ?? merged.outputPath,
    maxUnits: toOptionalInt(env.MAX_UNITS, merged.maxUnits),
    logLevel: env.LOG_LEVEL ?? merged.logLevel,
  };
}

export function validateConfig(config: AppConfig): void {
  if (config.workerCount < 1) {
    throw new ConfigError(`workerCount must be at least 1, got ${config.workerCount}`);
  }
  if (config.checkpointBatchSize < 1) {
    throw new ConfigError(`checkpointBatchSize must be at least 1, got ${config.checkpointBatchSize}`);
  }
  if (config.maxExtractAttempts < 1) {
    throw new ConfigError(`maxExtractAttempts must be at least 1, got ${config.maxExtractAttempts}`);
  }
  if (config.context.units < 0 || config.context.records < 0 || config.context.overlap < 0) {
    throw new ConfigError("context window sizes must not be negative");
  }
  if (config.strategy === "ai" && !config.aiApiKey) {
    throw new ConfigError("The ai strategy requires AI_API_KEY (or OPENAI_API_KEY) to be set");
  }
  try {
    new RegExp(config.unitLinkPattern);
  } catch {
    throw new ConfigError(`unitLinkPattern is not a valid regular expression: ${config.unitLinkPattern}`);
  }
}

export { DEFAULT_CONFIG };
