export type ExtractStrategyName = "html" | "text" | "ai";
export type BackoffMode = "fixed" | "exponential";

export interface MetadataSelector {
  label: string;
  selector: string;
}

/** CSS selectors used by the deterministic HTML strategy. Scoped to one item unless noted. */
export interface SelectorProfile {
  item: string;
  code: string;
  /** Read the course code from this attribute of the `code` element instead of its text. */
  codeAttribute?: string;
  title?: string;
  units?: string;
  description?: string;
  /** Page-level selector. */
  department?: string;
  metadata: MetadataSelector[];
}

export interface ContextSizes {
  units: number;
  records: number;
  overlap: number;
}

export interface AppConfig {
  sourceId: string;
  listingUrl: string;
  listingStartPage: number;
  listingEndPage: number;
  followNextLinks: boolean;
  unitLinkPattern: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  requestDelayMs: number;
  workerCount: number;
  checkpointBatchSize: number;
  context: ContextSizes;
  strategy: ExtractStrategyName;
  maxExtractAttempts: number;
  retryBackoffMs: number;
  retryBackoffMode: BackoffMode;
  repairPlaceholders: boolean;
  aiApiKey?: string;
  aiBaseUrl?: string;
  aiModel: string;
  aiTimeoutMs: number;
  institutionId: number;
  departmentsPath?: string;
  selectors: SelectorProfile;
  outputPath: string;
  maxUnits?: number;
  logLevel: string;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "selectors" | "context">> & {
  selectors?: Partial<SelectorProfile>;
  context?: Partial<ContextSizes>;
};
