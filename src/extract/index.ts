import type { AppConfig } from "../config";
import type { Logger, MetricsRegistry } from "../observability";
import { AiExtractionStrategy } from "./aiStrategy";
import { loadDepartmentMap } from "./departments";
import { HtmlCatalogStrategy } from "./htmlStrategy";
import { RecordExtractor } from "./recordExtractor";
import { createRetryPolicy } from "./retryPolicy";
import { OpenAiTextGenerator, type TextGenerator } from "./textGenerator";
import { TextCatalogStrategy } from "./textStrategy";
import type { ExtractionStrategy } from "./types";

interface StrategyDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  generator?: TextGenerator;
}

export function createExtractionStrategy(deps: StrategyDeps): ExtractionStrategy {
  const { config, logger, metrics } = deps;

  switch (config.strategy) {
    case "html":
      return new HtmlCatalogStrategy(config.selectors);
    case "text":
      return new TextCatalogStrategy();
    case "ai": {
      const generator =
        deps.generator ??
        new OpenAiTextGenerator({
          apiKey: config.aiApiKey ?? "",
          baseUrl: config.aiBaseUrl,
          model: config.aiModel,
          timeoutMs: config.aiTimeoutMs,
        });
      return new AiExtractionStrategy({
        generator,
        retryPolicy: createRetryPolicy(config),
        logger,
        metrics,
        institutionId: config.institutionId,
        repairPlaceholders: config.repairPlaceholders,
      });
    }
    default:
      throw new Error(`Unsupported extraction strategy: ${String(config.strategy)}`);
  }
}

export async function createRecordExtractor(deps: StrategyDeps): Promise<RecordExtractor> {
  const departments = deps.config.departmentsPath ? await loadDepartmentMap(deps.config.departmentsPath) : undefined;
  return new RecordExtractor({
    strategy: createExtractionStrategy(deps),
    logger: deps.logger.child("extract"),
    metrics: deps.metrics,
    defaults: {
      institutionId: deps.config.institutionId,
      departments,
    },
  });
}

export * from "./aiStrategy";
export * from "./courseCode";
export * from "./departments";
export * from "./htmlStrategy";
export * from "./metadata";
export * from "./placeholders";
export * from "./prompts";
export * from "./recordExtractor";
export * from "./responseParser";
export * from "./retryPolicy";
export * from "./textGenerator";
export * from "./textStrategy";
export * from "./types";
