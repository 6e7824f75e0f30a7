import { loadConfig, validateConfig, type AppConfig, type ExtractStrategyName } from "../config";
import { runCrawl, runDocument, runStatus, type CommandContext } from "../core/commands";
import { ConfigError } from "../core/errors";
import { createRunId, errorMessage, Logger, MetricsRegistry, parseLogLevel } from "../observability";
import { createStore } from "../store";

export type CommandName = "crawl" | "document" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  documentPath?: string;
  dryRun: boolean;
  force: boolean;
  resume: boolean;
  ignoreHttpsErrors: boolean;
  strategy?: ExtractStrategyName;
  workers?: number;
  maxUnits?: number;
  outputPath?: string;
  configPath?: string;
}

const HELP_TEXT = `
Usage:
  catalog-extractor <command> [options]

Commands:
  crawl              Discover catalog pages and extract them in parallel
  document <path>    Extract a PDF or text document page by page
  status             Show the metadata of the current checkpoint

Options:
  --config <path>        Optional path to JSON config file
  --strategy <name>      html | text | ai
  --workers <n>          Number of parallel workers (crawl)
  --output <path>        Checkpoint file to write
  --max-units <n>        Limit the number of units processed
  --dry-run              List discovered locations without extracting (crawl)
  --resume               Continue from an in-progress checkpoint
  --force                Run again even if the checkpoint is complete
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "crawl" || raw === "document" || raw === "status") {
    return raw;
  }
  return undefined;
}

function readOption(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  return value && !value.startsWith("--") ? value : undefined;
}

function readIntOption(argv: string[], name: string): number | undefined {
  const raw = readOption(argv, name);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) ? parsed : undefined;
}

function parseStrategy(raw: string | undefined): ExtractStrategyName | undefined {
  if (raw === "html" || raw === "text" || raw === "ai") {
    return raw;
  }
  return undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const positional = argv[1];
  const documentPath = command === "document" && positional && !positional.startsWith("--") ? positional : undefined;
  if (command === "document" && !documentPath) {
    return "help";
  }

  return {
    command,
    documentPath,
    dryRun: argv.includes("--dry-run"),
    force: argv.includes("--force"),
    resume: argv.includes("--resume"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    strategy: parseStrategy(readOption(argv, "--strategy")),
    workers: readIntOption(argv, "--workers"),
    maxUnits: readIntOption(argv, "--max-units"),
    outputPath: readOption(argv, "--output"),
    configPath: readOption(argv, "--config"),
  };
}

/** Command-line flags win over the file and environment. Documents default to the text strategy. */
export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  const documentStrategy = config.strategy === "html" ? "text" : config.strategy;
  return {
    ...config,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    strategy: parsed.strategy ?? (parsed.command === "document" ? documentStrategy : config.strategy),
    workerCount: parsed.workers ?? config.workerCount,
    maxUnits: parsed.maxUnits ?? config.maxUnits,
    outputPath: parsed.outputPath ?? config.outputPath,
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const runId = createRunId(parsed.command);
  const metrics = new MetricsRegistry();
  let logger = new Logger({ component: "cli", runId });
  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn("sigint_received", { command: parsed.command });
    controller.abort();
  };

  try {
    const config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
    validateConfig(config);
    logger = new Logger({ component: "cli", runId, minLevel: parseLogLevel(config.logLevel) });

    const store = createStore(config, logger.child("store"), metrics);
    const context: CommandContext = { runId, config, store, logger, metrics, signal: controller.signal };

    logger.info("command_start", {
      command: parsed.command,
      strategy: config.strategy,
      workers: config.workerCount,
      output: store.location,
      dryRun: parsed.dryRun,
      resume: parsed.resume,
      force: parsed.force,
      ignoreHttpsErrors: config.ignoreHttpsErrors,
      maxUnits: config.maxUnits,
    });

    process.once("SIGINT", onSigint);
    switch (parsed.command) {
      case "crawl":
        await runCrawl({ ...context, logger: logger.child("crawl") }, parsed);
        break;
      case "document":
        await runDocument({ ...context, logger: logger.child("document") }, parsed.documentPath ?? "", parsed);
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("config_invalid", { error: errorMessage(error) });
      return 1;
    }
    throw error;
  } finally {
    process.removeListener("SIGINT", onSigint);
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
