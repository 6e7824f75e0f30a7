import { MalformedOutputError, TransportError } from "../core/errors";
import { errorMessage, type Logger, type MetricsRegistry } from "../observability";
import { candidateNeedsRepair, isPlaceholder } from "./placeholders";
import { buildExtractionPrompt, buildRepairPrompt } from "./prompts";
import { parseCandidateArray } from "./responseParser";
import type { RetryPolicy } from "./retryPolicy";
import type { TextGenerator } from "./textGenerator";
import type { ExtractionRequest, ExtractionStrategy, RecordCandidate } from "./types";

export interface AiExtractionStrategyDeps {
  generator: TextGenerator;
  retryPolicy: RetryPolicy;
  logger: Logger;
  metrics: MetricsRegistry;
  institutionId: number;
  repairPlaceholders: boolean;
}

const REPAIRABLE_FIELDS = ["prefix", "number", "title", "description", "units", "department", "institution_id"] as const;

function sameCourse(original: RecordCandidate, repaired: RecordCandidate): boolean {
  const matches = (left: unknown, right: unknown): boolean =>
    isPlaceholder(left) || String(left).trim().toUpperCase() === String(right ?? "").trim().toUpperCase();
  return matches(original.prefix, repaired.prefix) && matches(original.number, repaired.number);
}

/**
 * Copies repaired values into the fields the original left as placeholders. The answer must list
 * the same courses in the same order; anything else is malformed.
 */
export function mergeRepairedCandidates(originals: RecordCandidate[], repaired: RecordCandidate[]): RecordCandidate[] {
  if (repaired.length !== originals.length) {
    throw new MalformedOutputError(`Repair response has ${repaired.length} records, expected ${originals.length}`);
  }

  return originals.map((original, index) => {
    const answer = repaired[index];
    if (!sameCourse(original, answer)) {
      throw new MalformedOutputError(`Repair response changed the course at position ${index}`);
    }

    const merged: RecordCandidate = { ...original };
    for (const field of REPAIRABLE_FIELDS) {
      if (isPlaceholder(original[field]) && !isPlaceholder(answer[field])) {
        merged[field] = answer[field];
      }
    }
    if (isPlaceholder(original.metadata) && !isPlaceholder(answer.metadata)) {
      merged.metadata = answer.metadata;
    }
    return merged;
  });
}

export function isRetryableExtractionError(error: Error): boolean {
  return error instanceof MalformedOutputError || error instanceof TransportError;
}

/**
 * Sends the unit, its context and the overlap records to a text-generation backend.
 * A unit whose attempts are all exhausted yields no candidates; it never throws for
 * transport or output problems.
 */
export class AiExtractionStrategy implements ExtractionStrategy {
  readonly name = "ai";
  private readonly deps: AiExtractionStrategyDeps;

  constructor(deps: AiExtractionStrategyDeps) {
    this.deps = deps;
  }

  async extract(request: ExtractionRequest): Promise<RecordCandidate[]> {
    const { generator, retryPolicy, logger, metrics } = this.deps;
    const unitId = request.unit.id;
    const prompt = buildExtractionPrompt(request, this.deps.institutionId);

    const outcome = await retryPolicy.execute(
      async (attempt) => {
        metrics.incrementCounter("extract_attempts");
        logger.debug("extract_attempt_start", { unitId, attempt });
        const text = await generator.generate(prompt);
        return parseCandidateArray(text);
      },
      {
        isRetryable: isRetryableExtractionError,
        onRetry: (error, attempt, delayMs) => {
          metrics.incrementCounter("extract_retries");
          logger.warn("extract_attempt_failed", { unitId, attempt, delayMs, error: error.message });
        },
      },
    );

    if (!outcome.ok) {
      metrics.incrementCounter("extract_exhausted");
      logger.error("extract_unit_exhausted", { unitId, attempts: outcome.attempts, error: outcome.error.message });
      return [];
    }

    if (!this.deps.repairPlaceholders || !outcome.value.some(candidateNeedsRepair)) {
      return outcome.value;
    }
    return this.repair(outcome.value, request);
  }

  /** One extra call asking for the placeholder fields only. Any failure keeps the candidates as they were. */
  private async repair(candidates: RecordCandidate[], request: ExtractionRequest): Promise<RecordCandidate[]> {
    const { generator, logger, metrics } = this.deps;
    const unitId = request.unit.id;
    metrics.incrementCounter("repairs_attempted");
    logger.info("extract_repair_start", { unitId, candidates: candidates.length });

    try {
      const repaired = parseCandidateArray(await generator.generate(buildRepairPrompt(candidates, request)));
      return mergeRepairedCandidates(candidates, repaired);
    } catch (error) {
      metrics.incrementCounter("repairs_failed");
      logger.warn("extract_repair_failed", { unitId, error: errorMessage(error) });
      return candidates;
    }
  }
}
