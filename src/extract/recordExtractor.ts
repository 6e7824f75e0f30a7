import { naturalKey, type NaturalKey } from "../dedupe";
import type { Logger, MetricsRegistry } from "../observability";
import type { CatalogRecord } from "../types";
import { flattenMetadata } from "./metadata";
import { isPlaceholder } from "./placeholders";
import type { CandidateScalar, ExtractedRecord, ExtractionRequest, ExtractionStrategy, RecordCandidate } from "./types";

export interface NormalizeDefaults {
  institutionId: number;
  departments?: ReadonlyMap<string, string>;
}

export type CandidateValidation = { ok: true; record: CatalogRecord } | { ok: false; reason: string };

const MERGED_FIELDS = ["title", "description", "units", "department", "metadata"] as const;

function toText(value: CandidateScalar): string {
  if (value === null || value === undefined) {
    return "";
  }
  return String(value).replace(/\s+/g, " ").trim();
}

function toInteger(value: CandidateScalar): number | undefined {
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === "string" && /^\s*\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return undefined;
}

/**
 * Turns a candidate into a typed record. A candidate without a usable prefix or number
 * has no natural key and is rejected.
 */
export function normalizeCandidate(candidate: RecordCandidate, defaults: NormalizeDefaults): CandidateValidation {
  const prefix = toText(candidate.prefix);
  const number = toText(candidate.number);
  if (isPlaceholder(prefix)) {
    return { ok: false, reason: "missing prefix" };
  }
  if (isPlaceholder(number)) {
    return { ok: false, reason: "missing number" };
  }

  const department = toText(candidate.department) || defaults.departments?.get(prefix.toUpperCase()) || "";
  const institutionId =
    defaults.institutionId > 0 ? defaults.institutionId : (toInteger(candidate.institution_id) ?? defaults.institutionId);

  return {
    ok: true,
    record: {
      prefix,
      number,
      title: toText(candidate.title),
      description: toText(candidate.description),
      units: toText(candidate.units),
      department,
      institution_id: institutionId,
      metadata: flattenMetadata(candidate.metadata),
    },
  };
}

/**
 * Overlap completion: fields the incoming record actually carries win over the earlier ones.
 * The key stays as first committed.
 */
export function mergeRecords(previous: CatalogRecord, incoming: CatalogRecord): CatalogRecord {
  const merged: CatalogRecord = { ...previous };
  for (const field of MERGED_FIELDS) {
    if (!isPlaceholder(incoming[field])) {
      merged[field] = incoming[field];
    }
  }
  return merged;
}

export interface RecordExtractorDeps {
  strategy: ExtractionStrategy;
  logger: Logger;
  metrics: MetricsRegistry;
  defaults: NormalizeDefaults;
}

/**
 * Runs a strategy over one unit and turns its candidates into records. Candidates whose key
 * matches an overlap record are merged into it and flagged `completes`; candidates repeated
 * within the unit are folded into one.
 */
export class RecordExtractor {
  private readonly deps: RecordExtractorDeps;

  constructor(deps: RecordExtractorDeps) {
    this.deps = deps;
  }

  get strategyName(): string {
    return this.deps.strategy.name;
  }

  async extract(request: ExtractionRequest): Promise<ExtractedRecord[]> {
    const { strategy, logger, metrics, defaults } = this.deps;
    const unitId = request.unit.id;
    const stopTimer = metrics.startTimer("extract_ms");

    let candidates: RecordCandidate[];
    try {
      candidates = await strategy.extract(request);
    } finally {
      stopTimer();
    }

    const overlapByKey = new Map<NaturalKey, CatalogRecord>(
      request.overlapRecords.map((record) => [naturalKey(record), record]),
    );
    const results: ExtractedRecord[] = [];
    const indexByKey = new Map<NaturalKey, number>();

    candidates.forEach((candidate, index) => {
      const validation = normalizeCandidate(candidate, defaults);
      if (!validation.ok) {
        metrics.incrementCounter("records_invalid");
        logger.warn("candidate_discarded", { unitId, candidateIndex: index, reason: validation.reason });
        return;
      }

      const key = naturalKey(validation.record);
      const existingIndex = indexByKey.get(key);
      if (existingIndex !== undefined) {
        const existing = results[existingIndex];
        results[existingIndex] = { ...existing, record: mergeRecords(existing.record, validation.record) };
        return;
      }

      const overlapped = overlapByKey.get(key);
      indexByKey.set(key, results.length);
      results.push(
        overlapped
          ? { record: mergeRecords(overlapped, validation.record), completes: true }
          : { record: validation.record, completes: false },
      );
    });

    logger.debug("extract_unit_complete", {
      unitId,
      candidates: candidates.length,
      records: results.length,
      completions: results.filter((result) => result.completes).length,
    });
    return results;
  }
}
