import type { ContextUnit } from "../context";
import type { CatalogRecord } from "../types";
import type { ExtractionRequest, RecordCandidate } from "./types";

const CONTEXT_UNIT_CHARS = 500;
const REPAIR_CONTEXT_UNIT_CHARS = 300;
const OVERLAP_DESCRIPTION_CHARS = 200;

function truncate(text: string, limit: number): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  return collapsed.length > limit ? `${collapsed.slice(0, limit)}...` : collapsed;
}

function describeContextUnits(units: ContextUnit[], limit: number): string {
  return units.map((unit) => `Unit ${unit.ordinal + 1} (${unit.unitId}): ${truncate(unit.content, limit)}`).join("\n");
}

function describeRecords(records: CatalogRecord[]): string {
  return records.map((record) => `- ${record.prefix} ${record.number}: ${record.title || "(no title)"}`).join("\n");
}

function describeOverlap(records: CatalogRecord[]): string {
  return records
    .map(
      (record) =>
        `- ${record.prefix} ${record.number}: ${record.title || "(no title)"}\n` +
        `  Description so far: ${truncate(record.description, OVERLAP_DESCRIPTION_CHARS) || "(empty)"}`,
    )
    .join("\n");
}

export function buildExtractionPrompt(request: ExtractionRequest, institutionId: number): string {
  const sections = [
    "You extract course records from one page of a course catalog.",
    "",
    "Rules:",
    "1. Return every course that appears in PAGE CONTENT.",
    '2. Each course is an object with the string fields "prefix", "number", "title", "description", "units", "department" and "metadata", and the integer field "institution_id".',
    `3. Set "institution_id" to ${institutionId}.`,
    '4. "metadata" is one string of "Label: value" pairs separated by "; " (prerequisites, lecture or lab hours, semesters offered, learning outcomes).',
    '5. Keep "number" and "units" as strings exactly as printed, including letter suffixes and symbolic values such as "V".',
    "6. Use the earlier units and recent courses below only to resolve fields that are unclear on this page.",
    "7. When a course listed under CONTINUING COURSES continues on this page, return it once with its completed fields. Do not return a continuing course that has nothing new on this page.",
    "8. Answer with a JSON array only, with no commentary. Answer [] when the page has no courses.",
    "",
    "PAGE CONTENT:",
    request.content,
  ];

  if (request.contextUnits.length > 0) {
    sections.push("", "EARLIER UNITS:", describeContextUnits(request.contextUnits, CONTEXT_UNIT_CHARS));
  }
  if (request.contextRecords.length > 0) {
    sections.push("", "RECENT COURSES:", describeRecords(request.contextRecords));
  }
  if (request.overlapRecords.length > 0) {
    sections.push("", "CONTINUING COURSES:", describeOverlap(request.overlapRecords));
  }

  sections.push("", "JSON array:");
  return sections.join("\n");
}

export function buildRepairPrompt(candidates: RecordCandidate[], request: ExtractionRequest): string {
  const sections = [
    'Some fields in the course records below are empty, null, "unknown" or "n/a".',
    "Fill them in from the page content and context where the value can be determined, and leave every other field unchanged.",
    "Answer with the corrected JSON array only, in the same order and with the same fields.",
    "",
    "RECORDS:",
    JSON.stringify(candidates, null, 2),
    "",
    "PAGE CONTENT:",
    request.content,
  ];

  if (request.contextUnits.length > 0) {
    sections.push("", "EARLIER UNITS:", describeContextUnits(request.contextUnits, REPAIR_CONTEXT_UNIT_CHARS));
  }
  if (request.contextRecords.length > 0) {
    sections.push("", "RECENT COURSES:", JSON.stringify(request.contextRecords, null, 2));
  }

  return sections.join("\n");
}
