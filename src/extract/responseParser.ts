import { z } from "zod";
import { MalformedOutputError } from "../core/errors";
import { CANDIDATE_FIELDS, type CandidateField, type CandidateScalar, type RecordCandidate } from "./types";

/** Alternate field names models tend to answer with. */
const FIELD_ALIASES: Record<string, CandidateField> = {
  course_prefix: "prefix",
  subject: "prefix",
  course_number: "number",
  course_title: "title",
  name: "title",
  course_desc: "description",
  course_description: "description",
  num_units: "units",
  credits: "units",
  dept_name: "department",
  inst_ipeds: "institution_id",
};

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const objectArraySchema = z.array(z.record(z.string(), z.unknown()));

export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```$/);
  return fenced ? fenced[1].trim() : trimmed;
}

function resolveField(key: string): CandidateField | undefined {
  const normalized = key.trim().toLowerCase();
  const direct = CANDIDATE_FIELDS.find((field) => field === normalized);
  return direct ?? FIELD_ALIASES[normalized];
}

function toScalar(field: CandidateField, value: unknown, index: number): CandidateScalar {
  const parsed = scalarSchema.safeParse(value);
  if (!parsed.success) {
    throw new MalformedOutputError(`Record ${index} has a non-scalar value for ${field}`);
  }
  return parsed.data;
}

function toCandidate(raw: Record<string, unknown>, index: number): RecordCandidate {
  const candidate: RecordCandidate = {};
  for (const [key, value] of Object.entries(raw)) {
    const field = resolveField(key);
    if (!field || candidate[field] !== undefined) {
      continue;
    }
    if (field === "metadata") {
      candidate.metadata = value;
    } else {
      candidate[field] = toScalar(field, value, index);
    }
  }
  return candidate;
}

/**
 * Parses a text-generation response into record candidates. The response must be a JSON
 * array of objects, optionally inside a code fence; a single object is taken as a one-item
 * array and `null` as an empty one. Anything else raises MalformedOutputError.
 */
export function parseCandidateArray(text: string): RecordCandidate[] {
  const body = stripCodeFences(text);
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedOutputError(`Response is not valid JSON: ${reason}`);
  }

  if (json === null) {
    return [];
  }
  const items = Array.isArray(json) ? json : [json];
  const parsed = objectArraySchema.safeParse(items);
  if (!parsed.success) {
    throw new MalformedOutputError("Response is not an array of objects");
  }

  return parsed.data.map((raw, index) => toCandidate(raw, index));
}
