import { joinMetadata } from "./metadata";
import type { ExtractionRequest, ExtractionStrategy, RecordCandidate } from "./types";

const HEADING = /^([A-Z][A-Z&]{1,7})\s+(\d{2,4}[A-Z]{0,3})\b\s*[-–—.:]?\s*(.*)$/;
const TRAILING_UNITS = /\s*\(\s*(\d+(?:\.\d+)?(?:\s*-\s*\d+(?:\.\d+)?)?|V)\s*(?:cr\.?|credits?|units?)?\s*\)\s*$/i;
const UNITS_LINE = /^(?:credits?|units?)\s*:\s*(.+)$/i;
const METADATA_LINE =
  /^(pre(?:requisites?)?|co-?requisites?|recommended preparation|lecture hours|lab hours|class hours|semester offered|cross-?list(?:ed)?|comments?)\s*:\s*(.+)$/i;

interface Draft {
  prefix: string;
  number: string;
  title: string;
  units: string;
  description: string[];
  metadata: Array<[string, string]>;
}

function labelFor(raw: string): string {
  const lower = raw.toLowerCase();
  if (lower === "pre" || lower.startsWith("prerequisite")) {
    return "Prerequisites";
  }
  return raw
    .split(/\s+/)
    .map((word) => word[0].toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

function toCandidate(draft: Draft): RecordCandidate {
  return {
    prefix: draft.prefix,
    number: draft.number,
    title: draft.title,
    description: draft.description.join(" ").trim(),
    units: draft.units,
    metadata: joinMetadata(draft.metadata),
  };
}

/**
 * Deterministic strategy for document text: a line like `ACC 124 Principles of Accounting (3)`
 * opens a record and the following lines up to the next heading fill it. Text before the
 * first heading continues the last overlap record, if there is one.
 */
export class TextCatalogStrategy implements ExtractionStrategy {
  readonly name = "text";

  async extract(request: ExtractionRequest): Promise<RecordCandidate[]> {
    const lines = request.content
      .split(/\r?\n/)
      .map((line) => line.replace(/\s+/g, " ").trim())
      .filter((line) => line.length > 0);

    const candidates: RecordCandidate[] = [];
    const leading: string[] = [];
    let current: Draft | undefined;

    for (const line of lines) {
      const heading = line.match(HEADING);
      if (heading) {
        if (current) {
          candidates.push(toCandidate(current));
        }
        const unitsMatch = heading[3].match(TRAILING_UNITS);
        current = {
          prefix: heading[1],
          number: heading[2],
          title: heading[3].replace(TRAILING_UNITS, "").trim(),
          units: unitsMatch ? unitsMatch[1].replace(/\s+/g, "") : "",
          description: [],
          metadata: [],
        };
        continue;
      }

      if (!current) {
        leading.push(line);
        continue;
      }

      const unitsLine = line.match(UNITS_LINE);
      const metadataLine = line.match(METADATA_LINE);
      if (unitsLine && !current.units) {
        current.units = unitsLine[1].trim();
      } else if (metadataLine) {
        current.metadata.push([labelFor(metadataLine[1]), metadataLine[2]]);
      } else {
        current.description.push(line);
      }
    }
    if (current) {
      candidates.push(toCandidate(current));
    }

    const continued = request.overlapRecords[request.overlapRecords.length - 1];
    if (continued && leading.length > 0) {
      candidates.unshift({
        prefix: continued.prefix,
        number: continued.number,
        description: [continued.description, ...leading].join(" ").trim(),
      });
    }

    return candidates;
  }
}
