import { load } from "cheerio";
import type { SelectorProfile } from "../config";
import { parseCourseCode } from "./courseCode";
import { joinMetadata } from "./metadata";
import type { ExtractionRequest, ExtractionStrategy, RecordCandidate } from "./types";

function clean(value: string | undefined): string {
  return (value ?? "").replace(/\s+/g, " ").trim();
}

function stripUnitsLabel(value: string): string {
  return value.replace(/^(credits?|units?|credit hours)\s*:?\s*/i, "");
}

/** Deterministic strategy: one candidate per element matching `profile.item`. No network calls. */
export class HtmlCatalogStrategy implements ExtractionStrategy {
  readonly name = "html";
  private readonly profile: SelectorProfile;

  constructor(profile: SelectorProfile) {
    this.profile = profile;
  }

  async extract(request: ExtractionRequest): Promise<RecordCandidate[]> {
    const { profile } = this;
    const $ = load(request.content);
    const pageDepartment = profile.department ? clean($(profile.department).first().text()) : "";
    const candidates: RecordCandidate[] = [];

    $(profile.item).each((_, element) => {
      const item = $(element);
      const codeElement = item.find(profile.code).first();
      const codeText = profile.codeAttribute ? codeElement.attr(profile.codeAttribute) : codeElement.text();
      const code = parseCourseCode(clean(codeText));
      const read = (selector: string | undefined): string => (selector ? clean(item.find(selector).first().text()) : "");

      const title = read(profile.title) || (code && !profile.codeAttribute ? code.rest : "");
      candidates.push({
        prefix: code?.prefix,
        number: code?.number,
        title,
        description: read(profile.description),
        units: stripUnitsLabel(read(profile.units)),
        department: pageDepartment,
        metadata: joinMetadata(profile.metadata.map((entry) => [entry.label, read(entry.selector)])),
      });
    });

    return candidates;
  }
}
