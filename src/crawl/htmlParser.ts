import { load } from "cheerio";

export interface ParsedLink {
  url: string;
  text: string;
}

export type LinkPredicate = (link: ParsedLink) => boolean;

function sanitizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function normalizeUrl(baseUrl: string, href: string): string | undefined {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return undefined;
  }
}

export function createPatternPredicate(pattern: string): LinkPredicate {
  const regex = new RegExp(pattern, "i");
  return (link) => regex.test(link.url);
}

export function extractLinksFromHtml(html: string, pageUrl: string, predicate: LinkPredicate): ParsedLink[] {
  const $ = load(html);
  const links: ParsedLink[] = [];
  const seen = new Set<string>();

  $("a[href]").each((_, element) => {
    const href = $(element).attr("href");
    if (!href || href.startsWith("#") || href.toLowerCase().startsWith("javascript:")) {
      return;
    }

    const url = normalizeUrl(pageUrl, href);
    if (!url || seen.has(url)) {
      return;
    }

    const link = { url, text: sanitizeText($(element).text() || $(element).attr("title") || "") };
    if (!predicate(link)) {
      return;
    }

    seen.add(url);
    links.push(link);
  });

  return links;
}

export function extractNextPageUrl(html: string, pageUrl: string): string | undefined {
  const $ = load(html);

  const explicitNext =
    $("a[rel='next']").attr("href") ||
    $(".pagination a.next").attr("href") ||
    $("li.pager__item--next a").attr("href") ||
    $("nav.pagination a:contains('Next')").attr("href");

  if (explicitNext) {
    return normalizeUrl(pageUrl, explicitNext);
  }

  return undefined;
}
