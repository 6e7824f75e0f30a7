import { errorMessage, type Logger, type MetricsRegistry } from "../observability";
import type { Renderer } from "../render";
import type { SourceUnit } from "../types";
import { Frontier } from "./frontier";
import { extractLinksFromHtml, extractNextPageUrl, type LinkPredicate } from "./htmlParser";

const PAGE_PLACEHOLDER = "{page}";
const DEFAULT_MAX_LISTING_PAGES = 500;

export interface DiscoveryDependencies {
  renderer: Renderer;
  frontier: Frontier;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface DiscoveryOptions {
  listingUrl: string;
  startPage: number;
  endPage: number;
  followNextLinks: boolean;
  predicate: LinkPredicate;
  maxListingPages?: number;
}

export function buildListingUrls(template: string, startPage: number, endPage: number): string[] {
  if (!template.includes(PAGE_PLACEHOLDER)) {
    return [template];
  }

  const urls: string[] = [];
  for (let page = startPage; page <= endPage; page += 1) {
    urls.push(template.split(PAGE_PLACEHOLDER).join(String(page)));
  }
  return urls;
}

/**
 * Walks listing pages and yields every new unit location they link to, in page order.
 * An unreachable listing page is logged and skipped.
 */
export async function* discoverUnitLocations(
  deps: DiscoveryDependencies,
  options: DiscoveryOptions,
): AsyncGenerator<string> {
  const { renderer, frontier, logger, metrics } = deps;
  const maxListingPages = options.maxListingPages ?? DEFAULT_MAX_LISTING_PAGES;
  const queue = buildListingUrls(options.listingUrl, options.startPage, options.endPage);
  let listingsVisited = 0;

  while (queue.length > 0 && listingsVisited < maxListingPages) {
    const listingUrl = queue.shift();
    if (listingUrl === undefined || !frontier.markVisited(listingUrl)) {
      continue;
    }
    listingsVisited += 1;

    logger.info("discovery_listing_start", { listingUrl });
    const stopTimer = metrics.startTimer("listing_fetch_ms");

    let html: string;
    try {
      html = await renderer.open(listingUrl);
    } catch (error) {
      stopTimer();
      metrics.incrementCounter("listings_failed");
      logger.error("discovery_listing_failed", { listingUrl, error: errorMessage(error) });
      continue;
    }
    const durationMs = stopTimer();

    metrics.incrementCounter("listings_crawled");
    const links = extractLinksFromHtml(html, listingUrl, options.predicate);
    let discoveredOnPage = 0;
    for (const link of links) {
      if (!frontier.add(link.url)) {
        continue;
      }
      discoveredOnPage += 1;
      metrics.incrementCounter("units_discovered");
      yield link.url;
    }

    logger.info("discovery_listing_complete", {
      listingUrl,
      linksOnPage: links.length,
      discoveredOnPage,
      totalDiscovered: frontier.size,
      durationMs,
    });

    if (options.followNextLinks) {
      const nextUrl = extractNextPageUrl(html, listingUrl);
      if (nextUrl && !frontier.isVisited(nextUrl)) {
        queue.push(nextUrl);
      }
    }
  }

  if (queue.length > 0) {
    logger.warn("discovery_max_listing_pages_reached", { maxListingPages, remaining: queue.length });
  }
}

/** Numbers locations as page units. Stops pulling from discovery once `maxUnits` is reached. */
export async function* toPageUnits(locations: AsyncIterable<string>, maxUnits?: number): AsyncGenerator<SourceUnit> {
  if (maxUnits !== undefined && maxUnits <= 0) {
    return;
  }
  let ordinal = 0;
  for await (const location of locations) {
    yield { id: location, ordinal, location, kind: "page" };
    ordinal += 1;
    if (maxUnits !== undefined && ordinal >= maxUnits) {
      return;
    }
  }
}
