import { afterEach, describe, expect, it, vi } from "vitest";
import { newMetrics, quietLogger } from "../../__tests__/helpers";
import { StaticRenderer } from "../../render";
import { buildListingUrls, discoverUnitLocations, toPageUnits } from "../discovery";
import { Frontier } from "../frontier";
import { createPatternPredicate } from "../htmlParser";

async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const collected: T[] = [];
  for await (const item of items) {
    collected.push(item);
  }
  return collected;
}

async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  yield* items;
}

describe("buildListingUrls", () => {
  it("expands the page placeholder over the inclusive range", () => {
    expect(buildListingUrls("https://catalog.test/classes?page={page}", 0, 2)).toEqual([
      "https://catalog.test/classes?page=0",
      "https://catalog.test/classes?page=1",
      "https://catalog.test/classes?page=2",
    ]);
  });

  it("uses a template without placeholder as a single listing", () => {
    expect(buildListingUrls("https://catalog.test/list", 0, 5)).toEqual(["https://catalog.test/list"]);
  });
});

describe("discoverUnitLocations", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("times the listing fetch without the time spent consuming its links", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
    const renderer = new StaticRenderer({
      "https://catalog.test/list": '<a href="/courses/acc-124">ACC 124</a><a href="/courses/acc-125">ACC 125</a>',
    });
    const metrics = newMetrics();

    const locations: string[] = [];
    for await (const location of discoverUnitLocations(
      { renderer, frontier: new Frontier(), logger: quietLogger(), metrics },
      {
        listingUrl: "https://catalog.test/list",
        startPage: 0,
        endPage: 0,
        followNextLinks: false,
        predicate: createPatternPredicate("/courses?/"),
      },
    )) {
      locations.push(location);
      vi.setSystemTime(Date.now() + 5_000);
    }

    expect(locations).toHaveLength(2);
    expect(metrics.getTimerSummaries().listing_fetch_ms).toEqual({ count: 1, min: 0, max: 0, avg: 0 });
  });

  it("yields each matching location once and skips failed listings", async () => {
    const renderer = new StaticRenderer({
      "https://catalog.test/classes?page=0": `
        <a href="/courses/acc-124">ACC 124</a>
        <a href="/courses/acc-125">ACC 125</a>
        <a href="/courses/acc-124#top">ACC 124 again</a>
        <a href="/about">About</a>`,
      "https://catalog.test/classes?page=2": `
        <a href="/courses/acc-125">ACC 125</a>
        <a href="https://catalog.test/courses/acc-126">ACC 126</a>`,
    });
    const metrics = newMetrics();

    const locations = await collect(
      discoverUnitLocations(
        { renderer, frontier: new Frontier(), logger: quietLogger(), metrics },
        {
          listingUrl: "https://catalog.test/classes?page={page}",
          startPage: 0,
          endPage: 2,
          followNextLinks: false,
          predicate: createPatternPredicate("/courses?/"),
        },
      ),
    );

    expect(locations).toEqual([
      "https://catalog.test/courses/acc-124",
      "https://catalog.test/courses/acc-125",
      "https://catalog.test/courses/acc-126",
    ]);
    expect(metrics.getCounter("listings_crawled")).toBe(2);
    expect(metrics.getCounter("listings_failed")).toBe(1);
    expect(metrics.getCounter("units_discovered")).toBe(3);
  });

  it("follows next links without revisiting a listing", async () => {
    const renderer = new StaticRenderer({
      "https://catalog.test/list": '<a href="/course/bio-101">BIO 101</a><a rel="next" href="/list?p=2">Next</a>',
      "https://catalog.test/list?p=2": '<a href="/course/bio-102">BIO 102</a><a rel="next" href="/list">Next</a>',
    });

    const locations = await collect(
      discoverUnitLocations(
        { renderer, frontier: new Frontier(), logger: quietLogger(), metrics: newMetrics() },
        {
          listingUrl: "https://catalog.test/list",
          startPage: 0,
          endPage: 0,
          followNextLinks: true,
          predicate: createPatternPredicate("/courses?/"),
        },
      ),
    );

    expect(locations).toEqual(["https://catalog.test/course/bio-101", "https://catalog.test/course/bio-102"]);
  });
});

describe("toPageUnits", () => {
  it("numbers units in discovery order and honours the cap", async () => {
    const units = await collect(toPageUnits(fromArray(["https://catalog.test/a", "https://catalog.test/b", "https://catalog.test/c"]), 2));

    expect(units).toEqual([
      { id: "https://catalog.test/a", ordinal: 0, location: "https://catalog.test/a", kind: "page" },
      { id: "https://catalog.test/b", ordinal: 1, location: "https://catalog.test/b", kind: "page" },
    ]);
  });
});
