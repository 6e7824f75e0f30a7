import { afterEach, describe, expect, it, vi } from "vitest";
import { TransportError } from "../../core/errors";
import { HttpRenderer, type FetchLike } from "../httpRenderer";
import { StaticRenderer } from "../staticRenderer";

describe("HttpRenderer", () => {
  const renderers: HttpRenderer[] = [];

  afterEach(async () => {
    await Promise.all(renderers.splice(0).map((renderer) => renderer.close()));
  });

  function rendererWith(fetchFn: FetchLike, timeoutMs = 1_000): HttpRenderer {
    const renderer = new HttpRenderer({ userAgent: "catalog-extractor-test", timeoutMs, ignoreHttpsErrors: false, fetchFn });
    renderers.push(renderer);
    return renderer;
  }

  it("returns the page body and sends the user agent", async () => {
    const fetchFn = vi.fn<FetchLike>(async () => ({ ok: true, status: 200, text: async () => "<h1>Accounting</h1>" }));

    const html = await rendererWith(fetchFn).open("https://catalog.test/courses/acc-124");

    expect(html).toBe("<h1>Accounting</h1>");
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0][0]).toBe("https://catalog.test/courses/acc-124");
    expect(fetchFn.mock.calls[0][1].headers["user-agent"]).toBe("catalog-extractor-test");
  });

  it("turns an error status into a transport error", async () => {
    const renderer = rendererWith(async () => ({ ok: false, status: 503, text: async () => "" }));

    await expect(renderer.open("https://catalog.test/courses/acc-124")).rejects.toThrow(
      new TransportError("HTTP 503 while fetching https://catalog.test/courses/acc-124"),
    );
  });

  it("aborts a request that outlives the timeout", async () => {
    const renderer = rendererWith(
      (_url, init) =>
        new Promise((_, reject) => {
          init.signal.addEventListener("abort", () => reject(new Error("aborted")));
        }),
      10,
    );

    await expect(renderer.open("https://catalog.test/slow")).rejects.toThrow(
      "Timed out after 10ms while fetching https://catalog.test/slow",
    );
  });

  it("wraps network failures", async () => {
    const renderer = rendererWith(async () => {
      throw new Error("getaddrinfo ENOTFOUND catalog.test");
    });

    await expect(renderer.open("https://catalog.test/")).rejects.toBeInstanceOf(TransportError);
  });

  it("refuses to open pages after close", async () => {
    const renderer = rendererWith(async () => ({ ok: true, status: 200, text: async () => "" }));
    await renderer.close();

    await expect(renderer.open("https://catalog.test/")).rejects.toThrow("Renderer session is closed");
  });
});

describe("StaticRenderer", () => {
  it("serves known pages and fails unknown ones as transport errors", async () => {
    const renderer = new StaticRenderer({ "catalog.pdf#1": "ACC 124 Principles of Accounting" });

    await expect(renderer.open("catalog.pdf#1")).resolves.toBe("ACC 124 Principles of Accounting");
    await expect(renderer.open("catalog.pdf#2")).rejects.toBeInstanceOf(TransportError);
  });
});
