import { describe, expect, it, vi } from "vitest";
import { makeRecord, makeUnit, newMetrics, quietLogger } from "../../__tests__/helpers";
import { TransportError } from "../../core/errors";
import { AiExtractionStrategy } from "../aiStrategy";
import { buildExtractionPrompt } from "../prompts";
import { fixedBackoff, RetryPolicy } from "../retryPolicy";
import type { TextGenerator } from "../textGenerator";
import type { ExtractionRequest } from "../types";

function request(overrides: Partial<ExtractionRequest> = {}): ExtractionRequest {
  return {
    unit: makeUnit(0),
    content: "ACC 124 Principles of Accounting (3)",
    contextUnits: [],
    contextRecords: [],
    overlapRecords: [],
    ...overrides,
  };
}

function strategyWith(generate: TextGenerator["generate"], options: { maxAttempts?: number; repair?: boolean } = {}) {
  const metrics = newMetrics();
  const sleep = vi.fn(async () => undefined);
  const strategy = new AiExtractionStrategy({
    generator: { generate },
    retryPolicy: new RetryPolicy({ maxAttempts: options.maxAttempts ?? 3, backoff: fixedBackoff(1_000), sleep }),
    logger: quietLogger(),
    metrics,
    institutionId: 141574,
    repairPlaceholders: options.repair ?? true,
  });
  return { strategy, metrics, sleep };
}

const COMPLETE = '[{"prefix":"ACC","number":"124","title":"Principles of Accounting","description":"Accounting cycle.","units":"3","department":"Accounting"}]';

describe("AiExtractionStrategy", () => {
  it("returns the parsed candidates of a well-formed answer", async () => {
    const generate = vi.fn(async () => COMPLETE);
    const { strategy } = strategyWith(generate);

    const candidates = await strategy.extract(request());

    expect(generate).toHaveBeenCalledTimes(1);
    expect(candidates).toEqual([
      {
        prefix: "ACC",
        number: "124",
        title: "Principles of Accounting",
        description: "Accounting cycle.",
        units: "3",
        department: "Accounting",
      },
    ]);
  });

  it("calls the backend exactly N times on persistent malformed output and yields nothing", async () => {
    const generate = vi.fn(async () => "I could not find any courses.");
    const { strategy, metrics, sleep } = strategyWith(generate, { maxAttempts: 3 });

    const candidates = await strategy.extract(request());

    expect(candidates).toEqual([]);
    expect(generate).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(metrics.getCounter("extract_attempts")).toBe(3);
    expect(metrics.getCounter("extract_retries")).toBe(2);
    expect(metrics.getCounter("extract_exhausted")).toBe(1);
  });

  it("retries a transport error and uses the next answer", async () => {
    const generate = vi
      .fn<TextGenerator["generate"]>()
      .mockRejectedValueOnce(new TransportError("timeout"))
      .mockResolvedValueOnce(COMPLETE);
    const { strategy } = strategyWith(generate);

    const candidates = await strategy.extract(request());

    expect(generate).toHaveBeenCalledTimes(2);
    expect(candidates).toHaveLength(1);
  });

  it("does not retry errors outside the transport and output taxonomy", async () => {
    const generate = vi.fn(async (): Promise<string> => {
      throw new RangeError("bad argument");
    });
    const { strategy } = strategyWith(generate);

    expect(await strategy.extract(request())).toEqual([]);
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it("repairs placeholder fields with one extra call", async () => {
    const generate = vi
      .fn<TextGenerator["generate"]>()
      .mockResolvedValueOnce('[{"prefix":"ACC","number":"124","title":"Principles of Accounting","units":"unknown"}]')
      .mockResolvedValueOnce('[{"prefix":"ACC","number":"124","title":"Principles of Accounting","units":"3"}]');
    const { strategy, metrics } = strategyWith(generate);

    const candidates = await strategy.extract(request());

    expect(generate).toHaveBeenCalledTimes(2);
    expect(candidates).toEqual([{ prefix: "ACC", number: "124", title: "Principles of Accounting", units: "3" }]);
    expect(metrics.getCounter("repairs_attempted")).toBe(1);
    expect(metrics.getCounter("repairs_failed")).toBe(0);
  });

  it("keeps the original candidates when the repair fails", async () => {
    const generate = vi
      .fn<TextGenerator["generate"]>()
      .mockResolvedValueOnce('[{"prefix":"ACC","number":"124","title":"N/A"}]')
      .mockRejectedValueOnce(new TransportError("connection reset"));
    const { strategy, metrics } = strategyWith(generate);

    const candidates = await strategy.extract(request());

    expect(candidates).toEqual([{ prefix: "ACC", number: "124", title: "N/A" }]);
    expect(metrics.getCounter("repairs_failed")).toBe(1);
  });

  it("keeps the original candidates when the repair answers with nothing", async () => {
    const generate = vi
      .fn<TextGenerator["generate"]>()
      .mockResolvedValueOnce('[{"prefix":"ACC","number":"124","description":null}]')
      .mockResolvedValueOnce("[]");
    const { strategy } = strategyWith(generate);

    expect(await strategy.extract(request())).toEqual([{ prefix: "ACC", number: "124", description: null }]);
  });

  it("keeps every course when the repair answer leaves one out", async () => {
    const generate = vi
      .fn<TextGenerator["generate"]>()
      .mockResolvedValueOnce(
        '[{"prefix":"ACC","number":"124","description":"unknown"},{"prefix":"ACC","number":"125","description":"Cost behavior."}]',
      )
      .mockResolvedValueOnce('[{"prefix":"ACC","number":"124","description":"Accounting cycle."}]');
    const { strategy, metrics } = strategyWith(generate);

    const candidates = await strategy.extract(request());

    expect(candidates).toEqual([
      { prefix: "ACC", number: "124", description: "unknown" },
      { prefix: "ACC", number: "125", description: "Cost behavior." },
    ]);
    expect(metrics.getCounter("repairs_failed")).toBe(1);
  });

  it("fills only placeholder fields from the repair answer", async () => {
    const generate = vi
      .fn<TextGenerator["generate"]>()
      .mockResolvedValueOnce(
        '[{"prefix":"ACC","number":"124","title":"Principles of Accounting","description":"n/a"},{"prefix":"ACC","number":"125","title":"Managerial Accounting","description":"Cost behavior."}]',
      )
      .mockResolvedValueOnce(
        '[{"prefix":"ACC","number":"124","title":"Renamed","description":"Accounting cycle."},{"prefix":"ACC","number":"125","title":"Managerial Accounting","description":"unknown"}]',
      );
    const { strategy, metrics } = strategyWith(generate);

    const candidates = await strategy.extract(request());

    expect(candidates).toEqual([
      { prefix: "ACC", number: "124", title: "Principles of Accounting", description: "Accounting cycle." },
      { prefix: "ACC", number: "125", title: "Managerial Accounting", description: "Cost behavior." },
    ]);
    expect(metrics.getCounter("repairs_failed")).toBe(0);
  });

  it("treats a repair answer that swaps the course as a failed repair", async () => {
    const generate = vi
      .fn<TextGenerator["generate"]>()
      .mockResolvedValueOnce('[{"prefix":"ACC","number":"124","units":"unknown"}]')
      .mockResolvedValueOnce('[{"prefix":"ACC","number":"201","units":"3"}]');
    const { strategy, metrics } = strategyWith(generate);

    expect(await strategy.extract(request())).toEqual([{ prefix: "ACC", number: "124", units: "unknown" }]);
    expect(metrics.getCounter("repairs_failed")).toBe(1);
  });

  it("skips the repair pass when it is disabled", async () => {
    const generate = vi.fn(async () => '[{"prefix":"ACC","number":"124","title":""}]');
    const { strategy } = strategyWith(generate, { repair: false });

    await strategy.extract(request());

    expect(generate).toHaveBeenCalledTimes(1);
  });
});

describe("buildExtractionPrompt", () => {
  it("includes context and continuing courses only when present", () => {
    const bare = buildExtractionPrompt(request(), 141574);
    expect(bare).toContain('3. Set "institution_id" to 141574.');
    expect(bare).not.toContain("CONTINUING COURSES:");

    const withOverlap = buildExtractionPrompt(
      request({ overlapRecords: [makeRecord({ description: "Covers the accounting cycle" })] }),
      141574,
    );
    expect(withOverlap).toContain(
      "CONTINUING COURSES:\n- ACC 124: Principles of Accounting\n  Description so far: Covers the accounting cycle",
    );
  });
});
