import { describe, expect, it } from "vitest";
import { makeRecord } from "../../__tests__/helpers";
import { Deduplicator } from "../deduplicator";
import { naturalKey } from "../naturalKey";

describe("naturalKey", () => {
  it("normalizes case and surrounding whitespace", () => {
    expect(naturalKey({ prefix: " acc", number: "124h " })).toBe("ACC-124H");
  });
});

describe("Deduplicator", () => {
  it("accepts a key once and rejects later occurrences", () => {
    const deduplicator = new Deduplicator();

    expect(deduplicator.admit(makeRecord())).toBe("accepted");
    expect(deduplicator.admit(makeRecord({ title: "Another title" }))).toBe("rejected");
    expect(deduplicator.admit(makeRecord({ prefix: "acc" }))).toBe("rejected");
    expect(deduplicator.size).toBe(1);
  });

  it("reports completions of a committed key as updates, repeatedly", () => {
    const deduplicator = new Deduplicator();
    deduplicator.admit(makeRecord());

    expect(deduplicator.admit(makeRecord(), { complete: true })).toBe("updated");
    expect(deduplicator.admit(makeRecord(), { complete: true })).toBe("updated");
    expect(deduplicator.size).toBe(1);
  });

  it("accepts a completion for a key it has never seen", () => {
    const deduplicator = new Deduplicator();

    expect(deduplicator.admit(makeRecord({ number: "125" }), { complete: true })).toBe("accepted");
    expect(deduplicator.has({ prefix: "ACC", number: "125" })).toBe(true);
  });

  it("keeps keys unique under concurrent admission", async () => {
    const deduplicator = new Deduplicator();
    const results = await Promise.all(
      Array.from({ length: 20 }, async (_, index) => {
        await new Promise((resolve) => setTimeout(resolve, index % 3));
        return deduplicator.admit(makeRecord({ number: String(100 + (index % 5)) }));
      }),
    );

    expect(results.filter((result) => result === "accepted")).toHaveLength(5);
    expect(results.filter((result) => result === "rejected")).toHaveLength(15);
  });
});
