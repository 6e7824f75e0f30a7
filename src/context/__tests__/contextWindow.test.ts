import { describe, expect, it } from "vitest";
import { makeRecord, makeUnit } from "../../__tests__/helpers";
import { BoundedBuffer } from "../boundedBuffer";
import { ContextWindow } from "../contextWindow";

describe("BoundedBuffer", () => {
  it("keeps only the newest items", () => {
    const buffer = new BoundedBuffer<number>(3);
    buffer.push(1, 2);
    buffer.push(3, 4);
    buffer.push(5);

    expect(buffer.toArray()).toEqual([3, 4, 5]);
    expect(buffer.length).toBe(3);
  });

  it("keeps nothing with a zero capacity", () => {
    const buffer = new BoundedBuffer<number>(0);
    buffer.push(1);

    expect(buffer.toArray()).toEqual([]);
  });
});

describe("ContextWindow", () => {
  it("holds the last P units and the last R accepted records", () => {
    const window = new ContextWindow({ units: 2, records: 3 });
    for (let ordinal = 0; ordinal < 4; ordinal += 1) {
      window.recordUnit(makeUnit(ordinal), `page ${ordinal}`);
    }
    window.recordAccepted([101, 102, 103, 104, 105].map((number) => makeRecord({ number: String(number) })));

    const slice = window.snapshot();
    expect(slice.contextUnits.map((unit) => unit.content)).toEqual(["page 2", "page 3"]);
    expect(slice.contextRecords.map((record) => record.number)).toEqual(["103", "104", "105"]);
  });

  it("replaces a completed record in place instead of buffering it twice", () => {
    const window = new ContextWindow({ units: 1, records: 2 });
    window.recordAccepted([makeRecord({ description: "Introduces" }), makeRecord({ number: "125" })]);

    window.recordUpdated(makeRecord({ description: "Introduces the accounting cycle." }));
    window.recordUpdated(makeRecord({ number: "126" }));

    expect(window.snapshot().contextRecords.map((record) => [record.number, record.description])).toEqual([
      ["125", "Introduces the accounting cycle."],
      ["126", "Introduces the accounting cycle."],
    ]);
  });

  it("hands out copies that cannot change the window", () => {
    const window = new ContextWindow({ units: 1, records: 1 });
    window.recordAccepted([makeRecord()]);

    window.snapshot().contextRecords[0].title = "changed";

    expect(window.snapshot().contextRecords[0].title).toBe("Principles of Accounting");
  });

  it("has an empty slice for runs without context", () => {
    expect(ContextWindow.empty()).toEqual({ contextUnits: [], contextRecords: [] });
  });
});
