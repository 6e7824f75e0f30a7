import type { ContextSizes } from "../config";
import { naturalKey } from "../dedupe";
import type { CatalogRecord, SourceUnit } from "../types";
import { BoundedBuffer } from "./boundedBuffer";

export interface ContextUnit {
  unitId: string;
  ordinal: number;
  content: string;
}

export interface ContextSlice {
  contextUnits: ContextUnit[];
  contextRecords: CatalogRecord[];
}

/**
 * Recent units and recent accepted records, read by the extractor to resolve content that
 * spans a page boundary. Extractors only ever see copies.
 */
export class ContextWindow {
  private readonly units: BoundedBuffer<ContextUnit>;
  private readonly records: BoundedBuffer<CatalogRecord>;

  constructor(sizes: Pick<ContextSizes, "units" | "records">) {
    this.units = new BoundedBuffer(sizes.units);
    this.records = new BoundedBuffer(sizes.records);
  }

  recordUnit(unit: SourceUnit, content: string): void {
    this.units.push({ unitId: unit.id, ordinal: unit.ordinal, content });
  }

  recordAccepted(records: CatalogRecord[]): void {
    this.records.push(...records.map((record) => ({ ...record })));
  }

  /** A completed record takes the place of its earlier version instead of being buffered twice. */
  recordUpdated(record: CatalogRecord): void {
    const key = naturalKey(record);
    if (!this.records.replaceLast((buffered) => naturalKey(buffered) === key, { ...record })) {
      this.records.push({ ...record });
    }
  }

  snapshot(): ContextSlice {
    return {
      contextUnits: this.units.toArray(),
      contextRecords: this.records.toArray().map((record) => ({ ...record })),
    };
  }

  static empty(): ContextSlice {
    return { contextUnits: [], contextRecords: [] };
  }
}
