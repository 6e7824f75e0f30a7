import { naturalKey, type NaturalKey } from "../dedupe";
import type { CatalogRecord } from "../types";

/** Committed records in acceptance order, addressable by natural key for overlap completion. */
export class ResultSet {
  private readonly records: CatalogRecord[] = [];
  private readonly indexByKey = new Map<NaturalKey, number>();

  append(record: CatalogRecord): void {
    const key = naturalKey(record);
    if (this.indexByKey.has(key)) {
      throw new Error(`Record ${key} is already committed`);
    }
    this.indexByKey.set(key, this.records.length);
    this.records.push({ ...record });
  }

  replace(record: CatalogRecord): boolean {
    const index = this.indexByKey.get(naturalKey(record));
    if (index === undefined) {
      return false;
    }
    this.records[index] = { ...record };
    return true;
  }

  get(key: NaturalKey): CatalogRecord | undefined {
    const index = this.indexByKey.get(key);
    return index === undefined ? undefined : { ...this.records[index] };
  }

  tail(count: number): CatalogRecord[] {
    if (count <= 0) {
      return [];
    }
    return this.records.slice(-count).map((record) => ({ ...record }));
  }

  snapshot(): CatalogRecord[] {
    return this.records.map((record) => ({ ...record }));
  }

  get size(): number {
    return this.records.length;
  }
}
