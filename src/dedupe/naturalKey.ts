import type { CatalogRecord } from "../types";

export type NaturalKey = string;

export function naturalKey(record: Pick<CatalogRecord, "prefix" | "number">): NaturalKey {
  return `${record.prefix.trim().toUpperCase()}-${record.number.trim().toUpperCase()}`;
}
