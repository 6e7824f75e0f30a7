export * from "./deduplicator";
export * from "./naturalKey";
