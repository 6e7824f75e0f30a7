export * from "./boundedBuffer";
export * from "./contextWindow";
