export * from "./documentSource";
