export * from "./extractionRun";
export * from "./mutex";
export * from "./resultSet";
export * from "./workerPool";
