export * from "./discovery";
export * from "./frontier";
export * from "./htmlParser";
