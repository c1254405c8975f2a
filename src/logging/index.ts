export * from "./logger";
export * from "./runLogger";
