export * from "./session";
export * from "./playwright";
export * from "./timing";
