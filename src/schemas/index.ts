export * from "./errors";
export * from "./health";
export * from "./keys";
export * from "./requests";
