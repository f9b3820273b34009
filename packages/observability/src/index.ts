export * from "./logging/interfaces";
export * from "./logging/structured-logger";
export * from "./logging/options";
export * from "./errors/serialize";
