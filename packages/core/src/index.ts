export * from "./errors";
export * from "./check/report-scope";
export * from "./check/decorators";
export * from "./check/report-base";
export * from "./config/env";
