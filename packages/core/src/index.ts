export { defaultLogger, type Logger, type LogLevel, silentLogger } from "./logger";
export * from "./merge";
export * from "./poly-table";
export * from "./result";
export * from "./table";
