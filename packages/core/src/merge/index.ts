export { mergePolyTable } from "./engine";
export { StrategyContractError, StrategyInvocationError } from "./errors";
export * from "./strategies";
export type { MergeError, MergeOptions, MergeStrategy } from "./types";
