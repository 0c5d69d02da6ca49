export { buildPolyTable, type PolyTableBuildError, polyTable } from "./build";
export { DuplicateNameError, EmptyInputError, InvalidStrategyError, NotFoundError } from "./errors";
export type { PolyTable, PolyTableInput, PolyTableOptions } from "./types";
