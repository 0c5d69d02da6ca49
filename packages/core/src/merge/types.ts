import type { Logger } from "../logger";
import type { EmptyInputError, InvalidStrategyError } from "../poly-table/errors";
import type { Table } from "../table/types";
import type { StrategyContractError, StrategyInvocationError } from "./errors";

/**
 * Combination strategy: reduces the tables of a PolyTable, in construction
 * order, to exactly one table. Strategies signal failure by throwing.
 */
export type MergeStrategy = (tables: ReadonlyArray<Table>) => Table;

/** Per-call merge options. */
export interface MergeOptions {
	/** Strategy used for this call only, instead of the stored one. */
	strategy?: MergeStrategy;
	/** Logger for this call; falls back to the PolyTable's logger. */
	logger?: Logger;
}

/** Everything {@link mergePolyTable} can fail with. */
export type MergeError =
	| EmptyInputError
	| InvalidStrategyError
	| StrategyInvocationError
	| StrategyContractError;
