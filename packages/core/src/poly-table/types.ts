import type { Logger } from "../logger";
import type { MergeError, MergeOptions, MergeStrategy } from "../merge/types";
import type { Result } from "../result/result";
import type { NamedTable, Table } from "../table/types";
import type { InvalidStrategyError, NotFoundError } from "./errors";

/**
 * Tables accepted by `buildPolyTable`: an ordered list of named tables,
 * or a record whose insertion order is the table order.
 */
export type PolyTableInput = ReadonlyArray<NamedTable> | Readonly<Record<string, Table>>;

/** Construction options for `buildPolyTable`. */
export interface PolyTableOptions {
	/** Default combination strategy. Defaults to the sequential left join. */
	strategy?: MergeStrategy;
	/** Receives debug records for every merge of this PolyTable. */
	logger?: Logger;
}

/**
 * An immutable, ordered group of uniquely-named tables plus the strategy
 * that combines them. Combination is deferred until {@link PolyTable.merge}.
 */
export interface PolyTable {
	/** Number of tables. Always at least one. */
	readonly size: number;
	/** Strategy used when merge is called without an override. */
	readonly mergeStrategy: MergeStrategy;
	readonly logger?: Logger;
	/** Table names in construction order. */
	names(): string[];
	has(name: string): boolean;
	/** The table registered under `name`, exactly as it was supplied. */
	at(name: string): Result<Table, NotFoundError>;
	/** Tables in construction order; this is what the strategy receives. */
	rawTables(): Table[];
	entries(): NamedTable[];
	/** A new PolyTable over the same tables with a different stored strategy. */
	withStrategy(strategy: MergeStrategy): Result<PolyTable, InvalidStrategyError>;
	/** Combine the tables into one, optionally overriding the strategy for this call. */
	merge(override?: MergeStrategy | MergeOptions): Result<Table, MergeError>;
}
