import type { Logger } from "../logger";
import { mergePolyTable } from "../merge/engine";
import { defaultMergeStrategy } from "../merge/strategies/fold";
import type { MergeStrategy } from "../merge/types";
import { Err, Ok, type Result, unwrapOrThrow } from "../result/result";
import type { NamedTable, Table } from "../table/types";
import { DuplicateNameError, EmptyInputError, InvalidStrategyError, NotFoundError } from "./errors";
import type { PolyTable, PolyTableInput, PolyTableOptions } from "./types";

/** Everything {@link buildPolyTable} can fail with. */
export type PolyTableBuildError = EmptyInputError | DuplicateNameError | InvalidStrategyError;

/**
 * Build a {@link PolyTable} from one or more named tables.
 *
 * Checks:
 * - at least one table is supplied
 * - table names are unique
 * - the strategy, when given, is a function
 *
 * Table contents are not inspected; mismatched or missing join keys only
 * surface when the tables are merged.
 *
 * @param tables - Named tables, in the order the strategy will receive them
 * @param options - Default strategy and logger
 * @returns The PolyTable or the first construction error found
 */
export function buildPolyTable(
	tables: PolyTableInput,
	options: PolyTableOptions = {},
): Result<PolyTable, PolyTableBuildError> {
	const entries = toEntries(tables);
	if (entries.length === 0) {
		return Err(new EmptyInputError("A PolyTable needs at least one table"));
	}

	const seen = new Set<string>();
	for (const { name } of entries) {
		if (seen.has(name)) {
			return Err(new DuplicateNameError(name));
		}
		seen.add(name);
	}

	const strategy =
		options.strategy === undefined ? Ok(defaultMergeStrategy) : checkStrategy(options.strategy);
	if (!strategy.ok) return strategy;

	return Ok(createPolyTable(Object.freeze(entries), strategy.value, options.logger));
}

/**
 * Build a PolyTable or throw the construction error.
 *
 * @example
 * ```ts
 * const birds = polyTable({ sightings, species, families });
 * const flat = unwrapOrThrow(birds.merge());
 * ```
 */
export function polyTable(tables: PolyTableInput, strategy?: MergeStrategy): PolyTable {
	return unwrapOrThrow(buildPolyTable(tables, strategy === undefined ? {} : { strategy }));
}

function isNamedTableList(input: PolyTableInput): input is ReadonlyArray<NamedTable> {
	return Array.isArray(input);
}

function toEntries(input: PolyTableInput): NamedTable[] {
	if (isNamedTableList(input)) {
		return input.map(({ name, table }) => Object.freeze({ name, table }));
	}
	return Object.entries(input).map(([name, table]) => Object.freeze({ name, table }));
}

function checkStrategy(strategy: MergeStrategy): Result<MergeStrategy, InvalidStrategyError> {
	if (typeof strategy === "function") return Ok(strategy);
	return Err(new InvalidStrategyError(`Merge strategy must be a function, got ${describe(strategy)}`));
}

function describe(value: unknown): string {
	return value === null ? "null" : typeof value;
}

function createPolyTable(
	entries: ReadonlyArray<NamedTable>,
	mergeStrategy: MergeStrategy,
	logger: Logger | undefined,
): PolyTable {
	const byName = new Map<string, Table>(entries.map((e) => [e.name, e.table]));

	const poly: PolyTable = {
		size: entries.length,
		mergeStrategy,
		logger,
		names: () => entries.map((e) => e.name),
		has: (name) => byName.has(name),
		at(name) {
			const table = byName.get(name);
			return table === undefined ? Err(new NotFoundError(name)) : Ok(table);
		},
		rawTables: () => entries.map((e) => e.table),
		entries: () => entries.map((e) => ({ name: e.name, table: e.table })),
		withStrategy(strategy) {
			const checked = checkStrategy(strategy);
			if (!checked.ok) return checked;
			return Ok(createPolyTable(entries, checked.value, logger));
		},
		merge: (override) => mergePolyTable(poly, override),
	};
	return Object.freeze(poly);
}
