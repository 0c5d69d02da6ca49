import { EmptyInputError, InvalidStrategyError } from "../poly-table/errors";
import type { PolyTable } from "../poly-table/types";
import { toError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import { cloneTable, rowCount, validateTable } from "../table/table";
import type { Table } from "../table/types";
import { StrategyContractError, StrategyInvocationError } from "./errors";
import type { MergeError, MergeOptions, MergeStrategy } from "./types";

/**
 * Combine the tables of a PolyTable into one table.
 *
 * The strategy is the override when one is given, otherwise the PolyTable's
 * stored strategy. It receives the tables in construction order and must
 * return exactly one table. The stored strategy is never replaced.
 *
 * If the strategy hands back one of its input tables, a copy is returned so
 * the caller never receives an input object.
 *
 * @param poly - The PolyTable to merge
 * @param override - A strategy, or options, for this call only
 * @returns The combined table or a {@link MergeError}
 */
export function mergePolyTable(
	poly: PolyTable,
	override?: MergeStrategy | MergeOptions,
): Result<Table, MergeError> {
	const resolved = resolveOptions(override);
	if (!resolved.ok) return resolved;

	const strategy = resolved.value.strategy ?? poly.mergeStrategy;
	if (typeof strategy !== "function") {
		return Err(new InvalidStrategyError("PolyTable has no callable merge strategy"));
	}

	const tables = poly.rawTables();
	if (tables.length === 0) {
		return Err(new EmptyInputError("Cannot merge a PolyTable with no tables"));
	}

	const name = strategy.name || "anonymous";
	const logger = resolved.value.logger ?? poly.logger;
	logger?.("debug", `Merging ${tables.length} tables with strategy "${name}"`, {
		tables: poly.names(),
	});

	let output: unknown;
	try {
		output = strategy(tables);
	} catch (err) {
		const cause = toError(err);
		return Err(
			new StrategyInvocationError(`Merge strategy "${name}" failed: ${cause.message}`, cause),
		);
	}

	if (Array.isArray(output)) {
		return Err(
			new StrategyContractError(
				`Merge strategy "${name}" returned ${output.length} tables, expected exactly one`,
			),
		);
	}
	const checked = validateTable(output);
	if (!checked.ok) {
		return Err(
			new StrategyContractError(
				`Merge strategy "${name}" did not return a table: ${checked.error.message}`,
				checked.error,
			),
		);
	}

	const merged = tables.includes(checked.value) ? cloneTable(checked.value) : checked.value;
	logger?.("debug", `Merged into ${rowCount(merged)} rows`, {
		columns: merged.columns.length,
	});
	return Ok(merged);
}

function resolveOptions(
	override: MergeStrategy | MergeOptions | undefined,
): Result<MergeOptions, InvalidStrategyError> {
	if (override === undefined) return Ok({});
	if (typeof override === "function") return Ok({ strategy: override });
	if (typeof override !== "object" || override === null) {
		return Err(new InvalidStrategyError("Merge override must be a function or an options object"));
	}
	if (override.strategy !== undefined && typeof override.strategy !== "function") {
		return Err(new InvalidStrategyError("Merge override strategy must be a function"));
	}
	return Ok(override);
}
