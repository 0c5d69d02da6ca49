import { columnNames, rowCount } from "../../table/table";
import type { CellValue, Column, Table } from "../../table/types";
import { JoinCardinalityError, JoinKeyError } from "./errors";
import { encodeKey } from "./keys";

/** What to do when a left row matches several right rows. */
export type JoinMultiple = "all" | "first" | "error";

/** Suffixes for non-key columns present on both sides: `[left, right]`. */
export const DEFAULT_JOIN_SUFFIX: readonly [string, string] = [".x", ".y"];

/** Keep every match by default, duplicating the left row. */
export const DEFAULT_JOIN_MULTIPLE: JoinMultiple = "all";

/** Options shared by {@link leftJoin} and {@link innerJoin}. */
export interface JoinOptions {
	/** Key columns. Defaults to every column name the two tables share. */
	on?: ReadonlyArray<string>;
	/** Appended to clashing non-key column names. */
	suffix?: readonly [string, string];
	/** Handling of left rows with more than one match. */
	multiple?: JoinMultiple;
}

type JoinKind = "left" | "inner";

/**
 * Left join: every left row is kept, in order. A row with no match gets
 * `null` in each right-only column; a row with several matches appears once
 * per match (see {@link JoinOptions.multiple}).
 *
 * @throws {JoinKeyError} when no key columns can be resolved, or a suffixed
 * name collides with another output column
 * @throws {JoinCardinalityError} when `multiple` is `"error"` and a row matches twice
 */
export function leftJoin(left: Table, right: Table, options: JoinOptions = {}): Table {
	return join("left", left, right, options);
}

/**
 * Inner join: only left rows with at least one match are kept.
 *
 * @throws {JoinKeyError} when no key columns can be resolved
 * @throws {JoinCardinalityError} when `multiple` is `"error"` and a row matches twice
 */
export function innerJoin(left: Table, right: Table, options: JoinOptions = {}): Table {
	return join("inner", left, right, options);
}

function join(kind: JoinKind, left: Table, right: Table, options: JoinOptions): Table {
	const keys = resolveKeys(left, right, options.on);
	const suffix = options.suffix ?? DEFAULT_JOIN_SUFFIX;
	const multiple = options.multiple ?? DEFAULT_JOIN_MULTIPLE;

	const leftKeys = keys.map((key) => keyValues(left, key, "left"));
	const rightKeys = keys.map((key) => keyValues(right, key, "right"));

	const index = new Map<string, number[]>();
	const rightRows = rowCount(right);
	for (let r = 0; r < rightRows; r++) {
		const key = encodeKey(rightKeys.map((values) => values[r] ?? null));
		const bucket = index.get(key);
		if (bucket) {
			bucket.push(r);
		} else {
			index.set(key, [r]);
		}
	}

	// [left row, right row or undefined when unmatched]
	const pairs: Array<[number, number | undefined]> = [];
	const leftRows = rowCount(left);
	for (let l = 0; l < leftRows; l++) {
		const matches = index.get(encodeKey(leftKeys.map((values) => values[l] ?? null))) ?? [];
		if (matches.length === 0) {
			if (kind === "left") pairs.push([l, undefined]);
			continue;
		}
		if (matches.length > 1 && multiple === "error") {
			throw new JoinCardinalityError(
				`Row ${l} of the left table matches ${matches.length} rows of the right table on [${keys.join(", ")}]`,
			);
		}
		for (const r of multiple === "first" ? matches.slice(0, 1) : matches) {
			pairs.push([l, r]);
		}
	}

	const keySet = new Set(keys);
	const leftNames = new Set(columnNames(left));
	const rightExtra = right.columns.filter((c) => !keySet.has(c.name));
	const clashing = new Set(rightExtra.filter((c) => leftNames.has(c.name)).map((c) => c.name));

	const columns: Column[] = [
		...left.columns.map((c) => ({
			name: clashing.has(c.name) ? `${c.name}${suffix[0]}` : c.name,
			values: pairs.map(([l]) => c.values[l] ?? null),
		})),
		...rightExtra.map((c) => ({
			name: clashing.has(c.name) ? `${c.name}${suffix[1]}` : c.name,
			values: pairs.map(([, r]): CellValue => (r === undefined ? null : (c.values[r] ?? null))),
		})),
	];

	const output = new Set<string>();
	for (const { name } of columns) {
		if (output.has(name)) {
			throw new JoinKeyError(
				`Column "${name}" appears twice in the joined table; choose a different suffix`,
			);
		}
		output.add(name);
	}
	return { columns };
}

function resolveKeys(left: Table, right: Table, on: ReadonlyArray<string> | undefined): string[] {
	const leftNames = columnNames(left);
	const rightNames = columnNames(right);

	if (on !== undefined) {
		if (on.length === 0) {
			throw new JoinKeyError("Join needs at least one key column");
		}
		return [...new Set(on)];
	}

	const rightSet = new Set(rightNames);
	const common = leftNames.filter((name) => rightSet.has(name));
	if (common.length === 0) {
		throw new JoinKeyError(
			`No common columns to join on: left has [${leftNames.join(", ")}], right has [${rightNames.join(", ")}]`,
		);
	}
	return common;
}

function keyValues(table: Table, key: string, side: "left" | "right"): ReadonlyArray<CellValue> {
	const column = table.columns.find((c) => c.name === key);
	if (!column) {
		throw new JoinKeyError(`Join key "${key}" is missing from the ${side} table`);
	}
	return column.values;
}
