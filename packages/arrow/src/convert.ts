import {
	type CellValue,
	type Column,
	createTable,
	Err,
	isCellValue,
	Ok,
	type Result,
	type Table,
} from "@polyframe/core";
import * as arrow from "apache-arrow";
import { ArrowConversionError } from "./errors";

/** JavaScript kind of the non-null cells of a column. */
type CellKind = "string" | "number" | "boolean" | "bigint" | "date" | "null";

/**
 * Maps a cell kind to the Apache Arrow data type a column of it is stored as.
 */
const ARROW_TYPE_MAP: Record<CellKind, () => arrow.DataType> = {
	string: () => new arrow.Utf8(),
	number: () => new arrow.Float64(),
	boolean: () => new arrow.Bool(),
	bigint: () => new arrow.Int64(),
	date: () => new arrow.DateMillisecond(),
	null: () => new arrow.Null(),
};

function kindOf(value: Exclude<CellValue, null>): CellKind {
	if (value instanceof Date) return "date";
	switch (typeof value) {
		case "string":
			return "string";
		case "number":
			return "number";
		case "boolean":
			return "boolean";
		default:
			return "bigint";
	}
}

/**
 * Infer the Arrow type of a column from its values.
 *
 * - `string` → Utf8
 * - `number` → Float64
 * - `boolean` → Bool
 * - `bigint` → Int64
 * - `Date` → DateMillisecond
 * - only `null` (or no values) → Null
 *
 * Nulls are allowed alongside any kind. Mixing kinds is an error.
 *
 * @param values - Column values to inspect
 * @returns The Arrow data type, or a message describing the conflicting kinds
 */
export function inferArrowType(values: ReadonlyArray<CellValue>): Result<arrow.DataType, string> {
	let kind: CellKind = "null";
	for (const value of values) {
		if (value === null) continue;
		const next = kindOf(value);
		if (kind === "null") {
			kind = next;
		} else if (kind !== next) {
			return Err(`mixes ${kind} and ${next} values`);
		}
	}
	return Ok(ARROW_TYPE_MAP[kind]());
}

/**
 * Convert a table into an Apache Arrow Table, one vector per column.
 *
 * Dates are written as epoch milliseconds.
 *
 * @param table - The table to convert
 * @returns A Result containing the Arrow table, or an ArrowConversionError
 * naming the first column whose type cannot be inferred
 */
export function tableToArrow(table: Table): Result<arrow.Table, ArrowConversionError> {
	const columnData: Record<string, arrow.Vector> = {};

	for (const column of table.columns) {
		const arrowType = inferArrowType(column.values);
		if (!arrowType.ok) {
			return Err(new ArrowConversionError(`Column "${column.name}" ${arrowType.error}`));
		}
		const values = column.values.map((v) => (v instanceof Date ? v.getTime() : v));
		columnData[column.name] = arrow.vectorFromArray(values, arrowType.value);
	}

	return Ok(new arrow.Table(columnData));
}

/**
 * Convert an Apache Arrow Table into a table, one column per field in
 * schema order. Values are read with `Vector.get`; Date columns come back as
 * `Date` objects. Nested, binary and other
 * values without a cell equivalent are rejected.
 *
 * @param arrowTable - The Arrow table to read
 * @returns A Result containing the table, or an ArrowConversionError
 */
export function tableFromArrow(arrowTable: arrow.Table): Result<Table, ArrowConversionError> {
	const columns: Column[] = [];
	const numRows = arrowTable.numRows;

	for (const [index, field] of arrowTable.schema.fields.entries()) {
		const vector = arrowTable.getChildAt(index);
		const isDate = arrow.DataType.isDate(field.type);
		const values: CellValue[] = [];

		for (let i = 0; i < numRows; i++) {
			const value: unknown = vector ? vector.get(i) : null;
			// Date vectors hand back epoch milliseconds
			const cell =
				value === undefined ? null : isDate && typeof value === "number" ? new Date(value) : value;
			if (!isCellValue(cell)) {
				return Err(
					new ArrowConversionError(
						`Column "${field.name}" of type ${String(field.type)} holds a value with no cell equivalent at row ${i}`,
					),
				);
			}
			values.push(cell);
		}
		columns.push({ name: field.name, values });
	}

	const table = createTable(columns);
	if (!table.ok) {
		return Err(
			new ArrowConversionError(`Arrow table is not a valid table: ${table.error.message}`, table.error),
		);
	}
	return Ok(table.value);
}
