import { TableShapeError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import type { CellValue, Column, Row, Table } from "./types";

/** Check whether an unknown value is a {@link CellValue}. */
export function isCellValue(value: unknown): value is CellValue {
	switch (typeof value) {
		case "string":
		case "number":
		case "boolean":
		case "bigint":
			return true;
		case "object":
			return value === null || value instanceof Date;
		default:
			return false;
	}
}

/** Describe what is wrong with a table-shaped value, or `undefined` if nothing is. */
function describeShapeProblem(value: unknown): string | undefined {
	if (typeof value !== "object" || value === null || Array.isArray(value)) {
		return "Table must be an object with a columns array";
	}
	if (!("columns" in value) || !Array.isArray(value.columns)) {
		return "Table must be an object with a columns array";
	}

	const columns: unknown[] = value.columns;
	const seen = new Set<string>();
	let length: number | undefined;

	for (const [index, column] of columns.entries()) {
		if (typeof column !== "object" || column === null) {
			return `Column ${index} must be an object`;
		}
		if (!("name" in column) || typeof column.name !== "string" || column.name === "") {
			return `Column ${index} must have a non-empty string name`;
		}
		const name = column.name;
		if (!("values" in column) || !Array.isArray(column.values)) {
			return `Column "${name}" must have a values array`;
		}
		if (seen.has(name)) {
			return `Duplicate column name "${name}"`;
		}
		seen.add(name);

		const values: unknown[] = column.values;
		const bad = values.findIndex((v) => !isCellValue(v));
		if (bad !== -1) {
			return `Column "${name}" holds an unsupported value at row ${bad}`;
		}
		if (length === undefined) {
			length = values.length;
		} else if (values.length !== length) {
			return `Column "${name}" has ${values.length} values, expected ${length}`;
		}
	}
	return undefined;
}

/** Type guard form of {@link validateTable}. */
export function isTable(value: unknown): value is Table {
	return describeShapeProblem(value) === undefined;
}

/**
 * Validate an untyped value as a {@link Table}.
 *
 * Checks:
 * - the value is a non-array object with a `columns` array
 * - every column has a non-empty string `name`, unique within the table
 * - every column has a `values` array holding only cell values
 * - all columns have the same length
 *
 * On success the original reference is returned, not a copy.
 *
 * @param value - Raw value to validate.
 * @returns The validated table or a {@link TableShapeError}.
 */
export function validateTable(value: unknown): Result<Table, TableShapeError> {
	if (isTable(value)) {
		return Ok(value);
	}
	return Err(new TableShapeError(describeShapeProblem(value) ?? "Invalid table"));
}

/** Build a table from columns, validating names and lengths. */
export function createTable(columns: ReadonlyArray<Column>): Result<Table, TableShapeError> {
	return validateTable({ columns });
}

/**
 * Build a table from row records.
 *
 * Columns appear in first-seen order across all rows unless `columnOrder`
 * is given, in which case only those columns are kept. Keys a row lacks
 * become `null`.
 */
export function tableFromRows(
	rows: ReadonlyArray<Readonly<Row>>,
	columnOrder?: ReadonlyArray<string>,
): Result<Table, TableShapeError> {
	const names: string[] = columnOrder ? [...columnOrder] : [];
	if (!columnOrder) {
		const seen = new Set<string>();
		for (const row of rows) {
			for (const key of Object.keys(row)) {
				if (!seen.has(key)) {
					seen.add(key);
					names.push(key);
				}
			}
		}
	}

	const columns: Column[] = names.map((name) => ({
		name,
		values: rows.map((row) => (Object.hasOwn(row, name) ? row[name] : null)),
	}));
	return createTable(columns);
}

/** Convert a table into one record per row. */
export function tableToRows(table: Table): Row[] {
	const count = rowCount(table);
	const rows: Row[] = [];
	for (let i = 0; i < count; i++) {
		const row: Row = {};
		for (const column of table.columns) {
			row[column.name] = column.values[i] ?? null;
		}
		rows.push(row);
	}
	return rows;
}

/** Number of rows; a table without columns has none. */
export function rowCount(table: Table): number {
	return table.columns[0]?.values.length ?? 0;
}

/** Column names in table order. */
export function columnNames(table: Table): string[] {
	return table.columns.map((c) => c.name);
}

/** Look up a column by name. */
export function getColumn(table: Table, name: string): Column | undefined {
	return table.columns.find((c) => c.name === name);
}

/** Copy a table's structure. Cell values are shared; they are immutable. */
export function cloneTable(table: Table): Table {
	return { columns: table.columns.map((c) => ({ name: c.name, values: [...c.values] })) };
}
