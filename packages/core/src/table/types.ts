/** A single cell. `null` is the missing-value marker. */
export type CellValue = string | number | boolean | bigint | Date | null;

/** A named, homogeneous sequence of cells */
export interface Column {
	/** Column name, unique within its table */
	readonly name: string;
	/** Cell values, one per row */
	readonly values: ReadonlyArray<CellValue>;
}

/**
 * Ordered collection of equal-length named columns.
 *
 * Tables are treated as immutable snapshots: nothing in this package writes
 * to a table it was handed.
 */
export interface Table {
	readonly columns: ReadonlyArray<Column>;
}

/** A table paired with the name it is registered under */
export interface NamedTable {
	readonly name: string;
	readonly table: Table;
}

/** One row of a table, keyed by column name */
export type Row = Record<string, CellValue>;
