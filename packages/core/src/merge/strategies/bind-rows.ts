import { EmptyInputError } from "../../poly-table/errors";
import { rowCount } from "../../table/table";
import type { CellValue, Column, Table } from "../../table/types";
import type { MergeStrategy } from "../types";

/**
 * Stack the rows of every table, matching columns by name.
 *
 * Output columns are the union of all column names in first-seen order.
 * A table lacking a column contributes `null` for each of its rows.
 */
export function bindRows(tables: ReadonlyArray<Table>): Table {
	if (tables.length === 0) {
		throw new EmptyInputError("Cannot bind rows of an empty list of tables");
	}

	const names: string[] = [];
	const seen = new Set<string>();
	for (const table of tables) {
		for (const column of table.columns) {
			if (!seen.has(column.name)) {
				seen.add(column.name);
				names.push(column.name);
			}
		}
	}

	const columns: Column[] = names.map((name) => ({
		name,
		values: tables.flatMap((table): CellValue[] => {
			const column = table.columns.find((c) => c.name === name);
			return column ? [...column.values] : new Array<CellValue>(rowCount(table)).fill(null);
		}),
	}));
	return { columns };
}

/** Strategy form of {@link bindRows}. */
export function bindRowsStrategy(): MergeStrategy {
	return bindRows;
}
