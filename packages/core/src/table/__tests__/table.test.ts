import { describe, expect, it } from "vitest";
import { TableShapeError } from "../../result/errors";
import {
	cloneTable,
	columnNames,
	createTable,
	getColumn,
	isCellValue,
	isTable,
	rowCount,
	tableFromRows,
	tableToRows,
	validateTable,
} from "../table";
import type { Table } from "../types";

const birds: Table = {
	columns: [
		{ name: "id", values: [1, 2, 3] },
		{ name: "common_name", values: ["robin", "wren", "kestrel"] },
	],
};

describe("isCellValue", () => {
	it("accepts scalars, bigint, Date and null", () => {
		for (const v of ["a", 1, true, 10n, new Date(0), null]) {
			expect(isCellValue(v)).toBe(true);
		}
	});

	it("rejects undefined, arrays, plain objects and functions", () => {
		for (const v of [undefined, [1], { a: 1 }, () => 1, Symbol("s")]) {
			expect(isCellValue(v)).toBe(false);
		}
	});
});

describe("validateTable", () => {
	it("returns the same reference on success", () => {
		const result = validateTable(birds);
		expect(result.ok).toBe(true);
		if (result.ok) expect(result.value).toBe(birds);
	});

	it("accepts a table with no columns", () => {
		expect(validateTable({ columns: [] }).ok).toBe(true);
	});

	it("rejects arrays of tables", () => {
		const result = validateTable([birds, birds]);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(TableShapeError);
			expect(result.error.message).toBe("Table must be an object with a columns array");
		}
	});

	it("rejects null and undefined", () => {
		expect(validateTable(null).ok).toBe(false);
		expect(validateTable(undefined).ok).toBe(false);
	});

	it("rejects ragged columns", () => {
		const result = validateTable({
			columns: [
				{ name: "a", values: [1, 2] },
				{ name: "b", values: [1] },
			],
		});
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toBe('Column "b" has 1 values, expected 2');
	});

	it("rejects duplicate column names", () => {
		const result = validateTable({
			columns: [
				{ name: "a", values: [1] },
				{ name: "a", values: [2] },
			],
		});
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toBe('Duplicate column name "a"');
	});

	it("rejects empty column names", () => {
		const result = validateTable({ columns: [{ name: "", values: [] }] });
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toBe("Column 0 must have a non-empty string name");
	});

	it("rejects unsupported cell values", () => {
		const result = validateTable({ columns: [{ name: "a", values: [1, { nested: true }] }] });
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe('Column "a" holds an unsupported value at row 1');
			expect(result.error.code).toBe("TABLE_SHAPE");
		}
	});
});

describe("isTable", () => {
	it("mirrors validateTable", () => {
		expect(isTable(birds)).toBe(true);
		expect(isTable({ columns: [{ name: "x" }] })).toBe(false);
	});
});

describe("createTable", () => {
	it("wraps columns into a validated table", () => {
		const result = createTable([{ name: "x", values: ["a", null] }]);
		expect(result.ok).toBe(true);
		if (result.ok) expect(rowCount(result.value)).toBe(2);
	});
});

describe("tableFromRows", () => {
	it("orders columns by first appearance and fills gaps with null", () => {
		const result = tableFromRows([{ a: 1 }, { b: "x", a: 2 }]);
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.columns).toEqual([
				{ name: "a", values: [1, 2] },
				{ name: "b", values: [null, "x"] },
			]);
		}
	});

	it("keeps only the requested columns in the requested order", () => {
		const result = tableFromRows([{ a: 1, b: 2, c: 3 }], ["c", "a"]);
		expect(result.ok).toBe(true);
		if (result.ok) expect(columnNames(result.value)).toEqual(["c", "a"]);
	});

	it("builds an empty table from no rows", () => {
		const result = tableFromRows([]);
		expect(result.ok).toBe(true);
		if (result.ok) expect(result.value.columns).toEqual([]);
	});
});

describe("tableToRows", () => {
	it("produces one record per row", () => {
		expect(tableToRows(birds)).toEqual([
			{ id: 1, common_name: "robin" },
			{ id: 2, common_name: "wren" },
			{ id: 3, common_name: "kestrel" },
		]);
	});
});

describe("helpers", () => {
	it("rowCount is zero without columns", () => {
		expect(rowCount({ columns: [] })).toBe(0);
		expect(rowCount(birds)).toBe(3);
	});

	it("getColumn finds by name", () => {
		expect(getColumn(birds, "common_name")?.values).toEqual(["robin", "wren", "kestrel"]);
		expect(getColumn(birds, "family")).toBeUndefined();
	});

	it("cloneTable copies structure without touching the source", () => {
		const copy = cloneTable(birds);
		expect(copy).toEqual(birds);
		expect(copy).not.toBe(birds);
		expect(copy.columns[0]).not.toBe(birds.columns[0]);
		expect(copy.columns[0]?.values).not.toBe(birds.columns[0]?.values);
	});
});
