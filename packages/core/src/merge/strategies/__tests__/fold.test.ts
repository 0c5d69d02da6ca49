import { describe, expect, it, vi } from "vitest";
import { families, sightings, species } from "../../../__tests__/fixtures";
import { EmptyInputError } from "../../../poly-table/errors";
import type { Table } from "../../../table/types";
import { defaultMergeStrategy, foldStrategy, innerJoinStrategy, leftJoinStrategy } from "../fold";

describe("foldStrategy", () => {
	it("combines from the left, carrying the result forward", () => {
		const steps: string[] = [];
		const label = (table: Table) => table.columns.map((c) => c.name).join("+");
		const combine = vi.fn((accumulated: Table, next: Table): Table => {
			steps.push(`${label(accumulated)} <- ${label(next)}`);
			return { columns: [...accumulated.columns, ...next.columns.slice(1)] };
		});

		foldStrategy(combine)([sightings, species, families]);
		expect(steps).toEqual([
			"id+common_name <- common_name+species",
			"id+common_name+species <- species+family",
		]);
	});

	it("returns a lone table without combining", () => {
		const combine = vi.fn();
		expect(foldStrategy(combine)([sightings])).toBe(sightings);
		expect(combine).not.toHaveBeenCalled();
	});

	it("throws EmptyInputError without tables", () => {
		expect(() => foldStrategy(vi.fn())([])).toThrow(EmptyInputError);
	});
});

describe("leftJoinStrategy", () => {
	it("is the default strategy", () => {
		expect(defaultMergeStrategy.name).toBe("leftJoinFold");
	});

	it("folds left joins over every table", () => {
		const merged = leftJoinStrategy()([sightings, species, families]);
		expect(merged.columns.map((c) => c.name)).toEqual(["id", "common_name", "species", "family"]);
		expect(merged.columns[0]?.values).toEqual([1, 2, 3]);
	});

	it("passes join options to every step", () => {
		const merged = leftJoinStrategy({ multiple: "first" })([sightings, species]);
		expect(merged.columns[2]?.values).toHaveLength(3);
	});
});

describe("innerJoinStrategy", () => {
	it("drops rows that fail to match at any step", () => {
		const merged = innerJoinStrategy()([sightings, species, families]);
		expect(merged.columns[1]?.values).toEqual(["robin", "wren"]);
	});
});
