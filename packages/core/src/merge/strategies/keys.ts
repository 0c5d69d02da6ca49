import stableStringify from "fast-json-stable-stringify";
import type { CellValue } from "../../table/types";

function encodeCell(value: CellValue): unknown {
	if (typeof value === "bigint") return { $bigint: value.toString() };
	if (value instanceof Date) return { $date: value.getTime() };
	if (typeof value === "number" && !Number.isFinite(value)) return { $number: String(value) };
	return value;
}

/**
 * Encode a composite join key as a string.
 *
 * Values compare by type and content: `1` and `"1"` differ, bigints and
 * dates compare by value, and `null` equals `null`.
 */
export function encodeKey(values: ReadonlyArray<CellValue>): string {
	return stableStringify(values.map(encodeCell));
}
