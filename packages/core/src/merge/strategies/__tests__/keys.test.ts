import { describe, expect, it } from "vitest";
import { encodeKey } from "../keys";

describe("encodeKey", () => {
	it("distinguishes numbers from numeric strings", () => {
		expect(encodeKey([1])).not.toBe(encodeKey(["1"]));
	});

	it("encodes bigints and dates by value", () => {
		expect(encodeKey([5n])).toBe('[{"$bigint":"5"}]');
		expect(encodeKey([new Date(1000)])).toBe('[{"$date":1000}]');
	});

	it("keeps NaN apart from null", () => {
		expect(encodeKey([Number.NaN])).toBe('[{"$number":"NaN"}]');
		expect(encodeKey([null])).toBe("[null]");
	});

	it("encodes composite keys positionally", () => {
		expect(encodeKey(["a", 1])).toBe('["a",1]');
	});
});
