import { EmptyInputError } from "../../poly-table/errors";
import type { Table } from "../../table/types";
import type { MergeStrategy } from "../types";
import { innerJoin, type JoinOptions, leftJoin } from "./join";

/** Pairwise combination step of a fold. */
export type Combine = (accumulated: Table, next: Table) => Table;

/**
 * Turn a pairwise combine into a strategy that folds from the left:
 * `combine(combine(t0, t1), t2)` and so on. A single table is returned as is.
 */
export function foldStrategy(combine: Combine): MergeStrategy {
	return function fold(tables) {
		const [first, ...rest] = tables;
		if (first === undefined) {
			throw new EmptyInputError("Cannot fold an empty list of tables");
		}
		return rest.reduce((accumulated, next) => combine(accumulated, next), first);
	};
}

/**
 * Sequential left join over all tables. Rows of the first table are never
 * dropped; keys are inferred at each step from the columns both sides share.
 * This is the strategy a PolyTable stores when none is given.
 */
export function leftJoinStrategy(options: JoinOptions = {}): MergeStrategy {
	const fold = foldStrategy((accumulated, next) => leftJoin(accumulated, next, options));
	return function leftJoinFold(tables) {
		return fold(tables);
	};
}

/** Sequential inner join over all tables. */
export function innerJoinStrategy(options: JoinOptions = {}): MergeStrategy {
	const fold = foldStrategy((accumulated, next) => innerJoin(accumulated, next, options));
	return function innerJoinFold(tables) {
		return fold(tables);
	};
}

/** Strategy stored by a PolyTable built without one. */
export const defaultMergeStrategy: MergeStrategy = leftJoinStrategy();
