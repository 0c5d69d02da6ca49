import type { Table } from "../table/types";

/** Facts table: one row per sighting. */
export const sightings: Table = {
	columns: [
		{ name: "id", values: [1, 2, 3] },
		{ name: "common_name", values: ["robin", "wren", "kestrel"] },
	],
};

/** Lookup from common name to species. */
export const species: Table = {
	columns: [
		{ name: "common_name", values: ["robin", "wren", "kestrel"] },
		{ name: "species", values: ["Erithacus rubecula", "Troglodytes troglodytes", "Falco tinnunculus"] },
	],
};

/** Lookup from species to family; the kestrel is missing on purpose. */
export const families: Table = {
	columns: [
		{ name: "species", values: ["Erithacus rubecula", "Troglodytes troglodytes"] },
		{ name: "family", values: ["Muscicapidae", "Troglodytidae"] },
	],
};
