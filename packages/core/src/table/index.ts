export {
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
} from "./table";
export type { CellValue, Column, NamedTable, Row, Table } from "./types";
