/**
 * Status codes carried by engine errors.
 * The numeric values follow the SQLite result codes so they line up with
 * what database tooling already reports.
 */
export enum StatusCode {
	OK = 0,
	ERROR = 1,
	INTERNAL = 2,
	NOTFOUND = 12,
	CONSTRAINT = 19,
	MISMATCH = 20,
	MISUSE = 21,
	FORMAT = 24,
}

/**
 * Builds the display name of a column, qualified by its table when known.
 */
export function qualifyColumn(table: string | undefined, column: string): string {
	return table ? `${table}.${column}` : column;
}
