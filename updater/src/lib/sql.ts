/**
 * SQL used by the persistence gateway. Table and column names are dynamic,
 * so they are always passed through `quoteIdent`; values are always bound.
 */

export type ColumnType = "FLOAT" | "BIGINT" | "INT";

/** Ordered column name -> type mapping; insertion order is the column order. */
export type ColumnSpec = Readonly<Record<string, ColumnType>>;

/** `information_schema.columns.data_type` reported for each column type. */
export const COLUMN_DATA_TYPES: Readonly<Record<ColumnType, string>> = {
	FLOAT: "double precision",
	BIGINT: "bigint",
	INT: "integer"
};

export function quoteIdent(name: string): string {
	return `"${name.replace(/"/g, "\"\"")}"`;
}

export const Sql = {
	begin: "BEGIN",
	commit: "COMMIT",
	rollback: "ROLLBACK",

	/**
	 * Simple sanity query for connection checks.
	 */
	healthCheck: "SELECT 1",

	/**
	 * Parameter: $1 = table name (case-sensitive, as stored)
	 */
	tableExists: `SELECT EXISTS (
		SELECT 1 FROM information_schema.tables
		WHERE table_schema = current_schema() AND table_name = $1
	) AS "exists"`,

	/**
	 * Parameter: $1 = table name. Rows come back in column order.
	 */
	tableColumns: `SELECT column_name AS "name", data_type AS "dataType"
		FROM information_schema.columns
		WHERE table_schema = current_schema() AND table_name = $1
		ORDER BY ordinal_position`,

	buildCreateTable(table: string, columns: ColumnSpec): string {
		const definitions = Object.entries(columns)
			.map(([name, type]) => `${quoteIdent(name)} ${type}`)
			.join(", ");
		return `CREATE TABLE IF NOT EXISTS ${quoteIdent(table)} (${definitions})`;
	},

	buildInsert(table: string, columns: readonly string[]): string {
		const names = columns.map(quoteIdent).join(", ");
		const placeholders = columns.map((_, i) => `$${i + 1}`).join(", ");
		return `INSERT INTO ${quoteIdent(table)} (${names}) VALUES (${placeholders})`;
	},

	/**
	 * Parameters: $1..$n = values of `columns`, all of which must match in one row
	 */
	buildRowExists(table: string, columns: readonly string[]): string {
		const conditions = columns.map((c, i) => `${quoteIdent(c)} = $${i + 1}`).join(" AND ");
		return `SELECT EXISTS (SELECT 1 FROM ${quoteIdent(table)} WHERE ${conditions}) AS "exists"`;
	},

	buildCountRows(table: string): string {
		return `SELECT COUNT(*)::bigint AS "count" FROM ${quoteIdent(table)}`;
	}
} as const;
