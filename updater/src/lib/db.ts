import { Pool } from "pg";
import type winston from "winston";

import type { DatabaseSettings } from "./config";
import { ConnectionError, StatementError, errorMessage } from "./errors";
import { Sql } from "./sql";
import type { ColumnSpec } from "./sql";

export type ColumnValue = number | string | boolean | null;

export type Row = Record<string, unknown>;

export interface QueryResultLike {
	rows: Row[];
	rowCount: number | null;
}

/** The part of a pooled pg client the gateway relies on. */
export interface DbClient {
	query(text: string, values?: unknown[]): Promise<QueryResultLike>;
	release(destroy?: boolean): void;
}

export interface DbPool {
	connect(): Promise<DbClient>;
	end(): Promise<void>;
}

export type PoolFactory = (settings: DatabaseSettings, logger: winston.Logger) => DbPool;

export interface ColumnInfo {
	name: string;
	dataType: string;
}

// SQLSTATE class 08 (connection exception), 57P (operator intervention)
const CONNECTION_SQLSTATE = /^(08|57P)/;
const CONNECTION_ERRNO: ReadonlySet<string> = new Set(["ECONNREFUSED", "ECONNRESET", "EPIPE", "ETIMEDOUT", "ENOTFOUND"]);

function isConnectionFailure(err: unknown): boolean {
	if (typeof err !== "object" || err === null) return false;
	const code = "code" in err && typeof err.code === "string" ? err.code : "";
	if (CONNECTION_SQLSTATE.test(code) || CONNECTION_ERRNO.has(code)) return true;
	return err instanceof Error && /Connection terminated/i.test(err.message);
}

export const createPgPool: PoolFactory = (settings, logger) => {
	const pool = new Pool({
		host: settings.host,
		port: settings.port,
		database: settings.name,
		user: settings.username,
		password: settings.password,
		ssl: settings.ssl ? { rejectUnauthorized: false } : undefined,
		max: settings.poolMax,
		idleTimeoutMillis: 30_000,
		connectionTimeoutMillis: 10_000
	});

	// An idle client dropped by the server emits here instead of on a query
	pool.on("error", err => {
		logger.error("database: idle client error: %s", err.message);
	});

	return {
		async connect(): Promise<DbClient> {
			const client = await pool.connect();
			return {
				query: (text: string, values: unknown[] = []) => client.query(text, values),
				release: (destroy?: boolean) => client.release(destroy)
			};
		},
		end: () => pool.end()
	};
};

/**
 * Owns the database pool for the lifetime of the process. Every operation
 * checks out one client, runs, and hands the client back on every exit path.
 */
export class PersistenceGateway {
	private pool: DbPool | null = null;

	constructor(
		private readonly settings: DatabaseSettings,
		private readonly logger: winston.Logger,
		private readonly poolFactory: PoolFactory = createPgPool
	) {}

	get connected(): boolean {
		return this.pool !== null;
	}

	async connect(): Promise<void> {
		if (this.pool) return;

		const target = `${this.settings.host}:${this.settings.port}/${this.settings.name}`;
		const pool = this.poolFactory(this.settings, this.logger);

		try {
			const client = await pool.connect();
			try {
				await client.query(Sql.healthCheck);
			} finally {
				client.release();
			}
		} catch (err) {
			await pool.end().catch(endErr => {
				this.logger.warn("database: closing failed pool: %s", errorMessage(endErr));
			});
			throw new ConnectionError(`Cannot connect to database ${target}: ${errorMessage(err)}`, err);
		}

		this.pool = pool;
		this.logger.info("database: connected to %s", target);
	}

	async disconnect(): Promise<void> {
		const pool = this.pool;
		if (!pool) return;
		this.pool = null;
		await pool.end();
		this.logger.info("database: disconnected");
	}

	/**
	 * Check out one client for `fn`. A client that failed with a connection
	 * error is destroyed rather than returned to the pool.
	 */
	async withClient<T>(fn: (client: DbClient) => Promise<T>): Promise<T> {
		const pool = this.pool;
		if (!pool) {
			throw new ConnectionError("Database is not connected");
		}

		let client: DbClient;
		try {
			client = await pool.connect();
		} catch (err) {
			throw new ConnectionError(`Could not acquire a database client: ${errorMessage(err)}`, err);
		}

		let discard = false;
		try {
			return await fn(client);
		} catch (err) {
			discard = err instanceof ConnectionError;
			throw err;
		} finally {
			client.release(discard);
		}
	}

	/**
	 * Run `fn` as one unit of work: COMMIT when it resolves, ROLLBACK when it
	 * throws. Exactly one of the two is issued.
	 */
	async withTransaction<T>(fn: (client: DbClient) => Promise<T>): Promise<T> {
		return this.withClient(async client => {
			await this.execute(client, Sql.begin);

			let result: T;
			try {
				result = await fn(client);
			} catch (err) {
				await this.rollback(client, err);
				throw err;
			}

			// A failed COMMIT ends the transaction server-side; nothing to roll back
			await this.execute(client, Sql.commit);
			return result;
		});
	}

	async tableExists(table: string): Promise<boolean> {
		const res = await this.withClient(client => this.execute(client, Sql.tableExists, [table]));
		return res.rows[0]?.exists === true;
	}

	async tableColumns(table: string): Promise<ColumnInfo[]> {
		const res = await this.withClient(client => this.execute(client, Sql.tableColumns, [table]));
		return res.rows.map(r => ({ name: String(r.name), dataType: String(r.dataType) }));
	}

	async createTable(table: string, columns: ColumnSpec): Promise<void> {
		const sql = Sql.buildCreateTable(table, columns);
		if (Object.keys(columns).length === 0) {
			throw new StatementError(`Refusing to create table ${table} without columns`, sql);
		}

		await this.withTransaction(client => this.execute(client, sql));
		this.logger.debug("database: ensured table %s", table);
	}

	async insertRow(table: string, values: Readonly<Record<string, ColumnValue>>): Promise<void> {
		const columns = Object.keys(values);
		const sql = Sql.buildInsert(table, columns);
		if (columns.length === 0) {
			throw new StatementError(`Refusing to insert an empty row into ${table}`, sql);
		}

		await this.withTransaction(client =>
			this.execute(
				client,
				sql,
				columns.map(c => values[c])
			)
		);
		this.logger.debug("database: inserted row into %s", table);
	}

	/** Whether one stored row holds every value of `match` at once. */
	async rowExists(table: string, match: Readonly<Record<string, ColumnValue>>): Promise<boolean> {
		const columns = Object.keys(match);
		const sql = Sql.buildRowExists(table, columns);
		if (columns.length === 0) {
			throw new StatementError(`Refusing to match rows of ${table} on no columns`, sql);
		}

		const res = await this.withClient(client =>
			this.execute(
				client,
				sql,
				columns.map(c => match[c])
			)
		);
		return res.rows[0]?.exists === true;
	}

	async countRows(table: string): Promise<number> {
		const res = await this.withClient(client => this.execute(client, Sql.buildCountRows(table)));
		// pg returns bigint as text
		return Number(res.rows[0]?.count ?? 0);
	}

	private async execute(client: DbClient, sql: string, values: unknown[] = []): Promise<QueryResultLike> {
		try {
			return await client.query(sql, values);
		} catch (err) {
			if (isConnectionFailure(err)) {
				throw new ConnectionError(`Database connection lost: ${errorMessage(err)}`, err);
			}
			throw new StatementError(`Statement failed: ${errorMessage(err)}`, sql, err);
		}
	}

	private async rollback(client: DbClient, cause: unknown): Promise<void> {
		try {
			await client.query(Sql.rollback);
			this.logger.debug("database: rolled back after: %s", errorMessage(cause));
		} catch (rollbackErr) {
			this.logger.error(
				"database: rollback failed (%s) after: %s",
				errorMessage(rollbackErr),
				errorMessage(cause)
			);
			throw new ConnectionError(`Rollback failed, connection discarded: ${errorMessage(rollbackErr)}`, rollbackErr);
		}
	}
}
