import type winston from "winston";
import type { DeviceColumn } from "@fleet-sync/common";

import type { ColumnInfo, PersistenceGateway } from "../lib/db";
import { ConnectionError, ProvisioningError, errorMessage } from "../lib/errors";
import { COLUMN_DATA_TYPES } from "../lib/sql";
import type { ColumnSpec, ColumnType } from "../lib/sql";

export type TableStatus = "CREATED" | "ALREADY_EXISTS";

export const DEVICE_TABLE_PREFIX = "device_";

// Postgres silently truncates longer identifiers
const MAX_IDENTIFIER_BYTES = 63;

/**
 * Layout of every device table. Downstream queries depend on these names,
 * types and this order.
 */
export const DEVICE_TABLE_COLUMNS = {
	battery_percentage: "FLOAT",
	battery_timestamp: "BIGINT",
	gps_latitude: "FLOAT",
	gps_longitude: "FLOAT",
	gps_timestamp: "BIGINT",
	ai_normal_percentage: "INT",
	ai_error1_percentage: "INT",
	ai_error2_percentage: "INT",
	ai_error3_percentage: "INT",
	ai_timestamp: "BIGINT"
} as const satisfies Record<DeviceColumn, ColumnType> & ColumnSpec;

export type SchemaGateway = Pick<PersistenceGateway, "tableExists" | "tableColumns" | "createTable">;

export function deviceTableName(entityKey: string): string {
	const key = entityKey.trim();
	if (key === "") {
		throw new ProvisioningError(DEVICE_TABLE_PREFIX, "Device name is empty");
	}

	const table = `${DEVICE_TABLE_PREFIX}${key}`;
	if (Buffer.byteLength(table, "utf8") > MAX_IDENTIFIER_BYTES) {
		throw new ProvisioningError(table, `Table name for device '${key}' exceeds ${MAX_IDENTIFIER_BYTES} bytes`);
	}
	if (table.includes("\u0000")) {
		throw new ProvisioningError(table, `Device name '${key}' contains a NUL character`);
	}
	return table;
}

function expectedLayout(columns: ColumnSpec): ColumnInfo[] {
	return Object.entries(columns).map(([name, type]) => ({ name, dataType: COLUMN_DATA_TYPES[type] }));
}

/** Returns a description of the first difference, or undefined when the layouts match. */
export function describeDrift(expected: readonly ColumnInfo[], actual: readonly ColumnInfo[]): string | undefined {
	const length = Math.max(expected.length, actual.length);
	for (let i = 0; i < length; i++) {
		const want = expected[i];
		const got = actual[i];
		if (!got) return `missing column ${want.name} at position ${i + 1}`;
		if (!want) return `unexpected column ${got.name} at position ${i + 1}`;
		if (want.name !== got.name) {
			return `column ${i + 1} is ${got.name}, expected ${want.name}`;
		}
		if (want.dataType !== got.dataType) {
			return `column ${got.name} is ${got.dataType}, expected ${want.dataType}`;
		}
	}
	return undefined;
}

/**
 * Makes sure each device has its table, created once with the fixed layout.
 * Existing tables are checked against the layout and never altered.
 */
export class SchemaRegistry {
	// tables already created or verified by this process
	private readonly verified = new Set<string>();

	constructor(
		private readonly gateway: SchemaGateway,
		private readonly logger: winston.Logger
	) {}

	async ensureTable(entityKey: string): Promise<TableStatus> {
		const table = deviceTableName(entityKey);
		if (this.verified.has(table)) {
			return "ALREADY_EXISTS";
		}

		try {
			if (await this.gateway.tableExists(table)) {
				await this.verifyLayout(table);
				this.verified.add(table);
				this.logger.debug("schema: table %s already exists", table);
				return "ALREADY_EXISTS";
			}

			await this.gateway.createTable(table, DEVICE_TABLE_COLUMNS);
			// CREATE ... IF NOT EXISTS is a no-op when another writer won the race
			await this.verifyLayout(table);
		} catch (err) {
			if (err instanceof ConnectionError || err instanceof ProvisioningError) {
				throw err;
			}
			throw new ProvisioningError(table, `Could not provision table ${table}: ${errorMessage(err)}`, undefined, err);
		}

		this.verified.add(table);
		this.logger.info("schema: created table %s", table);
		return "CREATED";
	}

	/** Forget a cached table, e.g. after it was dropped behind our back. */
	invalidate(entityKey: string): void {
		this.verified.delete(deviceTableName(entityKey));
	}

	private async verifyLayout(table: string): Promise<void> {
		const expected = expectedLayout(DEVICE_TABLE_COLUMNS);
		const actual = await this.gateway.tableColumns(table);
		const drift = describeDrift(expected, actual);
		if (drift) {
			throw new ProvisioningError(table, `Table ${table} does not match the device layout: ${drift}`, {
				expected,
				actual
			});
		}
	}
}
