import type winston from "winston";
import type { DeviceRow } from "@fleet-sync/common";

import type { PersistenceGateway } from "../lib/db";
import { MappingError, StatementError, errorMessage, isFatal } from "../lib/errors";
import { mapReading, toDeviceRow } from "../mapping/reading-mapper";
import { deviceTableName } from "../storage/schema-registry";
import type { SchemaRegistry, TableStatus } from "../storage/schema-registry";
import type { Entity, TelemetrySource } from "../thingsboard/client";

export type SyncStep = "FETCH_READING" | "MAP" | "PROVISION" | "PERSIST";

export type EntityOutcomeKind =
	| "SUCCESS"
	| "DUPLICATE"
	| "FETCH_FAILURE"
	| "MAPPING_FAILURE"
	| "PROVISIONING_FAILURE"
	| "STATEMENT_FAILURE";

export interface EntityOutcome {
	entity: Entity;
	outcome: EntityOutcomeKind;
	table?: string;
	tableStatus?: TableStatus;
	// set on failures
	step?: SyncStep;
	field?: string;
	error?: string;
}

export interface SyncReport {
	deviceType: string;
	startedAt: Date;
	finishedAt: Date;
	attempted: number;
	succeeded: number;
	skipped: number;
	failed: number;
	entities: EntityOutcome[];
}

export interface SyncOptions {
	deviceType: string;
	skipDuplicates: boolean;
}

export type RowWriter = Pick<PersistenceGateway, "insertRow" | "rowExists">;
export type TableProvisioner = Pick<SchemaRegistry, "ensureTable" | "invalidate">;

export interface SyncDependencies {
	source: TelemetrySource;
	registry: TableProvisioner;
	writer: RowWriter;
	logger: winston.Logger;
}

const FAILURE_BY_STEP: Readonly<Record<SyncStep, EntityOutcomeKind>> = {
	FETCH_READING: "FETCH_FAILURE",
	MAP: "MAPPING_FAILURE",
	PROVISION: "PROVISIONING_FAILURE",
	PERSIST: "STATEMENT_FAILURE"
};

/**
 * A stored row with all three group timestamps is the same reading. Any one
 * group reporting anew makes it a new reading.
 */
type DuplicateKey = Pick<DeviceRow, "battery_timestamp" | "gps_timestamp" | "ai_timestamp">;

// SQLSTATE undefined_table
const UNDEFINED_TABLE = "42P01";

export function summarize(report: SyncReport): string {
	const seconds = ((report.finishedAt.getTime() - report.startedAt.getTime()) / 1000).toFixed(1);
	const base =
		`sync: type=${report.deviceType} attempted=${report.attempted} succeeded=${report.succeeded} ` +
		`skipped=${report.skipped} failed=${report.failed} duration=${seconds}s`;

	const failures = report.entities
		.filter(e => e.step !== undefined)
		.map(e => `${e.entity.name}:${e.outcome}`);
	return failures.length > 0 ? `${base} failures=[${failures.join(", ")}]` : base;
}

/**
 * Drives one synchronisation cycle: list devices, then fetch, map, provision
 * and persist the latest reading of each device in turn. A device that fails
 * is recorded and the cycle moves on; only connection loss ends it early.
 */
export class SyncOrchestrator {
	constructor(
		private readonly deps: SyncDependencies,
		private readonly options: SyncOptions
	) {}

	async runOnce(): Promise<SyncReport> {
		const { logger } = this.deps;
		const startedAt = new Date();

		const entities = await this.deps.source.listEntities(this.options.deviceType);
		logger.info("sync: %d %s device(s) to process", entities.length, this.options.deviceType);

		const outcomes: EntityOutcome[] = [];
		for (const entity of entities) {
			outcomes.push(await this.syncEntity(entity));
		}

		const report: SyncReport = {
			deviceType: this.options.deviceType,
			startedAt,
			finishedAt: new Date(),
			attempted: outcomes.length,
			succeeded: outcomes.filter(o => o.outcome === "SUCCESS").length,
			skipped: outcomes.filter(o => o.outcome === "DUPLICATE").length,
			failed: outcomes.filter(o => o.step !== undefined).length,
			entities: outcomes
		};

		logger.info(summarize(report));
		return report;
	}

	private async syncEntity(entity: Entity): Promise<EntityOutcome> {
		const { source, registry, writer, logger } = this.deps;

		let step: SyncStep = "FETCH_READING";
		let table: string | undefined;
		let tableStatus: TableStatus | undefined;

		try {
			const raw = await source.latestReading(entity);

			step = "MAP";
			const mapped = mapReading(raw);
			if (!mapped.ok) {
				throw mapped.error;
			}

			step = "PROVISION";
			table = deviceTableName(entity.name);
			tableStatus = await registry.ensureTable(entity.name);

			step = "PERSIST";
			const row = toDeviceRow(mapped.value);
			const key: DuplicateKey = {
				battery_timestamp: row.battery_timestamp,
				gps_timestamp: row.gps_timestamp,
				ai_timestamp: row.ai_timestamp
			};
			if (this.options.skipDuplicates && (await writer.rowExists(table, key))) {
				logger.debug("sync: %s already holds reading %j, skipping", table, key);
				return { entity, outcome: "DUPLICATE", table, tableStatus };
			}

			await writer.insertRow(table, row);
			logger.debug("sync: stored reading for %s in %s", entity.name, table);
			return { entity, outcome: "SUCCESS", table, tableStatus };
		} catch (err) {
			if (isFatal(err)) {
				throw err;
			}

			if (err instanceof StatementError && err.sqlState === UNDEFINED_TABLE) {
				registry.invalidate(entity.name);
			}

			const outcome = FAILURE_BY_STEP[step];
			const field = err instanceof MappingError ? err.field : undefined;
			logger.warn("sync: %s failed at %s (%s): %s", entity.name, step, outcome, errorMessage(err));
			return { entity, outcome, table, tableStatus, step, field, error: errorMessage(err) };
		}
	}
}
