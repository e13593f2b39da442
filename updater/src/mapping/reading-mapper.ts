import type { z } from "zod";
import {
	AiPayloadSchema,
	BatteryPayloadSchema,
	DiagnosticsPayloadSchema,
	EnvironmentPayloadSchema,
	GnssPayloadSchema
} from "@fleet-sync/common";
import type { DeviceRow, RawEntry, RawReading, SensorGroupKey, TelemetryRecord } from "@fleet-sync/common";

import { MappingError } from "../lib/errors";

export type MapResult = { ok: true; value: TelemetryRecord } | { ok: false; error: MappingError };

/**
 * Where a group's timestamp is read from first. The location group is
 * stamped by the platform on receipt; the others carry a device timestamp.
 */
type TimestampSource = "entry" | "payload";

interface DecodedGroup<T> {
	payload: T;
	ts: number;
}

type PayloadSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function isEpoch(value: unknown): value is number {
	return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function firstEntry(raw: RawReading, group: SensorGroupKey): RawEntry | undefined {
	const entries = raw[group];
	if (!Array.isArray(entries) || entries.length === 0) {
		return undefined;
	}
	const entry = entries[0];
	// The platform answers `value: null` for keys that were never reported
	return entry.value === null || entry.value === undefined ? undefined : entry;
}

function decodeValue(group: SensorGroupKey, value: unknown): unknown {
	if (typeof value !== "string") {
		return value;
	}
	try {
		return JSON.parse(value);
	} catch {
		throw new MappingError(group, `Sensor group '${group}' payload is not valid JSON`, {
			preview: value.slice(0, 120)
		});
	}
}

function decodeGroup<T extends { ts?: number }>(
	group: SensorGroupKey,
	entry: RawEntry,
	schema: PayloadSchema<T>,
	tsSource: TimestampSource
): DecodedGroup<T> {
	const res = schema.safeParse(decodeValue(group, entry.value));
	if (!res.success) {
		const issue = res.error.issues[0];
		const path = issue ? issue.path.map(String).join(".") : "";
		const field = path ? `${group}.${path}` : group;
		throw new MappingError(field, `Sensor group '${group}' is malformed at ${field}: ${issue?.message ?? "invalid"}`);
	}

	const payload = res.data;
	const candidates = tsSource === "entry" ? [entry.ts, payload.ts] : [payload.ts, entry.ts];
	const ts = candidates.find(isEpoch);
	if (ts === undefined) {
		throw new MappingError(`${group}.ts`, `Sensor group '${group}' has no usable timestamp`);
	}

	return { payload, ts };
}

function requireGroup<T extends { ts?: number }>(
	raw: RawReading,
	group: SensorGroupKey,
	schema: PayloadSchema<T>,
	tsSource: TimestampSource
): DecodedGroup<T> {
	const entry = firstEntry(raw, group);
	if (!entry) {
		throw new MappingError(group, `Sensor group '${group}' is missing`);
	}
	return decodeGroup(group, entry, schema, tsSource);
}

function optionalGroup<T extends { ts?: number }>(
	raw: RawReading,
	group: SensorGroupKey,
	schema: PayloadSchema<T>
): DecodedGroup<T> | undefined {
	const entry = firstEntry(raw, group);
	return entry ? decodeGroup(group, entry, schema, "payload") : undefined;
}

function decodeRecord(raw: RawReading): TelemetryRecord {
	const bat = requireGroup(raw, "bat", BatteryPayloadSchema, "payload");
	const gnss = requireGroup(raw, "gnss", GnssPayloadSchema, "entry");
	const ai = requireGroup(raw, "ai", AiPayloadSchema, "payload");
	const dev = optionalGroup(raw, "dev", DiagnosticsPayloadSchema);
	const env = optionalGroup(raw, "env", EnvironmentPayloadSchema);

	const record: TelemetryRecord = {
		battery_percentage: bat.payload.v,
		battery_timestamp: bat.ts,

		gps_latitude: gnss.payload.lat,
		gps_longitude: gnss.payload.lng,
		gps_speed: gnss.payload.spd,
		gps_timestamp: gnss.ts,

		ai_normal_percentage: ai.payload.n,
		ai_error1_percentage: ai.payload.e1,
		ai_error2_percentage: ai.payload.e2,
		ai_error3_percentage: ai.payload.e3,
		ai_timestamp: ai.ts
	};

	if (dev) {
		record.diagnostics = {
			cellular_imei: dev.payload.imei,
			cellular_iccid: dev.payload.iccid,
			firmware_version: dev.payload.modV,
			board_version: dev.payload.brdV,
			application_version: dev.payload.appV,
			diagnostics_timestamp: dev.ts
		};
	}

	if (env) {
		record.environment = {
			environmental_temperature: env.payload.temp,
			environmental_humidity: env.payload.hum,
			environmental_pressure: env.payload.atmp,
			environmental_timestamp: env.ts
		};
	}

	return record;
}

/**
 * Translate one latest-values response into a typed record. Absent required
 * groups and malformed payloads fail; nothing is defaulted.
 */
export function mapReading(raw: RawReading): MapResult {
	try {
		return { ok: true, value: decodeRecord(raw) };
	} catch (err) {
		if (err instanceof MappingError) {
			return { ok: false, error: err };
		}
		throw err;
	}
}

/** Project a record onto the persisted device-table columns. */
export function toDeviceRow(record: TelemetryRecord): DeviceRow {
	return {
		battery_percentage: record.battery_percentage,
		battery_timestamp: record.battery_timestamp,
		gps_latitude: record.gps_latitude,
		gps_longitude: record.gps_longitude,
		gps_timestamp: record.gps_timestamp,
		ai_normal_percentage: record.ai_normal_percentage,
		ai_error1_percentage: record.ai_error1_percentage,
		ai_error2_percentage: record.ai_error2_percentage,
		ai_error3_percentage: record.ai_error3_percentage,
		ai_timestamp: record.ai_timestamp
	};
}
