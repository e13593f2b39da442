import type winston from "winston";
import type { RawReading, SensorGroupKey } from "@fleet-sync/common";

import type { DatabaseSettings, TelemetrySourceSettings } from "../lib/config";
import { createLogger } from "../lib/log";

export function silentLogger(): winston.Logger {
	return createLogger({ serviceName: "test", console: false, silent: true });
}

export const testDatabaseSettings: DatabaseSettings = {
	name: "telemetry",
	host: "localhost",
	port: 5432,
	username: "updater",
	password: "test-secret",
	ssl: false,
	poolMax: 1
};

export const testSourceSettings: TelemetrySourceSettings = {
	url: "https://tb.example.test",
	username: "tenant@example.test",
	password: "test-secret",
	deviceType: "DieselMotor",
	pageSize: 2,
	requestTimeoutMs: 1_000
};

/** A complete reading with the three persisted groups. */
export function rawReading(gpsTs = 1700000001): RawReading {
	return {
		bat: [{ value: { v: 87, ts: 1700000000 } }],
		gnss: [{ ts: gpsTs, value: { lat: 41.0, lng: 29.0, spd: 3.2 } }],
		ai: [{ ts: 1700000002, value: { n: 90, e1: 5, e2: 3, e3: 2 } }]
	};
}

export function withoutGroup(raw: RawReading, group: SensorGroupKey): RawReading {
	return Object.fromEntries(Object.entries(raw).filter(([key]) => key !== group));
}
