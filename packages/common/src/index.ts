// Record shapes shared by the mapper, the storage layer and the platform client
export type {
	DeviceColumn,
	DeviceRow,
	DiagnosticsRecord,
	EnvironmentRecord,
	RawEntry,
	RawReading,
	SensorGroupKey,
	TelemetryRecord
} from "./telemetry";

// Payload schemas, one per sensor group
export {
	AiPayloadSchema,
	BatteryPayloadSchema,
	DiagnosticsPayloadSchema,
	EnvironmentPayloadSchema,
	GnssPayloadSchema,
	RawEntrySchema,
	RawReadingSchema
} from "./schema";
export type { AiPayload, BatteryPayload, DiagnosticsPayload, EnvironmentPayload, GnssPayload } from "./schema";
