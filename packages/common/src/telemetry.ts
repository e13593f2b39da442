export type SensorGroupKey = "bat" | "gnss" | "ai" | "dev" | "env";

export interface RawEntry {
	ts?: number;       // platform receive time, epoch millis
	value?: unknown;   // JSON document or JSON-encoded string
}

/** Latest-values response of the platform, newest entry first per key. */
export type RawReading = Record<string, RawEntry[]>;

export interface DiagnosticsRecord {
	cellular_imei: string;
	cellular_iccid: string;
	firmware_version: string;
	board_version: string;
	application_version: string;
	diagnostics_timestamp: number;
}

export interface EnvironmentRecord {
	environmental_temperature: number;
	environmental_humidity: number;
	environmental_pressure: number;
	environmental_timestamp: number;
}

export interface TelemetryRecord {
	battery_percentage: number;
	battery_timestamp: number;

	gps_latitude: number;
	gps_longitude: number;
	gps_speed: number;
	gps_timestamp: number;

	ai_normal_percentage: number;
	ai_error1_percentage: number;
	ai_error2_percentage: number;
	ai_error3_percentage: number;
	ai_timestamp: number;

	// Only set when the device reported the group
	diagnostics?: DiagnosticsRecord;
	environment?: EnvironmentRecord;
}

/** The subset of a record that is written to a device table. */
export type DeviceRow = {
	battery_percentage: number;
	battery_timestamp: number;
	gps_latitude: number;
	gps_longitude: number;
	gps_timestamp: number;
	ai_normal_percentage: number;
	ai_error1_percentage: number;
	ai_error2_percentage: number;
	ai_error3_percentage: number;
	ai_timestamp: number;
};

export type DeviceColumn = keyof DeviceRow;
