import { z } from "zod";

// Payloads arrive either decoded or as a JSON string inside `value`.
const epoch = z.number().int().nonnegative();
// Numeric identifiers past 2^53 have already lost digits, so only exact integers are taken
const identifier = z.union([z.string().min(1), z.number().int().nonnegative().safe()]).transform(v => String(v));

// Entries are only checked for shape here; timestamps are validated per group when mapped
export const RawEntrySchema = z.object({
	ts: z.number().optional(),
	value: z.unknown()
});

export const RawReadingSchema = z.record(z.string(), z.array(RawEntrySchema));

export const BatteryPayloadSchema = z.object({
	v: z.number(),
	ts: epoch.optional()
});

export const GnssPayloadSchema = z.object({
	lat: z.number().min(-90).max(90),
	lng: z.number().min(-180).max(180),
	spd: z.number(),
	ts: epoch.optional()
});

export const AiPayloadSchema = z.object({
	n: z.number().int(),
	e1: z.number().int(),
	e2: z.number().int(),
	e3: z.number().int(),
	ts: epoch.optional()
});

export const DiagnosticsPayloadSchema = z.object({
	imei: identifier,
	iccid: identifier,
	modV: z.string(),
	brdV: z.string(),
	appV: z.string(),
	ts: epoch.optional()
});

export const EnvironmentPayloadSchema = z.object({
	temp: z.number(),
	hum: z.number(),
	atmp: z.number(),
	ts: epoch.optional()
});

export type BatteryPayload = z.infer<typeof BatteryPayloadSchema>;
export type GnssPayload = z.infer<typeof GnssPayloadSchema>;
export type AiPayload = z.infer<typeof AiPayloadSchema>;
export type DiagnosticsPayload = z.infer<typeof DiagnosticsPayloadSchema>;
export type EnvironmentPayload = z.infer<typeof EnvironmentPayloadSchema>;
