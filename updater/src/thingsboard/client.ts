import { z } from "zod";
import type winston from "winston";
import { RawReadingSchema } from "@fleet-sync/common";
import type { RawReading, SensorGroupKey } from "@fleet-sync/common";

import type { TelemetrySourceSettings } from "../lib/config";
import { AuthError, SourceError, errorMessage } from "../lib/errors";

export interface Entity {
	id: string;
	name: string;
	type: string;
}

export interface TelemetrySource {
	listEntities(category: string): Promise<Entity[]>;
	latestReading(entity: Entity): Promise<RawReading>;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const TELEMETRY_KEYS: readonly SensorGroupKey[] = ["bat", "gnss", "ai", "dev", "env"];

const LoginResponseSchema = z.object({
	token: z.string().min(1),
	refreshToken: z.string().optional()
});

const DevicePageSchema = z.object({
	data: z.array(
		z.object({
			id: z.object({ id: z.string().min(1) }),
			name: z.string(),
			type: z.string()
		})
	),
	hasNext: z.boolean()
});

function previewBody(body: string, maxLen = 256): string {
	const trimmed = body.trim();
	if (trimmed.length <= maxLen) return trimmed;
	return trimmed.slice(0, maxLen) + "…";
}

function describeIssues(issues: readonly z.ZodIssue[]): string {
	return issues
		.slice(0, 5)
		.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
		.join("; ");
}

/**
 * REST client for a ThingsBoard tenant. Holds the JWT obtained by `connect()`
 * and logs in again once when a request is rejected as unauthorized.
 */
export class ThingsBoardClient implements TelemetrySource {
	private token: string | null = null;

	constructor(
		private readonly settings: TelemetrySourceSettings,
		private readonly logger: winston.Logger,
		private readonly fetchImpl: FetchLike = (url, init) => fetch(url, init)
	) {}

	async connect(): Promise<void> {
		const url = `${this.settings.url}/api/auth/login`;

		let res: Response;
		try {
			res = await this.fetchImpl(url, {
				method: "POST",
				headers: { "content-type": "application/json", accept: "application/json" },
				body: JSON.stringify({ username: this.settings.username, password: this.settings.password }),
				signal: AbortSignal.timeout(this.settings.requestTimeoutMs)
			});
		} catch (err) {
			throw new AuthError(`Cannot reach ThingsBoard at ${this.settings.url}: ${errorMessage(err)}`, err);
		}

		if (!res.ok) {
			throw new AuthError(`Cannot log in to ThingsBoard (HTTP ${res.status}). Check username or password.`);
		}

		let body: unknown;
		try {
			body = await this.readJson(res, "login");
		} catch (err) {
			throw new AuthError(`Unexpected login response: ${errorMessage(err)}`, err);
		}

		const parsed = LoginResponseSchema.safeParse(body);
		if (!parsed.success) {
			throw new AuthError(`Unexpected login response: ${describeIssues(parsed.error.issues)}`);
		}

		this.token = parsed.data.token;
		this.logger.info("thingsboard: logged in to %s as %s", this.settings.url, this.settings.username);
	}

	/** All devices of the tenant whose profile name equals `category`. */
	async listEntities(category: string): Promise<Entity[]> {
		const entities: Entity[] = [];

		for (let page = 0; ; page++) {
			const query = new URLSearchParams({ pageSize: String(this.settings.pageSize), page: String(page) });
			const body = await this.get(`/api/tenant/devices?${query.toString()}`);

			const parsed = DevicePageSchema.safeParse(body);
			if (!parsed.success) {
				throw new SourceError(`Unexpected device page ${page}: ${describeIssues(parsed.error.issues)}`);
			}

			for (const device of parsed.data.data) {
				if (device.type === category) {
					entities.push({ id: device.id.id, name: device.name, type: device.type });
				}
			}

			if (!parsed.data.hasNext || parsed.data.data.length === 0) break;
		}

		this.logger.debug("thingsboard: %d device(s) of type %s", entities.length, category);
		return entities;
	}

	async latestReading(entity: Entity): Promise<RawReading> {
		const query = new URLSearchParams({ keys: TELEMETRY_KEYS.join(",") });
		const path = `/api/plugins/telemetry/DEVICE/${encodeURIComponent(entity.id)}/values/timeseries?${query.toString()}`;
		const body = await this.get(path);

		const parsed = RawReadingSchema.safeParse(body);
		if (!parsed.success) {
			throw new SourceError(
				`Unexpected telemetry for device ${entity.name}: ${describeIssues(parsed.error.issues)}`
			);
		}
		return parsed.data;
	}

	private async get(path: string, retried = false): Promise<unknown> {
		if (!this.token) {
			throw new AuthError("Not logged in to ThingsBoard");
		}

		let res: Response;
		try {
			res = await this.fetchImpl(`${this.settings.url}${path}`, {
				method: "GET",
				headers: { accept: "application/json", "x-authorization": `Bearer ${this.token}` },
				signal: AbortSignal.timeout(this.settings.requestTimeoutMs)
			});
		} catch (err) {
			throw new SourceError(`GET ${path} failed: ${errorMessage(err)}`, undefined, err);
		}

		if (res.status === 401 && !retried) {
			// expired JWT
			this.logger.info("thingsboard: token rejected, logging in again");
			await this.connect();
			return this.get(path, true);
		}

		if (!res.ok) {
			const text = await res.text();
			throw new SourceError(`GET ${path} failed with HTTP ${res.status}: ${previewBody(text)}`, res.status);
		}

		return this.readJson(res, path);
	}

	private async readJson(res: Response, what: string): Promise<unknown> {
		const text = await res.text();
		try {
			return JSON.parse(text);
		} catch {
			throw new SourceError(`Response for ${what} is not valid JSON: ${previewBody(text)}`, res.status);
		}
	}
}
