import { describe, expect, it } from "vitest";

import { silentLogger, testSourceSettings } from "../../__tests__/helpers";
import { AuthError, SourceError } from "../../lib/errors";
import { ThingsBoardClient } from "../client";
import type { FetchLike } from "../client";

interface Call {
	url: string;
	method: string;
	authorization: string | null;
	body?: string;
}

type Reply = Response | Error;

function json(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

/** Answers requests with the given replies, in order. */
function scriptedFetch(replies: Reply[]): { fetch: FetchLike; calls: Call[] } {
	const calls: Call[] = [];
	const fetch: FetchLike = async (url, init) => {
		calls.push({
			url,
			method: init?.method ?? "GET",
			authorization: new Headers(init?.headers).get("x-authorization"),
			body: typeof init?.body === "string" ? init.body : undefined
		});
		const reply = replies.shift();
		if (!reply) throw new Error(`unexpected request to ${url}`);
		if (reply instanceof Error) throw reply;
		return reply;
	};
	return { fetch, calls };
}

function device(id: string, name: string, type: string): { id: { id: string; entityType: string }; name: string; type: string } {
	return { id: { id, entityType: "DEVICE" }, name, type };
}

const LOGIN = "https://tb.example.test/api/auth/login";

describe("ThingsBoardClient", () => {
	it("logs in with the configured credentials", async () => {
		const { fetch, calls } = scriptedFetch([json({ token: "tok-1", refreshToken: "r-1" })]);
		const client = new ThingsBoardClient(testSourceSettings, silentLogger(), fetch);

		await client.connect();

		expect(calls).toEqual([
			{
				url: LOGIN,
				method: "POST",
				authorization: null,
				body: JSON.stringify({ username: "tenant@example.test", password: "test-secret" })
			}
		]);
	});

	it("reports rejected credentials as an AuthError", async () => {
		const { fetch } = scriptedFetch([json({ message: "Invalid username or password" }, 401)]);
		const client = new ThingsBoardClient(testSourceSettings, silentLogger(), fetch);

		const failure = client.connect();

		await expect(failure).rejects.toBeInstanceOf(AuthError);
		await expect(failure).rejects.toThrow("Cannot log in to ThingsBoard (HTTP 401). Check username or password.");
	});

	it("reports an unreachable server as an AuthError", async () => {
		const { fetch } = scriptedFetch([new TypeError("fetch failed")]);
		const client = new ThingsBoardClient(testSourceSettings, silentLogger(), fetch);

		await expect(client.connect()).rejects.toThrow("Cannot reach ThingsBoard at https://tb.example.test: fetch failed");
	});

	it("rejects a login response without a token", async () => {
		const { fetch } = scriptedFetch([json({ refreshToken: "r-1" })]);
		const client = new ThingsBoardClient(testSourceSettings, silentLogger(), fetch);

		await expect(client.connect()).rejects.toBeInstanceOf(AuthError);
	});

	it("refuses requests before login", async () => {
		const { fetch, calls } = scriptedFetch([]);
		const client = new ThingsBoardClient(testSourceSettings, silentLogger(), fetch);

		await expect(client.listEntities("DieselMotor")).rejects.toThrow("Not logged in to ThingsBoard");
		expect(calls).toEqual([]);
	});

	it("pages through the tenant devices and keeps those of the requested type", async () => {
		const { fetch, calls } = scriptedFetch([
			json({ token: "tok-1" }),
			json({ data: [device("d-1", "Truck 7", "DieselMotor"), device("d-2", "Gate", "default")], hasNext: true }),
			json({ data: [device("d-3", "Truck 9", "DieselMotor")], hasNext: false })
		]);
		const client = new ThingsBoardClient(testSourceSettings, silentLogger(), fetch);
		await client.connect();

		const entities = await client.listEntities("DieselMotor");

		expect(entities).toEqual([
			{ id: "d-1", name: "Truck 7", type: "DieselMotor" },
			{ id: "d-3", name: "Truck 9", type: "DieselMotor" }
		]);
		expect(calls.slice(1).map(c => c.url)).toEqual([
			"https://tb.example.test/api/tenant/devices?pageSize=2&page=0",
			"https://tb.example.test/api/tenant/devices?pageSize=2&page=1"
		]);
		expect(calls[1].authorization).toBe("Bearer tok-1");
	});

	it("fetches the latest values of the sensor groups for one device", async () => {
		const telemetry = { bat: [{ ts: 1700000000500, value: "{\"v\":87,\"ts\":1700000000}" }] };
		const { fetch, calls } = scriptedFetch([json({ token: "tok-1" }), json(telemetry)]);
		const client = new ThingsBoardClient(testSourceSettings, silentLogger(), fetch);
		await client.connect();

		const reading = await client.latestReading({ id: "d-1", name: "Truck 7", type: "DieselMotor" });

		expect(reading).toEqual(telemetry);
		expect(calls[1].url).toBe(
			"https://tb.example.test/api/plugins/telemetry/DEVICE/d-1/values/timeseries?keys=bat%2Cgnss%2Cai%2Cdev%2Cenv"
		);
	});

	it("rejects a telemetry body that is not a map of entry lists", async () => {
		const { fetch } = scriptedFetch([json({ token: "tok-1" }), json({ bat: { value: 1 } })]);
		const client = new ThingsBoardClient(testSourceSettings, silentLogger(), fetch);
		await client.connect();

		await expect(client.latestReading({ id: "d-1", name: "Truck 7", type: "DieselMotor" })).rejects.toThrow(
			"Unexpected telemetry for device Truck 7: bat: Expected array, received object"
		);
	});

	it("logs in again once when the token has expired", async () => {
		const { fetch, calls } = scriptedFetch([
			json({ token: "tok-1" }),
			json({ message: "Token has expired" }, 401),
			json({ token: "tok-2" }),
			json({ data: [], hasNext: false })
		]);
		const client = new ThingsBoardClient(testSourceSettings, silentLogger(), fetch);
		await client.connect();

		expect(await client.listEntities("DieselMotor")).toEqual([]);
		expect(calls.map(c => `${c.method} ${c.authorization ?? "-"}`)).toEqual([
			"POST -",
			"GET Bearer tok-1",
			"POST -",
			"GET Bearer tok-2"
		]);
	});

	it("gives up when the request is still unauthorized after logging in again", async () => {
		const { fetch } = scriptedFetch([
			json({ token: "tok-1" }),
			json({ message: "denied" }, 401),
			json({ token: "tok-2" }),
			json({ message: "denied" }, 401)
		]);
		const client = new ThingsBoardClient(testSourceSettings, silentLogger(), fetch);
		await client.connect();

		await expect(client.listEntities("DieselMotor")).rejects.toMatchObject({ name: "SourceError", status: 401 });
	});

	it("surfaces server errors with their status", async () => {
		const { fetch } = scriptedFetch([json({ token: "tok-1" }), new Response("upstream down", { status: 500 })]);
		const client = new ThingsBoardClient(testSourceSettings, silentLogger(), fetch);
		await client.connect();

		const failure = client.latestReading({ id: "d-1", name: "Truck 7", type: "DieselMotor" });

		await expect(failure).rejects.toBeInstanceOf(SourceError);
		await expect(failure).rejects.toThrow(
			"GET /api/plugins/telemetry/DEVICE/d-1/values/timeseries?keys=bat%2Cgnss%2Cai%2Cdev%2Cenv failed with HTTP 500: upstream down"
		);
	});
});
