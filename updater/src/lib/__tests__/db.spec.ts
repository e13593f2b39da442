import { beforeEach, describe, expect, it } from "vitest";

import { FakeDatabase, FakePgError } from "../../__tests__/fakes/fake-pg";
import { silentLogger, testDatabaseSettings } from "../../__tests__/helpers";
import { PersistenceGateway } from "../db";
import { ConnectionError, StatementError } from "../errors";

const COLUMNS = { battery_percentage: "FLOAT", battery_timestamp: "BIGINT" } as const;

describe("PersistenceGateway", () => {
	let db: FakeDatabase;
	let gateway: PersistenceGateway;

	beforeEach(() => {
		db = new FakeDatabase();
		gateway = new PersistenceGateway(testDatabaseSettings, silentLogger(), () => db.pool());
	});

	// statements issued from now on
	function statementsDuring(): { take: () => string[] } {
		const since = db.statements.length;
		return { take: () => db.statements.slice(since) };
	}

	describe("connection lifecycle", () => {
		it("rejects every operation before connect with a ConnectionError", async () => {
			await expect(gateway.tableExists("device_a")).rejects.toBeInstanceOf(ConnectionError);
			await expect(gateway.insertRow("device_a", { battery_percentage: 1 })).rejects.toThrow(
				"Database is not connected"
			);
			expect(db.statements).toEqual([]);
		});

		it("verifies the connection with a round trip and returns the client", async () => {
			await gateway.connect();

			expect(gateway.connected).toBe(true);
			expect(db.statements).toEqual(["SELECT 1"]);
			expect(db.checkedOut).toBe(0);
		});

		it("wraps a failed connect in a ConnectionError and ends the pool", async () => {
			db.connectError = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:5432"), { code: "ECONNREFUSED" });

			await expect(gateway.connect()).rejects.toThrow(
				"Cannot connect to database localhost:5432/telemetry: connect ECONNREFUSED 127.0.0.1:5432"
			);
			expect(gateway.connected).toBe(false);
			expect(db.ended).toBe(true);
		});

		it("ends the pool on disconnect and refuses work afterwards", async () => {
			await gateway.connect();
			await gateway.disconnect();

			expect(db.ended).toBe(true);
			await expect(gateway.countRows("device_a")).rejects.toBeInstanceOf(ConnectionError);
		});
	});

	describe("table operations", () => {
		beforeEach(async () => {
			await gateway.connect();
		});

		it("creates a table inside a committed unit of work", async () => {
			const window = statementsDuring();

			await gateway.createTable("device_a", COLUMNS);

			expect(window.take()).toEqual([
				"BEGIN",
				"CREATE TABLE IF NOT EXISTS \"device_a\" (\"battery_percentage\" FLOAT, \"battery_timestamp\" BIGINT)",
				"COMMIT"
			]);
			expect(await gateway.tableExists("device_a")).toBe(true);
			expect(await gateway.tableColumns("device_a")).toEqual([
				{ name: "battery_percentage", dataType: "double precision" },
				{ name: "battery_timestamp", dataType: "bigint" }
			]);
			expect(db.checkedOut).toBe(0);
		});

		it("reports missing tables", async () => {
			expect(await gateway.tableExists("device_missing")).toBe(false);
			expect(await gateway.tableColumns("device_missing")).toEqual([]);
		});

		it("refuses to create a table without columns", async () => {
			await expect(gateway.createTable("device_a", {})).rejects.toBeInstanceOf(StatementError);
			expect(db.tables.has("device_a")).toBe(false);
		});

		it("quotes names that are not plain identifiers", async () => {
			await gateway.createTable("device_Truck \"7\"", COLUMNS);

			expect(db.tables.has("device_Truck \"7\"")).toBe(true);
			expect(await gateway.tableExists("device_Truck \"7\"")).toBe(true);
		});
	});

	describe("row operations", () => {
		beforeEach(async () => {
			await gateway.connect();
			await gateway.createTable("device_a", COLUMNS);
		});

		it("inserts with bound parameters and commits", async () => {
			const window = statementsDuring();

			await gateway.insertRow("device_a", { battery_percentage: 87, battery_timestamp: 1700000000 });

			expect(window.take()).toEqual([
				"BEGIN",
				"INSERT INTO \"device_a\" (\"battery_percentage\", \"battery_timestamp\") VALUES ($1, $2)",
				"COMMIT"
			]);
			expect(db.rows("device_a")).toEqual([{ battery_percentage: 87, battery_timestamp: 1700000000 }]);
			expect(await gateway.countRows("device_a")).toBe(1);
		});

		it("rolls back a failed insert, leaves the row count unchanged and surfaces a StatementError", async () => {
			await gateway.insertRow("device_a", { battery_percentage: 50, battery_timestamp: 1699999999 });
			db.failNext(/^INSERT/, new FakePgError("duplicate key value violates unique constraint", "23505"));
			const window = statementsDuring();

			const failure = gateway.insertRow("device_a", { battery_percentage: 87, battery_timestamp: 1700000000 });

			await expect(failure).rejects.toBeInstanceOf(StatementError);
			await expect(failure).rejects.toMatchObject({ sqlState: "23505", code: "STATEMENT_ERROR" });
			expect(window.take()).toEqual([
				"BEGIN",
				"INSERT INTO \"device_a\" (\"battery_percentage\", \"battery_timestamp\") VALUES ($1, $2)",
				"ROLLBACK"
			]);
			expect(await gateway.countRows("device_a")).toBe(1);
			expect(db.checkedOut).toBe(0);
		});

		it("does not roll back after a failed COMMIT", async () => {
			db.failNext(/^COMMIT$/);
			const window = statementsDuring();

			await expect(
				gateway.insertRow("device_a", { battery_percentage: 87, battery_timestamp: 1700000000 })
			).rejects.toBeInstanceOf(StatementError);

			expect(window.take()).not.toContain("ROLLBACK");
			expect(db.rows("device_a")).toEqual([]);
		});

		it("surfaces an unknown table as a StatementError with its SQLSTATE", async () => {
			await expect(gateway.insertRow("device_b", { battery_percentage: 1 })).rejects.toMatchObject({
				name: "StatementError",
				sqlState: "42P01"
			});
		});

		it("turns a dropped connection into a ConnectionError and discards the client", async () => {
			db.failNext(/^INSERT/, new FakePgError("terminating connection due to administrator command", "57P01"));

			await expect(
				gateway.insertRow("device_a", { battery_percentage: 87, battery_timestamp: 1700000000 })
			).rejects.toBeInstanceOf(ConnectionError);
			expect(db.releases.at(-1)).toBe(true);
			expect(db.rows("device_a")).toEqual([]);
		});

		it("treats a failed rollback as a lost connection", async () => {
			db.failNext(/^INSERT/);
			db.failNext(/^ROLLBACK$/);

			await expect(
				gateway.insertRow("device_a", { battery_percentage: 87, battery_timestamp: 1700000000 })
			).rejects.toThrow("Rollback failed, connection discarded: statement rejected");
			expect(db.releases.at(-1)).toBe(true);
		});

		it("finds a row only when every given column matches in the same row", async () => {
			await gateway.insertRow("device_a", { battery_percentage: 87, battery_timestamp: 1700000000 });
			await gateway.insertRow("device_a", { battery_percentage: 42, battery_timestamp: 1700000500 });

			expect(await gateway.rowExists("device_a", { battery_percentage: 87, battery_timestamp: 1700000000 })).toBe(true);
			expect(await gateway.rowExists("device_a", { battery_percentage: 87, battery_timestamp: 1700000500 })).toBe(false);
			expect(await gateway.rowExists("device_a", { battery_timestamp: 1700000500 })).toBe(true);
		});

		it("refuses to match on no columns", async () => {
			await expect(gateway.rowExists("device_a", {})).rejects.toBeInstanceOf(StatementError);
		});
	});
});
