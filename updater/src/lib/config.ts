import fs from "node:fs";
import process from "node:process";
import { Command } from "commander";
import { parse as parseEnvFile } from "dotenv";

import { configError } from "./errors";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

export interface DatabaseSettings {
	readonly name: string;
	readonly host: string;
	readonly port: number;
	readonly username: string;
	readonly password: string;
	readonly ssl: boolean;
	readonly poolMax: number;
}

export interface TelemetrySourceSettings {
	readonly url: string;
	readonly username: string;
	readonly password: string;
	readonly deviceType: string;   // device profile name to sync
	readonly pageSize: number;
	readonly requestTimeoutMs: number;
}

export interface AppConfig {
	database: DatabaseSettings;
	thingsboard: TelemetrySourceSettings;

	logging: {
		level: LogLevel;
		dir: string;
		console: boolean;
	};

	sync: {
		skipDuplicates: boolean;
		intervalMs?: number; // unset = one cycle and exit
	};
}

export interface CliOptions {
	databaseEnv: string;
	thingsboardEnv: string;
	interval?: string;
	once?: boolean;
	logDir?: string;
}

export type EnvSource = Readonly<Record<string, string | undefined>>;

/* ---------- defaults ---------- */

const DEFAULT_DATABASE_ENV = ".database.env";
const DEFAULT_THINGSBOARD_ENV = ".thingsboard.env";
const DEFAULT_LOG_DIR = "./logs";
const DEFAULT_LOG_LEVEL: LogLevel = "info";
const DEFAULT_DEVICE_TYPE = "DieselMotor";
const DEFAULT_PAGE_SIZE = 100;
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const DEFAULT_POOL_MAX = 1;

const LOG_LEVELS: ReadonlySet<string> = new Set(["error", "warn", "info", "http", "verbose", "debug", "silly"]);

export function parseCommandLine(argv: readonly string[] = process.argv): CliOptions {
	const program = new Command();

	program
		.name("data-updater")
		.option("--database-env <path>", "Env file with DATABASE_* settings", DEFAULT_DATABASE_ENV)
		.option("--thingsboard-env <path>", "Env file with THINGSBOARD_* settings", DEFAULT_THINGSBOARD_ENV)
		.option("--interval <ms>", "Repeat the sync every <ms> milliseconds")
		.option("--once", "Run a single sync cycle and exit")
		.option("--log-dir <path>", "Directory for rotated log files")
		.allowExcessArguments(false);

	program.parse(Array.from(argv));

	return program.opts<CliOptions>();
}

function readEnvFile(filePath: string): Record<string, string> {
	if (!fs.existsSync(filePath)) {
		return {};
	}
	return parseEnvFile(fs.readFileSync(filePath));
}

/* ---------- env helpers ---------- */

function requireEnv(env: EnvSource, name: string): string {
	const value = env[name];
	if (!value || value.trim() === "") {
		throw configError(`Missing required environment variable: ${name}`);
	}
	return value.trim();
}

function optionalStringEnv(env: EnvSource, name: string, def: string): string {
	const value = env[name];
	if (value === undefined || value.trim() === "") return def;
	return value.trim();
}

function optionalNumberEnv(env: EnvSource, name: string, def: number): number {
	const raw = env[name];
	if (raw === undefined || raw.trim() === "") return def;
	return positiveInteger(name, raw);
}

function optionalBooleanEnv(env: EnvSource, name: string, def: boolean): boolean {
	const value = env[name];
	if (value === undefined || value.trim() === "") return def;
	const lower = value.trim().toLowerCase();
	if (lower === "true") return true;
	if (lower === "false") return false;
	throw configError(`Environment variable ${name} must be "true" or "false"`);
}

function positiveInteger(name: string, raw: string): number {
	const n = Number(raw);
	if (!Number.isInteger(n) || n <= 0) {
		throw configError(`${name} must be a positive integer`, { value: raw });
	}
	return n;
}

function parsePort(env: EnvSource, name: string): number {
	const port = positiveInteger(name, requireEnv(env, name));
	if (port > 65535) {
		throw configError(`${name} must be a valid TCP port`, { value: port });
	}
	return port;
}

function normalizeBaseUrl(name: string, raw: string): string {
	const withScheme = /^https?:\/\//i.test(raw) ? raw : `https://${raw}`;
	let url: URL;
	try {
		url = new URL(withScheme);
	} catch {
		throw configError(`${name} is not a valid URL`, { value: raw });
	}
	// keep any path prefix, drop the trailing slash
	return `${url.origin}${url.pathname}`.replace(/\/+$/, "");
}

function parseLogLevel(raw: string): LogLevel {
	const lower = raw.toLowerCase();
	if (!isLogLevel(lower)) {
		throw configError(`LOG_LEVEL must be one of: ${Array.from(LOG_LEVELS).join(", ")}`);
	}
	return lower;
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.has(value);
}

/* ---------- public API ---------- */

export function loadDatabaseSettings(env: EnvSource): DatabaseSettings {
	return {
		name: requireEnv(env, "DATABASE_NAME"),
		host: requireEnv(env, "DATABASE_HOST"),
		port: parsePort(env, "DATABASE_PORT"),
		username: requireEnv(env, "DATABASE_USERNAME"),
		password: requireEnv(env, "DATABASE_PASSWORD"),
		ssl: optionalBooleanEnv(env, "DATABASE_SSL", false),
		poolMax: optionalNumberEnv(env, "DATABASE_POOL_MAX", DEFAULT_POOL_MAX)
	};
}

export function loadTelemetrySourceSettings(env: EnvSource): TelemetrySourceSettings {
	return {
		url: normalizeBaseUrl("THINGSBOARD_HOST", requireEnv(env, "THINGSBOARD_HOST")),
		username: requireEnv(env, "THINGSBOARD_USERNAME"),
		password: requireEnv(env, "THINGSBOARD_PASSWORD"),
		deviceType: optionalStringEnv(env, "THINGSBOARD_DEVICE_TYPE", DEFAULT_DEVICE_TYPE),
		pageSize: optionalNumberEnv(env, "THINGSBOARD_PAGE_SIZE", DEFAULT_PAGE_SIZE),
		requestTimeoutMs: optionalNumberEnv(env, "THINGSBOARD_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS)
	};
}

/**
 * Build the configuration from CLI options and already merged environment values.
 * CLI flags win over SYNC_INTERVAL_MS and LOG_DIR; `--once` disables the interval.
 */
export function buildConfig(cli: CliOptions, env: EnvSource): AppConfig {
	const intervalRaw = cli.interval ?? env.SYNC_INTERVAL_MS;
	const intervalMs =
		cli.once || intervalRaw === undefined || intervalRaw.trim() === ""
			? undefined
			: positiveInteger("sync interval", intervalRaw);

	return {
		database: loadDatabaseSettings(env),
		thingsboard: loadTelemetrySourceSettings(env),
		logging: {
			level: parseLogLevel(optionalStringEnv(env, "LOG_LEVEL", DEFAULT_LOG_LEVEL)),
			dir: cli.logDir ?? optionalStringEnv(env, "LOG_DIR", DEFAULT_LOG_DIR),
			console: optionalBooleanEnv(env, "LOG_CONSOLE", true)
		},
		sync: {
			skipDuplicates: optionalBooleanEnv(env, "SYNC_SKIP_DUPLICATES", true),
			intervalMs
		}
	};
}

export function loadConfig(argv: readonly string[] = process.argv): AppConfig {
	const cli = parseCommandLine(argv);

	// Process environment overrides values from the env files
	const env: EnvSource = {
		...readEnvFile(cli.databaseEnv),
		...readEnvFile(cli.thingsboardEnv),
		...process.env
	};

	return buildConfig(cli, env);
}
