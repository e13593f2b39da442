import fs from "node:fs";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

export interface LoggerOptions {
	serviceName: string;
	logDir?: string;      // no file transports when unset
	level?: string;
	console?: boolean;
	silent?: boolean;
}

const RESERVED_KEYS: ReadonlySet<string> = new Set(["level", "message", "timestamp", "stack", "service"]);

function getLevel(level?: string): string {
	return (level ?? process.env.LOG_LEVEL ?? "info").toLowerCase();
}

function formatMeta(info: Record<string, unknown>): string {
	const meta: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(info)) {
		if (!RESERVED_KEYS.has(key)) meta[key] = value;
	}
	return Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
}

export function createLogger(opts: LoggerOptions): winston.Logger {
	const level = getLevel(opts.level);

	const baseFormat = winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.printf(info => {
			const ts = String(info.timestamp);
			const stack = typeof info.stack === "string" ? `\n${info.stack}` : "";
			return `${ts} [${opts.serviceName}] ${info.level}: ${String(info.message)}${formatMeta(info)}${stack}`;
		})
	);

	const transports: winston.transport[] = [];

	if (opts.console ?? true) {
		transports.push(new winston.transports.Console({ level }));
	}

	if (opts.logDir) {
		fs.mkdirSync(opts.logDir, { recursive: true });

		transports.push(
			new DailyRotateFile({
				level,
				dirname: opts.logDir,
				filename: `${opts.serviceName}.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxFiles: "14d",
				zippedArchive: false
			})
		);

		transports.push(
			new DailyRotateFile({
				level: "error",
				dirname: opts.logDir,
				filename: `${opts.serviceName}.error.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxFiles: "30d",
				zippedArchive: false
			})
		);
	}

	// winston warns on writes without any transport
	if (transports.length === 0) {
		transports.push(new winston.transports.Console({ level, silent: true }));
	}

	return winston.createLogger({
		level,
		format: baseFormat,
		transports,
		silent: opts.silent ?? false
	});
}
