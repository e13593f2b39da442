export type ErrorCode =
	| "CONFIG_ERROR"
	| "MAPPING_ERROR"
	| "PROVISIONING_ERROR"
	| "CONNECTION_ERROR"
	| "STATEMENT_ERROR"
	| "SOURCE_ERROR"
	| "AUTH_ERROR"
	| "INTERNAL_ERROR";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly details?: unknown;

	constructor(params: { code: ErrorCode; message: string; details?: unknown; cause?: unknown }) {
		super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
		this.name = "AppError";
		this.code = params.code;
		this.details = params.details;
	}
}

/** A required sensor group or sub-field is absent or malformed. */
export class MappingError extends AppError {
	public readonly field: string;

	constructor(field: string, message: string, details?: unknown) {
		super({ code: "MAPPING_ERROR", message, details });
		this.name = "MappingError";
		this.field = field;
	}
}

export class ProvisioningError extends AppError {
	public readonly table: string;

	constructor(table: string, message: string, details?: unknown, cause?: unknown) {
		super({ code: "PROVISIONING_ERROR", message, details, cause });
		this.name = "ProvisioningError";
		this.table = table;
	}
}

/** No usable database connection. Fatal for the whole cycle. */
export class ConnectionError extends AppError {
	constructor(message: string, cause?: unknown) {
		super({ code: "CONNECTION_ERROR", message, cause });
		this.name = "ConnectionError";
	}
}

export class StatementError extends AppError {
	public readonly sql: string;
	public readonly sqlState?: string;

	constructor(message: string, sql: string, cause?: unknown) {
		super({ code: "STATEMENT_ERROR", message, details: { sql }, cause });
		this.name = "StatementError";
		this.sql = sql;
		this.sqlState = readSqlState(cause);
	}
}

export class SourceError extends AppError {
	public readonly status?: number;

	constructor(message: string, status?: number, cause?: unknown) {
		super({ code: "SOURCE_ERROR", message, details: status !== undefined ? { status } : undefined, cause });
		this.name = "SourceError";
		this.status = status;
	}
}

export class AuthError extends AppError {
	constructor(message: string, cause?: unknown) {
		super({ code: "AUTH_ERROR", message, cause });
		this.name = "AuthError";
	}
}

function readSqlState(err: unknown): string | undefined {
	if (typeof err !== "object" || err === null || !("code" in err)) {
		return undefined;
	}
	return typeof err.code === "string" ? err.code : undefined;
}

export function asAppError(err: unknown): AppError {
	if (err instanceof AppError) {
		return err;
	}

	if (err instanceof Error) {
		return new AppError({
			code: "INTERNAL_ERROR",
			message: err.message,
			cause: err
		});
	}

	return new AppError({
		code: "INTERNAL_ERROR",
		message: "Unknown error",
		details: err
	});
}

export function configError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "CONFIG_ERROR",
		message,
		details
	});
}

/** Errors after which no further work in the cycle can proceed. */
export function isFatal(err: unknown): boolean {
	return err instanceof ConnectionError || err instanceof AuthError;
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
