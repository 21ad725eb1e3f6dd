import { BASE_ERROR_CODES, type BaseErrorCode } from "./codes.js";

export {
	BASE_ERROR_CODES,
	type BaseErrorCode,
	createErrorCodes,
	type MergeErrorCodes,
	type RawErrorCode,
} from "./codes.js";

export type FolioErrorCode = BaseErrorCode;

export interface FolioErrorOptions {
	cause?: unknown;
	status?: number;
	transient?: boolean;
	details?: Record<string, unknown>;
}

export class FolioError extends Error {
	readonly code: string;
	readonly status: number;
	readonly details?: Record<string, unknown>;
	/**
	 * Whether the condition may change so that a retry (with a new idempotency
	 * key) can succeed. Callers use it to decide on automatic retries.
	 */
	readonly transient: boolean;

	constructor(code: string, message: string, options?: FolioErrorOptions) {
		super(message, { cause: options?.cause });
		this.code = code;
		this.status = options?.status ?? 500;
		this.transient = options?.transient ?? false;
		this.details = options?.details;
		this.name = "FolioError";
	}

	/** Finer-grained reason, e.g. `"SAME_ACCOUNT_TRANSFER"`. Falls back to `code`. */
	get reason(): string {
		const reason = this.details?.reason;
		return typeof reason === "string" ? reason : this.code;
	}

	/**
	 * Create a FolioError from a registered code, using its default message
	 * and status.
	 */
	static fromCode<C extends FolioErrorCode>(
		code: C,
		options?: { message?: string; cause?: unknown; details?: Record<string, unknown> },
	): FolioError {
		const raw = BASE_ERROR_CODES[code];
		return new FolioError(code, options?.message ?? raw.message, {
			cause: options?.cause,
			status: raw.status,
			transient: raw.transient,
			details: options?.details,
		});
	}

	// --- Validation (400) ---

	static validation(message: string, reason?: string, details?: Record<string, unknown>) {
		return new ValidationError(message, { reason, details });
	}

	static unbalanced(totalDebit: number, totalCredit: number) {
		return new ValidationError(
			`Debits (${totalDebit}) do not equal credits (${totalCredit})`,
			{ code: "UNBALANCED_ENTRIES", details: { totalDebit, totalCredit } },
		);
	}

	static insufficientFunds(message = "Insufficient funds", details?: Record<string, unknown>) {
		return new ValidationError(message, { code: "INSUFFICIENT_FUNDS", details });
	}

	static negativeStock(productId: string, available: number, requested: number) {
		return new ValidationError(
			`Insufficient stock for product ${productId}: available ${available}, requested ${requested}`,
			{ code: "NEGATIVE_STOCK", details: { productId, available, requested } },
		);
	}

	// --- Not found (404) ---

	static notFound(resource: string, id?: string) {
		return new NotFoundError(resource, id);
	}

	// --- Configuration (500) ---

	static configuration(message: string, details?: Record<string, unknown>) {
		return new ConfigurationError(message, { details });
	}

	// --- Conflict (409) ---

	static conflict(message = "Resource conflict", details?: Record<string, unknown>) {
		return new ConflictError(message, { details });
	}

	static idempotencyMismatch(key: string, field: string) {
		return new ConflictError(
			`Idempotency key "${key}" was already used with a different ${field}`,
			{ code: "IDEMPOTENCY_MISMATCH", details: { key, field } },
		);
	}

	static internal(message = "Internal error", cause?: unknown) {
		return new FolioError("INTERNAL", message, { cause, status: 500, transient: false });
	}
}

// =============================================================================
// TAXONOMY
// =============================================================================

type ValidationCode = "VALIDATION_FAILED" | "UNBALANCED_ENTRIES" | "INSUFFICIENT_FUNDS" | "NEGATIVE_STOCK";

export class ValidationError extends FolioError {
	constructor(
		message: string,
		options: {
			code?: ValidationCode;
			reason?: string;
			details?: Record<string, unknown>;
			cause?: unknown;
		} = {},
	) {
		const code = options.code ?? "VALIDATION_FAILED";
		super(code, message, {
			cause: options.cause,
			status: 400,
			transient: BASE_ERROR_CODES[code].transient,
			details: { ...options.details, reason: options.reason ?? code },
		});
		this.name = "ValidationError";
	}
}

export class NotFoundError extends FolioError {
	readonly resource: string;

	constructor(resource: string, id?: string, cause?: unknown) {
		super("NOT_FOUND", id ? `${resource} not found: ${id}` : `${resource} not found`, {
			cause,
			status: 404,
			transient: true,
			details: id ? { resource, id } : { resource },
		});
		this.resource = resource;
		this.name = "NotFoundError";
	}
}

export class ConfigurationError extends FolioError {
	constructor(message: string, options: { details?: Record<string, unknown>; cause?: unknown } = {}) {
		super("CONFIGURATION", message, {
			cause: options.cause,
			status: 500,
			transient: false,
			details: options.details,
		});
		this.name = "ConfigurationError";
	}
}

export class ConflictError extends FolioError {
	constructor(
		message: string,
		options: {
			code?: "CONFLICT" | "IDEMPOTENCY_MISMATCH";
			details?: Record<string, unknown>;
			cause?: unknown;
		} = {},
	) {
		super(options.code ?? "CONFLICT", message, {
			cause: options.cause,
			status: 409,
			transient: false,
			details: options.details,
		});
		this.name = "ConflictError";
	}
}
