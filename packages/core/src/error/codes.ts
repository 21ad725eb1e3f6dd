// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of error codes with HTTP status and default message.
// Plugins extend it by declaring their own codes via `$ERROR_CODES`.

export type RawErrorCode = {
	message: string;
	status: number;
	/**
	 * Whether the condition may change so that retrying can succeed.
	 *
	 * - `true`: e.g. insufficient funds; a later deposit may make the retry pass.
	 * - `false` (default): validation or configuration failures that always fail again.
	 */
	transient?: boolean;
};

export const BASE_ERROR_CODES = {
	// Transient
	INSUFFICIENT_FUNDS: { message: "Insufficient funds", status: 400, transient: true },
	NEGATIVE_STOCK: { message: "Stock quantity cannot go negative", status: 400, transient: true },
	NOT_FOUND: { message: "Resource not found", status: 404, transient: true },

	// Deterministic
	VALIDATION_FAILED: { message: "Validation failed", status: 400, transient: false },
	UNBALANCED_ENTRIES: { message: "Debits and credits do not balance", status: 400, transient: false },
	CONFIGURATION: { message: "Ledger configuration error", status: 500, transient: false },
	CONFLICT: { message: "Resource conflict", status: 409, transient: false },
	IDEMPOTENCY_MISMATCH: {
		message: "Idempotency key was reused with a different request",
		status: 409,
		transient: false,
	},
	INTERNAL: { message: "Internal error", status: 500, transient: false },
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;

// =============================================================================
// PLUGIN ERROR CODE UTILITIES
// =============================================================================

/**
 * Create typed error codes for a plugin. Returns a frozen object.
 *
 * @example
 * ```ts
 * export const APPROVAL_ERROR_CODES = createErrorCodes({
 *   APPROVAL_REQUIRED: { message: "Voucher needs approval", status: 403 },
 * });
 * ```
 */
export function createErrorCodes<T extends Record<string, RawErrorCode>>(codes: T): Readonly<T> {
	return Object.freeze(codes);
}

/**
 * Merge error codes from a plugin tuple with the base error codes.
 */
export type MergeErrorCodes<
	TPlugins extends readonly { $ERROR_CODES?: Record<string, RawErrorCode> }[],
> = BaseErrorCode | ExtractPluginErrorCodes<TPlugins>;

type ExtractPluginErrorCodes<
	TPlugins extends readonly { $ERROR_CODES?: Record<string, RawErrorCode> }[],
> = TPlugins extends readonly [
	infer First,
	...infer Rest extends { $ERROR_CODES?: Record<string, RawErrorCode> }[],
]
	?
			| (First extends { $ERROR_CODES: infer Codes extends Record<string, RawErrorCode> }
					? keyof Codes
					: never)
			| ExtractPluginErrorCodes<Rest>
	: never;
