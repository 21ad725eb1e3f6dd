// Storage contract
export * from "./db/index.js";

// Errors
export type { BaseErrorCode, FolioErrorCode, FolioErrorOptions, RawErrorCode } from "./error/index.js";
export {
	BASE_ERROR_CODES,
	ConfigurationError,
	ConflictError,
	createErrorCodes,
	FolioError,
	NotFoundError,
	ValidationError,
} from "./error/index.js";

// Type definitions
export * from "./types/index.js";

// Utilities
export * from "./utils/index.js";
