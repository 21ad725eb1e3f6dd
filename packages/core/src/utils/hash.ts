import { createHash } from "node:crypto";
import stringify from "safe-stable-stringify";

const deterministicStringify = stringify.configure({ deterministic: true });

/**
 * Serialize with sorted keys, so logically equal payloads produce equal text.
 * `undefined` properties are dropped.
 */
export function stableStringify(value: unknown): string {
	return deterministicStringify(value) ?? "";
}

/** SHA-256 hex digest of a string. */
export function sha256(payload: string): string {
	return createHash("sha256").update(payload).digest("hex");
}

/**
 * Fingerprint a request payload for idempotency checks. Key order does not
 * matter; any change in a value yields a different fingerprint.
 */
export function computeRequestFingerprint(request: Record<string, unknown>): string {
	return sha256(stableStringify(request));
}
