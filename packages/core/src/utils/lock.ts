/** Deterministic 32-bit hash, used as a pg_advisory_xact_lock key. */
export function hashLockKey(input: string): number {
	let hash = 0;
	for (let i = 0; i < input.length; i++) {
		const char = input.charCodeAt(i);
		hash = ((hash << 5) - hash + char) | 0;
	}
	return hash;
}

/** Lock key scoped to a tenant: `lockKeyFor("t1", "sequence", "INV")`. */
export function lockKeyFor(tenantId: string, ...parts: string[]): number {
	return hashLockKey([tenantId, ...parts].join(":"));
}
