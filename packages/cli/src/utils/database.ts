// =============================================================================
// Database access for the CLI commands
// =============================================================================

import * as p from "@clack/prompts";
import pg, { type Client } from "pg";
import pc from "picocolors";
import type { ExistingSchema } from "./ddl.js";

export interface QueryResultLike {
	rows: Record<string, unknown>[];
}

/** The part of `pg.Client` the commands use. */
export interface Queryable {
	query(text: string, values?: unknown[]): Promise<QueryResultLike>;
}

export interface ConnectionOptions {
	url?: string;
	schema: string;
}

const SCHEMA_NAME = /^[a-z_][a-z0-9_]*$/;

/**
 * Resolve the connection URL from `--url` or `DATABASE_URL` and validate the
 * schema name. Logs and sets the exit code when either is unusable.
 */
export function resolveConnection(options: ConnectionOptions): { url: string; schema: string } | null {
	const url = options.url ?? process.env.DATABASE_URL;
	if (!url) {
		p.log.error(`${pc.red("No DATABASE_URL")} ${pc.dim("set DATABASE_URL or use --url")}`);
		process.exitCode = 1;
		return null;
	}
	if (!SCHEMA_NAME.test(options.schema)) {
		p.log.error(`${pc.red("Invalid schema")} ${pc.dim(`"${options.schema}" is not a lowercase identifier`)}`);
		process.exitCode = 1;
		return null;
	}
	return { url, schema: options.schema };
}

/** Connect, run `fn`, and always close the client. */
export async function withClient<T>(url: string, fn: (client: Client) => Promise<T>): Promise<T> {
	const client = new pg.Client({ connectionString: url });
	await client.connect();
	try {
		return await fn(client);
	} finally {
		await client.end();
	}
}

export async function readExistingSchema(client: Queryable, schema: string): Promise<ExistingSchema> {
	const columns = await client.query(
		"SELECT table_name, column_name FROM information_schema.columns WHERE table_schema = $1",
		[schema],
	);
	const indexes = await client.query("SELECT indexname FROM pg_indexes WHERE schemaname = $1", [schema]);

	const tables = new Map<string, Set<string>>();
	for (const row of columns.rows) {
		const table = String(row.table_name);
		const set = tables.get(table) ?? new Set<string>();
		set.add(String(row.column_name));
		tables.set(table, set);
	}
	return { tables, indexes: new Set(indexes.rows.map((row) => String(row.indexname))) };
}

/** Hide credentials in connection strings and key=value pairs. */
export function sanitizeErrorMessage(message: string): string {
	return message
		.replace(/postgres(ql)?:\/\/[^\s]+/gi, "postgres://***")
		.replace(/(password|token|secret|key)[=:]\s*\S+/gi, "$1=***");
}
