import * as p from "@clack/prompts";
import type { TableDefinition } from "@folio/core";
import { Command } from "commander";
import { auditLog, getFolioTables } from "folio";
import pc from "picocolors";
import { buildMigrationPlan, planIsEmpty, planToStatements, type MigrationPlan } from "../utils/ddl.js";
import { readExistingSchema, resolveConnection, sanitizeErrorMessage, withClient } from "../utils/database.js";

interface MigrateOptions {
	url?: string;
	schema: string;
	dryRun?: boolean;
	yes?: boolean;
	auditLog: boolean;
}

/** Core tables, plus the audit trail table unless it was switched off. */
export function migrationTables(options: { auditLog: boolean }): Record<string, TableDefinition> {
	return getFolioTables({ plugins: options.auditLog ? [auditLog()] : [] });
}

function printPlan(plan: MigrationPlan): void {
	p.log.step(pc.bold("Migration Plan"));
	for (const table of plan.tablesToCreate) {
		p.log.info(
			`  ${pc.green("CREATE")} ${pc.cyan(table.name)} ${pc.dim(`(${Object.keys(table.def.columns).length} columns)`)}`,
		);
	}
	for (const add of plan.columnsToAdd) {
		p.log.info(`  ${pc.yellow("ALTER")}  ${pc.cyan(add.table)} add column ${add.column}`);
	}
	if (plan.indexesToCreate.length > 0) {
		p.log.info(`  ${pc.blue("INDEX")}  ${plan.indexesToCreate.length} index(es) to create`);
	}
}

export const migrateCommand = new Command("migrate")
	.description("Create or extend the folio tables in PostgreSQL")
	.option("--url <url>", "PostgreSQL connection URL (or set DATABASE_URL)")
	.option("--schema <name>", "PostgreSQL schema", "folio")
	.option("--dry-run", "Print the SQL without applying it")
	.option("-y, --yes", "Skip confirmation prompt")
	.option("--no-audit-log", "Leave out the audit_log table")
	.action(async (options: MigrateOptions) => {
		p.intro(pc.bgCyan(pc.black(" folio migrate ")));

		const connection = resolveConnection(options);
		if (!connection) return;
		const tables = migrationTables(options);

		try {
			await withClient(connection.url, async (client) => {
				const s = p.spinner();
				s.start("Inspecting database schema...");
				const existing = await readExistingSchema(client, connection.schema);
				const plan = buildMigrationPlan(tables, existing);
				s.stop("Schema inspected");

				if (planIsEmpty(plan)) {
					p.log.success(`${pc.green("Schema is up to date.")} No changes needed.`);
					p.outro(pc.dim("Database schema matches folio definitions."));
					return;
				}

				printPlan(plan);
				const statements = planToStatements(plan, connection.schema);

				if (options.dryRun) {
					process.stdout.write(`${statements.join("\n\n")}\n`);
					p.outro(pc.dim("Dry run: nothing was applied."));
					return;
				}

				if (!options.yes) {
					const confirmed = await p.confirm({ message: "Apply these changes?" });
					if (p.isCancel(confirmed) || !confirmed) {
						p.cancel("Migration cancelled.");
						return;
					}
				}

				// PostgreSQL DDL is transactional: a failure leaves nothing behind.
				const s2 = p.spinner();
				s2.start(`Applying ${statements.length} statement(s)...`);
				await client.query("BEGIN");
				try {
					for (const statement of statements) {
						await client.query(statement);
					}
					await client.query("COMMIT");
				} catch (error) {
					await client.query("ROLLBACK");
					s2.stop(pc.red("Migration rolled back"));
					throw error;
				}
				s2.stop(`${pc.green("Applied")} ${statements.length} statement(s)`);
				p.outro(pc.green("Migration completed successfully!"));
			});
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			p.log.error(`${pc.red("Migration failed:")} ${pc.dim(sanitizeErrorMessage(message))}`);
			process.exitCode = 1;
		}
	});
