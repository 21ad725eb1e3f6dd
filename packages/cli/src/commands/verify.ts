import * as p from "@clack/prompts";
import { Command } from "commander";
import pc from "picocolors";
import { resolveConnection, sanitizeErrorMessage, withClient } from "../utils/database.js";
import { runIntegrityChecks } from "../utils/integrity-checks.js";

export const verifyCommand = new Command("verify")
	.description("Verify ledger integrity on a live database")
	.option("--url <url>", "PostgreSQL connection URL (or set DATABASE_URL)")
	.option("--schema <name>", "PostgreSQL schema", "folio")
	.option("-n, --limit <n>", "Offending rows to show per check", "10")
	.action(async (options: { url?: string; schema: string; limit: string }) => {
		p.intro(pc.bgCyan(pc.black(" folio verify ")));

		const connection = resolveConnection(options);
		if (!connection) return;
		const limit = Math.max(1, Number.parseInt(options.limit, 10) || 10);

		try {
			const results = await withClient(connection.url, (client) =>
				runIntegrityChecks(client, connection.schema, limit),
			);

			let failed = 0;
			for (const result of results) {
				if (result.passed) {
					p.log.success(`${pc.green("PASS")} ${result.name}`);
					continue;
				}
				failed++;
				p.log.error(`${pc.red("FAIL")} ${result.name}`);
				for (const line of result.failures) {
					p.log.message(pc.dim(`  ${line}`));
				}
			}

			if (failed > 0) {
				process.exitCode = 1;
				p.outro(pc.red(`${failed} of ${results.length} check(s) failed`));
			} else {
				p.outro(pc.green(`All ${results.length} checks passed`));
			}
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			p.log.error(`${pc.red("Verification failed:")} ${pc.dim(sanitizeErrorMessage(message))}`);
			process.exitCode = 1;
		}
	});
