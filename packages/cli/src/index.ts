#!/usr/bin/env node
import "dotenv/config";
import { readFileSync } from "node:fs";
import { Command } from "commander";
import pc from "picocolors";
import { infoCommand } from "./commands/info.js";
import { migrateCommand } from "./commands/migrate.js";
import { verifyCommand } from "./commands/verify.js";
import { sanitizeErrorMessage } from "./utils/database.js";

process.on("SIGINT", () => process.exit(0));
process.on("SIGTERM", () => process.exit(0));

function readVersion(): string {
	const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
	if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
		return pkg.version;
	}
	return "0.0.0";
}

const cliVersion = readVersion();

const BANNER = `
  ${pc.bold(pc.cyan("folio"))} ${pc.dim(`v${cliVersion}`)}
  ${pc.dim("Double-entry ledger for ERP back ends")}
`;

const program = new Command()
	.name("folio")
	.description("CLI for folio: schema migrations and ledger integrity checks")
	.version(cliVersion, "-v, --version")
	.action(() => {
		console.log(BANNER);
		program.help();
	});

program.addCommand(migrateCommand);
program.addCommand(verifyCommand);
program.addCommand(infoCommand);

program.exitOverride();

try {
	await program.parseAsync();
} catch (error) {
	if (error instanceof Error && "code" in error) {
		if (error.code === "commander.helpDisplayed" || error.code === "commander.version") {
			process.exit(0);
		}
	}
	const message = error instanceof Error ? error.message : String(error);
	console.error(pc.red(sanitizeErrorMessage(message)));
	process.exit(1);
}
