import { arch, platform, release } from "node:os";
import * as p from "@clack/prompts";
import { Command } from "commander";
import pc from "picocolors";
import { migrationTables } from "./migrate.js";

export interface FolioInfo {
	version: string;
	node: string;
	platform: string;
	tables: Array<{ name: string; columns: number; indexes: number }>;
}

export function collectInfo(version: string): FolioInfo {
	const tables = Object.entries(migrationTables({ auditLog: true })).map(([name, def]) => ({
		name,
		columns: Object.keys(def.columns).length,
		indexes: def.indexes?.length ?? 0,
	}));
	return {
		version,
		node: process.version,
		platform: `${platform()} ${release()} (${arch()})`,
		tables,
	};
}

export const infoCommand = new Command("info")
	.description("Show the folio version and its tables")
	.option("--json", "Output as JSON")
	.action((options: { json?: boolean }) => {
		const info = collectInfo(infoCommand.parent?.version() ?? "unknown");

		if (options.json) {
			process.stdout.write(`${JSON.stringify(info, null, 2)}\n`);
			return;
		}

		p.intro(pc.bgCyan(pc.black(" folio info ")));
		p.log.info(`${pc.bold("folio")}     ${info.version}`);
		p.log.info(`${pc.bold("node")}      ${info.node}`);
		p.log.info(`${pc.bold("platform")}  ${info.platform}`);
		p.log.step(pc.bold(`Tables (${info.tables.length})`));
		for (const table of info.tables) {
			p.log.message(`  ${pc.cyan(table.name.padEnd(22))} ${pc.dim(`${table.columns} columns, ${table.indexes} indexes`)}`);
		}
		p.outro(pc.dim("Run folio migrate to create them."));
	});
