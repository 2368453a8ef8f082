#!/usr/bin/env tsx

/**
 * sync-vendor: refresh the vendor directory of a Go module and commit the
 * result if it changed. Run from the repository root.
 *
 * Usage: sync-vendor <source-path>     e.g. sync-vendor ./pkg/...
 */

import { parseArgs } from "node:util";
import { ConfigurationError, SyncError } from "./errors.js";
import { createGitCli } from "./git.js";
import { createLogger, loadEnv } from "./utils.js";
import { createGoVendorer, refreshVendor } from "./vendor.js";

const USAGE = "Usage: sync-vendor <source-path>";

const cwd = process.cwd();
const env: Record<string, string | undefined> = { ...process.env, ...loadEnv(cwd) };
const logger = createLogger({ timestamps: env.SYNC_LOG_TIMESTAMPS === "1" });

try {
	let sourcePath: string | undefined;
	try {
		const { positionals } = parseArgs({ options: {}, allowPositionals: true, strict: true });
		if (positionals.length > 1) throw new Error(`unexpected argument: ${positionals[1]}`);
		sourcePath = positionals[0];
	} catch (err) {
		throw new ConfigurationError(err instanceof Error ? err.message : String(err));
	}

	await refreshVendor(sourcePath, {
		git: createGitCli(cwd),
		vendorer: createGoVendorer(cwd),
		logger,
	});
} catch (err) {
	if (!(err instanceof SyncError)) throw err;
	logger.error(`❗ ${err.message}`);
	if (err instanceof ConfigurationError) console.error(USAGE);
	process.exit(err.exitCode);
}
