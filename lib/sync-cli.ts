#!/usr/bin/env tsx

/**
 * sync-cherry-pick: bring a downstream repository up to date with the
 * commits of an upstream one. Run from the root of a downstream checkout.
 *
 * Usage:
 *   sync-cherry-pick my-org/my-fork/main -u their-org/project/main
 *   sync-cherry-pick my-org/my-fork/main -u their-org/project/main --no-cherry-pick
 *   sync-cherry-pick my-org/my-fork/main -u their-org/project/main -i
 *
 * Optional settings come from .upstream-sync.yaml and SYNC_* variables
 * (environment or .env).
 */

import { buildSyncConfig, loadSettings, parseSyncArgs, SYNC_USAGE } from "./config.js";
import { ConfigurationError, ExitCode, ManualFixRequiredError, SyncError } from "./errors.js";
import { createGitCli } from "./git.js";
import { createAutoPrompter, createKeystrokePrompter } from "./prompt.js";
import { runSync } from "./sync.js";
import { createLogger, loadEnv } from "./utils.js";

const cwd = process.cwd();
const env: Record<string, string | undefined> = { ...process.env, ...loadEnv(cwd) };
const logger = createLogger({ timestamps: env.SYNC_LOG_TIMESTAMPS === "1" });

try {
	const args = parseSyncArgs(process.argv.slice(2));
	if (args.help) {
		console.log(SYNC_USAGE);
		process.exit(ExitCode.Ok);
	}

	const config = buildSyncConfig(args, loadSettings(cwd, env));
	const prompter = config.interactive
		? createKeystrokePrompter({
				input: process.stdin,
				output: process.stdout,
				timeoutMs: config.promptTimeoutMs,
			})
		: createAutoPrompter();

	await runSync(config, { git: createGitCli(cwd), prompter, logger });
} catch (err) {
	if (!(err instanceof SyncError)) throw err;
	if (err instanceof ManualFixRequiredError) {
		logger.error(err.recipe);
	} else {
		logger.error(`❗ ${err.message}`);
		if (err instanceof ConfigurationError) console.error(SYNC_USAGE);
	}
	process.exit(err.exitCode);
}
