/**
 * Vendor refresh: regenerate the vendored dependency tree for a source path
 * and commit it when anything changed. Running it twice in a row commits at
 * most once.
 */

import { CommandError, ConfigurationError, PreconditionError } from "./errors.js";
import type { VersionControl } from "./git.js";
import { type CommandRunner, type RunResult, runCommand } from "./process.js";
import type { Logger } from "./utils.js";

export const VENDOR_COMMIT_MESSAGE = "Vendor directory refresh";

export interface Vendorer {
	/** Snapshot dependencies into the vendor directory. */
	vendor(): Promise<void>;
	/** Run code generation against `sourcePath`, resolving imports from the vendor directory. */
	generate(sourcePath: string): Promise<void>;
}

/** Go modules: `go mod vendor` + `go generate -mod=vendor`. */
export function createGoVendorer(cwd: string, runner: CommandRunner = runCommand): Vendorer {
	async function go(args: string[]): Promise<void> {
		const command = `go ${args.join(" ")}`;
		let res: RunResult;
		try {
			res = await runner("go", args, { cwd });
		} catch (err) {
			throw CommandError.notAvailable(command, err instanceof Error ? err.message : String(err));
		}
		if (res.code !== 0) throw CommandError.commandFailed(command, res.stderr || res.stdout, res.code);
	}

	return {
		vendor: () => go(["mod", "vendor"]),
		generate: (sourcePath) => go(["generate", "-mod=vendor", sourcePath]),
	};
}

export interface VendorDeps {
	git: VersionControl;
	vendorer: Vendorer;
	logger: Logger;
}

export async function refreshVendor(
	sourcePath: string | undefined,
	deps: VendorDeps,
): Promise<{ committed: boolean }> {
	const { git, vendorer, logger } = deps;

	if (!sourcePath) {
		throw new ConfigurationError(
			"Provide the directory holding the source code to generate for, e.g. ./pkg/...",
		);
	}
	if (!(await git.isRepoRoot())) throw PreconditionError.notARepo();

	logger.info("🔄 refreshing vendor directory");
	await vendorer.vendor();
	await vendorer.generate(sourcePath);
	await git.addAll();

	if (!(await git.hasStagedChanges())) {
		logger.info("Vendor directory already up to date.");
		return { committed: false };
	}

	await git.commit([VENDOR_COMMIT_MESSAGE]);
	logger.info(`Committed "${VENDOR_COMMIT_MESSAGE}".`);
	return { committed: true };
}
