/**
 * Argument parsing and settings for the sync CLI. Everything here runs
 * before the first git command, so bad input never leaves a half-configured
 * repository behind.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { parseArgs } from "node:util";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { defaultWorkspaceDir } from "./utils.js";

// --- Types ---

export interface RepoRef {
	readonly org: string;
	readonly repo: string;
	readonly branch: string;
}

export type RepoRole = "downstream" | "upstream";

export type SyncArgs =
	| { help: true }
	| {
			help: false;
			downstream: RepoRef;
			upstream: RepoRef;
			cherryPick: boolean;
			interactive: boolean;
			force: boolean;
	  };

export interface SyncConfig {
	readonly downstream: RepoRef;
	readonly upstream: RepoRef;
	readonly cherryPick: boolean;
	readonly interactive: boolean;
	readonly force: boolean;
	readonly upstreamRemote: string;
	readonly downstreamRemote: string;
	readonly remoteBaseUrl: string;
	readonly workspace: string;
	readonly promptTimeoutMs: number;
}

export const SYNC_USAGE = `Synchronize a downstream git repository with the changes made in an upstream one.

Usage: sync-cherry-pick <downstream_org/repo/branch> --upstream <upstream_org/repo/branch> [options]

    --no-cherry-pick          Only list the missing commits, do not cherry-pick them
-i, --interactive             Ask what to do with every commit (for local runs)
-u, --upstream                Upstream org/repository/branch to sync from
-f, --force                   Delete support files left by earlier runs first
-h, --help                    Show this help
`;

// --- Repo refs ---

const REPO_REF_RE = /^([^/\s]+)\/([^/\s]+)\/([^\s]+)$/;

const REF_ERRORS: Record<RepoRole, string> = {
	downstream: "you must provide a downstream configuration as <org/repo/branch>",
	upstream: "you must provide an upstream repo as -u <org/repo/branch>",
};

/** Parses `org/repo/branch`. The branch may itself contain slashes. */
export function parseRepoRef(input: string | undefined, role: RepoRole): RepoRef {
	const match = input?.match(REPO_REF_RE);
	const [, org, repo, branch] = match ?? [];
	if (!org || !repo || !branch || branch.startsWith("/") || branch.endsWith("/") || branch.includes("//")) {
		throw new ConfigurationError(REF_ERRORS[role]);
	}
	return Object.freeze({ org, repo, branch });
}

export function remoteUrl(baseUrl: string, ref: RepoRef): string {
	return `${baseUrl.replace(/\/+$/, "")}/${ref.org}/${ref.repo}.git`;
}

// --- CLI args ---

export function parseSyncArgs(argv: string[]): SyncArgs {
	let parsed: ReturnType<typeof parseSyncFlags>;
	try {
		parsed = parseSyncFlags(argv);
	} catch (err) {
		throw new ConfigurationError(err instanceof Error ? err.message : String(err));
	}

	const { values, positionals } = parsed;
	if (values.help) return { help: true };

	if (positionals.length > 1) {
		throw new ConfigurationError(`unknown argument: ${positionals[1]}`);
	}

	const downstream = parseRepoRef(positionals[0], "downstream");
	const upstream = parseRepoRef(values.upstream, "upstream");

	return {
		help: false,
		downstream,
		upstream,
		cherryPick: !values["no-cherry-pick"],
		interactive: values.interactive ?? false,
		force: values.force ?? false,
	};
}

function parseSyncFlags(argv: string[]) {
	return parseArgs({
		args: argv,
		options: {
			upstream: { type: "string", short: "u" },
			"no-cherry-pick": { type: "boolean", default: false },
			interactive: { type: "boolean", short: "i", default: false },
			force: { type: "boolean", short: "f", default: false },
			help: { type: "boolean", short: "h", default: false },
		},
		allowPositionals: true,
		strict: true,
	});
}

// --- Settings ---

export const SETTINGS_FILE = ".upstream-sync.yaml";

export const SettingsSchema = z.object({
	workspace: z.string().min(1).optional(),
	remoteBaseUrl: z.string().url().default("https://github.com"),
	upstreamRemote: z.string().min(1).default("upstream"),
	downstreamRemote: z.string().min(1).default("origin"),
	promptTimeoutSeconds: z.coerce.number().int().nonnegative().default(0),
});

export type Settings = z.infer<typeof SettingsSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads `.upstream-sync.yaml` from `dir` (if present) and applies
 * SYNC_* overrides from `env`.
 */
export function loadSettings(dir: string, env: Record<string, string | undefined>): Settings {
	const input: Record<string, unknown> = {};

	const filePath = join(dir, SETTINGS_FILE);
	if (existsSync(filePath)) {
		let doc: unknown;
		try {
			doc = parseYaml(readFileSync(filePath, "utf-8"));
		} catch (err) {
			throw new ConfigurationError(
				`${SETTINGS_FILE}: ${err instanceof Error ? err.message : String(err)}`,
			);
		}
		if (doc !== null && doc !== undefined) {
			if (!isRecord(doc)) throw new ConfigurationError(`${SETTINGS_FILE} must be a mapping`);
			Object.assign(input, doc);
		}
	}

	if (env.SYNC_WORKSPACE_DIR) input.workspace = env.SYNC_WORKSPACE_DIR;
	if (env.SYNC_REMOTE_BASE_URL) input.remoteBaseUrl = env.SYNC_REMOTE_BASE_URL;
	if (env.SYNC_PROMPT_TIMEOUT) input.promptTimeoutSeconds = env.SYNC_PROMPT_TIMEOUT;

	const result = SettingsSchema.safeParse(input);
	if (!result.success) {
		const issues = result.error.issues
			.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
			.join("; ");
		throw new ConfigurationError(`invalid settings: ${issues}`);
	}
	return result.data;
}

export function buildSyncConfig(
	args: Extract<SyncArgs, { help: false }>,
	settings: Settings,
): SyncConfig {
	return Object.freeze({
		downstream: args.downstream,
		upstream: args.upstream,
		cherryPick: args.cherryPick,
		interactive: args.interactive,
		force: args.force,
		upstreamRemote: settings.upstreamRemote,
		downstreamRemote: settings.downstreamRemote,
		remoteBaseUrl: settings.remoteBaseUrl,
		workspace: settings.workspace ?? defaultWorkspaceDir(),
		promptTimeoutMs: settings.promptTimeoutSeconds * 1000,
	});
}
