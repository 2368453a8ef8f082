import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	SETTINGS_FILE,
	SettingsSchema,
	buildSyncConfig,
	loadSettings,
	parseRepoRef,
	parseSyncArgs,
	remoteUrl,
} from "./config.js";
import { ConfigurationError } from "./errors.js";

describe("parseRepoRef", () => {
	it("splits org, repo and branch", () => {
		expect(parseRepoRef("my-org/fork/main", "downstream")).toEqual({
			org: "my-org",
			repo: "fork",
			branch: "main",
		});
	});

	it("keeps slashes in the branch", () => {
		expect(parseRepoRef("my-org/fork/release/1.2", "downstream").branch).toBe("release/1.2");
	});

	it.each(["my-org/fork", "my-org//main", "/fork/main", "my-org/fork/", "", "my-org/fork/a//b"])(
		"rejects %j",
		(input) => {
			expect(() => parseRepoRef(input, "downstream")).toThrow(
				"you must provide a downstream configuration as <org/repo/branch>",
			);
		},
	);

	it("names the upstream flag in the upstream error", () => {
		expect(() => parseRepoRef(undefined, "upstream")).toThrow(
			"you must provide an upstream repo as -u <org/repo/branch>",
		);
	});
});

describe("parseSyncArgs", () => {
	it("parses the full flag set", () => {
		expect(
			parseSyncArgs(["my-org/fork/main", "-u", "up-org/project/dev", "--no-cherry-pick", "-i", "-f"]),
		).toEqual({
			help: false,
			downstream: { org: "my-org", repo: "fork", branch: "main" },
			upstream: { org: "up-org", repo: "project", branch: "dev" },
			cherryPick: false,
			interactive: true,
			force: true,
		});
	});

	it("defaults to non-interactive cherry-picking", () => {
		const args = parseSyncArgs(["my-org/fork/main", "--upstream", "up-org/project/main"]);
		expect(args).toMatchObject({ help: false, cherryPick: true, interactive: false, force: false });
	});

	it("returns a help request", () => {
		expect(parseSyncArgs(["--help"])).toEqual({ help: true });
		expect(parseSyncArgs(["my-org/fork/main", "-h"])).toEqual({ help: true });
	});

	it("requires the upstream", () => {
		expect(() => parseSyncArgs(["my-org/fork/main"])).toThrow(
			"you must provide an upstream repo as -u <org/repo/branch>",
		);
	});

	it("rejects a malformed downstream before looking at the upstream", () => {
		expect(() => parseSyncArgs(["my-org/fork", "-u", "up-org/project/main"])).toThrow(
			"you must provide a downstream configuration as <org/repo/branch>",
		);
	});

	it("rejects unknown flags and extra arguments", () => {
		expect(() => parseSyncArgs(["my-org/fork/main", "-u", "up-org/project/main", "--bogus"])).toThrow(
			ConfigurationError,
		);
		expect(() => parseSyncArgs(["my-org/fork/main", "extra", "-u", "up-org/project/main"])).toThrow(
			"unknown argument: extra",
		);
	});
});

describe("remoteUrl", () => {
	it("joins base, org and repo", () => {
		expect(remoteUrl("https://github.com/", { org: "up-org", repo: "project", branch: "main" })).toBe(
			"https://github.com/up-org/project.git",
		);
	});
});

describe("settings", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "config-test-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("uses defaults without a file", () => {
		expect(loadSettings(dir, {})).toEqual({
			remoteBaseUrl: "https://github.com",
			upstreamRemote: "upstream",
			downstreamRemote: "origin",
			promptTimeoutSeconds: 0,
		});
	});

	it("reads the yaml file and lets the environment override it", () => {
		writeFileSync(
			join(dir, SETTINGS_FILE),
			"workspace: /srv/sync\nupstreamRemote: source\npromptTimeoutSeconds: 30\n",
		);
		expect(loadSettings(dir, { SYNC_PROMPT_TIMEOUT: "5", SYNC_REMOTE_BASE_URL: "https://git.example.com" })).toEqual({
			workspace: "/srv/sync",
			remoteBaseUrl: "https://git.example.com",
			upstreamRemote: "source",
			downstreamRemote: "origin",
			promptTimeoutSeconds: 5,
		});
	});

	it("rejects invalid values", () => {
		expect(() => loadSettings(dir, { SYNC_PROMPT_TIMEOUT: "-1" })).toThrow(ConfigurationError);
		expect(() => loadSettings(dir, { SYNC_REMOTE_BASE_URL: "not a url" })).toThrow(/remoteBaseUrl/);
	});

	it("rejects a file that is not a mapping", () => {
		writeFileSync(join(dir, SETTINGS_FILE), "- one\n- two\n");
		expect(() => loadSettings(dir, {})).toThrow(`${SETTINGS_FILE} must be a mapping`);
	});

	it("builds a frozen config", () => {
		const args = parseSyncArgs(["my-org/fork/main", "-u", "up-org/project/main"]);
		if (args.help) throw new Error("unexpected help");
		const config = buildSyncConfig(args, SettingsSchema.parse({ workspace: dir, promptTimeoutSeconds: 2 }));
		expect(config.workspace).toBe(dir);
		expect(config.promptTimeoutMs).toBe(2000);
		expect(Object.isFrozen(config)).toBe(true);
		expect(Object.isFrozen(config.upstream)).toBe(true);
	});
});
