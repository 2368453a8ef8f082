/**
 * Version-control collaborator. The sync and vendor flows only talk to the
 * `VersionControl` interface; `createGitCli` backs it with the git binary.
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import { CommandError } from "./errors.js";
import { type CommandRunner, runCommand } from "./process.js";

// --- Interface ---

export interface CommitOptions {
	allowEmpty?: boolean;
	amend?: boolean;
}

export interface VersionControl {
	/** True when the working directory is the top of a checkout. */
	isRepoRoot(): Promise<boolean>;
	listRemotes(): Promise<string[]>;
	/** `remote add -f`: registers and fetches. */
	addRemote(name: string, url: string): Promise<void>;
	setRemoteUrl(name: string, url: string): Promise<void>;
	fetch(remote: string): Promise<void>;
	checkout(ref: string): Promise<void>;
	hasRemoteBranch(remote: string, branch: string): Promise<boolean>;
	/** Abbreviated ids of HEAD's history, newest first. */
	log(): Promise<string[]>;
	/** Full raw message (subject and body). */
	commitMessage(id: string): Promise<string>;
	commitTitle(id: string): Promise<string>;
	/** Human-readable commit header, as `git show -s`. */
	show(id: string): Promise<string>;
	/** Applies a commit onto HEAD. Resolves false when it stopped on a conflict. */
	cherryPick(id: string): Promise<boolean>;
	abortCherryPick(): Promise<void>;
	/** Each paragraph becomes its own `-m`. */
	commit(paragraphs: string[], opts?: CommitOptions): Promise<void>;
	headMessage(): Promise<string>;
	addAll(): Promise<void>;
	hasStagedChanges(): Promise<boolean>;
}

// --- Git CLI ---

export function createGitCli(cwd: string, runner: CommandRunner = runCommand): VersionControl {
	async function exec(args: string[], env?: Record<string, string>) {
		const command = `git ${args.join(" ")}`;
		try {
			return await runner("git", ["-C", cwd, ...args], { env });
		} catch (err) {
			throw CommandError.notAvailable(command, err instanceof Error ? err.message : String(err));
		}
	}

	async function git(args: string[], env?: Record<string, string>): Promise<string> {
		const res = await exec(args, env);
		if (res.code !== 0) {
			throw CommandError.commandFailed(`git ${args.join(" ")}`, res.stderr || res.stdout, res.code);
		}
		return res.stdout;
	}

	async function refExists(ref: string): Promise<boolean> {
		const res = await exec(["rev-parse", "--verify", "--quiet", ref]);
		return res.code === 0;
	}

	return {
		async isRepoRoot() {
			return existsSync(join(cwd, ".git"));
		},

		async listRemotes() {
			const out = await git(["remote"]);
			return out
				.split("\n")
				.map((l) => l.trim())
				.filter(Boolean);
		},

		async addRemote(name, url) {
			await git(["remote", "add", "-f", name, url], { GIT_TERMINAL_PROMPT: "0" });
		},

		async setRemoteUrl(name, url) {
			await git(["remote", "set-url", name, url]);
		},

		async fetch(remote) {
			await git(["fetch", remote], { GIT_TERMINAL_PROMPT: "0" });
		},

		async checkout(ref) {
			await git(["checkout", ref]);
		},

		async hasRemoteBranch(remote, branch) {
			return refExists(`refs/remotes/${remote}/${branch}`);
		},

		async log() {
			const out = await git(["log", "--pretty=format:%h"]);
			return out
				.split("\n")
				.map((l) => l.trim())
				.filter(Boolean);
		},

		async commitMessage(id) {
			return git(["log", "--format=%B", "-n1", id]);
		},

		async commitTitle(id) {
			const out = await git(["show", "--format=%s", "-s", id]);
			return out.trim();
		},

		async show(id) {
			return git(["show", "-s", id]);
		},

		async cherryPick(id) {
			const res = await exec(["cherry-pick", id]);
			if (res.code === 0) return true;
			// A stopped pick leaves CHERRY_PICK_HEAD behind; anything else is a real failure
			if (await refExists("CHERRY_PICK_HEAD")) return false;
			throw CommandError.commandFailed(`git cherry-pick ${id}`, res.stderr || res.stdout, res.code);
		},

		async abortCherryPick() {
			if (!(await refExists("CHERRY_PICK_HEAD"))) return;
			await git(["cherry-pick", "--abort"]);
		},

		async commit(paragraphs, opts = {}) {
			const args = ["commit"];
			if (opts.allowEmpty) args.push("--allow-empty");
			if (opts.amend) args.push("--amend");
			for (const p of paragraphs) args.push("-m", p);
			await git(args);
		},

		async headMessage() {
			const out = await git(["log", "--format=%B", "-n1"]);
			return out.trim();
		},

		async addAll() {
			await git(["add", "--all"]);
		},

		async hasStagedChanges() {
			// No commit yet: anything in the index is new
			if (!(await refExists("HEAD"))) {
				const staged = await git(["ls-files", "--cached"]);
				return staged.trim() !== "";
			}
			const res = await exec(["diff-index", "--quiet", "--cached", "HEAD"]);
			if (res.code === 0) return false;
			if (res.code === 1) return true;
			throw CommandError.commandFailed("git diff-index --quiet --cached HEAD", res.stderr, res.code);
		},
	};
}
