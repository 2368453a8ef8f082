/**
 * In-memory stand-ins for tests: a `VersionControl` that models branches,
 * a detached HEAD, cherry-picks with scripted conflicts and a tiny file
 * tree, plus a scripted prompter and a recording logger.
 */

import type { CommitOptions, VersionControl } from "../git.js";
import type { ConflictChoice, PickChoice, Prompter } from "../prompt.js";
import type { Logger } from "../utils.js";

export interface FakeCommit {
	id: string;
	message: string;
}

type Tree = Record<string, string>;

function sameTree(a: Tree, b: Tree): boolean {
	const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
	for (const k of keys) if (a[k] !== b[k]) return false;
	return true;
}

export class FakeGit implements VersionControl {
	repoRoot = true;
	remotes = new Set<string>(["origin"]);
	/** `remote/branch` -> history, newest first. */
	branches = new Map<string, FakeCommit[]>();
	/** Checked-out history, newest first. */
	head: FakeCommit[] = [];
	/** Upstream ids whose cherry-pick stops on a conflict. */
	conflicts = new Set<string>();
	pickInProgress: string | undefined;
	calls: string[] = [];

	workingTree: Tree = {};
	private stagedTree: Tree = {};
	private headTree: Tree = {};
	private nextId = 1;

	private newId(): string {
		return `f${(this.nextId++).toString(16).padStart(6, "0")}`;
	}

	private find(id: string): FakeCommit {
		for (const history of [this.head, ...this.branches.values()]) {
			const hit = history.find((c) => c.id === id);
			if (hit) return hit;
		}
		throw new Error(`unknown commit ${id}`);
	}

	async isRepoRoot() {
		return this.repoRoot;
	}

	async listRemotes() {
		return [...this.remotes];
	}

	async addRemote(name: string, url: string) {
		this.calls.push(`remote add ${name} ${url}`);
		this.remotes.add(name);
	}

	async setRemoteUrl(name: string, url: string) {
		this.calls.push(`remote set-url ${name} ${url}`);
	}

	async fetch(remote: string) {
		if (!this.remotes.has(remote)) throw new Error(`no such remote ${remote}`);
		this.calls.push(`fetch ${remote}`);
	}

	async checkout(ref: string) {
		const history = this.branches.get(ref);
		if (!history) throw new Error(`unknown ref ${ref}`);
		this.calls.push(`checkout ${ref}`);
		this.head = [...history];
	}

	async hasRemoteBranch(remote: string, branch: string) {
		return this.branches.has(`${remote}/${branch}`);
	}

	async log() {
		return this.head.map((c) => c.id);
	}

	async commitMessage(id: string) {
		return `${this.find(id).message}\n`;
	}

	async commitTitle(id: string) {
		return this.find(id).message.split("\n")[0] ?? "";
	}

	async show(id: string) {
		this.calls.push(`show ${id}`);
		return `commit ${id}\n\n    ${this.find(id).message}\n`;
	}

	async cherryPick(id: string) {
		this.calls.push(`cherry-pick ${id}`);
		if (this.conflicts.has(id)) {
			this.pickInProgress = id;
			return false;
		}
		this.head.unshift({ id: this.newId(), message: this.find(id).message });
		return true;
	}

	async abortCherryPick() {
		if (!this.pickInProgress) return;
		this.calls.push("cherry-pick --abort");
		this.pickInProgress = undefined;
	}

	async commit(paragraphs: string[], opts: CommitOptions = {}) {
		const message = paragraphs.join("\n\n");
		if (opts.amend) {
			if (this.head.length === 0) throw new Error("nothing to amend");
			this.calls.push("commit --amend");
			this.head[0] = { id: this.newId(), message };
			return;
		}
		if (!opts.allowEmpty && sameTree(this.stagedTree, this.headTree)) {
			throw new Error("nothing to commit");
		}
		this.calls.push(opts.allowEmpty ? "commit --allow-empty" : "commit");
		this.head.unshift({ id: this.newId(), message });
		this.headTree = { ...this.stagedTree };
	}

	async headMessage() {
		return this.head[0]?.message.trim() ?? "";
	}

	async addAll() {
		this.calls.push("add --all");
		this.stagedTree = { ...this.workingTree };
	}

	async hasStagedChanges() {
		return !sameTree(this.stagedTree, this.headTree);
	}
}

/** Answers prompts from fixed queues; an exhausted queue is a test bug. */
export function createScriptedPrompter(
	picks: PickChoice[],
	conflicts: ConflictChoice[] = [],
): Prompter & { asked: string[] } {
	const asked: string[] = [];
	return {
		interactive: true,
		asked,
		async choosePick(commit) {
			asked.push(`pick ${commit}`);
			const next = picks.shift();
			if (!next) throw new Error(`unexpected pick prompt for ${commit}`);
			return next;
		},
		async chooseConflict(commit) {
			asked.push(`conflict ${commit}`);
			const next = conflicts.shift();
			if (!next) throw new Error(`unexpected conflict prompt for ${commit}`);
			return next;
		},
	};
}

export function createRecordingLogger(): Logger & { lines: string[] } {
	const lines: string[] = [];
	return {
		lines,
		info: (msg) => lines.push(msg),
		warn: (msg) => lines.push(`WARN ${msg}`),
		error: (msg) => lines.push(`ERROR ${msg}`),
	};
}
