import { existsSync, rmSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import type { VersionControl } from "./git.js";
import { extractProvenance } from "./provenance.js";
import { ensureDir } from "./utils.js";

// --- Support files ---

export interface SupportFiles {
	upstreamLog: string;
	downstreamLog: string;
	missingDownstream: string;
	missingUpstream: string;
}

export function supportFiles(
	workspace: string,
	upstreamRepo: string,
	downstreamRepo: string,
): SupportFiles {
	return {
		upstreamLog: join(workspace, `${upstreamRepo}-upstream.log`),
		downstreamLog: join(workspace, `${downstreamRepo}-downstream.log`),
		missingDownstream: join(workspace, "missing-downstream"),
		missingUpstream: join(workspace, "missing-upstream"),
	};
}

export function clearSupportFiles(files: SupportFiles): void {
	for (const path of Object.values(files)) {
		if (existsSync(path)) rmSync(path);
	}
}

export function writeLogFile(path: string, ids: string[]): void {
	ensureDir(dirname(path));
	writeFileSync(path, ids.map((id) => `${id}\n`).join(""));
}

// --- Logs ---

/** Upstream history as plain ids, newest first. Leaves `remote/branch` checked out. */
export async function buildUpstreamLog(
	git: VersionControl,
	remote: string,
	branch: string,
): Promise<string[]> {
	await git.fetch(remote);
	await git.checkout(`${remote}/${branch}`);
	return git.log();
}

/**
 * Downstream history mapped into upstream ids: a commit carrying provenance
 * annotations for the upstream repo contributes every id it references,
 * anything else contributes its own id.
 */
export async function buildDownstreamLog(
	git: VersionControl,
	remote: string,
	branch: string,
	upstreamOrg: string,
	upstreamRepo: string,
): Promise<string[]> {
	await git.fetch(remote);
	await git.checkout(`${remote}/${branch}`);

	const entries: string[] = [];
	for (const id of await git.log()) {
		const message = await git.commitMessage(id);
		const origins = extractProvenance(message, upstreamOrg, upstreamRepo);
		if (origins.length > 0) entries.push(...origins);
		else entries.push(id);
	}
	return entries;
}

// --- Diff ---

/**
 * Abbreviated ids of one commit can differ in length (git grows them as the
 * repository grows), so a prefix in either direction is a match.
 */
export function idsMatch(a: string, b: string): boolean {
	const x = a.toLowerCase();
	const y = b.toLowerCase();
	if (!x || !y) return false;
	return x.length <= y.length ? y.startsWith(x) : x.startsWith(y);
}

/** Entries of `a` with no match in `b`, in the order of `a`. */
export function missingFrom(a: string[], b: string[]): string[] {
	const exact = new Set(b.map((id) => id.toLowerCase()));
	return a.filter(
		(id) => !exact.has(id.toLowerCase()) && !b.some((other) => idsMatch(id, other)),
	);
}
