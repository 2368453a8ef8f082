/**
 * Per-commit replay. One upstream commit goes through:
 *
 *   PROMPT -> cherry-pick | skip | later | quit
 *   conflict -> skip (abort first) | later (abort first) | manual fix
 *
 * Every commit this creates downstream carries a provenance annotation, so
 * the next run sees the upstream commit as handled.
 */

import { type RepoRef, remoteUrl } from "./config.js";
import { ManualFixRequiredError, SyncAbortedError } from "./errors.js";
import type { VersionControl } from "./git.js";
import type { Prompter } from "./prompt.js";
import { formatProvenance } from "./provenance.js";
import type { Logger } from "./utils.js";

export type PickOutcome = "picked" | "skipped" | "deferred";

export interface CherryPickContext {
	git: VersionControl;
	prompter: Prompter;
	logger: Logger;
	upstream: RepoRef;
	downstream: RepoRef;
	remoteBaseUrl: string;
}

export async function processCommit(ctx: CherryPickContext, commit: string): Promise<PickOutcome> {
	const { git, prompter, logger, upstream } = ctx;

	const details = prompter.interactive ? await git.show(commit) : "";
	const choice = await prompter.choosePick(commit, details);

	switch (choice) {
		case "quit":
			throw new SyncAbortedError(commit);
		case "later":
			logger.info(`Leaving ${commit} for a later run`);
			return "deferred";
		case "skip":
			await recordSkip(ctx, commit);
			return "skipped";
		case "cherry-pick":
			break;
	}

	logger.info(`🍒 cherry-picking ${commit}`);
	if (await git.cherryPick(commit)) {
		const original = await git.headMessage();
		await git.commit([original, formatProvenance(upstream.org, upstream.repo, commit)], {
			amend: true,
		});
		return "picked";
	}

	const onConflict = await prompter.chooseConflict(commit);
	switch (onConflict) {
		case "later":
			await git.abortCherryPick();
			logger.info(`Conflict on ${commit}, leaving it for a later run`);
			return "deferred";
		case "skip":
			await git.abortCherryPick();
			await recordSkip(ctx, commit);
			return "skipped";
		case "manual":
			throw new ManualFixRequiredError(commit, recoveryRecipe(ctx, commit));
	}
}

/** Empty placeholder commit so the skipped upstream commit is never offered again. */
async function recordSkip(ctx: CherryPickContext, commit: string): Promise<void> {
	const { git, logger, upstream } = ctx;
	const title = await git.commitTitle(commit);
	await git.commit([`skipped: ${title}`, formatProvenance(upstream.org, upstream.repo, commit)], {
		allowEmpty: true,
	});
	logger.info(`Skipped ${commit} for good`);
}

const RECOVERY_REMOTE = "downstream";

/** Step-by-step instructions for resolving a conflicted commit by hand. */
export function recoveryRecipe(
	ctx: Pick<CherryPickContext, "upstream" | "downstream" | "remoteBaseUrl">,
	commit: string,
): string {
	const { upstream, downstream, remoteBaseUrl } = ctx;
	const annotation = formatProvenance(upstream.org, upstream.repo, commit);
	return [
		`❗ Conflict on commit ${commit}. Nothing more can be done automatically: rerun with -i/--interactive or fix it by hand.`,
		"One way to fix it:",
		"",
		`  git clone ${remoteUrl(remoteBaseUrl, upstream)}`,
		`  cd ${upstream.repo}`,
		`  git remote add -f ${RECOVERY_REMOTE} ${remoteUrl(remoteBaseUrl, downstream)}`,
		`  git checkout ${RECOVERY_REMOTE}/${downstream.branch}`,
		`  git cherry-pick ${commit}`,
		"  # resolve the conflict",
		"  git cherry-pick --continue",
		`  git commit --amend -m "$(git log --format=%B -n1)" -m "Conflict fixed manually" -m "${annotation}"`,
		`  git push ${RECOVERY_REMOTE} HEAD:${downstream.branch}`,
		"",
		`The downstream commit carrying the resolution must include this line in its message: "${annotation}"`,
		"",
		`A single empty commit with one "(cherry picked from commit ${upstream.org}/${upstream.repo}@<commit>)" line per upstream commit also works. Use it to mark commits fixed by hand, or to leave a commit out of the synchronization.`,
	].join("\n");
}
