/**
 * Upstream -> downstream synchronization: works out which upstream commits
 * have no counterpart downstream and replays them oldest first.
 */

import { type PickOutcome, processCommit } from "./cherry-pick.js";
import {
	buildDownstreamLog,
	buildUpstreamLog,
	clearSupportFiles,
	missingFrom,
	supportFiles,
	writeLogFile,
} from "./commit-log.js";
import { type SyncConfig, remoteUrl } from "./config.js";
import { PreconditionError } from "./errors.js";
import type { VersionControl } from "./git.js";
import type { Prompter } from "./prompt.js";
import type { Logger } from "./utils.js";

export interface SyncDeps {
	git: VersionControl;
	prompter: Prompter;
	logger: Logger;
}

export interface SyncReport {
	/** Upstream commits with no downstream counterpart, newest first. */
	missingDownstream: string[];
	/** Downstream-only commits, newest first. */
	missingUpstream: string[];
	/** Replay results in the order the commits were processed. */
	outcomes: Array<{ commit: string; outcome: PickOutcome }>;
}

export async function runSync(config: SyncConfig, deps: SyncDeps): Promise<SyncReport> {
	const { git, logger } = deps;
	const { upstream, downstream, upstreamRemote, downstreamRemote } = config;

	if (!(await git.isRepoRoot())) throw PreconditionError.notARepo();

	const files = supportFiles(config.workspace, upstream.repo, downstream.repo);
	if (config.force) clearSupportFiles(files);

	// --- Remotes ---

	const url = remoteUrl(config.remoteBaseUrl, upstream);
	logger.info(`🚜 adding ${upstream.org}/${upstream.repo} remote as ${upstreamRemote}`);
	if ((await git.listRemotes()).includes(upstreamRemote)) {
		await git.setRemoteUrl(upstreamRemote, url);
		await git.fetch(upstreamRemote);
	} else {
		await git.addRemote(upstreamRemote, url);
	}

	if (!(await git.hasRemoteBranch(downstreamRemote, downstream.branch))) {
		throw PreconditionError.missingBranch(downstream.branch, downstream.org, downstream.repo, "downstream");
	}
	if (!(await git.hasRemoteBranch(upstreamRemote, upstream.branch))) {
		throw PreconditionError.missingBranch(upstream.branch, upstream.org, upstream.repo, "upstream");
	}

	// --- Logs ---

	logger.info(`🔎 calculating list of upstream commits (${upstream.repo} ${upstreamRemote}/${upstream.branch})`);
	const upstreamLog = await buildUpstreamLog(git, upstreamRemote, upstream.branch);
	writeLogFile(files.upstreamLog, upstreamLog);

	// Downstream last: replay happens on top of whatever is checked out
	logger.info(`🔎 calculating list of downstream commits (${downstreamRemote}/${downstream.branch})`);
	const downstreamLog = await buildDownstreamLog(
		git,
		downstreamRemote,
		downstream.branch,
		upstream.org,
		upstream.repo,
	);
	writeLogFile(files.downstreamLog, downstreamLog);

	const missingDownstream = missingFrom(upstreamLog, downstreamLog);
	const missingUpstream = missingFrom(downstreamLog, upstreamLog);
	writeLogFile(files.missingDownstream, missingDownstream);
	writeLogFile(files.missingUpstream, missingUpstream);

	const report: SyncReport = { missingDownstream, missingUpstream, outcomes: [] };

	if (missingUpstream.length > 0) {
		logger.info(
			`INFO: ${missingUpstream.length} commits diverged downstream - informational only, no action required`,
		);
	}

	if (missingDownstream.length === 0) {
		logger.info("🍒 no upstream commits missing from the downstream repo.");
		return report;
	}

	logger.info(`INFO: ${missingDownstream.length} commits missing downstream.`);
	const oldestFirst = [...missingDownstream].reverse();

	if (!config.cherryPick) {
		logger.info("🍒 commits not yet ported to the downstream repo (oldest first)");
		logger.info("");
		for (const commit of oldestFirst) logger.info(commit);
		return report;
	}

	logger.info("INFO: cherry-picking the missing commits.");
	const ctx = {
		git,
		prompter: deps.prompter,
		logger,
		upstream,
		downstream,
		remoteBaseUrl: config.remoteBaseUrl,
	};
	for (const commit of oldestFirst) {
		const outcome = await processCommit(ctx, commit);
		report.outcomes.push({ commit, outcome });
	}
	return report;
}
