/**
 * Error taxonomy shared by both CLIs. Each error knows the exit code the
 * process should terminate with.
 */

export enum ExitCode {
	Ok = 0,
	Failure = 1,
	Precondition = 2,
	ManualFix = 3,
}

export type SyncErrorCode =
	| "CONFIGURATION"
	| "PRECONDITION"
	| "MANUAL_FIX_REQUIRED"
	| "ABORTED"
	| "COMMAND_FAILED";

export class SyncError extends Error {
	constructor(
		message: string,
		public readonly code: SyncErrorCode,
		public readonly exitCode: ExitCode,
	) {
		super(message);
		this.name = "SyncError";
	}
}

/** Malformed or missing arguments and settings. */
export class ConfigurationError extends SyncError {
	constructor(message: string) {
		super(message, "CONFIGURATION", ExitCode.Failure);
		this.name = "ConfigurationError";
	}
}

/** The working directory or repository is not in the state required to start. */
export class PreconditionError extends SyncError {
	constructor(message: string) {
		super(message, "PRECONDITION", ExitCode.Precondition);
		this.name = "PreconditionError";
	}

	static notARepo(): PreconditionError {
		return new PreconditionError(
			"Not a git repository, or not its top-level directory. Check out the repository and run from its root.",
		);
	}

	static missingBranch(branch: string, org: string, repo: string, role: string): PreconditionError {
		return new PreconditionError(
			`the ${branch} branch does not exist on ${org}/${repo}.\nMake sure the ${role} branch exists before retrying the synchronization.`,
		);
	}
}

/** A cherry-pick conflicted and nobody resolved it. Carries the recovery recipe. */
export class ManualFixRequiredError extends SyncError {
	constructor(
		public readonly commit: string,
		public readonly recipe: string,
	) {
		super(`conflict while cherry-picking ${commit}`, "MANUAL_FIX_REQUIRED", ExitCode.ManualFix);
		this.name = "ManualFixRequiredError";
	}
}

/** The operator chose to quit. */
export class SyncAbortedError extends SyncError {
	constructor(commit: string) {
		super(`synchronization stopped by operator at ${commit}`, "ABORTED", ExitCode.Failure);
		this.name = "SyncAbortedError";
	}
}

/** An external command exited non-zero. */
export class CommandError extends SyncError {
	constructor(
		message: string,
		public readonly command: string,
		public readonly stderr: string,
	) {
		super(message, "COMMAND_FAILED", ExitCode.Failure);
		this.name = "CommandError";
	}

	static commandFailed(command: string, stderr: string, code: number | null): CommandError {
		const detail = stderr.trim() || `exited with code ${code}`;
		return new CommandError(`${command} failed: ${detail}`, command, stderr);
	}

	static notAvailable(command: string, reason: string): CommandError {
		return new CommandError(`${command} could not be started: ${reason}`, command, "");
	}
}
