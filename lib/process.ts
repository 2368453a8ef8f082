import { spawn } from "node:child_process";

export interface RunOptions {
	cwd?: string;
	env?: Record<string, string>;
}

export interface RunResult {
	code: number | null;
	stdout: string;
	stderr: string;
}

/** Spawns a command and resolves with its output. Never rejects on a non-zero exit. */
export type CommandRunner = (
	cmd: string,
	args: string[],
	opts?: RunOptions,
) => Promise<RunResult>;

export const runCommand: CommandRunner = (cmd, args, opts = {}) =>
	new Promise((resolve, reject) => {
		const child = spawn(cmd, args, {
			cwd: opts.cwd,
			env: { ...process.env, ...opts.env },
			stdio: ["ignore", "pipe", "pipe"],
		});
		let stdout = "";
		let stderr = "";
		child.stdout.on("data", (d: Buffer) => {
			stdout += d.toString();
		});
		child.stderr.on("data", (d: Buffer) => {
			stderr += d.toString();
		});
		child.on("error", reject);
		child.on("close", (code) => resolve({ code, stdout, stderr }));
	});
