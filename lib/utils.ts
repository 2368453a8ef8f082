import { existsSync, mkdirSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Reads KEY=VALUE pairs from `<dir>/.env`. Comments, blank lines and an
 * `export ` prefix are skipped; matching surrounding quotes are stripped.
 * A missing file yields no variables.
 */
export function loadEnv(dir: string): Record<string, string> {
	const envPath = join(dir, ".env");
	if (!existsSync(envPath)) return {};

	const vars: Record<string, string> = {};
	for (const line of readFileSync(envPath, "utf-8").split("\n")) {
		const trimmed = line.trim().replace(/^export\s+/, "");
		if (!trimmed || trimmed.startsWith("#")) continue;
		const eq = trimmed.indexOf("=");
		if (eq <= 0) continue;
		vars[trimmed.slice(0, eq).trim()] = unquote(trimmed.slice(eq + 1).trim());
	}
	return vars;
}

function unquote(value: string): string {
	const first = value[0];
	if (value.length >= 2 && (first === '"' || first === "'") && value.endsWith(first)) {
		return value.slice(1, -1);
	}
	return value;
}

/** Default directory for the sync support files. */
export function defaultWorkspaceDir(): string {
	return tmpdir();
}

/** Ensure a directory exists (mkdir -p). */
export function ensureDir(path: string): void {
	if (!existsSync(path)) mkdirSync(path, { recursive: true });
}

// --- Logging ---

export interface Logger {
	info(msg: string): void;
	warn(msg: string): void;
	error(msg: string): void;
}

export function createLogger(opts: { timestamps?: boolean } = {}): Logger {
	const stamp = (msg: string) =>
		opts.timestamps ? `[${new Date().toISOString()}] ${msg}` : msg;
	return {
		info: (msg) => console.log(stamp(msg)),
		warn: (msg) => console.warn(stamp(msg)),
		error: (msg) => console.error(stamp(msg)),
	};
}
