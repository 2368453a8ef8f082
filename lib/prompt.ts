/**
 * Operator choices during a sync. The orchestrator only sees `Prompter`;
 * the terminal implementation reads single keystrokes.
 */

import { type Key, emitKeypressEvents } from "node:readline";

export type PickChoice = "cherry-pick" | "skip" | "later" | "quit";
export type ConflictChoice = "skip" | "later" | "manual";

export interface Prompter {
	readonly interactive: boolean;
	choosePick(commit: string, details: string): Promise<PickChoice>;
	chooseConflict(commit: string): Promise<ConflictChoice>;
}

// --- Non-interactive ---

export function createAutoPrompter(): Prompter {
	return {
		interactive: false,
		async choosePick() {
			return "cherry-pick";
		},
		async chooseConflict() {
			return "manual";
		},
	};
}

// --- Keystroke ---

export interface KeyInput extends NodeJS.ReadableStream {
	isTTY?: boolean;
	readableEnded?: boolean;
	setRawMode?(mode: boolean): unknown;
}

export interface KeystrokePrompterOpts {
	input: KeyInput;
	output: NodeJS.WritableStream;
	/** 0 waits forever; otherwise silence resolves to "later". */
	timeoutMs?: number;
}

const PICK_KEYS: Record<string, PickChoice> = {
	c: "cherry-pick",
	s: "skip",
	l: "later",
	q: "quit",
};

const CONFLICT_KEYS: Record<string, ConflictChoice> = {
	s: "skip",
	l: "later",
	q: "manual",
};

export function createKeystrokePrompter(opts: KeystrokePrompterOpts): Prompter {
	const { input, output } = opts;
	const timeoutMs = opts.timeoutMs ?? 0;

	function readKey<T extends string>(
		keys: Record<string, T>,
		onInterrupt: T,
		fallback: T,
	): Promise<T> {
		return new Promise((resolve) => {
			emitKeypressEvents(input);
			const raw = input.isTTY === true && typeof input.setRawMode === "function";
			if (raw) input.setRawMode?.(true);

			let timer: NodeJS.Timeout | undefined;

			const finish = (choice: T, echo: string) => {
				if (timer) clearTimeout(timer);
				input.removeListener("keypress", onKey);
				input.removeListener("end", onClosed);
				input.removeListener("close", onClosed);
				if (raw) input.setRawMode?.(false);
				input.pause();
				output.write(`${echo}\n`);
				resolve(choice);
			};

			const onKey = (str: string | undefined, key: Key | undefined) => {
				if (key?.ctrl && key.name === "c") {
					finish(onInterrupt, "^C");
					return;
				}
				const pressed = str?.toLowerCase();
				if (!pressed || !Object.hasOwn(keys, pressed)) return;
				finish(keys[pressed], pressed);
			};

			// No more keys can arrive once the input is gone
			const onClosed = () => finish(fallback, "(input closed, leaving for later)");

			if (input.readableEnded) {
				onClosed();
				return;
			}

			input.on("keypress", onKey);
			input.once("end", onClosed);
			input.once("close", onClosed);
			input.resume();
			if (timeoutMs > 0) {
				timer = setTimeout(() => finish(fallback, "(no answer, leaving for later)"), timeoutMs);
			}
		});
	}

	return {
		interactive: true,

		choosePick(commit, details) {
			output.write(`${details.trimEnd()}\n\n`);
			output.write(
				`What do you want to do with ${commit}? c) cherry-pick it, s) skip it for good, l) leave it for later, q) quit `,
			);
			return readKey(PICK_KEYS, "quit", "later");
		},

		chooseConflict(commit) {
			output.write(`Cannot apply ${commit} cleanly, there is a conflict.\n`);
			output.write("What do you want to do? s) skip it for good, l) leave it for later, q) quit and fix by hand ");
			return readKey(CONFLICT_KEYS, "manual", "later");
		},
	};
}
