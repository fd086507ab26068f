/**
 * Line-oriented REPL state: buffers input until parentheses balance, keeps
 * one global environment across inputs, and turns every reply into lines to
 * print. Errors are reported and the session keeps going.
 */

import { Environment } from "./environment";
import { formatError, runSource, RunOptions } from "./pocketscheme";

export type SessionOptions = Omit<RunOptions, "env">;

export interface SessionReply {
	lines: string[];
	quit: boolean;
}

export const HELP_LINES = [
	":help   show this message",
	":env    list global bindings",
	":reset  drop all global bindings",
	":quit   leave the REPL"
];

/** Paren depth of `src`, ignoring strings and comments. Negative when over-closed. */
export function parenDepth(src: string): number {
	let depth = 0;
	let inString = false;
	for (let i = 0; i < src.length; i++) {
		const ch = src[i];
		if (inString) {
			if (ch === "\\") i++;
			else if (ch === "\"") inString = false;
			continue;
		}
		if (ch === "\"") inString = true;
		else if (ch === ";") {
			while (i < src.length && src[i] !== "\n") i++;
		} else if (ch === "(") depth++;
		else if (ch === ")") depth--;
	}
	// an open string keeps the input incomplete
	return inString ? Math.max(depth, 1) : depth;
}

export class Session {
	private env = new Environment();
	private buffer = "";

	constructor(private readonly options: SessionOptions = {}) {}

	get pending(): boolean {
		return this.buffer !== "";
	}

	feed(line: string): SessionReply {
		const trimmed = line.trim();
		if (!this.pending && trimmed.startsWith(":")) return this.command(trimmed);

		this.buffer += (this.buffer ? "\n" : "") + line;
		if (parenDepth(this.buffer) > 0) return { lines: [], quit: false };

		const input = this.buffer.trim();
		this.buffer = "";
		if (input === "") return { lines: [], quit: false };

		const result = runSource(input, { ...this.options, env: this.env });
		const lines = [...result.outputs];
		if (result.error) lines.push(...formatError(result.error, this.options.trace !== false));
		return { lines, quit: false };
	}

	private command(cmd: string): SessionReply {
		switch (cmd) {
			case ":help":
				return { lines: HELP_LINES, quit: false };
			case ":env": {
				const names = this.env.names().sort();
				return { lines: [names.length > 0 ? names.join(" ") : "(no bindings)"], quit: false };
			}
			case ":reset":
				this.env = new Environment();
				return { lines: ["environment reset"], quit: false };
			case ":quit":
				return { lines: [], quit: true };
			default:
				return { lines: [`unknown command: ${cmd}`], quit: false };
		}
	}
}
