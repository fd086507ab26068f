#!/usr/bin/env node
import * as fs from "fs";
import * as readline from "readline";
import { formatError, runSource } from "./pocketscheme";
import { HELP_LINES, Session } from "./session";

const USAGE = [
	"usage: pocketscheme [file] [--no-trace]",
	"",
	"  file        evaluate every form in file, stopping at the first error",
	"  --no-trace  omit evaluation traces from error reports",
	"  --help      show this message",
	"",
	"Without a file, starts an interactive session."
].join("\n");

interface CliArgs {
	help: boolean;
	trace: boolean;
	file?: string;
	unknown: string[];
}

function parseArgs(argv: string[]): CliArgs {
	const args: CliArgs = { help: false, trace: true, unknown: [] };
	for (const arg of argv) {
		if (arg === "--help" || arg === "-h") args.help = true;
		else if (arg === "--no-trace") args.trace = false;
		else if (arg.startsWith("-")) args.unknown.push(arg);
		else if (args.file === undefined) args.file = arg;
		else args.unknown.push(arg);
	}
	return args;
}

function runFile(file: string, trace: boolean): number {
	let src: string;
	try {
		src = fs.readFileSync(file, "utf8");
	} catch (e) {
		console.error(`pocketscheme: cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`);
		return 1;
	}

	const result = runSource(src, { trace });
	for (const line of result.outputs) console.log(line);
	if (result.error) {
		for (const line of formatError(result.error, trace)) console.error(line);
		return 1;
	}
	return 0;
}

function startRepl(trace: boolean): void {
	const session = new Session({ trace });
	const rl = readline.createInterface({
		input: process.stdin,
		output: process.stdout,
		prompt: "pocketscheme> "
	});

	console.log("pocketscheme. Type :help for commands.");
	rl.prompt();

	rl.on("line", (line: string) => {
		const reply = session.feed(line);
		for (const out of reply.lines) console.log(out);
		if (reply.quit) {
			rl.close();
			return;
		}
		rl.setPrompt(session.pending ? "... " : "pocketscheme> ");
		rl.prompt();
	});
}

(function () {
	const args = parseArgs(process.argv.slice(2));

	if (args.unknown.length > 0) {
		console.error(`pocketscheme: unexpected argument ${args.unknown[0]}`);
		console.error(USAGE);
		process.exitCode = 2;
		return;
	}

	if (args.help) {
		console.log(USAGE);
		console.log("");
		console.log("Session commands:");
		for (const line of HELP_LINES) console.log(`  ${line}`);
		return;
	}

	if (args.file !== undefined) {
		process.exitCode = runFile(args.file, args.trace);
		return;
	}

	startRepl(args.trace);
})();
