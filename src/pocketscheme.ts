import type { Expression } from "./ast";
import { Environment } from "./environment";
import { ErrorKind, EvalError, ReadError } from "./errors";
import { EvaluateOptions, tryEvaluate } from "./evaluator";
import { lex } from "./lexer";
import { readAll } from "./parser";
import { render, RenderOptions } from "./render";

export interface RunOptions extends EvaluateOptions, RenderOptions {
	/** Global environment to evaluate in; a fresh one when omitted. */
	env?: Environment;
}

export interface RunFailure {
	kind: ErrorKind | "ReadError";
	message: string;
	trace: string[];
}

export interface RunResult {
	outputs: string[];
	/** Value of the last form evaluated successfully. */
	value: Expression | null;
	error?: RunFailure;
}

/** `define` and `set!` forms print nothing. */
export const isSilent = (form: Expression): boolean =>
	form.type === "Primitive" && (form.op === "DEFINE" || form.op === "SET");

export function readSource(src: string): Expression[] {
	return readAll(lex(src));
}

/**
 * Read every form of `src` and evaluate them in order, stopping at the first
 * failure. Read and evaluation errors are reported in the result.
 */
export function runSource(src: string, options: RunOptions = {}): RunResult {
	const env = options.env ?? new Environment();
	const outputs: string[] = [];

	let forms: Expression[];
	try {
		forms = readSource(src);
	} catch (e) {
		if (!(e instanceof ReadError)) throw e;
		return { outputs, value: null, error: { kind: "ReadError", message: e.message, trace: [] } };
	}

	let value: Expression | null = null;
	for (const form of forms) {
		const result = tryEvaluate(form, env, options);
		if (!result.ok) return { outputs, value, error: toFailure(result.error) };
		value = result.value;
		if (!isSilent(form)) outputs.push(render(result.value, options));
	}
	return { outputs, value };
}

function toFailure(e: EvalError): RunFailure {
	return { kind: e.kind, message: e.message, trace: e.trace };
}

export function formatError(failure: RunFailure, showTrace = true): string[] {
	const lines = [`error: ${failure.message}`];
	if (showTrace && failure.trace.length > 0) lines.push(`  trace: ${failure.trace.join(" > ")}`);
	return lines;
}
