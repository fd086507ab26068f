import { EvalError, ErrorKind } from "../src/errors";

/** Kind of the EvalError `fn` throws, or undefined when it returns. */
export function errorKind(fn: () => unknown): ErrorKind | undefined {
	try {
		fn();
	} catch (e) {
		if (e instanceof EvalError) return e.kind;
		throw e;
	}
	return undefined;
}

export function caught(fn: () => unknown): EvalError {
	try {
		fn();
	} catch (e) {
		if (e instanceof EvalError) return e;
		throw e;
	}
	throw new Error("expected an EvalError");
}
