export type ErrorKind =
	| "UnboundIdentifier"
	| "ArityMismatch"
	| "InvalidOperandType"
	| "DivisionByZero"
	| "InvalidDefineTarget"
	| "InvalidLambdaParams"
	| "InvalidPredicateResult"
	| "UnknownVariantForEval";

export class EvalError extends Error {
	readonly kind: ErrorKind;
	trace: string[] = [];

	constructor(kind: ErrorKind, message: string) {
		super(message);
		this.name = "EvalError";
		this.kind = kind;
	}
}

export class ReadError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ReadError";
	}
}

export type Result<T, E = EvalError> =
	| { ok: true; value: T }
	| { ok: false; error: E };
