import {
	bool,
	Expression,
	ExpressionOf,
	ExpressionType,
	float,
	int,
	isNumber,
	list,
	NIL,
	NumberExpression,
	numericValue,
	PrimOp,
	primitiveName
} from "./ast";
import { EvalError } from "./errors";

export type Builtins = {
	[op in PrimOp]?: (...args: Expression[]) => Expression;
};

const kindNames: Record<ExpressionType, string> = {
	Int: "integer",
	Float: "float",
	Str: "string",
	Lit: "literal",
	List: "list",
	Symbol: "symbol",
	Procedure: "procedure",
	Primitive: "primitive"
};

export const kindOf = (value: Expression): string => kindNames[value.type];

export function expectArity(op: PrimOp, args: readonly unknown[], count: number): void {
	if (args.length !== count) {
		throw new EvalError(
			"ArityMismatch",
			`${primitiveName(op)}: expected ${count} argument(s), got ${args.length}`
		);
	}
}

function expectNumber(value: Expression, op: PrimOp): NumberExpression {
	if (isNumber(value)) return value;
	throw new EvalError("InvalidOperandType", `${primitiveName(op)}: expected a number, got ${kindOf(value)}`);
}

const toNumber = (value: Expression, op: PrimOp): number => numericValue(expectNumber(value, op));

/** Items of a list operand; `nil` counts as the empty list. */
export const asItems = (value: Expression, op: PrimOp): Expression[] => {
	if (value.type === "List") return value.items;
	if (value.type === "Lit" && value.value === "nil") return [];
	throw new EvalError("InvalidOperandType", `${primitiveName(op)}: expected a list, got ${kindOf(value)}`);
};

type IntExpression = ExpressionOf<"Int">;

const isInt = (n: NumberExpression): n is IntExpression => n.type === "Int";

const INT64_BOUND = 2 ** 63;

// integral float results of + and * collapse back to integers when they fit
const demote = (n: number): Expression =>
	Number.isInteger(n) && n >= -INT64_BOUND && n < INT64_BOUND ? int(n) : float(n);

const isZero = (value: Expression) => isNumber(value) && numericValue(value) === 0;

/** Sign of `a - b`; NaN when either side is NaN. Integer pairs compare exactly. */
function order(a: NumberExpression, b: NumberExpression): number {
	if (isInt(a) && isInt(b)) return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
	const x = numericValue(a);
	const y = numericValue(b);
	if (x < y) return -1;
	if (x > y) return 1;
	return x === y ? 0 : NaN;
}

function compare(op: PrimOp, test: (ordering: number) => boolean) {
	return (...args: Expression[]) => {
		expectArity(op, args, 2);
		return bool(test(order(expectNumber(args[0], op), expectNumber(args[1], op))));
	};
}

function unaryMath(op: PrimOp, fn: (n: number) => number) {
	return (...args: Expression[]) => {
		expectArity(op, args, 1);
		return float(fn(toNumber(args[0], op)));
	};
}

function typePredicate(op: PrimOp, test: (value: Expression) => boolean) {
	return (...args: Expression[]) => {
		expectArity(op, args, 1);
		return bool(test(args[0]));
	};
}

export const builtins: Builtins = {
	ADD(...args) {
		const nums = args.map(arg => expectNumber(arg, "ADD"));
		const ints = nums.filter(isInt);
		if (ints.length === nums.length) return int(ints.reduce((sum, n) => sum + n.value, 0n));
		return demote(nums.reduce((sum, n) => sum + numericValue(n), 0));
	},

	SUB(...args) {
		expectArity("SUB", args, 2);
		const a = expectNumber(args[0], "SUB");
		const b = expectNumber(args[1], "SUB");
		if (isInt(a) && isInt(b)) return int(a.value - b.value);
		return float(numericValue(a) - numericValue(b));
	},

	MUL(...args) {
		const nums = args.map(arg => expectNumber(arg, "MUL"));
		const ints = nums.filter(isInt);
		if (ints.length === nums.length) return int(ints.reduce((product, n) => product * n.value, 1n));
		return demote(nums.reduce((product, n) => product * numericValue(n), 1));
	},

	DIV(...args) {
		expectArity("DIV", args, 2);
		if (isZero(args[1])) throw new EvalError("DivisionByZero", "/: division by zero");
		const a = expectNumber(args[0], "DIV");
		const b = expectNumber(args[1], "DIV");
		if (isInt(a) && isInt(b)) return int(a.value / b.value);
		return float(numericValue(a) / numericValue(b));
	},

	MOD(...args) {
		expectArity("MOD", args, 2);
		const [a, b] = args;
		if (isZero(b)) throw new EvalError("DivisionByZero", "mod: division by zero");
		if (a.type !== "Int" || b.type !== "Int") {
			throw new EvalError("InvalidOperandType", `mod: expected two integers, got ${kindOf(a)} and ${kindOf(b)}`);
		}
		return int(a.value % b.value);
	},

	GT: compare("GT", o => o > 0),
	LT: compare("LT", o => o < 0),
	GE: compare("GE", o => o >= 0),
	LE: compare("LE", o => o <= 0),

	EQ(...args) {
		expectArity("EQ", args, 2);
		const [a, b] = args;
		if (isNumber(a) && isNumber(b)) return bool(order(a, b) === 0);
		if (a.type === "Str" && b.type === "Str") return bool(a.value === b.value);
		if (a.type === "Lit" && b.type === "Lit") return bool(a.value === b.value);
		throw new EvalError("InvalidOperandType", `=: cannot compare ${kindOf(a)} with ${kindOf(b)}`);
	},

	IS_NUM: typePredicate("IS_NUM", isNumber),
	IS_SYM: typePredicate("IS_SYM", v => v.type === "Symbol"),
	IS_PROC: typePredicate("IS_PROC", v => v.type === "Procedure"),
	IS_LIST: typePredicate("IS_LIST", v => v.type === "List"),
	IS_STR: typePredicate("IS_STR", v => v.type === "Str"),
	IS_BOOL: typePredicate("IS_BOOL", v => v.type === "Lit" && v.value !== "nil"),
	IS_NULL: typePredicate("IS_NULL", v =>
		(v.type === "List" && v.items.length === 0) || (v.type === "Lit" && v.value === "nil")),

	SIN: unaryMath("SIN", Math.sin),
	COS: unaryMath("COS", Math.cos),
	TAN: unaryMath("TAN", Math.tan),
	SQRT: unaryMath("SQRT", Math.sqrt),
	LOG: unaryMath("LOG", Math.log),

	ABS(...args) {
		expectArity("ABS", args, 1);
		const a = expectNumber(args[0], "ABS");
		if (isInt(a)) return int(a.value < 0n ? -a.value : a.value);
		return float(Math.abs(a.value));
	},

	MAX(...args) {
		expectArity("MAX", args, 2);
		const [a, b] = args;
		return order(expectNumber(a, "MAX"), expectNumber(b, "MAX")) >= 0 ? a : b;
	},

	MIN(...args) {
		expectArity("MIN", args, 2);
		const [a, b] = args;
		return order(expectNumber(a, "MIN"), expectNumber(b, "MIN")) <= 0 ? a : b;
	},

	CDR(...args) {
		expectArity("CDR", args, 1);
		const items = asItems(args[0], "CDR");
		if (items.length < 2) return NIL;
		return list(items.slice(1));
	},

	CONS(...args) {
		expectArity("CONS", args, 2);
		const [head, tail] = args;
		if (head.type === "List") {
			throw new EvalError("InvalidOperandType", "cons: first argument must not be a list");
		}
		return list([head, ...asItems(tail, "CONS")]);
	},

	APPEND(...args) {
		expectArity("APPEND", args, 2);
		return list([...asItems(args[0], "APPEND"), ...asItems(args[1], "APPEND")]);
	}
};
