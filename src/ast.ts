import type { Environment } from "./environment";

export type Token =
	| { type: "LPAREN" }
	| { type: "RPAREN" }
	| { type: "QUOTE" }
	| { type: "STRING"; value: string }
	| { type: "ATOM"; value: string }
	| { type: "EOF" };

export type PrimOp =
	| "IF" | "DEFINE" | "SET" | "WHILE"
	| "ADD" | "SUB" | "MUL" | "DIV" | "MOD"
	| "GT" | "LT" | "GE" | "LE" | "EQ"
	| "IS_NUM" | "IS_SYM" | "IS_PROC" | "IS_LIST" | "IS_STR" | "IS_BOOL"
	| "SIN" | "COS" | "TAN" | "SQRT" | "LOG" | "MAX" | "MIN" | "ABS"
	| "LAMBDA"
	| "CAR" | "CDR" | "CONS" | "IS_NULL" | "MAP" | "FILTER" | "APPEND"
	| "APPLY";

export type LitValue = "true" | "false" | "nil";

export type Expression =
	| { type: "Int"; value: bigint }
	| { type: "Float"; value: number }
	| { type: "Str"; value: string }
	| { type: "Lit"; value: LitValue }
	| { type: "List"; items: Expression[] }
	| { type: "Symbol"; name: string; bound: Expression | null }
	| { type: "Procedure"; params: string[]; body: Expression; env: Environment }
	| { type: "Primitive"; op: PrimOp; args: Expression[] };

export type ExpressionType = Expression["type"];

export type ExpressionOf<T extends ExpressionType> = Extract<Expression, { type: T }>;

/** Surface names the reader turns into primitive applications. */
export const primitiveTable: ReadonlyMap<string, PrimOp> = new Map<string, PrimOp>([
	["if", "IF"], ["define", "DEFINE"], ["set!", "SET"], ["set", "SET"],
	["lambda", "LAMBDA"], ["while", "WHILE"],
	["+", "ADD"], ["-", "SUB"], ["*", "MUL"], ["/", "DIV"],
	["mod", "MOD"], ["modulo", "MOD"],
	[">", "GT"], ["<", "LT"], [">=", "GE"], ["<=", "LE"], ["=", "EQ"],
	["number?", "IS_NUM"], ["symbol?", "IS_SYM"], ["procedure?", "IS_PROC"],
	["list?", "IS_LIST"], ["string?", "IS_STR"], ["boolean?", "IS_BOOL"],
	["null?", "IS_NULL"],
	["sin", "SIN"], ["cos", "COS"], ["tan", "TAN"], ["sqrt", "SQRT"], ["log", "LOG"],
	["max", "MAX"], ["min", "MIN"], ["abs", "ABS"],
	["car", "CAR"], ["cdr", "CDR"], ["cons", "CONS"],
	["map", "MAP"], ["filter", "FILTER"], ["append", "APPEND"]
]);

const primitiveNames = new Map<PrimOp, string>();
for (const [name, op] of primitiveTable) {
	if (!primitiveNames.has(op)) primitiveNames.set(op, name);
}

export const primitiveName = (op: PrimOp): string => primitiveNames.get(op) ?? op.toLowerCase();

// integers wrap to 64 bits; number arguments must be finite
export const int = (value: number | bigint): Expression => ({
	type: "Int",
	value: BigInt.asIntN(64, typeof value === "bigint" ? value : BigInt(Math.trunc(value)))
});
export const float = (value: number): Expression => ({ type: "Float", value });
export const str = (value: string): Expression => ({ type: "Str", value });
export const list = (items: Expression[]): Expression => ({ type: "List", items });
export const sym = (name: string, bound: Expression | null = null): Expression => ({ type: "Symbol", name, bound });
export const prim = (op: PrimOp, args: Expression[]): Expression => ({ type: "Primitive", op, args });

export const TRUE: Expression = { type: "Lit", value: "true" };
export const FALSE: Expression = { type: "Lit", value: "false" };
export const NIL: Expression = { type: "Lit", value: "nil" };

export const bool = (b: boolean): Expression => (b ? TRUE : FALSE);

export type NumberExpression = ExpressionOf<"Int"> | ExpressionOf<"Float">;

export function isNumber(e: Expression): e is NumberExpression {
	return e.type === "Int" || e.type === "Float";
}

/** Value of a numeric expression as a double. Large integers round. */
export const numericValue = (e: NumberExpression): number => (e.type === "Int" ? Number(e.value) : e.value);
