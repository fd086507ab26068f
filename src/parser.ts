import {
	Expression,
	FALSE,
	float,
	int,
	list,
	NIL,
	prim,
	primitiveTable,
	str,
	sym,
	Token,
	TRUE
} from "./ast";
import { ReadError } from "./errors";

const INT_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.\d*|\.\d+|\d+)(e[+-]?\d+)?$/i;

const specialFloats: ReadonlyMap<string, number> = new Map([
	["+inf.0", Infinity],
	["-inf.0", -Infinity],
	["+nan.0", NaN]
]);

export function parseAtom(text: string): Expression {
	if (INT_RE.test(text)) {
		const n = BigInt(text);
		// literals outside 64 bits read as floats
		return BigInt.asIntN(64, n) === n ? int(n) : float(Number(text));
	}
	if (FLOAT_RE.test(text)) return float(Number(text));
	const special = specialFloats.get(text);
	if (special !== undefined) return float(special);
	if (text === "#t") return TRUE;
	if (text === "#f") return FALSE;
	if (text === "nil") return NIL;
	return sym(text);
}

function createReader(tokens: Token[]) {
	let pos = 0;
	const peek = () => tokens[pos];
	const consume = () => tokens[pos++];

	function unexpected(t: Token): never {
		if (t.type === "EOF") throw new ReadError("unexpected end of input");
		if (t.type === "RPAREN") throw new ReadError("unexpected ')'");
		throw new ReadError(`unexpected token: ${t.type}`);
	}

	// Quoted data: identifiers read as strings, nothing becomes a primitive.
	function parseDatum(): Expression {
		const t = consume();
		switch (t.type) {
			case "QUOTE": return parseDatum();
			case "STRING": return str(t.value);
			case "ATOM": {
				const atom = parseAtom(t.value);
				return atom.type === "Symbol" ? str(atom.name) : atom;
			}
			case "LPAREN": {
				const items: Expression[] = [];
				while (peek().type !== "RPAREN") {
					if (peek().type === "EOF") throw new ReadError("unterminated list");
					items.push(parseDatum());
				}
				consume();
				return list(items);
			}
			default: return unexpected(t);
		}
	}

	// A bare identifier in name position of define/set! becomes the name string.
	function parseName(): Expression {
		const t = peek();
		if (t.type === "ATOM") {
			const atom = parseAtom(t.value);
			if (atom.type === "Symbol") {
				consume();
				return str(atom.name);
			}
		}
		return parseExpr();
	}

	function parseRest(): Expression[] {
		const items: Expression[] = [];
		while (peek().type !== "RPAREN") {
			if (peek().type === "EOF") throw new ReadError("unterminated list");
			items.push(parseExpr());
		}
		consume();
		return items;
	}

	function parseForm(): Expression {
		const head = peek();
		if (head.type === "EOF") throw new ReadError("unterminated list");
		if (head.type === "RPAREN") {
			consume();
			return list([]);
		}

		const op = head.type === "ATOM" ? primitiveTable.get(head.value) : undefined;
		if (op === undefined) {
			const callee = parseExpr();
			return prim("APPLY", [callee, ...parseRest()]);
		}

		consume();
		if ((op === "DEFINE" || op === "SET") && peek().type !== "RPAREN") {
			const name = parseName();
			return prim(op, [name, ...parseRest()]);
		}
		if (op === "LAMBDA" && peek().type === "LPAREN") {
			const params = parseDatum();
			return prim(op, [params, ...parseRest()]);
		}
		return prim(op, parseRest());
	}

	function parseExpr(): Expression {
		const t = consume();
		switch (t.type) {
			case "QUOTE": return parseDatum();
			case "STRING": return str(t.value);
			case "ATOM": return parseAtom(t.value);
			case "LPAREN": return parseForm();
			default: return unexpected(t);
		}
	}

	return {
		parseExpr,
		atEnd: () => peek().type === "EOF"
	};
}

/** Read exactly one form. */
export function read(tokens: Token[]): Expression {
	const reader = createReader(tokens);
	if (reader.atEnd()) throw new ReadError("empty input");
	const form = reader.parseExpr();
	if (!reader.atEnd()) throw new ReadError("unexpected tokens at end");
	return form;
}

export function readAll(tokens: Token[]): Expression[] {
	const reader = createReader(tokens);
	const forms: Expression[] = [];
	while (!reader.atEnd()) forms.push(reader.parseExpr());
	return forms;
}
