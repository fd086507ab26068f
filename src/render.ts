import type { Expression } from "./ast";

export interface RenderOptions {
	/** Quote and escape strings so the text reads back to the same value. */
	readable?: boolean;
}

const escapeString = (s: string): string =>
	s
		.replace(/\\/g, "\\\\")
		.replace(/"/g, "\\\"")
		.replace(/\n/g, "\\n")
		.replace(/\t/g, "\\t")
		.replace(/\r/g, "\\r");

function renderFloat(n: number): string {
	if (Number.isNaN(n)) return "+nan.0";
	if (n === Infinity) return "+inf.0";
	if (n === -Infinity) return "-inf.0";
	const text = String(n);
	// keep integral floats distinguishable from integers
	return Number.isInteger(n) && !/e/i.test(text) ? `${text}.0` : text;
}

export function render(expr: Expression, options: RenderOptions = {}): string {
	switch (expr.type) {
		case "Int": return String(expr.value);
		case "Float": return renderFloat(expr.value);
		case "Str": return options.readable ? `"${escapeString(expr.value)}"` : expr.value;
		case "Lit":
			if (expr.value === "true") return "#t";
			if (expr.value === "false") return "#f";
			return "()";
		case "List": return `(${expr.items.map(item => render(item, options)).join(" ")})`;
		case "Symbol": return expr.bound ? render(expr.bound, options) : expr.name;
		case "Procedure": return "<closure>";
		case "Primitive":
			switch (expr.op) {
				case "LAMBDA": return "<closure>";
				case "DEFINE":
				case "SET":
					return "";
				default: return "<primitive>";
			}
	}
}
