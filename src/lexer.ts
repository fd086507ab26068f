import { Token } from "./ast";
import { ReadError } from "./errors";

export function lex(input: string): Token[] {
	const tokens: Token[] = [];
	let i = 0;

	const isSpace = (c: string) => /\s/.test(c);
	const isDelimiter = (c: string) =>
		isSpace(c) || c === "(" || c === ")" || c === "'" || c === "\"" || c === ";";

	while (i < input.length) {
		const ch = input[i];

		if (isSpace(ch)) {
			i++;
			continue;
		}

		if (ch === ";") {
			while (i < input.length && input[i] !== "\n") i++;
			continue;
		}

		if (ch === "(") {
			tokens.push({ type: "LPAREN" });
			i++;
			continue;
		}

		if (ch === ")") {
			tokens.push({ type: "RPAREN" });
			i++;
			continue;
		}

		if (ch === "'") {
			tokens.push({ type: "QUOTE" });
			i++;
			continue;
		}

		if (ch === "\"") {
			let j = i + 1;
			let buf = "";
			let closed = false;
			while (j < input.length) {
				const c = input[j];
				if (c === "\\") {
					if (j + 1 >= input.length) break;
					const n = input[j + 1];
					if (n === "n") buf += "\n";
					else if (n === "t") buf += "\t";
					else if (n === "r") buf += "\r";
					else buf += n;
					j += 2;
					continue;
				}
				if (c === "\"") { closed = true; j++; break; }
				buf += c;
				j++;
			}
			if (!closed) throw new ReadError("unterminated string literal");
			tokens.push({ type: "STRING", value: buf });
			i = j;
			continue;
		}

		const start = i;
		while (i < input.length && !isDelimiter(input[i])) i++;
		tokens.push({ type: "ATOM", value: input.slice(start, i) });
	}

	tokens.push({ type: "EOF" });
	return tokens;
}
