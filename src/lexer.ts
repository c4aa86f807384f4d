import { Token } from "./ast";
import { SchemeSyntaxError } from "./errors";

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export function lex(input: string): Token[] {
	const tokens: Token[] = [];
	const chars = Array.from(input);
	let i = 0;
	let line = 1;
	let column = 1;

	const isSpace = (c: string) => /\s/.test(c);
	const isDigit = (c: string | undefined) => c !== undefined && c >= "0" && c <= "9";
	const isIdentStart = (c: string) => /[\p{L}!$%&*/:<=>?_^]/u.test(c);
	const isIdentPart = (c: string) => /[\p{L}0-9!$%&*/:<=>?_^+\-#]/u.test(c);

	function fail(message: string): never {
		throw new SchemeSyntaxError(message, line, column);
	}

	const advance = () => {
		if (chars[i] === "\n") {
			line++;
			column = 1;
		} else {
			column++;
		}
		i++;
	};

	// atoms must be followed by whitespace, a closing paren, a comment or the end of input
	const expectDelimiter = () => {
		const c = chars[i];
		if (c === undefined || c === ")" || c === ";" || isSpace(c)) return;
		fail(`Unexpected character when looking for a delimiter: ${c}`);
	};

	const readNumber = (negative: boolean): bigint => {
		let digits = "";
		while (isDigit(chars[i])) {
			digits += chars[i];
			advance();
		}
		const value = negative ? -BigInt(digits) : BigInt(digits);
		if (value < INT64_MIN || value > INT64_MAX) fail(`Integer literal out of range: ${negative ? "-" : ""}${digits}`);
		return value;
	};

	while (i < chars.length) {
		const ch = chars[i];
		const start = { line, column };

		if (isSpace(ch)) {
			advance();
			continue;
		}

		if (ch === ";") {
			while (i < chars.length && chars[i] !== "\n") advance();
			continue;
		}

		if (ch === "(") {
			tokens.push({ type: "LPAREN", ...start });
			advance();
			continue;
		}

		if (ch === ")") {
			tokens.push({ type: "RPAREN", ...start });
			advance();
			continue;
		}

		if (ch === "'") {
			tokens.push({ type: "QUOTE", ...start });
			advance();
			continue;
		}

		if (ch === "`") {
			tokens.push({ type: "QUASIQUOTE", ...start });
			advance();
			continue;
		}

		if (ch === ",") {
			tokens.push({ type: "UNQUOTE", ...start });
			advance();
			continue;
		}

		if (ch === "+" || ch === "-") {
			advance();
			if (isDigit(chars[i])) {
				tokens.push({ type: "INTEGER", value: readNumber(ch === "-"), ...start });
			} else {
				tokens.push({ type: "IDENT", value: ch, ...start });
			}
			expectDelimiter();
			continue;
		}

		if (ch === "#") {
			advance();
			const flag = chars[i];
			if (flag !== "t" && flag !== "f") {
				fail(`Unexpected character when looking for t/f: ${flag ?? "EOF"}`);
			}
			advance();
			tokens.push({ type: "BOOLEAN", value: flag === "t", ...start });
			expectDelimiter();
			continue;
		}

		if (isDigit(ch)) {
			tokens.push({ type: "INTEGER", value: readNumber(false), ...start });
			expectDelimiter();
			continue;
		}

		if (ch === '"') {
			advance();
			let buf = "";
			while (true) {
				const c = chars[i];
				if (c === undefined) fail("Expected end quote, but found EOF instead");
				if (c === '"') {
					advance();
					break;
				}
				if (c === "\\") {
					advance();
					const n = chars[i];
					if (n === undefined) fail("Expected end quote, but found EOF instead");
					else if (n === "n") buf += "\n";
					else if (n === "t") buf += "\t";
					else if (n === "r") buf += "\r";
					else buf += n;
					advance();
					continue;
				}
				buf += c;
				advance();
			}
			tokens.push({ type: "STRING", value: buf, ...start });
			expectDelimiter();
			continue;
		}

		if (isIdentStart(ch)) {
			let name = "";
			while (i < chars.length && isIdentPart(chars[i])) {
				name += chars[i];
				advance();
			}
			tokens.push({ type: "IDENT", value: name, ...start });
			expectDelimiter();
			continue;
		}

		fail(`Unexpected character: ${ch}`);
	}

	return tokens;
}
