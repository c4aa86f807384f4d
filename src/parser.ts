import { ASTNode, ProgramNode, Token } from "./ast";
import { SchemeSyntaxError } from "./errors";

const readerMacros = {
	QUOTE: "quote",
	QUASIQUOTE: "quasiquote",
	UNQUOTE: "unquote"
} as const;

function sym(name: string): ASTNode {
	return { type: "Identifier", name };
}

export function parse(tokens: Token[]): ProgramNode {
	let pos = 0;
	const peek = (): Token | undefined => tokens[pos];

	function parseExpr(): ASTNode {
		const t = peek();
		if (t === undefined) throw new SchemeSyntaxError("unexpected end of input");
		pos++;

		switch (t.type) {
			case "QUOTE":
			case "QUASIQUOTE":
			case "UNQUOTE": {
				if (peek() === undefined) {
					throw new SchemeSyntaxError(`nothing to ${readerMacros[t.type]}`, t.line, t.column);
				}
				return { type: "List", items: [sym(readerMacros[t.type]), parseExpr()] };
			}
			case "STRING": return { type: "StringLiteral", value: t.value };
			case "IDENT": return sym(t.value);
			case "INTEGER": return { type: "Integer", value: t.value };
			case "BOOLEAN": return { type: "Boolean", value: t.value };
			case "LPAREN": {
				const items: ASTNode[] = [];
				while (true) {
					const p = peek();
					if (p === undefined) throw new SchemeSyntaxError("unterminated list", t.line, t.column);
					if (p.type === "RPAREN") break;
					items.push(parseExpr());
				}
				pos++;
				return { type: "List", items };
			}
			case "RPAREN":
				throw new SchemeSyntaxError("unexpected )", t.line, t.column);
		}
	}

	const body: ASTNode[] = [];
	while (peek() !== undefined) {
		body.push(parseExpr());
	}

	return { type: "Program", body };
}
