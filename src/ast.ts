export type Position = { line: number; column: number };

export type Token = Position & (
	| { type: "LPAREN" }
	| { type: "RPAREN" }
	| { type: "QUOTE" }
	| { type: "QUASIQUOTE" }
	| { type: "UNQUOTE" }
	| { type: "IDENT"; value: string }
	| { type: "INTEGER"; value: bigint }
	| { type: "BOOLEAN"; value: boolean }
	| { type: "STRING"; value: string }
);

export type ASTNode =
	| { type: "Identifier"; name: string }
	| { type: "Integer"; value: bigint }
	| { type: "Boolean"; value: boolean }
	| { type: "StringLiteral"; value: string }
	| { type: "List"; items: ASTNode[] };

export type ProgramNode = { type: "Program"; body: ASTNode[] };
