/**
 * Errors raised while reading or evaluating a program.
 */

export class RuntimeError extends Error {
	/** Labels of the expressions the error unwound through, outermost first. */
	readonly trace: string[] = [];

	constructor(message: string) {
		super(message);
		this.name = "RuntimeError";
	}
}

export class SchemeSyntaxError extends Error {
	readonly line: number | undefined;
	readonly column: number | undefined;

	constructor(message: string, line?: number, column?: number) {
		const loc = line !== undefined ? ` (line: ${line}, column: ${column ?? 0})` : "";
		super(`${message}${loc}`);
		this.name = "SyntaxError";
		this.line = line;
		this.column = column;
	}
}
