import type { ASTNode } from "./ast";
import { createRootEnv } from "./builtins";
import { RuntimeError, SchemeSyntaxError } from "./errors";
import { evaluateSequence } from "./evaluator";
import { lex } from "./lexer";
import { parse } from "./parser";
import { fromNodes, render, Value } from "./values";

export interface RunOptions {
	/** Append the chain of forms a runtime error unwound through. */
	trace?: boolean;
}

export type Replier = (text: string) => void;

/**
 * Evaluate a parsed program in a fresh root scope and return the value of its
 * last expression. Throws the first RuntimeError raised.
 */
export function interpret(nodes: ASTNode[]): Value {
	return evaluateSequence(fromNodes(nodes), createRootEnv());
}

export function run(src: string): Value {
	return interpret(parse(lex(src)).body);
}

export function formatError(e: RuntimeError | SchemeSyntaxError, options: RunOptions = {}): string {
	const lines = [`sapling error: ${e.name}: ${e.message}`];
	if (options.trace && e instanceof RuntimeError && e.trace.length > 0) {
		lines.push(`Trace: ${e.trace.join(" > ")}`);
	}
	return lines.join("\n");
}

/**
 * Run a program and report through `reply`. Returns true on success.
 * Errors other than syntax and runtime errors are not ours and propagate.
 */
export function runSapling(src: string, reply: Replier, options: RunOptions = {}): boolean {
	let value: Value;
	try {
		value = run(src);
	} catch (e) {
		if (e instanceof RuntimeError || e instanceof SchemeSyntaxError) {
			reply(formatError(e, options));
			return false;
		}
		throw e;
	}

	reply(render(value));
	return true;
}
