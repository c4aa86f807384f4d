import type { Env } from "./environment";
import { RuntimeError } from "./errors";
import { evaluate } from "./evaluator";
import { mkList, render, Value } from "./values";

const isUnquote = (v: Value): boolean => v.type === "Symbol" && v.name === "unquote";

/**
 * Quote a value. Plain quote (`quasi` false) never evaluates. Inside a
 * quasiquote, an `(unquote x)` form is replaced by the value of `x` in `env`.
 */
export function quote(value: Value, quasi: boolean, env: Env): Value {
	if (value.type !== "List") return value;

	const [head, ...rest] = value.items;
	if (quasi && head !== undefined && isUnquote(head)) {
		if (rest.length !== 1) {
			throw new RuntimeError(`unquote: expected exactly 1 argument, got ${rest.length}: ${render(value)}`);
		}
		return evaluate(rest[0], env);
	}

	return mkList(value.items.map(item => quote(item, quasi, env)));
}
