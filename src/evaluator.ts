import type { Env } from "./environment";
import { RuntimeError } from "./errors";
import { nil, Procedure, render, Value } from "./values";

export function evaluateSequence(values: Value[], env: Env): Value {
	let result = nil();
	for (const value of values) {
		result = evaluate(value, env);
	}
	return result;
}

export function evaluate(value: Value, env: Env): Value {
	switch (value.type) {
		case "Symbol": return env.get(value.name);
		case "Integer":
		case "Boolean":
		case "String":
		case "Procedure":
			return value;
		case "List":
			if (value.items.length === 0) return value;
			return evaluateExpression(value.items, env);
	}
}

const describeForm = (items: Value[]): string => {
	const head = items[0];
	if (head.type === "Symbol") return `(${head.name})`;
	return `(${render(head)})`;
};

/**
 * Evaluate the operator and hand the operands, unevaluated, to the procedure.
 * Each procedure decides for itself which operands get evaluated.
 */
export function evaluateExpression(items: Value[], env: Env): Value {
	if (items.length === 0) throw new RuntimeError("Can't evaluate an empty expression");
	try {
		const operator = evaluate(items[0], env);
		if (operator.type !== "Procedure") {
			throw new RuntimeError(`First element of an expression must be a procedure: ${render(operator)}`);
		}
		return apply(operator.procedure, items.slice(1), env);
	} catch (e) {
		if (e instanceof RuntimeError) e.trace.unshift(describeForm(items));
		throw e;
	}
}

export function apply(procedure: Procedure, args: Value[], callerEnv: Env): Value {
	switch (procedure.kind) {
		case "Native":
			return procedure.operation(args, callerEnv);
		case "Scheme": {
			const { params, body, env } = procedure;
			if (params.length !== args.length) {
				throw new RuntimeError(`Must supply exactly ${params.length} argument(s) to function, got ${args.length}`);
			}
			// operands are evaluated in the caller's scope, then bound in a fresh child of the closure's scope
			const scope = env.child();
			params.forEach((name, idx) => {
				scope.bind(name, evaluate(args[idx], callerEnv));
			});
			return evaluateSequence(body, scope);
		}
	}
}
