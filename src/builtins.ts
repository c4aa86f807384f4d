import { Env } from "./environment";
import { RuntimeError } from "./errors";
import { evaluate } from "./evaluator";
import { quote } from "./quoter";
import { isTruthy, mkBool, mkInt, mkList, mkProcedure, nil, render, Value } from "./values";

export interface Builtins {
	[name: string]: (args: Value[], env: Env) => Value;
}

const plural = (n: number) => (n === 1 ? "argument" : "arguments");

const expectExactly = (name: string, args: Value[], n: number) => {
	if (args.length !== n) {
		throw new RuntimeError(`${name}: expected exactly ${n} ${plural(n)}, got ${args.length}`);
	}
};

const expectAtLeast = (name: string, args: Value[], n: number) => {
	if (args.length < n) {
		throw new RuntimeError(`${name}: expected at least ${n} ${plural(n)}, got ${args.length}`);
	}
};

const expectSymbol = (name: string, v: Value): string => {
	if (v.type !== "Symbol") throw new RuntimeError(`${name}: expected a symbol, got ${render(v)}`);
	return v.name;
};

const toInteger = (name: string, v: Value): bigint => {
	if (v.type !== "Integer") throw new RuntimeError(`${name}: expected an integer, got ${render(v)}`);
	return v.value;
};

function lambda(args: Value[], env: Env): Value {
	expectAtLeast("lambda", args, 2);
	const [paramList, ...body] = args;
	if (paramList.type !== "List") {
		throw new RuntimeError(`lambda: expected a parameter list, got ${render(paramList)}`);
	}
	const params = paramList.items.map(p => expectSymbol("lambda", p));
	return mkProcedure({ kind: "Scheme", params, body, env });
}

export const builtins: Builtins = {
	define(args, env) {
		expectExactly("define", args, 2);
		const name = expectSymbol("define", args[0]);
		// checked before the value is evaluated
		env.assertDefinable(name);
		env.define(name, evaluate(args[1], env));
		return nil();
	},

	"set!": function (args, env) {
		expectExactly("set!", args, 2);
		const name = expectSymbol("set!", args[0]);
		env.assertBound(name);
		env.update(name, evaluate(args[1], env));
		return nil();
	},

	lambda,
	"λ": lambda,

	if(args, env) {
		expectExactly("if", args, 3);
		const cond = evaluate(args[0], env);
		return isTruthy(cond) ? evaluate(args[1], env) : evaluate(args[2], env);
	},

	"+": function (args, env) {
		expectAtLeast("+", args, 2);
		let sum = 0n;
		for (const arg of args) {
			sum = BigInt.asIntN(64, sum + toInteger("+", evaluate(arg, env)));
		}
		return mkInt(sum);
	},

	"-": function (args, env) {
		expectExactly("-", args, 2);
		const left = toInteger("-", evaluate(args[0], env));
		const right = toInteger("-", evaluate(args[1], env));
		return mkInt(left - right);
	},

	and(args, env) {
		let result = mkBool(true);
		for (const arg of args) {
			result = evaluate(arg, env);
			if (!isTruthy(result)) return mkBool(false);
		}
		return result;
	},

	or(args, env) {
		for (const arg of args) {
			const v = evaluate(arg, env);
			if (isTruthy(v)) return v;
		}
		return mkBool(false);
	},

	list(args, env) {
		return mkList(args.map(arg => evaluate(arg, env)));
	},

	quote(args, env) {
		expectExactly("quote", args, 1);
		return quote(args[0], false, env);
	},

	quasiquote(args, env) {
		expectExactly("quasiquote", args, 1);
		return quote(args[0], true, env);
	},

	error(args, env) {
		expectExactly("error", args, 1);
		throw new RuntimeError(render(evaluate(args[0], env)));
	}
};

/** A fresh root scope holding every builtin. Nothing is shared between roots but the native operations. */
export function createRootEnv(): Env {
	const env = new Env();
	for (const [name, operation] of Object.entries(builtins)) {
		env.bind(name, mkProcedure({ kind: "Native", name, operation }));
	}
	return env;
}
