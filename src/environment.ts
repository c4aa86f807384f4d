/**
 * Lexical scope. Closures and child scopes hold a reference to the scope they
 * were created in; a scope is never copied, so mutations are seen by every holder.
 */

import { RuntimeError } from "./errors";
import type { Value } from "./values";

export class Env {
	readonly parent?: Env;
	private readonly bindings: Map<string, Value>;

	constructor(parent?: Env) {
		this.parent = parent;
		this.bindings = new Map();
	}

	child(): Env {
		return new Env(this);
	}

	hasOwn(name: string): boolean {
		return this.bindings.has(name);
	}

	has(name: string): boolean {
		if (this.bindings.has(name)) return true;
		return this.parent ? this.parent.has(name) : false;
	}

	/**
	 * Look up a name, walking outward from this scope. The innermost binding wins.
	 */
	lookup(name: string): Value | undefined {
		const value = this.bindings.get(name);
		if (value !== undefined) return value;
		return this.parent?.lookup(name);
	}

	get(name: string): Value {
		const value = this.lookup(name);
		if (value === undefined) throw new RuntimeError(`Identifier not found: ${name}`);
		return value;
	}

	/** Fails when `name` is already bound in this scope. */
	assertDefinable(name: string): void {
		if (this.bindings.has(name)) throw new RuntimeError(`Duplicate define: ${name}`);
	}

	/** Fails when `name` is bound nowhere in the chain. */
	assertBound(name: string): void {
		if (!this.has(name)) throw new RuntimeError(`Can't set! an undefined variable: ${name}`);
	}

	/** Bind a new name in this scope only. Redefinition is an error. */
	define(name: string, value: Value): void {
		this.assertDefinable(name);
		this.bindings.set(name, value);
	}

	/** Bind a name in this scope, replacing any local binding it already has. */
	bind(name: string, value: Value): void {
		this.bindings.set(name, value);
	}

	/** Rebind a name in the scope where it is already bound. */
	update(name: string, value: Value): void {
		if (this.bindings.has(name)) {
			this.bindings.set(name, value);
			return;
		}
		this.assertBound(name);
		this.parent?.update(name, value);
	}
}
