/**
 * Runtime values. Every datum the evaluator touches, including unevaluated
 * code, is one of these.
 */

import type { ASTNode } from "./ast";
import type { Env } from "./environment";

export type Value =
	| { type: "Symbol"; name: string }
	| { type: "Integer"; value: bigint }
	| { type: "Boolean"; value: boolean }
	| { type: "String"; value: string }
	| { type: "List"; items: Value[] }
	| { type: "Procedure"; procedure: Procedure };

/**
 * A native operation receives its operands unevaluated, together with the
 * caller's environment, and decides itself what to evaluate.
 */
export type NativeOperation = (args: Value[], env: Env) => Value;

export type Procedure =
	| { kind: "Native"; name: string; operation: NativeOperation }
	| { kind: "Scheme"; params: string[]; body: Value[]; env: Env };

export const mkSymbol = (name: string): Value => ({ type: "Symbol", name });
export const mkInt = (value: bigint | number): Value => ({ type: "Integer", value: BigInt.asIntN(64, BigInt(value)) });
export const mkBool = (value: boolean): Value => ({ type: "Boolean", value });
export const mkString = (value: string): Value => ({ type: "String", value });
export const mkList = (items: Value[]): Value => ({ type: "List", items });
export const mkProcedure = (procedure: Procedure): Value => ({ type: "Procedure", procedure });

/** The empty list, returned wherever there is no meaningful result. */
export const nil = (): Value => mkList([]);

export const isTruthy = (v: Value): boolean => !(v.type === "Boolean" && !v.value);

export function fromNode(node: ASTNode): Value {
	switch (node.type) {
		case "Identifier": return mkSymbol(node.name);
		case "Integer": return mkInt(node.value);
		case "Boolean": return mkBool(node.value);
		case "StringLiteral": return mkString(node.value);
		case "List": return mkList(fromNodes(node.items));
	}
}

export function fromNodes(nodes: ASTNode[]): Value[] {
	return nodes.map(fromNode);
}

function renderRaw(v: Value): string {
	switch (v.type) {
		case "Symbol": return v.name;
		case "Integer": return v.value.toString();
		case "Boolean": return v.value ? "#t" : "#f";
		case "String": return `"${v.value}"`;
		case "List": return `(${v.items.map(renderRaw).join(" ")})`;
		case "Procedure": return "#<procedure>";
	}
}

/** Symbols and lists are prefixed with a quote to mark them as data. */
export function render(v: Value): string {
	if (v.type === "Symbol" || v.type === "List") return `'${renderRaw(v)}`;
	return renderRaw(v);
}

/**
 * Structural equality. Procedures are only equal to the very same procedure
 * record; programs should not rely on comparing them.
 */
export function valuesEqual(a: Value, b: Value): boolean {
	switch (a.type) {
		case "Symbol": return b.type === "Symbol" && a.name === b.name;
		case "Integer": return b.type === "Integer" && a.value === b.value;
		case "Boolean": return b.type === "Boolean" && a.value === b.value;
		case "String": return b.type === "String" && a.value === b.value;
		case "List":
			return b.type === "List"
				&& a.items.length === b.items.length
				&& a.items.every((item, idx) => valuesEqual(item, b.items[idx]));
		case "Procedure": return b.type === "Procedure" && a.procedure === b.procedure;
	}
}
