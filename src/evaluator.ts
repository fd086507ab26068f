import {
	Expression,
	ExpressionOf,
	list,
	NIL,
	primitiveName
} from "./ast";
import { asItems, builtins, expectArity, kindOf } from "./builtins";
import { Environment } from "./environment";
import { EvalError, Result } from "./errors";
import { render } from "./render";

export interface EvaluateOptions {
	/** Record the forms under evaluation and attach them to errors. Defaults to true. */
	trace?: boolean;
}

type Procedure = ExpressionOf<"Procedure">;
type Primitive = ExpressionOf<"Primitive">;

/** `#t` and positive numbers are true; everything else is false. */
export const isTruthy = (v: Expression): boolean => {
	switch (v.type) {
		case "Lit": return v.value === "true";
		case "Int": return v.value > 0n;
		case "Float": return v.value > 0;
		default: return false;
	}
};

function describeNode(node: Expression): string {
	switch (node.type) {
		case "Primitive": {
			const head = node.args[0];
			if (node.op === "APPLY" && head?.type === "Symbol") return `(${head.name})`;
			return `(${primitiveName(node.op)})`;
		}
		case "Symbol": return node.name;
		case "Procedure": return "<closure>";
		case "List": return node.items.length === 0 ? "'()" : `'(${node.items.length} items)`;
		default: return render(node, { readable: true });
	}
}

function unknownVariant(node: never): never {
	const tag: unknown = Reflect.get(node, "type");
	throw new EvalError("UnknownVariantForEval", `cannot evaluate expression of kind ${String(tag)}`);
}

/**
 * Reduce `node` to a value in `env`.
 *
 * `bindings` undefined means value position. A list means application: a
 * procedure reached with bindings is called with them, evaluated in the
 * caller's environment.
 */
export function evaluate(
	node: Expression,
	env: Environment = new Environment(),
	bindings?: Expression[],
	options: EvaluateOptions = {}
): Expression {
	const trace: string[] = [];
	const useTrace = options.trace !== false;

	const runWithTrace = <T>(label: () => string, fn: () => T): T => {
		if (!useTrace) return fn();
		trace.push(label());
		try {
			return fn();
		} catch (e) {
			if (e instanceof EvalError && e.trace.length === 0) e.trace = [...trace];
			throw e;
		} finally {
			trace.pop();
		}
	};

	function evalSymbol(node: ExpressionOf<"Symbol">, scope: Environment, args?: Expression[]): Expression {
		if (node.bound !== null) return evalNode(node.bound, scope, args);
		return evalNode(scope.lookup(node.name), scope, args);
	}

	function applyProcedure(proc: Procedure, args: Expression[], caller: Environment): Expression {
		if (args.length !== proc.params.length) {
			throw new EvalError(
				"ArityMismatch",
				`procedure expects ${proc.params.length} argument(s), got ${args.length}`
			);
		}
		const values = args.map(arg => evalNode(arg, caller));
		const frame = proc.env.child();
		proc.params.forEach((param, idx) => frame.define(param, values[idx]));
		return evalNode(proc.body, frame);
	}

	function expectProcedure(value: Expression, label: string): Procedure {
		if (value.type !== "Procedure") {
			throw new EvalError("InvalidOperandType", `${label}: expected a procedure, got ${kindOf(value)}`);
		}
		return value;
	}

	function nameOf(value: Expression, label: string): string {
		if (value.type !== "Str") {
			throw new EvalError("InvalidDefineTarget", `${label}: name must be a string, got ${kindOf(value)}`);
		}
		return value.value;
	}

	function evalDefine(args: Expression[], scope: Environment, ambient?: Expression[]): Expression {
		expectArity("DEFINE", args, 2);
		const name = nameOf(evalNode(args[0], scope, ambient), "define");
		// the name is visible (as a placeholder) while its value evaluates
		const created = scope.declare(name);
		let value: Expression;
		try {
			value = evalNode(args[1], scope, ambient);
		} catch (e) {
			if (created) scope.undeclare(name);
			throw e;
		}
		scope.define(name, value);
		return NIL;
	}

	function evalSet(args: Expression[], scope: Environment, ambient?: Expression[]): Expression {
		expectArity("SET", args, 2);
		const name = nameOf(evalNode(args[0], scope, ambient), "set!");
		if (!scope.isBound(name)) {
			throw new EvalError("UnboundIdentifier", `set!: unbound identifier: ${name}`);
		}
		// rebinding shadows in the current frame, ancestors keep their value
		scope.define(name, evalNode(args[1], scope, ambient));
		return NIL;
	}

	function evalLambda(args: Expression[], scope: Environment): Expression {
		expectArity("LAMBDA", args, 2);
		const [paramsNode, body] = args;
		if (paramsNode.type !== "List") {
			throw new EvalError("InvalidLambdaParams", `lambda: parameters must be a list, got ${kindOf(paramsNode)}`);
		}
		const params: string[] = [];
		for (const p of paramsNode.items) {
			if (p.type !== "Str" && p.type !== "Symbol") {
				throw new EvalError("InvalidLambdaParams", `lambda: parameter names must be identifiers, got ${kindOf(p)}`);
			}
			const name = p.type === "Str" ? p.value : p.name;
			if (params.includes(name)) {
				throw new EvalError("InvalidLambdaParams", `lambda: duplicate parameter ${name}`);
			}
			params.push(name);
		}
		return { type: "Procedure", params, body, env: scope };
	}

	function evalIf(args: Expression[], scope: Environment, ambient?: Expression[]): Expression {
		if (args.length !== 2 && args.length !== 3) {
			throw new EvalError("ArityMismatch", `if: expected 2 or 3 arguments, got ${args.length}`);
		}
		const cond = evalNode(args[0], scope, ambient);
		if (isTruthy(cond)) return evalNode(args[1], scope, ambient);
		if (args.length === 3) return evalNode(args[2], scope, ambient);
		return NIL;
	}

	function evalWhile(args: Expression[], scope: Environment, ambient?: Expression[]): Expression {
		expectArity("WHILE", args, 2);
		const [test, body] = args;
		while (true) {
			const cond = evalNode(test, scope, ambient);
			if (cond.type !== "Lit" || cond.value === "nil") {
				throw new EvalError("InvalidOperandType", `while: condition must be a boolean, got ${kindOf(cond)}`);
			}
			if (cond.value === "false") return NIL;
			evalNode(body, scope, ambient);
		}
	}

	function evalApply(args: Expression[], scope: Environment): Expression {
		if (args.length === 0) throw new EvalError("ArityMismatch", "apply: missing procedure");
		const [head, ...rest] = args;
		return applyProcedure(expectProcedure(evalNode(head, scope), "apply"), rest, scope);
	}

	function evalCar(args: Expression[], scope: Environment, ambient?: Expression[]): Expression {
		expectArity("CAR", args, 1);
		const items = asItems(evalNode(args[0], scope, ambient), "CAR");
		if (items.length === 0) return NIL;
		return evalNode(items[0], scope, ambient);
	}

	function evalMap(args: Expression[], scope: Environment, ambient?: Expression[]): Expression {
		expectArity("MAP", args, 2);
		const fn = expectProcedure(evalNode(args[0], scope), "map");
		const items = asItems(evalNode(args[1], scope, ambient), "MAP");
		return list(items.map(item => applyProcedure(fn, [item], scope)));
	}

	function evalFilter(args: Expression[], scope: Environment, ambient?: Expression[]): Expression {
		expectArity("FILTER", args, 2);
		const fn = expectProcedure(evalNode(args[0], scope), "filter");
		const items = asItems(evalNode(args[1], scope, ambient), "FILTER");
		const kept: Expression[] = [];
		for (const item of items) {
			const verdict = applyProcedure(fn, [item], scope);
			if (verdict.type !== "Lit" || verdict.value === "nil") {
				throw new EvalError(
					"InvalidPredicateResult",
					`filter: predicate must return a boolean, got ${render(verdict, { readable: true })}`
				);
			}
			if (verdict.value === "true") kept.push(item);
		}
		return list(kept);
	}

	function evalPrimitive(node: Primitive, scope: Environment, ambient?: Expression[]): Expression {
		const { op, args } = node;
		switch (op) {
			case "DEFINE": return evalDefine(args, scope, ambient);
			case "SET": return evalSet(args, scope, ambient);
			case "LAMBDA": return evalLambda(args, scope);
			case "IF": return evalIf(args, scope, ambient);
			case "WHILE": return evalWhile(args, scope, ambient);
			case "APPLY": return evalApply(args, scope);
			case "CAR": return evalCar(args, scope, ambient);
			case "MAP": return evalMap(args, scope, ambient);
			case "FILTER": return evalFilter(args, scope, ambient);
		}

		const builtin = builtins[op];
		if (!builtin) {
			throw new EvalError("UnknownVariantForEval", `no evaluation rule for primitive ${op}`);
		}
		return builtin(...args.map(arg => evalNode(arg, scope, ambient)));
	}

	function evalNode(node: Expression, scope: Environment, args?: Expression[]): Expression {
		return runWithTrace(() => describeNode(node), () => {
			switch (node.type) {
				case "Int":
				case "Float":
				case "Str":
				case "Lit":
				case "List":
					return node;
				case "Symbol": return evalSymbol(node, scope, args);
				case "Procedure": return args === undefined ? node : applyProcedure(node, args, scope);
				case "Primitive": return evalPrimitive(node, scope, args);
				default: return unknownVariant(node);
			}
		});
	}

	return evalNode(node, env, bindings);
}

/**
 * Result-returning flavour of `evaluate`. Only evaluation errors are captured;
 * anything else (host stack exhaustion included) propagates.
 */
export function tryEvaluate(
	node: Expression,
	env: Environment,
	options: EvaluateOptions = {}
): Result<Expression> {
	try {
		return { ok: true, value: evaluate(node, env, undefined, options) };
	} catch (e) {
		if (e instanceof EvalError) return { ok: false, error: e };
		throw e;
	}
}
