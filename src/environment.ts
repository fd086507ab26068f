/**
 * Lexical scope chain.
 *
 * Each frame maps names to bindings and points at its enclosing frame; the
 * global frame has no parent. Closures hold frames by reference, so a binding
 * installed through one closure is visible to every closure sharing the frame.
 */

import type { Expression } from "./ast";
import { EvalError } from "./errors";

interface Binding {
	// undefined while a define is still evaluating its value
	value: Expression | undefined;
}

export class Environment {
	readonly parent: Environment | null;
	private frame: Map<string, Binding>;

	constructor(parent: Environment | null = null) {
		this.parent = parent;
		this.frame = new Map();
	}

	/**
	 * Resolve a name, innermost frame first.
	 * Throws `UnboundIdentifier` when nothing in the chain binds it.
	 */
	lookup(name: string): Expression {
		const binding = this.resolve(name);
		if (binding === undefined) {
			throw new EvalError("UnboundIdentifier", `unbound identifier: ${name}`);
		}
		if (binding.value === undefined) {
			throw new EvalError("UnboundIdentifier", `identifier used before its definition completed: ${name}`);
		}
		return binding.value;
	}

	/** Same walk as `lookup`, but reports a miss as undefined. */
	find(name: string): Expression | undefined {
		return this.resolve(name)?.value;
	}

	findInFrame(name: string): Expression | undefined {
		return this.frame.get(name)?.value;
	}

	isBound(name: string): boolean {
		return this.find(name) !== undefined;
	}

	define(name: string, value: Expression): void {
		const existing = this.frame.get(name);
		if (existing) {
			existing.value = value;
			return;
		}
		this.frame.set(name, { value });
	}

	/**
	 * Reserve `name` in this frame ahead of its value. Lookups reaching the
	 * placeholder fail until `define` fills it in. Returns false when the frame
	 * already had the name.
	 */
	declare(name: string): boolean {
		if (this.frame.has(name)) return false;
		this.frame.set(name, { value: undefined });
		return true;
	}

	/** Drop a placeholder left by `declare`. Completed bindings stay. */
	undeclare(name: string): void {
		const binding = this.frame.get(name);
		if (binding !== undefined && binding.value === undefined) this.frame.delete(name);
	}

	child(): Environment {
		return new Environment(this);
	}

	names(): string[] {
		return [...this.frame.keys()].filter(name => this.frame.get(name)?.value !== undefined);
	}

	private resolve(name: string): Binding | undefined {
		let scope: Environment | null = this;
		while (scope !== null) {
			const binding = scope.frame.get(name);
			if (binding !== undefined) return binding;
			scope = scope.parent;
		}
		return undefined;
	}
}
