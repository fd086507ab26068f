import { int, str } from "../src/ast";
import { Environment } from "../src/environment";
import { EvalError } from "../src/errors";
import { caught, errorKind } from "./helpers";

describe("Environment", () => {

	test("define and lookup", () => {
		const env = new Environment();
		env.define("x", int(42));
		expect(env.lookup("x")).toEqual(int(42));
	});

	test("define overwrites in the same frame", () => {
		const env = new Environment();
		env.define("x", int(1));
		env.define("x", str("two"));
		expect(env.lookup("x")).toEqual(str("two"));
	});

	test("strict lookup of an unknown name fails with UnboundIdentifier", () => {
		const env = new Environment();
		expect(() => env.lookup("unknown")).toThrow(EvalError);
		expect(errorKind(() => env.lookup("unknown"))).toBe("UnboundIdentifier");
		expect(caught(() => env.lookup("unknown")).message).toBe("unbound identifier: unknown");
	});

	test("lenient lookup reports a miss as undefined", () => {
		const env = new Environment();
		expect(env.find("unknown")).toBeUndefined();
		expect(env.isBound("unknown")).toBe(false);
	});

	test("child frames see their ancestors", () => {
		const global = new Environment();
		global.define("x", int(1));
		const inner = global.child().child();
		expect(inner.lookup("x")).toEqual(int(1));
		expect(inner.isBound("x")).toBe(true);
		expect(inner.parent?.parent).toBe(global);
	});

	test("shadowing leaves the outer binding alone", () => {
		const global = new Environment();
		global.define("x", int(1));
		const inner = global.child();
		inner.define("x", int(2));
		expect(inner.lookup("x")).toEqual(int(2));
		expect(global.lookup("x")).toEqual(int(1));
	});

	test("findInFrame only checks the innermost frame", () => {
		const global = new Environment();
		global.define("x", int(1));
		const inner = global.child();
		expect(inner.findInFrame("x")).toBeUndefined();
		expect(inner.find("x")).toEqual(int(1));
	});

	test("frames are shared, not copied", () => {
		const global = new Environment();
		const a = global.child();
		const b = global.child();
		global.define("late", int(7));
		expect(a.lookup("late")).toEqual(int(7));
		expect(b.lookup("late")).toEqual(int(7));
	});
});

describe("Environment placeholders", () => {

	test("a declared name is not usable until defined", () => {
		const env = new Environment();
		env.declare("f");
		expect(env.find("f")).toBeUndefined();
		expect(env.isBound("f")).toBe(false);
		const err = caught(() => env.lookup("f"));
		expect(err.kind).toBe("UnboundIdentifier");
		expect(err.message).toBe("identifier used before its definition completed: f");

		env.define("f", int(3));
		expect(env.lookup("f")).toEqual(int(3));
	});

	test("a placeholder shadows an outer binding", () => {
		const global = new Environment();
		global.define("x", int(1));
		const inner = global.child();
		inner.declare("x");
		expect(errorKind(() => inner.lookup("x"))).toBe("UnboundIdentifier");
	});

	test("declare keeps an existing binding", () => {
		const env = new Environment();
		env.define("x", int(1));
		expect(env.declare("x")).toBe(false);
		expect(env.lookup("x")).toEqual(int(1));
	});

	test("undeclare drops only placeholders", () => {
		const global = new Environment();
		global.define("x", int(1));
		const env = global.child();
		expect(env.declare("x")).toBe(true);
		env.undeclare("x");
		expect(env.lookup("x")).toEqual(int(1));

		env.define("y", int(2));
		env.undeclare("y");
		expect(env.lookup("y")).toEqual(int(2));
	});

	test("names lists completed bindings of the current frame", () => {
		const global = new Environment();
		global.define("outer", int(0));
		const env = global.child();
		env.define("a", int(1));
		env.declare("b");
		expect(env.names()).toEqual(["a"]);
	});
});
