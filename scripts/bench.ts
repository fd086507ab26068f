import { performance } from "node:perf_hooks";
import { Environment } from "../src/environment";
import { evaluate } from "../src/evaluator";
import { readSource } from "../src/pocketscheme";

type Scenario = { label: string; prelude: string; src: string };
type BenchRow = {
	label: string;
	mode: "trace:on" | "trace:off";
	ms: number;
	result: string;
};

const scenarios: Scenario[] = [
	{
		label: "fact-12",
		prelude: "(define fact (lambda (n) (if (<= n 1) 1 (* n (fact (- n 1))))))",
		src: "(fact 12)"
	},
	{
		label: "fib-15",
		prelude: "(define fib (lambda (n) (if (< n 2) n (+ (fib (- n 1)) (fib (- n 2))))))",
		src: "(fib 15)"
	},
	{
		label: "map-square",
		prelude: "",
		src: "(map (lambda (x) (* x x)) '(1 2 3 4 5 6 7 8 9 10))"
	},
	{
		label: "curry",
		prelude: "",
		src: "((((lambda (x) (lambda (y) (lambda (z) (+ x y z)))) 10) 15) 20)"
	}
];

function benchScenario(scenario: Scenario, iterations: number, trace: boolean): BenchRow {
	const env = new Environment();
	for (const form of readSource(scenario.prelude)) evaluate(form, env, undefined, { trace });
	const [form] = readSource(scenario.src);

	let last = "";
	const start = performance.now();
	for (let i = 0; i < iterations; i++) {
		const value = evaluate(form, env, undefined, { trace });
		if (i === iterations - 1) last = value.type === "Int" ? String(value.value) : value.type;
	}
	const ms = performance.now() - start;

	return {
		label: scenario.label,
		mode: trace ? "trace:on" : "trace:off",
		ms,
		result: last
	};
}

async function main() {
	const iterations = Number(process.env.BENCH_ITERS ?? 200);
	const rows: BenchRow[] = [];

	for (const scenario of scenarios) {
		rows.push(benchScenario(scenario, iterations, true));
		rows.push(benchScenario(scenario, iterations, false));
	}

	console.log(`pocketscheme benchmark (${iterations} iterations per scenario)`);
	for (const row of rows) {
		console.log(
			`${row.label.padEnd(12)} ${row.mode.padEnd(10)} ${row.ms.toFixed(2).padStart(9)} ms  result=${row.result}`
		);
	}
}

main().catch(err => {
	console.error(err);
	process.exit(1);
});
