import * as assert from "node:assert";
import * as fc from "fast-check";
import { defineChecker } from "../../server/checker/defineChecker";
import { parseOutput } from "../../server/lint/parseOutput";
import { diagLine, formatDiagLine, noiseLine } from "../helpers/arbitraries";
import { createDiagChecker } from "../helpers/checkers";
import { createTestSnapshot } from "../helpers/snapshots";

const TEXT = "a\nbb\nccc\ndddd\n";

suite("parseOutput", () => {
	test("drops a match whose severity is absent", () => {
		const diagnostics = parseOutput({
			output: "diag:4 UNDEFINED X1: msg",
			checker: createDiagChecker(),
			snapshot: createTestSnapshot(TEXT),
		});

		assert.deepStrictEqual(diagnostics, []);
	});

	test("maps a match to the range of its line", () => {
		const snapshot = createTestSnapshot(TEXT);
		const diagnostics = parseOutput({
			output: "diag:4 HIGH X1: msg",
			checker: createDiagChecker(),
			snapshot,
		});

		assert.strictEqual(diagnostics.length, 1);
		const diag = diagnostics[0];
		assert.ok(diag);
		assert.strictEqual(diag.start, 9);
		assert.strictEqual(diag.end, 13);
		assert.strictEqual(diag.severity, "error");
		assert.strictEqual(diag.message, "msg (X1)");
		assert.strictEqual(diag.code, "X1");
		assert.strictEqual(diag.source, "diag");
		assert.strictEqual(diag.document, snapshot);
	});

	test("returns an empty list for empty output", () => {
		const diagnostics = parseOutput({
			output: "",
			checker: createDiagChecker(),
			snapshot: createTestSnapshot(TEXT),
		});

		assert.deepStrictEqual(diagnostics, []);
	});

	test("uses the checker's source label", () => {
		const diagnostics = parseOutput({
			output: "diag:1 LOW W1: careful",
			checker: createDiagChecker({ source: "diag-tool" }),
			snapshot: createTestSnapshot(TEXT),
		});

		assert.strictEqual(diagnostics[0]?.source, "diag-tool");
		assert.strictEqual(diagnostics[0]?.severity, "warning");
	});

	test("logs ignored matches", () => {
		const logged: string[] = [];
		parseOutput({
			output: "diag:2 UNDEFINED Z9: nope",
			checker: createDiagChecker(),
			snapshot: createTestSnapshot(TEXT),
			logger: { log: (message) => logged.push(message) },
		});

		assert.deepStrictEqual(logged, [
			'[diag] Ignoring match: "diag:2 UNDEFINED Z9: nope"',
		]);
	});

	test("drops a match for which extraction returns null", () => {
		const checker = defineChecker({
			id: "nullable",
			command: ["tool"],
			matcher: /^(\d+)$/m,
			extract: (match) => {
				const line = Number(match[1]);
				if (line === 2) {
					return null;
				}
				return {
					start: line,
					end: line,
					severity: "hint",
					message: `line ${line}`,
				};
			},
		});

		const diagnostics = parseOutput({
			output: "1\n2\n3\n",
			checker,
			snapshot: createTestSnapshot(TEXT),
		});

		assert.deepStrictEqual(
			diagnostics.map((diag) => diag.message),
			["line 1", "line 3"],
		);
		assert.strictEqual(diagnostics[0]?.code, undefined);
	});

	test("clamps offsets into the document and orders them", () => {
		const checker = defineChecker({
			id: "wild",
			command: ["tool"],
			matcher: /^(-?\d+),(-?\d+)$/m,
			extract: (match) => ({
				start: Number(match[1]),
				end: Number(match[2]),
				severity: "error",
				message: "wild",
			}),
		});

		const diagnostics = parseOutput({
			output: "-5,3\n100,2\n4,NaN",
			checker,
			snapshot: createTestSnapshot(TEXT),
		});

		assert.deepStrictEqual(
			diagnostics.map((diag) => [diag.start, diag.end]),
			[
				[0, 3],
				[2, 14],
			],
		);
	});

	test("does not touch the state of the checker's matcher", () => {
		const checker = createDiagChecker({
			matcher: /^diag:(\d+) (\w+) (\w+): (.*)$/gm,
		});
		checker.matcher.lastIndex = 7;

		const diagnostics = parseOutput({
			output: "diag:1 HIGH A1: one\ndiag:2 LOW A2: two",
			checker,
			snapshot: createTestSnapshot(TEXT),
		});

		assert.strictEqual(diagnostics.length, 2);
		assert.strictEqual(checker.matcher.lastIndex, 7);
	});

	test("gives the same result on repeated runs", () => {
		const checker = createDiagChecker();
		const snapshot = createTestSnapshot(TEXT);
		const output = "diag:1 HIGH A1: one\ndiag:3 LOW A2: two\n";

		const first = parseOutput({ output, checker, snapshot });
		const second = parseOutput({ output, checker, snapshot });

		assert.deepStrictEqual(second, first);
	});

	test("property: keeps every match in output order", () => {
		const snapshot = createTestSnapshot(
			Array.from({ length: 20 }, (_, i) => `line ${i + 1}`).join("\n"),
		);
		const checker = createDiagChecker();

		fc.assert(
			fc.property(
				fc.array(fc.oneof(diagLine, noiseLine), { maxLength: 30 }),
				(entries) => {
					const output = entries
						.map((entry) =>
							typeof entry === "string" ? entry : formatDiagLine(entry),
						)
						.join("\n");
					const expected = entries.flatMap((entry) =>
						typeof entry === "string"
							? []
							: [`${entry.message} (${entry.code})`],
					);

					const diagnostics = parseOutput({ output, checker, snapshot });

					assert.deepStrictEqual(
						diagnostics.map((diag) => diag.message),
						expected,
					);
				},
			),
		);
	});

	test("property: offsets always lie within the document", () => {
		const checker = defineChecker({
			id: "offsets",
			command: ["tool"],
			matcher: /^(-?\d+) (-?\d+)$/m,
			extract: (match) => ({
				start: Number(match[1]),
				end: Number(match[2]),
				severity: "warning",
				message: "offsets",
			}),
		});

		fc.assert(
			fc.property(
				fc.string({ maxLength: 40 }),
				fc.integer({ min: -1000, max: 1000 }),
				fc.integer({ min: -1000, max: 1000 }),
				(text, start, end) => {
					const snapshot = createTestSnapshot(text);
					const [diag] = parseOutput({
						output: `${start} ${end}`,
						checker,
						snapshot,
					});

					assert.ok(diag);
					assert.ok(diag.start >= 0);
					assert.ok(diag.start <= diag.end);
					assert.ok(diag.end <= text.length);
				},
			),
		);
	});
});
