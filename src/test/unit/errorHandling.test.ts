import * as assert from "node:assert";
import { runHandlerSafely } from "../../server/shared/errorHandling";

suite("runHandlerSafely", () => {
	test("runs the handler", async () => {
		const errors: string[] = [];
		let ran = false;

		await runHandlerSafely({ error: (m) => errors.push(m) }, "save", async () => {
			ran = true;
		});

		assert.strictEqual(ran, true);
		assert.deepStrictEqual(errors, []);
	});

	test("logs the first line of a failure instead of rejecting", async () => {
		const errors: string[] = [];

		await runHandlerSafely(
			{ error: (m) => errors.push(m) },
			"didOpen",
			async () => {
				throw new Error("settings unavailable\nstack details");
			},
		);

		assert.deepStrictEqual(errors, [
			"lint-supervisor: failed to react to didOpen (settings unavailable)",
		]);
	});

	test("logs thrown non-error values", async () => {
		const errors: string[] = [];

		await runHandlerSafely({ error: (m) => errors.push(m) }, "close", () =>
			Promise.reject("gone"),
		);

		assert.deepStrictEqual(errors, [
			"lint-supervisor: failed to react to close (gone)",
		]);
	});
});
