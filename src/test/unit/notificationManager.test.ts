import * as assert from "node:assert";
import { NotificationManager } from "../../server/state/notificationManager";
import { createMockConnection } from "../helpers/mockConnection";

suite("NotificationManager", () => {
	suite("maybeNotifyCheckerDisabled", () => {
		test("shows a warning on the first call", async () => {
			const { connection, calls } = createMockConnection();
			const manager = new NotificationManager(connection);

			await manager.maybeNotifyCheckerDisabled(
				"diag",
				"diag-tool not found\nsearched PATH",
			);

			assert.deepStrictEqual(calls.showWarningMessage, [
				"diag: disabled (diag-tool not found)",
			]);
			assert.deepStrictEqual(calls.consoleWarn, [
				"diag: disabled (diag-tool not found)",
			]);
		});

		test("shows each checker's warning once per cooldown", async () => {
			const { connection, calls } = createMockConnection();
			const manager = new NotificationManager(connection);

			await manager.maybeNotifyCheckerDisabled("diag", "missing");
			await manager.maybeNotifyCheckerDisabled("diag", "missing");
			await manager.maybeNotifyCheckerDisabled("other", "missing");

			assert.deepStrictEqual(calls.showWarningMessage, [
				"diag: disabled (missing)",
				"other: disabled (missing)",
			]);
			assert.strictEqual(calls.consoleWarn.length, 3);
		});
	});

	suite("notifyRunFailure", () => {
		test("warns the user and the log", () => {
			const { connection, calls } = createMockConnection();
			const manager = new NotificationManager(connection);

			manager.notifyRunFailure("diag", new Error("spawn EACCES\nmore"));

			assert.deepStrictEqual(calls.showWarningMessage, [
				"diag: failed to run (spawn EACCES)",
			]);
			assert.deepStrictEqual(calls.consoleWarn, [
				"diag: failed to run (spawn EACCES)",
			]);
		});
	});

	suite("notifyStderr", () => {
		test("shows the first line and logs the whole output", () => {
			const { connection, calls } = createMockConnection();
			const manager = new NotificationManager(connection);

			manager.notifyStderr("diag", "  config missing\nusing defaults\n");

			assert.deepStrictEqual(calls.showWarningMessage, [
				"diag: config missing",
			]);
			assert.deepStrictEqual(calls.consoleWarn, [
				"[diag] config missing\nusing defaults",
			]);
		});

		test("ignores blank output", () => {
			const { connection, calls } = createMockConnection();
			const manager = new NotificationManager(connection);

			manager.notifyStderr("diag", " \n");

			assert.deepStrictEqual(calls.showWarningMessage, []);
			assert.deepStrictEqual(calls.consoleWarn, []);
		});
	});

	test("forwards log levels to the console", () => {
		const { connection, calls } = createMockConnection();
		const manager = new NotificationManager(connection);

		manager.log("info");
		manager.warn("careful");
		manager.error("broken");

		assert.deepStrictEqual(calls.consoleLog, ["info"]);
		assert.deepStrictEqual(calls.consoleWarn, ["careful"]);
		assert.deepStrictEqual(calls.consoleError, ["broken"]);
	});
});
