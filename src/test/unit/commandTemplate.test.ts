import * as assert from "node:assert";
import * as path from "node:path";
import { URI } from "vscode-uri";
import { evaluateCommand } from "../../server/checker/commandTemplate";
import { TEST_URI, createTestSnapshot } from "../helpers/snapshots";

const sourceFile = URI.parse(TEST_URI).fsPath;

suite("evaluateCommand", () => {
	test("expands the input file in pipe mode to the document path", () => {
		const snapshot = createTestSnapshot("x");

		const argv = evaluateCommand(["tool", "--stdin-filename", `\${file}`], {
			snapshot,
			inputFile: snapshot.filePath,
			tempDir: null,
		});

		assert.deepStrictEqual(argv, ["tool", "--stdin-filename", sourceFile]);
	});

	test("expands file placeholders against the temp file", () => {
		const tempDir = path.resolve("tmp", "lint-supervisor-abc");
		const inputFile = path.join(tempDir, "notes.txt");

		const argv = evaluateCommand(
			[
				"tool",
				`\${file}`,
				`--name=\${fileBasename}`,
				`\${fileDirname}`,
				`\${tempDir}`,
				`--source=\${sourceFile}`,
			],
			{ snapshot: createTestSnapshot("x"), inputFile, tempDir },
		);

		assert.deepStrictEqual(argv, [
			"tool",
			inputFile,
			"--name=notes.txt",
			tempDir,
			tempDir,
			`--source=${sourceFile}`,
		]);
	});

	test("expands the workspace folder, or the cwd without one", () => {
		const workspaceRoot = path.resolve("workspace");
		const inWorkspace = createTestSnapshot("x", {
			uri: URI.file(path.join(workspaceRoot, "a.txt")).toString(),
			workspaceFolders: [workspaceRoot],
		});
		const outside = createTestSnapshot("x");

		const context = { inputFile: null, tempDir: null };
		assert.deepStrictEqual(
			evaluateCommand([`\${workspaceFolder}/tool`], {
				...context,
				snapshot: inWorkspace,
			}),
			[`${workspaceRoot}/tool`],
		);
		assert.deepStrictEqual(
			evaluateCommand([`--root=\${workspaceFolder}`], {
				...context,
				snapshot: outside,
			}),
			[`--root=${path.dirname(sourceFile)}`],
		);
	});

	test("expands missing values to empty strings", () => {
		const snapshot = createTestSnapshot("x", { uri: "untitled:Untitled-1" });

		const argv = evaluateCommand(
			["tool", `--file=\${file}`, `--dir=\${tempDir}`],
			{ snapshot, inputFile: null, tempDir: null },
		);

		assert.deepStrictEqual(argv, ["tool", "--file=", "--dir="]);
	});

	test("passes the context to a function template", () => {
		const snapshot = createTestSnapshot("x", { languageId: "markdown" });

		const argv = evaluateCommand(
			(context) => ["tool", `--lang=${context.snapshot.languageId}`],
			{ snapshot, inputFile: null, tempDir: null },
		);

		assert.deepStrictEqual(argv, ["tool", "--lang=markdown"]);
	});

	test("rejects a template without an executable", () => {
		const context = {
			snapshot: createTestSnapshot("x"),
			inputFile: null,
			tempDir: null,
		};

		assert.throws(
			() => evaluateCommand(() => [], context),
			/command template produced no executable/,
		);
		assert.throws(
			() => evaluateCommand([`\${tempDir}`, "arg"], context),
			/command template produced no executable/,
		);
	});
});
