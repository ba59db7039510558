import assert from "node:assert";
import { afterEach, describe, it, mock } from "node:test";
import { parseArgs } from "../src/cli/args.js";

describe("parseArgs", () => {
	afterEach(() => {
		mock.restoreAll();
	});

	it("collects files in order", () => {
		assert.deepStrictEqual(parseArgs(["a.txt", "src/b.rs"]), { files: ["a.txt", "src/b.rs"] });
	});

	it("parses flags", () => {
		assert.deepStrictEqual(parseArgs(["--insert", "a.txt"]), { files: ["a.txt"], insert: true });
		assert.deepStrictEqual(parseArgs(["-h"]), { files: [], help: true });
		assert.deepStrictEqual(parseArgs(["--version"]), { files: [], version: true });
	});

	it("treats everything after -- as files", () => {
		assert.deepStrictEqual(parseArgs(["--", "--insert", "-x"]), { files: ["--insert", "-x"] });
	});

	it("warns about unknown options and skips them", () => {
		const error = mock.method(console, "error", () => {});
		assert.deepStrictEqual(parseArgs(["--bogus", "a.txt"]), { files: ["a.txt"] });
		assert.strictEqual(error.mock.callCount(), 1);
	});
});
