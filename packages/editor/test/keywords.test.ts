import assert from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, afterEach, before, describe, it, mock } from "node:test";
import { fileTypeFromName } from "@xed/buffer";
import { buildFileTypeDefinition, parseKeywordsArgs, runKeywordsCommand, splitWords } from "../src/cli/keywords.js";

describe("keywords command", () => {
	let dir: string;

	before(() => {
		dir = mkdtempSync(join(tmpdir(), "xed-keywords-"));
	});

	after(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	afterEach(() => {
		mock.restoreAll();
	});

	it("splits word lists on any whitespace", () => {
		assert.deepStrictEqual(splitWords("  fn let\n\tmatch\r\nmut \n"), ["fn", "let", "match", "mut"]);
		assert.deepStrictEqual(splitWords(""), []);
	});

	it("parses arguments", () => {
		assert.deepStrictEqual(parseKeywordsArgs(["p.txt", "s.txt", "--name", "lua", "--ext", ".lua", "--comment", "--"]), {
			args: {
				primaryPath: "p.txt",
				secondaryPath: "s.txt",
				name: "lua",
				extensions: [".lua"],
				commentDelimiter: "--",
			},
		});
	});

	it("rejects incomplete arguments", () => {
		assert.deepStrictEqual(parseKeywordsArgs(["p.txt", "--name", "x", "--ext", ".x"]), {
			error: "Expected exactly two word list files",
		});
		assert.deepStrictEqual(parseKeywordsArgs(["p.txt", "s.txt", "--ext", ".x"]), { error: "Missing --name" });
		assert.deepStrictEqual(parseKeywordsArgs(["p.txt", "s.txt", "--name", "x"]), { error: "Missing --ext" });
		assert.deepStrictEqual(parseKeywordsArgs(["p.txt", "s.txt", "--verbose"]), {
			error: 'Unknown or incomplete option "--verbose"',
		});
	});

	it("builds a definition that highlights the keywords", () => {
		const definition = buildFileTypeDefinition(
			{ name: "lua", extensions: [".lua"], commentDelimiter: "--" },
			["local", "function"],
			["string"],
		);
		const fileType = fileTypeFromName("init.lua", [definition]);
		assert.strictEqual(fileType.name, "lua");
		assert.ok(fileType.highlightOptions.primaryKeywords.has("local"));
		assert.ok(fileType.highlightOptions.secondaryKeywords.has("string"));
		assert.deepStrictEqual(fileType.highlightOptions.commentDelimiters, ["--"]);
	});

	it("prints the definition as JSON", () => {
		const primary = join(dir, "primary.txt");
		const secondary = join(dir, "secondary.txt");
		writeFileSync(primary, "if then\nend\n");
		writeFileSync(secondary, "nil\n");
		const log = mock.method(console, "log", () => {});
		mock.method(console, "error", () => {});

		const code = runKeywordsCommand([primary, secondary, "--name", "lua", "--ext", ".lua"]);

		assert.strictEqual(code, 0);
		assert.strictEqual(log.mock.callCount(), 1);
		assert.deepStrictEqual(JSON.parse(String(log.mock.calls[0]?.arguments[0])), {
			name: "lua",
			extensions: [".lua"],
			numbers: true,
			strings: true,
			characters: true,
			comments: true,
			commentDelimiters: ["//"],
			primaryKeywords: ["if", "then", "end"],
			secondaryKeywords: ["nil"],
		});
	});

	it("fails when a word list cannot be read", () => {
		const error = mock.method(console, "error", () => {});
		const code = runKeywordsCommand([join(dir, "nope.txt"), join(dir, "nope2.txt"), "--name", "x", "--ext", ".x"]);
		assert.strictEqual(code, 1);
		assert.strictEqual(error.mock.callCount(), 1);
	});
});
