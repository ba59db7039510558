import assert from "node:assert";
import { describe, it } from "node:test";
import { graphemeCount, graphemeIndexAt, graphemeOffsets, splitGraphemes } from "../src/grapheme.js";

describe("graphemeCount", () => {
	it("counts ASCII characters one by one", () => {
		assert.strictEqual(graphemeCount("hello"), 5);
		assert.strictEqual(graphemeCount(""), 0);
	});

	it("counts a base letter with a combining mark as one cluster", () => {
		assert.strictEqual(graphemeCount("e\u0301"), 1);
		assert.strictEqual(graphemeCount("he\u0301llo"), 5);
	});

	it("counts emoji with modifiers and flags as single clusters", () => {
		assert.strictEqual(graphemeCount("👍🏽"), 1);
		assert.strictEqual(graphemeCount("🇩🇪🇫🇷"), 2);
		assert.strictEqual(graphemeCount("日本語"), 3);
	});

	it("treats CRLF as one cluster", () => {
		assert.strictEqual(graphemeCount("\r\n"), 1);
		assert.strictEqual(graphemeCount("a\r\nb"), 3);
	});
});

describe("splitGraphemes", () => {
	it("keeps combining marks with their base", () => {
		assert.deepStrictEqual(splitGraphemes("ae\u0301b"), ["a", "e\u0301", "b"]);
	});
});

describe("graphemeOffsets", () => {
	it("lists the start offset of each cluster followed by the text length", () => {
		assert.deepStrictEqual(graphemeOffsets("ae\u0301b"), [0, 1, 3, 4]);
		assert.deepStrictEqual(graphemeOffsets(""), [0]);
	});
});

describe("graphemeIndexAt", () => {
	const offsets = [0, 1, 3, 4];

	it("maps a cluster boundary to its index", () => {
		assert.strictEqual(graphemeIndexAt(offsets, 0), 0);
		assert.strictEqual(graphemeIndexAt(offsets, 3), 2);
		assert.strictEqual(graphemeIndexAt(offsets, 4), 3);
	});

	it("returns undefined for an offset inside a cluster", () => {
		assert.strictEqual(graphemeIndexAt(offsets, 2), undefined);
	});
});
