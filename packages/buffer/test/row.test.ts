import assert from "node:assert";
import { describe, it } from "node:test";
import { createFileType } from "../src/filetype.js";
import { Row } from "../src/row.js";

const SAMPLES = ["", "hello", "nai\u0308ve", "a👍🏽b", "日本語 text", "🇩🇪🇫🇷 flags", "tab\there"];

describe("Row", () => {
	describe("fromText", () => {
		it("measures length in grapheme clusters", () => {
			assert.strictEqual(Row.fromText("hello").length, 5);
			assert.strictEqual(Row.fromText("nai\u0308ve").length, 5);
			assert.strictEqual(Row.fromText("a👍🏽b").length, 3);
			assert.strictEqual(Row.fromText("🇩🇪🇫🇷").length, 2);
			assert.strictEqual(Row.fromText("").length, 0);
			assert.ok(Row.fromText("").isEmpty());
		});
	});

	describe("insert", () => {
		it("inserts at a grapheme column", () => {
			const row = Row.fromText("a👍🏽c");
			row.insert(2, "b");
			assert.strictEqual(row.getText(), "a👍🏽bc");
			assert.strictEqual(row.length, 4);
		});

		it("appends when the column is past the end", () => {
			const row = Row.fromText("abc");
			row.insert(10, "d");
			assert.strictEqual(row.getText(), "abcd");
			assert.strictEqual(row.length, 4);
		});

		it("clamps a negative column to the start", () => {
			const row = Row.fromText("bc");
			row.insert(-3, "a");
			assert.strictEqual(row.getText(), "abc");
		});

		it("recomputes the length when the inserted mark joins a cluster", () => {
			const row = Row.fromText("ab");
			row.insert(1, "\u0301");
			assert.strictEqual(row.getText(), "a\u0301b");
			assert.strictEqual(row.length, 2);
		});

		it("is undone by delete at the same column", () => {
			for (const text of SAMPLES) {
				const length = Row.fromText(text).length;
				for (let x = 0; x <= length; x++) {
					const row = Row.fromText(text);
					row.insert(x, "Q");
					assert.strictEqual(row.length, length + 1);
					row.delete(x);
					assert.strictEqual(row.getText(), text);
					assert.strictEqual(row.length, length);
				}
			}
		});
	});

	describe("delete", () => {
		it("removes a whole cluster", () => {
			const row = Row.fromText("a👍🏽b");
			row.delete(1);
			assert.strictEqual(row.getText(), "ab");
			assert.strictEqual(row.length, 2);
		});

		it("ignores columns outside the row", () => {
			const row = Row.fromText("ab");
			row.delete(2);
			row.delete(-1);
			row.delete(Number.NaN);
			assert.strictEqual(row.getText(), "ab");
		});
	});

	describe("split and append", () => {
		it("splits at a grapheme column", () => {
			const row = Row.fromText("ab👍🏽cd");
			const tail = row.split(3);
			assert.strictEqual(row.getText(), "ab👍🏽");
			assert.strictEqual(row.length, 3);
			assert.strictEqual(tail.getText(), "cd");
			assert.strictEqual(tail.length, 2);
		});

		it("reconstructs the original text when the tail is appended back", () => {
			for (const text of SAMPLES) {
				const length = Row.fromText(text).length;
				for (let k = 0; k <= length; k++) {
					const row = Row.fromText(text);
					const tail = row.split(k);
					assert.strictEqual(row.length, k);
					assert.strictEqual(tail.length, length - k);
					row.append(tail);
					assert.strictEqual(row.getText(), text);
					assert.strictEqual(row.length, length);
				}
			}
		});

		it("leaves both halves without highlight marks", () => {
			const row = Row.fromText("let x");
			row.highlight(createFileType({ name: "t", extensions: [".t"], primaryKeywords: ["let"] }).highlightOptions);
			assert.strictEqual(row.getHighlighting().length, 5);
			const tail = row.split(2);
			assert.strictEqual(row.getHighlighting().length, 0);
			assert.strictEqual(tail.getHighlighting().length, 0);
		});

		it("clamps the split column", () => {
			const row = Row.fromText("abc");
			const tail = row.split(99);
			assert.strictEqual(row.getText(), "abc");
			assert.strictEqual(tail.getText(), "");
		});

		it("sums the lengths on append", () => {
			const row = Row.fromText("日本");
			row.append(Row.fromText("語👍🏽"));
			assert.strictEqual(row.getText(), "日本語👍🏽");
			assert.strictEqual(row.length, 4);
		});
	});

	describe("find", () => {
		it("finds the first occurrence at or after the start column", () => {
			const row = Row.fromText("abcabc");
			assert.strictEqual(row.find("bc", 0, "forward"), 1);
			assert.strictEqual(row.find("bc", 1, "forward"), 1);
			assert.strictEqual(row.find("bc", 2, "forward"), 4);
			assert.strictEqual(row.find("bc", 5, "forward"), undefined);
		});

		it("finds the last occurrence before the start column when searching backward", () => {
			const row = Row.fromText("abcabc");
			assert.strictEqual(row.find("bc", 6, "backward"), 4);
			assert.strictEqual(row.find("bc", 4, "backward"), 1);
			assert.strictEqual(row.find("bc", 1, "backward"), undefined);
			assert.strictEqual(row.find("bc", 100, "backward"), 4);
		});

		it("maps UTF-16 offsets back to grapheme columns", () => {
			const row = Row.fromText("😀x😀x");
			assert.strictEqual(row.find("x", 0, "forward"), 1);
			assert.strictEqual(row.find("x", 2, "forward"), 3);
			assert.strictEqual(row.find("😀", 1, "forward"), 2);
		});

		it("skips a match that starts inside a cluster", () => {
			const row = Row.fromText("e\u0301e");
			assert.strictEqual(row.find("\u0301", 0, "forward"), undefined);
			assert.strictEqual(row.find("e", 1, "forward"), 1);
		});

		it("returns undefined for an empty or absent query", () => {
			const row = Row.fromText("abc");
			assert.strictEqual(row.find("", 0, "forward"), undefined);
			assert.strictEqual(row.find("zz", 0, "forward"), undefined);
			assert.strictEqual(row.find("zz", 3, "backward"), undefined);
		});
	});
});
