import assert from "node:assert";
import { describe, it } from "node:test";
import { stripAnsi, truncateToWidth, visibleWidth } from "../src/utils.js";

describe("visibleWidth", () => {
	it("counts ASCII characters", () => {
		assert.strictEqual(visibleWidth("hello"), 5);
		assert.strictEqual(visibleWidth(""), 0);
	});

	it("counts wide characters as two columns", () => {
		assert.strictEqual(visibleWidth("中文"), 4);
	});

	it("counts a combining sequence as one column", () => {
		assert.strictEqual(visibleWidth("e\u0301"), 1);
	});

	it("ignores ANSI and APC sequences", () => {
		assert.strictEqual(visibleWidth("\x1b[31mred\x1b[0m"), 3);
		assert.strictEqual(visibleWidth("\x1b_xed:hl:number\x0712\x1b_xed:hl:reset\x07"), 2);
	});
});

describe("stripAnsi", () => {
	it("removes control sequences", () => {
		assert.strictEqual(stripAnsi("\x1b[1;31ma\x1b[0m\x1b]0;t\x07b"), "ab");
	});
});

describe("truncateToWidth", () => {
	it("returns short text unchanged", () => {
		assert.strictEqual(truncateToWidth("hi", 5), "hi");
	});

	it("pads short text when asked", () => {
		assert.strictEqual(truncateToWidth("hi", 5, "...", true), "hi   ");
	});

	it("adds an ellipsis when truncating", () => {
		assert.strictEqual(truncateToWidth("hello world", 8), "hello...");
		assert.strictEqual(truncateToWidth("hello world", 5, ""), "hello");
	});

	it("does not split wide characters", () => {
		assert.strictEqual(truncateToWidth("中文字", 5), "中...");
	});

	it("keeps ANSI codes and resets before the ellipsis", () => {
		assert.strictEqual(truncateToWidth("\x1b[31mhello world\x1b[0m", 8), "\x1b[31mhello\x1b[0m...");
	});

	it("pads truncated text to the full width", () => {
		assert.strictEqual(truncateToWidth("中文字", 5, "", true), "中文 ");
	});
});
