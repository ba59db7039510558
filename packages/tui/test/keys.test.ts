import assert from "node:assert";
import { describe, it } from "node:test";
import { isPrintable, Key, matchesKey, parseKey } from "../src/keys.js";

describe("parseKey", () => {
	it("parses CSI and SS3 arrow keys", () => {
		assert.strictEqual(parseKey("\x1b[A"), "up");
		assert.strictEqual(parseKey("\x1b[B"), "down");
		assert.strictEqual(parseKey("\x1bOC"), "right");
		assert.strictEqual(parseKey("\x1bOD"), "left");
	});

	it("applies xterm modifier parameters", () => {
		assert.strictEqual(parseKey("\x1b[1;5C"), "ctrl+right");
		assert.strictEqual(parseKey("\x1b[1;2D"), "shift+left");
		assert.strictEqual(parseKey("\x1b[1;3A"), "alt+up");
		assert.strictEqual(parseKey("\x1b[3;5~"), "ctrl+delete");
	});

	it("parses tilde keys", () => {
		assert.strictEqual(parseKey("\x1b[3~"), "delete");
		assert.strictEqual(parseKey("\x1b[5~"), "pageUp");
		assert.strictEqual(parseKey("\x1b[6~"), "pageDown");
		assert.strictEqual(parseKey("\x1b[1~"), "home");
		assert.strictEqual(parseKey("\x1b[4~"), "end");
		assert.strictEqual(parseKey("\x1b[H"), "home");
		assert.strictEqual(parseKey("\x1b[F"), "end");
	});

	it("parses control characters", () => {
		assert.strictEqual(parseKey("\r"), "enter");
		assert.strictEqual(parseKey("\n"), "enter");
		assert.strictEqual(parseKey("\t"), "tab");
		assert.strictEqual(parseKey("\x7f"), "backspace");
		assert.strictEqual(parseKey("\b"), "backspace");
		assert.strictEqual(parseKey("\x1b"), "escape");
		assert.strictEqual(parseKey("\x1b[Z"), "shift+tab");
		assert.strictEqual(parseKey("\x13"), "ctrl+s");
		assert.strictEqual(parseKey("\x11"), "ctrl+q");
		assert.strictEqual(parseKey("\x06"), "ctrl+f");
	});

	it("parses meta keys", () => {
		assert.strictEqual(parseKey("\x1bx"), "alt+x");
		assert.strictEqual(parseKey("\x1b\x7f"), "alt+backspace");
		assert.strictEqual(parseKey("\x1b\u{1F600}"), "alt+\u{1F600}");
	});

	it("returns printable text as is", () => {
		assert.strictEqual(parseKey("a"), "a");
		assert.strictEqual(parseKey(" "), "space");
		assert.strictEqual(parseKey("é"), "é");
		assert.strictEqual(parseKey("\u{1F600}"), "\u{1F600}");
	});

	it("returns undefined for unknown escape sequences", () => {
		assert.strictEqual(parseKey("\x1b[99X"), undefined);
		assert.strictEqual(parseKey(""), undefined);
	});
});

describe("matchesKey", () => {
	it("compares against key ids", () => {
		assert.strictEqual(matchesKey("\x13", Key.ctrl("s")), true);
		assert.strictEqual(matchesKey("\x13", Key.ctrl("q")), false);
		assert.strictEqual(matchesKey("\x1b[A", Key.up), true);
		assert.strictEqual(matchesKey("j", "j"), true);
	});
});

describe("isPrintable", () => {
	it("rejects control characters and escape sequences", () => {
		assert.strictEqual(isPrintable("a"), true);
		assert.strictEqual(isPrintable("中"), true);
		assert.strictEqual(isPrintable("\x1b[A"), false);
		assert.strictEqual(isPrintable("\r"), false);
		assert.strictEqual(isPrintable(""), false);
	});
});
