import assert from "node:assert";
import { afterEach, beforeEach, describe, it } from "node:test";
import { extractCompleteSequences, StdinBuffer } from "../src/stdin-buffer.js";

describe("StdinBuffer", () => {
	let buffer: StdinBuffer;
	let data: string[];
	let pastes: string[];

	beforeEach(() => {
		buffer = new StdinBuffer({ timeout: 5 });
		data = [];
		pastes = [];
		buffer.on("data", (sequence) => data.push(sequence));
		buffer.on("paste", (content) => pastes.push(content));
	});

	afterEach(() => {
		buffer.destroy();
	});

	it("emits complete escape sequences", () => {
		buffer.process("\x1b[A");
		assert.deepStrictEqual(data, ["\x1b[A"]);
	});

	it("splits plain text into characters", () => {
		buffer.process("a\x1b[Bc");
		assert.deepStrictEqual(data, ["a", "\x1b[B", "c"]);
	});

	it("keeps surrogate pairs together", () => {
		buffer.process("\u{1F600}x");
		assert.deepStrictEqual(data, ["\u{1F600}", "x"]);
	});

	it("keeps alt with an astral character in one sequence across chunks", () => {
		buffer.process("\x1b\ud83d");
		assert.deepStrictEqual(data, []);
		buffer.process("\ude00x");
		assert.deepStrictEqual(data, ["\x1b\u{1F600}", "x"]);
	});

	it("joins escape sequences split across chunks", () => {
		buffer.process("\x1b");
		assert.deepStrictEqual(data, []);
		buffer.process("[1;5");
		assert.deepStrictEqual(data, []);
		buffer.process("C");
		assert.deepStrictEqual(data, ["\x1b[1;5C"]);
	});

	it("flushes a lone escape after the timeout", async () => {
		buffer.process("\x1b");
		await new Promise((resolve) => setTimeout(resolve, 30));
		assert.deepStrictEqual(data, ["\x1b"]);
	});

	it("returns pending input from flush", () => {
		buffer.process("\x1b[");
		assert.strictEqual(buffer.getBuffer(), "\x1b[");
		assert.deepStrictEqual(buffer.flush(), ["\x1b["]);
		assert.strictEqual(buffer.getBuffer(), "");
	});

	it("emits bracketed paste content as one event", () => {
		buffer.process("x\x1b[200~hello\x1b[201~y");
		assert.deepStrictEqual(data, ["x", "y"]);
		assert.deepStrictEqual(pastes, ["hello"]);
	});

	it("collects paste content across chunks", () => {
		buffer.process("\x1b[200~hel");
		buffer.process("lo\nworld\x1b[201~");
		assert.deepStrictEqual(pastes, ["hello\nworld"]);
		assert.deepStrictEqual(data, []);
	});
});

describe("extractCompleteSequences", () => {
	it("leaves incomplete sequences in the remainder", () => {
		assert.deepStrictEqual(extractCompleteSequences("a\x1b[1;"), { sequences: ["a"], remainder: "\x1b[1;" });
	});

	it("recognizes SS3, OSC and meta sequences", () => {
		assert.deepStrictEqual(extractCompleteSequences("\x1bOA\x1b]0;t\x07\x1bx"), {
			sequences: ["\x1bOA", "\x1b]0;t\x07", "\x1bx"],
			remainder: "",
		});
	});

	it("takes a whole code point after escape", () => {
		assert.deepStrictEqual(extractCompleteSequences("\x1b\u{1F600}a"), {
			sequences: ["\x1b\u{1F600}", "a"],
			remainder: "",
		});
		assert.deepStrictEqual(extractCompleteSequences("\x1b\ud83d"), { sequences: [], remainder: "\x1b\ud83d" });
	});
});
