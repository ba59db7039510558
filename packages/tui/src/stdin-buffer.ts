/**
 * StdinBuffer 缓冲输入并发出完整的序列。
 *
 * stdin 的数据事件可能只包含转义序列的一部分（例如 `\x1b` 与 `[A` 分两次到达），
 * 不缓冲的话，部分序列会被误解为 Escape 加普通按键。
 * 普通文本按码点逐个发出，括号粘贴的内容整体通过 "paste" 事件发出。
 */

import { EventEmitter } from "node:events";

const ESC = "\x1b";
const BRACKETED_PASTE_START = "\x1b[200~";
const BRACKETED_PASTE_END = "\x1b[201~";

type SequenceStatus = "complete" | "incomplete";

/**
 * 判断以 ESC 开头的字符串是否已构成完整序列
 */
function sequenceStatus(data: string): SequenceStatus {
	if (data.length === 1) {
		return "incomplete";
	}

	const introducer = data[1];

	// CSI：ESC [ 参数 结束字节 (0x40-0x7E)
	if (introducer === "[") {
		if (data.length < 3) return "incomplete";
		const code = data.charCodeAt(data.length - 1);
		return code >= 0x40 && code <= 0x7e ? "complete" : "incomplete";
	}

	// OSC/DCS/APC：以 ST (ESC \) 或 BEL 结尾
	if (introducer === "]" || introducer === "P" || introducer === "_") {
		return data.endsWith(`${ESC}\\`) || data.endsWith("\x07") ? "complete" : "incomplete";
	}

	// SS3：ESC O 后跟单个字符
	if (introducer === "O") {
		return data.length >= 3 ? "complete" : "incomplete";
	}

	// Meta：ESC 后跟单个码点，代理对需要等到低位代理
	const code = data.charCodeAt(1);
	if (code >= 0xd800 && code <= 0xdbff && data.length < 3) {
		return "incomplete";
	}
	return "complete";
}

/**
 * 将累积的缓冲区拆分为完整的序列，剩余的不完整转义序列留在 remainder 中
 */
export function extractCompleteSequences(buffer: string): { sequences: string[]; remainder: string } {
	const sequences: string[] = [];
	let pos = 0;

	while (pos < buffer.length) {
		if (buffer.startsWith(ESC, pos)) {
			let end = pos + 1;
			while (end <= buffer.length && sequenceStatus(buffer.slice(pos, end)) === "incomplete") {
				end++;
			}
			if (end > buffer.length) {
				return { sequences, remainder: buffer.slice(pos) };
			}
			sequences.push(buffer.slice(pos, end));
			pos = end;
			continue;
		}

		const codePoint = buffer.codePointAt(pos) ?? 0;
		const char = String.fromCodePoint(codePoint);
		sequences.push(char);
		pos += char.length;
	}

	return { sequences, remainder: "" };
}

export type StdinBufferOptions = {
	/**
	 * 等待序列完成的最长时间（默认：10ms）
	 * 超过此时间后，即使不完整也会刷新缓冲区
	 */
	timeout?: number;
};

export type StdinBufferEventMap = {
	data: [string];
	paste: [string];
};

/**
 * 缓冲 stdin 输入并通过 'data' 事件发出完整的序列。
 */
export class StdinBuffer extends EventEmitter<StdinBufferEventMap> {
	private buffer = "";
	private timeout: ReturnType<typeof setTimeout> | null = null;
	private readonly timeoutMs: number;
	private pasteMode = false;
	private pasteBuffer = "";

	constructor(options: StdinBufferOptions = {}) {
		super();
		this.timeoutMs = options.timeout ?? 10;
	}

	process(data: string): void {
		this.clearTimer();

		if (this.pasteMode) {
			this.pasteBuffer += data;
			this.finishPaste();
			return;
		}

		this.buffer += data;

		const startIndex = this.buffer.indexOf(BRACKETED_PASTE_START);
		if (startIndex !== -1) {
			this.emitSequences(extractCompleteSequences(this.buffer.slice(0, startIndex)).sequences);
			this.pasteMode = true;
			this.pasteBuffer = this.buffer.slice(startIndex + BRACKETED_PASTE_START.length);
			this.buffer = "";
			this.finishPaste();
			return;
		}

		const result = extractCompleteSequences(this.buffer);
		this.buffer = result.remainder;
		this.emitSequences(result.sequences);

		if (this.buffer.length > 0) {
			this.timeout = setTimeout(() => {
				this.emitSequences(this.flush());
			}, this.timeoutMs);
		}
	}

	/**
	 * 立即返回缓冲区中剩余的内容（作为单个序列）并清空缓冲区
	 */
	flush(): string[] {
		this.clearTimer();
		if (this.buffer.length === 0) {
			return [];
		}
		const sequences = [this.buffer];
		this.buffer = "";
		return sequences;
	}

	clear(): void {
		this.clearTimer();
		this.buffer = "";
		this.pasteMode = false;
		this.pasteBuffer = "";
	}

	getBuffer(): string {
		return this.buffer;
	}

	destroy(): void {
		this.clear();
		this.removeAllListeners();
	}

	private finishPaste(): void {
		const endIndex = this.pasteBuffer.indexOf(BRACKETED_PASTE_END);
		if (endIndex === -1) return;

		const content = this.pasteBuffer.slice(0, endIndex);
		const remaining = this.pasteBuffer.slice(endIndex + BRACKETED_PASTE_END.length);
		this.pasteMode = false;
		this.pasteBuffer = "";
		this.emit("paste", content);

		if (remaining.length > 0) {
			this.process(remaining);
		}
	}

	private emitSequences(sequences: string[]): void {
		for (const sequence of sequences) {
			this.emit("data", sequence);
		}
	}

	private clearTimer(): void {
		if (this.timeout) {
			clearTimeout(this.timeout);
			this.timeout = null;
		}
	}
}
