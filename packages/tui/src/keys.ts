/**
 * 按键标识符，例如 "ctrl+s"、"up"、"pageDown"、"alt+x"，可打印字符就是字符本身。
 */
export type KeyId = string;

/**
 * 常用按键标识符。
 */
export const Key = {
	up: "up",
	down: "down",
	left: "left",
	right: "right",
	home: "home",
	end: "end",
	pageUp: "pageUp",
	pageDown: "pageDown",
	insert: "insert",
	delete: "delete",
	backspace: "backspace",
	enter: "enter",
	tab: "tab",
	escape: "escape",
	space: "space",
	ctrl: (key: string): KeyId => `ctrl+${key}`,
	alt: (key: string): KeyId => `alt+${key}`,
	shift: (key: string): KeyId => `shift+${key}`,
} as const;

// CSI/SS3 末尾字符 -> 按键
const FINAL_BYTE_KEYS: Record<string, KeyId> = {
	A: "up",
	B: "down",
	C: "right",
	D: "left",
	H: "home",
	F: "end",
};

// CSI <n> ~ -> 按键
const TILDE_KEYS: Record<string, KeyId> = {
	"1": "home",
	"2": "insert",
	"3": "delete",
	"4": "end",
	"5": "pageUp",
	"6": "pageDown",
	"7": "home",
	"8": "end",
};

// xterm 修饰参数：1 + (shift ? 1 : 0) + (alt ? 2 : 0) + (ctrl ? 4 : 0)
function modifierPrefix(param: number): string {
	const bits = param - 1;
	let prefix = "";
	if (bits & 4) prefix += "ctrl+";
	if (bits & 2) prefix += "alt+";
	if (bits & 1) prefix += "shift+";
	return prefix;
}

function parseSingle(ch: string): KeyId | undefined {
	const code = ch.charCodeAt(0);
	if (ch === "\r" || ch === "\n") return "enter";
	if (ch === "\t") return "tab";
	if (ch === "\x7f" || ch === "\b") return "backspace";
	if (ch === "\x1b") return "escape";
	if (ch === " ") return "space";
	if (code === 0) return "ctrl+space";
	if (code >= 1 && code <= 26) return `ctrl+${String.fromCharCode(code + 96)}`;
	if (code === 0x1c) return "ctrl+\\";
	if (code === 0x1d) return "ctrl+]";
	if (code === 0x1f) return "ctrl+-";
	return undefined;
}

/**
 * 将单个输入序列（StdinBuffer 拆分后）解析为按键标识符。
 * 可打印文本返回其本身，无法识别的转义序列返回 undefined。
 */
export function parseKey(data: string): KeyId | undefined {
	if (data.length === 0) return undefined;

	if (data.length === 1) {
		return parseSingle(data) ?? data;
	}

	if (data === "\x1b[Z") return "shift+tab";

	// CSI：ESC [ <params> <final>
	const csi = /^\x1b\[(\d*)(?:;(\d+))?([A-Za-z~])$/.exec(data);
	if (csi) {
		const [, first = "", modifier, final = ""] = csi;
		const prefix = modifier ? modifierPrefix(Number(modifier)) : "";
		if (final === "~") {
			const key = TILDE_KEYS[first];
			return key ? prefix + key : undefined;
		}
		const key = FINAL_BYTE_KEYS[final];
		return key ? prefix + key : undefined;
	}

	// SS3：ESC O <final>
	if (data.length === 3 && data.startsWith("\x1bO")) {
		return FINAL_BYTE_KEYS[data[2] ?? ""];
	}

	// Meta：ESC 后跟单个码点
	const rest = data.slice(1);
	if (data.startsWith("\x1b") && [...rest].length === 1) {
		const key = parseSingle(rest) ?? rest;
		return `alt+${key}`;
	}

	// 多字节的单个可打印字形（例如表情符号）
	return isPrintable(data) ? data : undefined;
}

/**
 * 检查输入是否匹配按键标识符。
 */
export function matchesKey(data: string, keyId: KeyId): boolean {
	return parseKey(data) === keyId;
}

/**
 * 输入是否为可直接插入的文本（不含控制字符和转义序列）。
 */
export function isPrintable(data: string): boolean {
	return data.length > 0 && !/[\x00-\x1f\x7f]/.test(data);
}
