import { eastAsianWidth } from "get-east-asian-width";

// 字形分割器（共享实例）
const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

// 字符分类正则（与 string-width 库相同的类别）
const zeroWidthRegex = /^(?:\p{Default_Ignorable_Code_Point}|\p{Control}|\p{Mark}|\p{Surrogate})+$/u;
const leadingNonPrintingRegex = /^[\p{Default_Ignorable_Code_Point}\p{Control}\p{Format}\p{Mark}\p{Surrogate}]+/u;
const pictographicRegex = /^\p{Extended_Pictographic}/u;

// 非 ASCII 字符串的宽度缓存
const WIDTH_CACHE_SIZE = 512;
const widthCache = new Map<string, number>();

/**
 * 计算单个字形集群的终端宽度。
 */
function graphemeWidth(segment: string): number {
	if (zeroWidthRegex.test(segment)) {
		return 0;
	}

	// 表情符号（含 VS16 或 ZWJ 序列）占两列
	if (pictographicRegex.test(segment) && (segment.includes("\uFE0F") || segment.length > 2 || isWideCodePoint(segment))) {
		return 2;
	}

	const base = segment.replace(leadingNonPrintingRegex, "");
	const cp = base.codePointAt(0);
	if (cp === undefined) {
		return 0;
	}
	return eastAsianWidth(cp);
}

function isWideCodePoint(segment: string): boolean {
	const cp = segment.codePointAt(0);
	return cp !== undefined && eastAsianWidth(cp) === 2;
}

/**
 * 去除 SGR/光标控制序列、OSC 和 APC 序列（高亮标记也是 APC）。
 */
export function stripAnsi(str: string): string {
	if (!str.includes("\x1b")) return str;
	return str
		.replace(/\x1b\[[0-9;]*[A-Za-z]/g, "")
		.replace(/\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)/g, "")
		.replace(/\x1b_[^\x07\x1b]*(?:\x07|\x1b\\)/g, "");
}

/**
 * 计算字符串在终端中的可见宽度。
 */
export function visibleWidth(str: string): number {
	if (str.length === 0) {
		return 0;
	}

	// 快速路径：纯可打印 ASCII
	let isPureAscii = true;
	for (let i = 0; i < str.length; i++) {
		const code = str.charCodeAt(i);
		if (code < 0x20 || code > 0x7e) {
			isPureAscii = false;
			break;
		}
	}
	if (isPureAscii) {
		return str.length;
	}

	const cached = widthCache.get(str);
	if (cached !== undefined) {
		return cached;
	}

	let width = 0;
	for (const { segment } of segmenter.segment(stripAnsi(str))) {
		width += graphemeWidth(segment);
	}

	if (widthCache.size >= WIDTH_CACHE_SIZE) {
		const firstKey = widthCache.keys().next().value;
		if (firstKey !== undefined) {
			widthCache.delete(firstKey);
		}
	}
	widthCache.set(str, width);

	return width;
}

/**
 * 从字符串的指定位置提取 ANSI 转义序列。
 */
export function extractAnsiCode(str: string, pos: number): { code: string; length: number } | null {
	if (pos >= str.length || str[pos] !== "\x1b") return null;

	const next = str[pos + 1];

	// CSI：ESC [ 参数 字母
	if (next === "[") {
		let j = pos + 2;
		while (j < str.length && !/[A-Za-z]/.test(str[j] ?? "")) j++;
		if (j < str.length) return { code: str.substring(pos, j + 1), length: j + 1 - pos };
		return null;
	}

	// OSC / APC：以 BEL 或 ST (ESC \) 结尾
	if (next === "]" || next === "_") {
		let j = pos + 2;
		while (j < str.length) {
			if (str[j] === "\x07") return { code: str.substring(pos, j + 1), length: j + 1 - pos };
			if (str[j] === "\x1b" && str[j + 1] === "\\") return { code: str.substring(pos, j + 2), length: j + 2 - pos };
			j++;
		}
		return null;
	}

	return null;
}

/**
 * 截断文本以适应最大可见宽度，必要时添加省略号。
 * 可选地用空格填充以精确达到 maxWidth。ANSI 转义代码不计入宽度。
 *
 * @param ellipsis - 截断时附加的省略号字符串（默认："..."）
 * @param pad - 如果为 true，则用空格填充结果以精确达到 maxWidth（默认：false）
 */
export function truncateToWidth(text: string, maxWidth: number, ellipsis: string = "...", pad: boolean = false): string {
	const textVisibleWidth = visibleWidth(text);

	if (textVisibleWidth <= maxWidth) {
		return pad ? text + " ".repeat(maxWidth - textVisibleWidth) : text;
	}

	const ellipsisWidth = visibleWidth(ellipsis);
	const targetWidth = maxWidth - ellipsisWidth;

	if (targetWidth <= 0) {
		return ellipsis.substring(0, Math.max(0, maxWidth));
	}

	let result = "";
	let currentWidth = 0;
	let i = 0;
	let hasAnsi = false;

	outer: while (i < text.length) {
		const ansi = extractAnsiCode(text, i);
		if (ansi) {
			result += ansi.code;
			hasAnsi = true;
			i += ansi.length;
			continue;
		}

		// 截取到下一个转义序列之前的纯文本部分
		let end = i;
		while (end < text.length && !extractAnsiCode(text, end)) end++;

		for (const { segment } of segmenter.segment(text.slice(i, end))) {
			const width = graphemeWidth(segment);
			if (currentWidth + width > targetWidth) {
				break outer;
			}
			result += segment;
			currentWidth += width;
		}
		i = end;
	}

	// 在省略号前重置样式，以防止样式泄露到省略号中
	const truncated = hasAnsi ? `${result}\x1b[0m${ellipsis}` : result + ellipsis;
	if (pad) {
		return truncated + " ".repeat(Math.max(0, maxWidth - currentWidth - ellipsisWidth));
	}
	return truncated;
}
